import { FORM_CONTENT_TYPE } from "../constants";
import { TransportError } from "../errors";

export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Performs the HTTP POST for one operation. Retries and timeouts are the
 * transport's business; the client never retries.
 */
export interface Transport {
  post(url: string, body: string, headers: Record<string, string>): Promise<TransportResponse>;
}

export interface FetchTransportConfig {
  /** Abort the exchange after this many milliseconds */
  timeoutMs?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Replacement for the global fetch */
  fetch?: typeof fetch;
}

/**
 * Transport backed by the Fetch API.
 */
export class FetchTransport implements Transport {
  private readonly config: FetchTransportConfig;

  constructor(config: FetchTransportConfig = {}) {
    this.config = config;
  }

  async post(url: string, body: string, headers: Record<string, string>): Promise<TransportResponse> {
    const fetchFn = this.config.fetch ?? fetch;

    let response: Response;
    try {
      response = await fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": FORM_CONTENT_TYPE, ...this.config.headers, ...headers },
        body,
        signal: this.config.timeoutMs ? AbortSignal.timeout(this.config.timeoutMs) : undefined,
      });
    } catch (error) {
      throw new TransportError(
        `POST ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    try {
      return { status: response.status, body: await response.text() };
    } catch (error) {
      throw new TransportError(`Failed to read response body from ${url}`, {
        status: response.status,
        cause: error,
      });
    }
  }
}
