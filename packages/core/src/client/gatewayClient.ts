import { HTTP_SUCCESS_RANGE } from "../constants";
import { ParseError, TransportError } from "../errors";
import { FetchTransport } from "../http";
import type { Transport, TransportResponse } from "../http";
import { parseFailureResult } from "../normalize";
import type {
  BankAccount,
  CaptureOptions,
  CardPresent,
  ChargeOptions,
  DirectDebitOptions,
  GatewayDialect,
  GatewayResult,
  MinorUnits,
  ParsedResponse,
  PaymentMethod,
  PaymentOperation,
  RefundOptions,
  StoreOptions,
} from "../types";

export interface GatewayClientConfig {
  /** Defaults to a FetchTransport without timeout */
  transport?: Transport;
  /** Log operation, endpoint and outcome to the console. Field values are never logged. */
  debug?: boolean;
}

/**
 * Runs payment operations against one gateway dialect.
 *
 * Each call is a single request/response exchange: the dialect builds and
 * signs the fields, the transport posts them, and the dialect parses and
 * normalizes the answer. The client holds no mutable state, so one instance
 * may serve concurrent callers.
 */
export class GatewayClient {
  private readonly dialect: GatewayDialect;
  private readonly transport: Transport;
  private readonly debug: boolean;

  /**
   * Creates a new GatewayClient instance.
   *
   * @param dialect - The gateway dialect to speak
   * @param config - Transport and logging settings
   */
  constructor(dialect: GatewayDialect, config: GatewayClientConfig = {}) {
    this.dialect = dialect;
    this.transport = config.transport ?? new FetchTransport();
    this.debug = config.debug ?? false;
  }

  /**
   * Charges a payment method in one step.
   *
   * @param amount - Amount in minor units
   * @param paymentMethod - Card, stored reference or other payment method
   * @param options - Order, customer and 3-D Secure details
   * @returns The normalized gateway result
   */
  purchase(amount: MinorUnits, paymentMethod: PaymentMethod, options?: ChargeOptions): Promise<GatewayResult> {
    return this.execute({ kind: "purchase", amount, paymentMethod, options });
  }

  /**
   * Reserves an amount for a later capture.
   *
   * @param amount - Amount in minor units
   * @param paymentMethod - Card, stored reference or other payment method
   * @param options - Order, customer and 3-D Secure details
   * @returns The normalized gateway result; pass its authorization to capture
   */
  authorize(amount: MinorUnits, paymentMethod: PaymentMethod, options?: ChargeOptions): Promise<GatewayResult> {
    return this.execute({ kind: "authorize", amount, paymentMethod, options });
  }

  capture(amount: MinorUnits, authorization: string, options?: CaptureOptions): Promise<GatewayResult> {
    return this.execute({ kind: "capture", amount, authorization, options });
  }

  refund(amount: MinorUnits, authorization: string, options?: RefundOptions): Promise<GatewayResult> {
    return this.execute({ kind: "refund", amount, authorization, options });
  }

  /**
   * Registers a card with the gateway so later calls can use a stored reference.
   *
   * @param card - The card to store
   * @param options - Alias and order details
   * @returns The normalized gateway result, with the issued reference in `billingId`
   */
  store(card: CardPresent, options?: StoreOptions): Promise<GatewayResult> {
    return this.execute({ kind: "store", card, options });
  }

  directDebit(amount: MinorUnits, bankAccount: BankAccount, options?: DirectDebitOptions): Promise<GatewayResult> {
    return this.execute({ kind: "directDebit", amount, bankAccount, options });
  }

  /**
   * Runs one operation through the full pipeline.
   *
   * @param operation - The operation to run
   * @returns The normalized gateway result. Declines are results, not errors.
   * @throws ConfigurationError if the request cannot be built
   * @throws TransportError if the HTTP exchange fails
   */
  async execute(operation: PaymentOperation): Promise<GatewayResult> {
    const request = this.dialect.buildRequest(operation);
    const fields = this.dialect.signRequest(request.fields);

    this.log(`${operation.kind} -> POST ${request.url}`);
    const response = await this.post(request.url, fields.toFormBody());
    this.log(`${operation.kind} <- HTTP ${response.status}`);

    let parsed: ParsedResponse;
    try {
      parsed = this.dialect.parseResponse(response.body);
    } catch (error) {
      if (error instanceof ParseError) {
        this.log(`${operation.kind} response could not be parsed: ${error.message}`);
        return parseFailureResult(response.body, this.dialect.testMode);
      }
      throw error;
    }

    const result = this.dialect.normalizeResponse(parsed, { url: request.url, fields });
    this.log(`${operation.kind} ${result.success ? "succeeded" : "failed"}: ${result.message}`);
    return result;
  }

  private async post(url: string, body: string): Promise<TransportResponse> {
    let response: TransportResponse;
    try {
      response = await this.transport.post(url, body, {});
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(
        `POST ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (response.status < HTTP_SUCCESS_RANGE.MIN || response.status > HTTP_SUCCESS_RANGE.MAX) {
      throw new TransportError(`Gateway responded with HTTP ${response.status}`, {
        status: response.status,
      });
    }
    return response;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[Gatewire ${this.dialect.name}] ${message}`);
    }
  }
}
