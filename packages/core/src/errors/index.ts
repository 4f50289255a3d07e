/**
 * @fileoverview Error classes raised by gatewire
 * @module @gatewire/core/errors
 */

/**
 * Message used for results built from an unparseable gateway response.
 */
export const PARSE_FAILURE_MESSAGE = "Unable to parse the gateway response";

/**
 * Thrown for missing or invalid credentials or structured options. Raised at
 * construction or build time, before anything is sent.
 */
export class ConfigurationError extends Error {
  /** Dotted path of the offending input, when known */
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.field = field;

    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Thrown when the HTTP exchange with the gateway could not be completed.
 */
export class TransportError extends Error {
  /** HTTP status, when the gateway answered at all */
  public readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status;

    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Thrown by response parsers when a body does not conform to the dialect.
 */
export class ParseError extends Error {
  public readonly body: string;

  constructor(message: string, body: string) {
    super(message);
    this.name = "ParseError";
    this.body = body;

    Object.setPrototypeOf(this, ParseError.prototype);
  }
}
