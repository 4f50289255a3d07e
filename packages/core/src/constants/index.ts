/**
 * @fileoverview Constants shared by every gatewire dialect
 * @module @gatewire/core/constants
 */

/**
 * Currency sent when the caller does not override it.
 */
export const DEFAULT_CURRENCY = "EUR";

/**
 * Message carried by every successful result.
 */
export const SUCCESS_MESSAGE = "The transaction was successful";

/**
 * Outcome of an address (AVS) or card verification value (CVV) check.
 */
export const VERIFICATION_RESULTS = {
  MATCHED: "matched",
  FAILED: "failed",
  /** The check could not be performed by the issuer */
  UNAVAILABLE: "unavailable",
  /** The check was not requested or not processed */
  NOT_CHECKED: "not_checked",
  /** The gateway returned a code outside the known table */
  UNKNOWN: "unknown",
} as const;

export type VerificationResult = (typeof VERIFICATION_RESULTS)[keyof typeof VERIFICATION_RESULTS];

/**
 * Lookup table from a gateway's raw check code to a verification result.
 */
export type VerificationTable = Readonly<Record<string, VerificationResult>>;

export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

/**
 * HTTP status range treated as a completed exchange.
 */
export const HTTP_SUCCESS_RANGE = {
  MIN: 200,
  MAX: 299,
} as const;
