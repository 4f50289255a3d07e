import { VERIFICATION_RESULTS } from "../constants";
import type { VerificationResult, VerificationTable } from "../constants";
import { PARSE_FAILURE_MESSAGE } from "../errors";
import type { GatewayResult } from "../types";

/**
 * Upper-cases the first character and lower-cases the rest.
 *
 * @param value - The string to capitalize
 * @returns The capitalized string
 *
 * @example
 * ```typescript
 * capitalize("invalid CARD"); // "Invalid card"
 * ```
 */
export function capitalize(value: string): string {
  if (value === "") {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Turns a raw gateway error string into a human message.
 *
 * A pipe-delimited list is joined with commas, a slash-delimited list is cut
 * to its first segment, and anything else is trimmed. The result is
 * capitalized in every case.
 *
 * @param raw - Raw error text from the gateway, possibly absent
 * @returns The formatted message
 *
 * @example
 * ```typescript
 * formatErrorMessage("Rejected|Invalid card"); // "Rejected, invalid card"
 * formatErrorMessage("foo/bar/baz");           // "Foo"
 * formatErrorMessage(" single error ");        // "Single error"
 * ```
 */
export function formatErrorMessage(raw: string | undefined): string {
  const message = (raw ?? "").trim();

  if (message.includes("|")) {
    return capitalize(message.split("|").join(", "));
  }
  if (message.includes("/")) {
    return capitalize(message.split("/")[0] ?? "");
  }
  return capitalize(message);
}

/**
 * Maps a raw AVS or CVV check code through a lookup table.
 *
 * @param table - The dialect's code table
 * @param code - Raw code from the response
 * @returns Undefined when the gateway sent no code, `unknown` for codes outside the table
 */
export function mapVerificationCode(
  table: VerificationTable,
  code: string | undefined,
): VerificationResult | undefined {
  if (code === undefined || code === "") {
    return undefined;
  }
  return Object.prototype.hasOwnProperty.call(table, code) ? table[code] : VERIFICATION_RESULTS.UNKNOWN;
}

/**
 * Builds the failed result returned when a response body cannot be parsed.
 *
 * @param body - The raw response body, kept for diagnostics
 * @param testMode - Whether the dialect runs against the test environment
 * @returns A failed gateway result
 */
export function parseFailureResult(body: string, testMode: boolean): GatewayResult {
  return {
    success: false,
    message: PARSE_FAILURE_MESSAGE,
    authorization: "",
    rawFields: { body },
    testMode,
  };
}
