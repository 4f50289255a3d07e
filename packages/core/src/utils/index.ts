import { ConfigurationError } from "../errors";
import type { CardPresent, PaymentMethod } from "../types";

/**
 * Card holder name as sent to the gateway.
 *
 * @param card - The card
 * @returns "first last" when both parts are present, otherwise undefined so the field is omitted
 */
export function cardholderName(card: Pick<CardPresent, "firstName" | "lastName">): string | undefined {
  const first = card.firstName?.trim();
  const last = card.lastName?.trim();
  if (!first || !last) {
    return undefined;
  }
  return `${first} ${last}`;
}

/**
 * Zero-pads an integer to a fixed width.
 *
 * @param value - The number to pad
 * @param width - Minimum number of digits
 * @returns The padded digits
 *
 * @example
 * ```typescript
 * padDigits(8, 2);  // "08"
 * padDigits(99, 4); // "0099"
 * ```
 */
export function padDigits(value: number, width: number): string {
  return String(Math.trunc(Math.abs(value))).padStart(width, "0");
}

/**
 * Last two digits of a year, after padding it to four digits.
 *
 * @param year - Two- or four-digit year
 * @returns Two-digit year
 */
export function shortYear(year: number): string {
  return padDigits(year, 4).slice(-2);
}

/**
 * Fails a payment-method dispatch that a dialect cannot handle.
 *
 * @param dialect - Name of the dialect
 * @param paymentMethod - The unsupported payment method
 * @returns Never returns
 * @throws ConfigurationError always
 */
export function unsupportedPaymentMethod(dialect: string, paymentMethod: PaymentMethod): never {
  throw new ConfigurationError(
    `Payment method '${paymentMethod.type}' is not supported by ${dialect}`,
    "paymentMethod.type",
  );
}

/**
 * Compile-time exhaustiveness guard for tagged unions.
 *
 * @param value - The value that should have been narrowed to never
 * @returns Never returns
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
