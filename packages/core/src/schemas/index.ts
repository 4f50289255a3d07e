import { z } from "zod";
import { ConfigurationError } from "../errors";

// ============================================================================
// Reusable Primitive Schemas
// ============================================================================

/**
 * Non-empty string schema - a string with at least one non-whitespace character.
 * Used for required credential and option fields.
 */
export const NonEmptyString = z.string().trim().min(1);
export type NonEmptyString = z.infer<typeof NonEmptyString>;

/**
 * Amount in minor currency units - a non-negative integer.
 */
export const MinorUnitsSchema = z.number().int().nonnegative();

/**
 * ISO 4217 alphabetic currency code.
 */
export const CurrencySchema = z.string().regex(/^[A-Z]{3}$/, {
  message: "Currency must be a three-letter ISO 4217 code (e.g. 'EUR')",
});

export const GatewayModeSchema = z.enum(["test", "live"]);

export const SignatureAlgorithmSchema = z.enum(["none", "sha1", "sha256", "sha512", "md5-password"]);

// ============================================================================
// Credential Schemas
// ============================================================================

/**
 * Credentials schema with every member optional except the merchant id.
 * Dialects tighten it with `.required()` for the members they sign with.
 */
export const CredentialsSchema = z.object({
  merchantId: NonEmptyString,
  loginId: NonEmptyString.optional(),
  subAccountId: NonEmptyString.optional(),
  password: NonEmptyString.optional(),
  secret: z.string().optional(),
  signatureAlgorithm: SignatureAlgorithmSchema.optional(),
});
export type CredentialsInput = z.infer<typeof CredentialsSchema>;

// ============================================================================
// Structured Input Schemas
// ============================================================================

/**
 * Address schema for operations that require a full postal address.
 */
export const RequiredAddressSchema = z.object({
  street: NonEmptyString,
  zip: NonEmptyString,
  city: NonEmptyString,
  country: z.string().optional(),
  phone: z.string().optional(),
});

export const InvoiceLineSchema = z.object({
  id: NonEmptyString,
  price: MinorUnitsSchema,
  quantity: z.number().int().positive(),
  description: z.string().optional(),
  vat: z.number().nonnegative().optional(),
});

/**
 * Bank account schema for direct debit. Either an IBAN, or an account number
 * together with a bank code, identifies the account.
 */
export const BankAccountSchema = z
  .object({
    holder: NonEmptyString,
    iban: z.string().optional(),
    bic: z.string().optional(),
    accountNumber: z.string().optional(),
    bankCode: z.string().optional(),
    country: z.string().optional(),
  })
  .refine(account => Boolean(account.iban?.trim()) || Boolean(account.accountNumber?.trim() && account.bankCode?.trim()), {
    message: "Bank account requires an IBAN or an account number with a bank code",
    path: ["iban"],
  });

// ============================================================================
// Validation
// ============================================================================

/**
 * Validates a value against a schema, converting failures into a
 * ConfigurationError that names the first offending path.
 *
 * @param schema - The zod schema to validate against
 * @param value - The value to validate
 * @param label - Name of the input, used as the path prefix in messages
 * @returns The parsed value
 * @throws ConfigurationError if validation fails
 */
export function validateConfiguration<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string,
): z.infer<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const field = [label, ...(issue?.path ?? [])].join(".");
  throw new ConfigurationError(`${field}: ${issue?.message ?? "invalid value"}`, field);
}
