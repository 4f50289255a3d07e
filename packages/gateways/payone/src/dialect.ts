import { z } from "zod";
import {
  CredentialsSchema,
  CurrencySchema,
  DEFAULT_CURRENCY,
  FieldSet,
  GatewayModeSchema,
  HashedSecretSigner,
  MinorUnitsSchema,
  NonEmptyString,
  SUCCESS_MESSAGE,
  formatErrorMessage,
  parseKeyValueBody,
  validateConfiguration,
} from "@gatewire/core";
import type {
  Credentials,
  GatewayDialect,
  GatewayRequest,
  GatewayResult,
  ParsedResponse,
  PaymentOperation,
} from "@gatewire/core";
import { APPROVED_STATUS, DEFAULT_COUNTRY, PAYONE_REQUESTS, PAYONE_URL } from "./constants";
import { buildOperationFields } from "./fields";

/**
 * PayOne configuration schema. The portal key (`secret`) is required; it is
 * only ever sent as an MD5 hash.
 */
export const PayOneConfigSchema = z.object({
  credentials: CredentialsSchema.extend({
    loginId: NonEmptyString,
    subAccountId: NonEmptyString,
    secret: z.string().min(1),
    signatureAlgorithm: z.literal("md5-password").optional(),
  }),
  mode: GatewayModeSchema.default("live"),
  currency: CurrencySchema.default(DEFAULT_CURRENCY),
  url: z.string().url().default(PAYONE_URL),
});
export type PayOneConfig = z.input<typeof PayOneConfigSchema>;

/**
 * PayOne Server API dialect: form-encoded requests, `KEY=value` line responses.
 *
 * @example
 * ```typescript
 * const payone = new PayOneDialect({
 *   credentials: { merchantId: "10001", loginId: "2000001", subAccountId: "10002", secret: "portal-key" },
 *   mode: "test",
 * });
 * const client = new GatewayClient(payone);
 * const result = await client.purchase(1000, card);
 * ```
 */
export class PayOneDialect implements GatewayDialect {
  readonly name = "payone";
  readonly testMode: boolean;

  private readonly credentials: Readonly<Credentials>;
  private readonly currency: string;
  private readonly url: string;
  private readonly signer = new HashedSecretSigner("key", "md5");

  /**
   * Creates a PayOne dialect.
   *
   * @param config - Credentials and environment
   * @throws ConfigurationError if a required credential is missing
   */
  constructor(config: PayOneConfig) {
    const parsed = validateConfiguration(PayOneConfigSchema, config, "config");
    this.credentials = Object.freeze({ ...parsed.credentials });
    this.testMode = parsed.mode === "test";
    this.currency = parsed.currency;
    this.url = parsed.url;
  }

  buildRequest(operation: PaymentOperation): GatewayRequest {
    const fields = buildOperationFields(operation);

    fields
      .set("mid", this.credentials.merchantId)
      .set("portalid", this.credentials.loginId)
      .set("aid", this.credentials.subAccountId)
      .set("mode", this.testMode ? "test" : "live")
      .set("amount", operation.kind === "store" ? undefined : this.amountOf(operation))
      .set("request", PAYONE_REQUESTS[operation.kind])
      .set("currency", this.currencyOf(operation))
      .setIfAbsent("country", DEFAULT_COUNTRY);

    return { url: this.url, fields };
  }

  signRequest(fields: FieldSet): FieldSet {
    return this.signer.sign(fields, this.credentials);
  }

  parseResponse(body: string): ParsedResponse {
    return parseKeyValueBody(body);
  }

  normalizeResponse(response: ParsedResponse): GatewayResult {
    const success = response.status === APPROVED_STATUS;

    return {
      success,
      message: success
        ? SUCCESS_MESSAGE
        : formatErrorMessage(response.errormessage || response.customermessage || response.status),
      authorization: response.txid ?? response.pseudocardpan ?? "",
      rawFields: response,
      testMode: this.testMode,
      errorCode: response.errorcode || undefined,
      redirectUrl: response.redirecturl || undefined,
      billingId: response.userid || response.pseudocardpan || undefined,
    };
  }

  private amountOf(operation: Exclude<PaymentOperation, { kind: "store" }>): number {
    return validateConfiguration(MinorUnitsSchema, operation.amount, "amount");
  }

  private currencyOf(operation: PaymentOperation): string {
    const currency = operation.options?.currency;
    return currency === undefined ? this.currency : validateConfiguration(CurrencySchema, currency, "options.currency");
  }
}
