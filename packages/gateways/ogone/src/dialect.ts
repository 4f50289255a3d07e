import { z } from "zod";
import {
  CanonicalSigner,
  CredentialsSchema,
  CurrencySchema,
  DEFAULT_CURRENCY,
  FieldSet,
  GatewayModeSchema,
  MinorUnitsSchema,
  NonEmptyString,
  SUCCESS_MESSAGE,
  formatErrorMessage,
  mapVerificationCode,
  parseXmlAttributes,
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
import {
  AUTHORIZATION_SEPARATOR,
  AVS_RESULTS,
  CVV_RESULTS,
  DEFAULT_STORE_AMOUNT,
  HTML_ANSWER,
  LEGACY_SIGNATURE_FIELDS,
  MAINTENANCE_PATH,
  OGONE_LIVE_URL,
  OGONE_OPERATIONS,
  OGONE_TEST_URL,
  ORDER_PATH,
  SIGNATURE_FIELD,
} from "./constants";
import { buildOperationFields } from "./fields";

/**
 * Ogone configuration schema. The SHA-IN passphrase (`secret`) is optional;
 * without it requests go out unsigned and a deprecation warning is logged,
 * unless `signatureAlgorithm` is explicitly `none`. A configured passphrase
 * always signs.
 */
export const OgoneConfigSchema = z.object({
  credentials: CredentialsSchema.extend({
    loginId: NonEmptyString,
    password: NonEmptyString,
    signatureAlgorithm: z.enum(["none", "sha1", "sha256", "sha512"]).optional(),
  }),
  mode: GatewayModeSchema.default("live"),
  currency: CurrencySchema.default(DEFAULT_CURRENCY),
  /** Amount authorized when registering an alias */
  storeAmount: MinorUnitsSchema.default(DEFAULT_STORE_AMOUNT),
  /** Overrides the test or live base URL */
  baseUrl: z.string().url().optional(),
});
export type OgoneConfig = z.input<typeof OgoneConfigSchema>;

/**
 * Ogone DirectLink dialect: form-encoded requests signed with a SHA digest,
 * XML responses carrying their fields as root attributes.
 */
export class OgoneDialect implements GatewayDialect {
  readonly name = "ogone";
  readonly testMode: boolean;

  private readonly credentials: Readonly<Credentials>;
  private readonly currency: string;
  private readonly storeAmount: number;
  private readonly baseUrl: string;
  private readonly signer: CanonicalSigner;

  /**
   * Creates an Ogone dialect.
   *
   * @param config - Credentials and environment
   * @param warn - Receives the unsigned-request deprecation notice; defaults to console.warn
   * @throws ConfigurationError if a required credential is missing
   */
  constructor(config: OgoneConfig, warn?: (message: string) => void) {
    const parsed = validateConfiguration(OgoneConfigSchema, config, "config");
    this.credentials = Object.freeze({ ...parsed.credentials });
    this.testMode = parsed.mode === "test";
    this.currency = parsed.currency;
    this.storeAmount = parsed.storeAmount;
    this.baseUrl = parsed.baseUrl ?? (this.testMode ? OGONE_TEST_URL : OGONE_LIVE_URL);
    this.signer = new CanonicalSigner({
      fieldName: SIGNATURE_FIELD,
      legacyFields: LEGACY_SIGNATURE_FIELDS,
      warn,
    });
  }

  buildRequest(operation: PaymentOperation): GatewayRequest {
    const fields = buildOperationFields(operation);

    fields
      .set("amount", this.amountOf(operation))
      .set("currency", this.currencyOf(operation))
      .set("PSPID", this.credentials.merchantId)
      .set("USERID", this.credentials.loginId)
      .set("PSWD", this.credentials.password)
      .set("Operation", OGONE_OPERATIONS[operation.kind]);

    return { url: this.endpointFor(fields), fields };
  }

  /**
   * Signs the request as it stands, `Operation` and credentials included.
   *
   * @param fields - The unsigned request
   * @returns The request with `SHASign` appended when a secret is configured
   */
  signRequest(fields: FieldSet): FieldSet {
    return this.signer.sign(fields, this.credentials);
  }

  /**
   * Exposes the string digested for a request, for comparison with the
   * back-office SHA-IN settings.
   *
   * @param fields - The unsigned request
   * @returns The canonical string, passphrase included
   */
  signatureInput(fields: FieldSet): string {
    return this.signer.canonicalString(fields, this.credentials);
  }

  parseResponse(body: string): ParsedResponse {
    return parseXmlAttributes(body, { textElements: [HTML_ANSWER] });
  }

  normalizeResponse(response: ParsedResponse, request: GatewayRequest): GatewayResult {
    const success = response.NCERROR === "0";
    const payId = response.PAYID ?? "";

    return {
      success,
      message: success ? SUCCESS_MESSAGE : formatErrorMessage(response.NCERRORPLUS),
      authorization: [payId, request.fields.get("Operation") ?? ""].join(AUTHORIZATION_SEPARATOR),
      rawFields: response,
      avsResult: mapVerificationCode(AVS_RESULTS, response.AAVCheck),
      cvvResult: mapVerificationCode(CVV_RESULTS, response.CVCCheck),
      testMode: this.testMode,
      errorCode: success ? undefined : response.NCERROR || undefined,
      htmlAnswer: response[HTML_ANSWER] || undefined,
      billingId: response.ALIAS || undefined,
      orderId: response.orderID || undefined,
    };
  }

  private endpointFor(fields: FieldSet): string {
    return this.baseUrl + (fields.has("PAYID") ? MAINTENANCE_PATH : ORDER_PATH);
  }

  private amountOf(operation: PaymentOperation): number {
    const amount = operation.kind === "store" ? this.storeAmount : operation.amount;
    return validateConfiguration(MinorUnitsSchema, amount, "amount");
  }

  private currencyOf(operation: PaymentOperation): string {
    const currency = operation.options?.currency;
    return currency === undefined ? this.currency : validateConfiguration(CurrencySchema, currency, "options.currency");
  }
}
