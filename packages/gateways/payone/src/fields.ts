import {
  BankAccountSchema,
  ConfigurationError,
  FieldSet,
  InvoiceLineSchema,
  assertNever,
  cardholderName,
  padDigits,
  shortYear,
  validateConfiguration,
} from "@gatewire/core";
import type { CardPresent, ChargeOptions, InvoiceLine, PaymentMethod, PaymentOperation } from "@gatewire/core";
import {
  ADDRESS_FIELDS,
  CARD_BRAND_CODES,
  CLEARING_TYPES,
  DEBIT_FIELDS,
  ECOMMERCE_MODES,
  INVOICE_LINE_FIELDS,
  ONLINE_TRANSFER_FIELDS,
  PERSONAL_DATA_FIELDS,
  REDIRECT_FIELDS,
  THREE_D_SECURE_FIELDS,
} from "./constants";

/**
 * Formats a card expiry as `YYMM`.
 *
 * @param card - The card
 * @returns The expiry date
 *
 * @example
 * ```typescript
 * expiryDate({ year: 2009, month: 8 }); // "0908"
 * ```
 */
export function expiryDate(card: Pick<CardPresent, "year" | "month">): string {
  return `${shortYear(card.year)}${padDigits(card.month, 2)}`;
}

/**
 * Looks up the single-letter `cardtype` code for a brand.
 *
 * @param brand - Card brand, e.g. "visa"
 * @returns The PayOne card type code
 * @throws ConfigurationError for brands PayOne does not accept
 */
export function cardTypeCode(brand: string): string {
  if (!Object.hasOwn(CARD_BRAND_CODES, brand)) {
    throw new ConfigurationError(`Card brand '${brand}' is not supported by PayOne`, "paymentMethod.brand");
  }
  return CARD_BRAND_CODES[brand];
}

/**
 * Builds the operation-specific fields of a PayOne request. Credential and
 * common fields are added by the dialect.
 *
 * @param operation - The operation to encode
 * @returns The unsigned operation fields
 * @throws ConfigurationError if a required structured input is missing or invalid
 */
export function buildOperationFields(operation: PaymentOperation): FieldSet {
  switch (operation.kind) {
    case "purchase":
    case "authorize":
      return buildChargeFields(operation.paymentMethod, operation.options ?? {});

    case "capture": {
      const options = operation.options ?? {};
      const fields = new FieldSet().set("txid", requireAuthorization(operation.authorization));
      addInvoiceLine(fields, options.invoiceLine);
      return fields
        .set("sequencenumber", options.sequenceNumber)
        .set("reference", options.reference);
    }

    case "refund": {
      const options = operation.options ?? {};
      return new FieldSet()
        .set("txid", requireAuthorization(operation.authorization))
        .set("sequencenumber", options.sequenceNumber)
        .set("narrative_text", options.narrativeText)
        .set("use_customerdata", yesNo(options.useCustomerData));
    }

    case "store":
      return new FieldSet()
        .set("cardpan", operation.card.number)
        .set("cardtype", cardTypeCode(operation.card.brand))
        .set("cardexpiredate", expiryDate(operation.card))
        .set("cardcvc2", operation.card.verificationValue)
        .set("storecarddata", "yes");

    case "directDebit": {
      const options = operation.options ?? {};
      const account = validateConfiguration(BankAccountSchema, operation.bankAccount, "bankAccount");
      return new FieldSet()
        .merge(account, DEBIT_FIELDS)
        .set("clearingtype", CLEARING_TYPES.DEBIT)
        .fill(options.address, ADDRESS_FIELDS)
        .fill(options.personalData, PERSONAL_DATA_FIELDS)
        .set("reference", options.reference);
    }

    default:
      return assertNever(operation);
  }
}

function buildChargeFields(paymentMethod: PaymentMethod, options: ChargeOptions): FieldSet {
  const fields = new FieldSet();

  addPaymentMethod(fields, paymentMethod, options);
  if (paymentMethod.type === "card" || paymentMethod.type === "stored") {
    fields.merge(options.threeDSecure, THREE_D_SECURE_FIELDS);
  }
  fields.fill(options.address, ADDRESS_FIELDS);
  fields.fill(options.personalData, PERSONAL_DATA_FIELDS);
  addInvoiceLine(fields, options.invoiceLine);
  fields.setIfAbsent("reference", options.reference);

  return fields;
}

function addPaymentMethod(fields: FieldSet, paymentMethod: PaymentMethod, options: ChargeOptions): void {
  switch (paymentMethod.type) {
    case "card":
      fields
        .set("cardpan", paymentMethod.number)
        .set("cardexpiredate", expiryDate(paymentMethod))
        .set("cardcvc2", paymentMethod.verificationValue)
        .set("clearingtype", CLEARING_TYPES.CARD)
        .set("cardholder", cardholderName(paymentMethod))
        .set("ecommercemode", options.threeDSecure ? ECOMMERCE_MODES.THREE_D_SECURE : ECOMMERCE_MODES.INTERNET)
        .set("firstname", paymentMethod.firstName)
        .set("lastname", paymentMethod.lastName)
        .set("cardtype", cardTypeCode(paymentMethod.brand));
      return;

    case "stored": {
      const reference = paymentMethod.reference.trim();
      if (reference === "") {
        throw new ConfigurationError("Stored reference must not be blank", "paymentMethod.reference");
      }
      fields
        .set(/^\d+$/.test(reference) ? "userid" : "pseudocardpan", reference)
        .set("clearingtype", CLEARING_TYPES.CARD);
      return;
    }

    case "invoice":
      fields
        .set("reference", paymentMethod.reference)
        .set("clearingtype", CLEARING_TYPES.INVOICE)
        .set("vatid", options.vatId);
      return;

    case "onlineTransfer":
      fields
        .merge(paymentMethod, ONLINE_TRANSFER_FIELDS)
        .merge(options.redirect, REDIRECT_FIELDS)
        .set("clearingtype", CLEARING_TYPES.ONLINE_TRANSFER);
      return;

    case "wallet":
      fields
        .set("wallettype", paymentMethod.walletType)
        .merge(options.redirect, REDIRECT_FIELDS)
        .set("clearingtype", CLEARING_TYPES.WALLET);
      return;

    default:
      assertNever(paymentMethod);
  }
}

function addInvoiceLine(fields: FieldSet, line: InvoiceLine | undefined): void {
  if (line) {
    fields.merge(validateConfiguration(InvoiceLineSchema, line, "options.invoiceLine"), INVOICE_LINE_FIELDS);
  }
}

function requireAuthorization(authorization: string): string {
  if (authorization.trim() === "") {
    throw new ConfigurationError("Authorization token must not be blank", "authorization");
  }
  return authorization;
}

function yesNo(value: boolean | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value ? "yes" : "no";
}
