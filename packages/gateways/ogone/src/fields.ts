import { randomUUID } from "crypto";
import {
  ConfigurationError,
  FieldSet,
  NonEmptyString,
  RequiredAddressSchema,
  assertNever,
  cardholderName,
  padDigits,
  shortYear,
  unsupportedPaymentMethod,
  validateConfiguration,
} from "@gatewire/core";
import type { CardPresent, ChargeOptions, PaymentMethod, PaymentOperation } from "@gatewire/core";
import {
  ALIAS_OPERATION_BY_PSP,
  AUTHORIZATION_SEPARATOR,
  DEFAULT_HTTP_ACCEPT,
  DIRECT_DEBIT,
  ORDER_ID_MAX_LENGTH,
  THREE_D_SECURE_DISPLAY_MODES,
  THREE_D_SECURE_FIELDS,
} from "./constants";

/**
 * Formats a card expiry as `MMYY`.
 *
 * @param card - The card
 * @returns The expiry date
 */
export function expiryDate(card: Pick<CardPresent, "year" | "month">): string {
  return `${padDigits(card.month, 2)}${shortYear(card.year)}`;
}

/**
 * Generates an order id within Ogone's length limit.
 *
 * @returns A random order id
 */
export function generateOrderId(): string {
  return randomUUID().replace(/-/g, "").slice(0, ORDER_ID_MAX_LENGTH);
}

/**
 * Uses the caller's order id, or a generated one when it is absent or blank.
 *
 * @param orderId - Order id from the operation options
 * @returns A non-blank order id
 */
export function orderIdOrGenerated(orderId: string | undefined): string {
  return orderId?.trim() || generateOrderId();
}

/**
 * Extracts the PAYID from an authorization token (`PAYID;operation`).
 *
 * @param authorization - Token returned by an earlier operation
 * @returns The payment id
 * @throws ConfigurationError if the token carries no payment id
 */
export function paymentIdFrom(authorization: string): string {
  const [payId = ""] = authorization.split(AUTHORIZATION_SEPARATOR);
  if (payId.trim() === "") {
    throw new ConfigurationError("Authorization token carries no PAYID", "authorization");
  }
  return payId.trim();
}

/**
 * Builds the operation-specific fields of an Ogone DirectLink request.
 * Credentials, amount and `Operation` are added by the dialect.
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

    case "capture":
    case "refund":
      return new FieldSet().set("PAYID", paymentIdFrom(operation.authorization));

    case "store": {
      const options = operation.options ?? {};
      const fields = new FieldSet().set("orderID", orderIdOrGenerated(options.orderId));
      addCard(fields, operation.card);
      if (options.billingId) {
        fields.set("ALIAS", options.billingId);
      } else {
        fields.set("ALIASOPERATION", ALIAS_OPERATION_BY_PSP);
      }
      return fields;
    }

    case "directDebit": {
      const options = operation.options ?? {};
      const orderId = validateConfiguration(NonEmptyString, options.orderId, "options.orderId");
      const address = validateConfiguration(RequiredAddressSchema, options.address, "options.address");
      const iban = validateConfiguration(NonEmptyString, operation.bankAccount.iban, "bankAccount.iban");
      const holder = validateConfiguration(NonEmptyString, operation.bankAccount.holder, "bankAccount.holder");

      return new FieldSet()
        .set("PM", DIRECT_DEBIT.PAYMENT_METHOD)
        .set("CARDNO", iban)
        .set("CN", holder)
        .set("OWNERADDRESS", address.street)
        .set("OWNERZIP", address.zip)
        .set("OWNERTOWN", address.city)
        .set("orderID", orderId)
        .set("ED", DIRECT_DEBIT.EXPIRY);
    }

    default:
      return assertNever(operation);
  }
}

function buildChargeFields(paymentMethod: PaymentMethod, options: ChargeOptions): FieldSet {
  const fields = new FieldSet()
    .set("orderID", orderIdOrGenerated(options.orderId))
    .set("COM", options.description);

  addPaymentMethod(fields, paymentMethod);
  fields.setIfAbsent("ALIAS", options.billingId);

  if (options.threeDSecure) {
    const threeDSecure = options.threeDSecure;
    fields
      .set("FLAG3D", "Y")
      .set("WIN3DS", THREE_D_SECURE_DISPLAY_MODES[threeDSecure.displayMode ?? "mainWindow"])
      .set("HTTP_ACCEPT", threeDSecure.httpAccept ?? DEFAULT_HTTP_ACCEPT)
      .merge(threeDSecure, THREE_D_SECURE_FIELDS);
  }

  const address = options.address;
  if (address) {
    fields
      .setIfAbsent("OWNERADDRESS", address.street)
      .setIfAbsent("OWNERZIP", address.zip)
      .setIfAbsent("OWNERTOWN", address.city)
      .setIfAbsent("OWNERCTY", address.country)
      .setIfAbsent("OWNERTELNO", address.phone);
  }

  return fields
    .setIfAbsent("EMAIL", options.personalData?.email)
    .setIfAbsent("REMOTE_ADDR", options.customerIp);
}

function addPaymentMethod(fields: FieldSet, paymentMethod: PaymentMethod): void {
  switch (paymentMethod.type) {
    case "card":
      addCard(fields, paymentMethod);
      return;

    case "stored":
      fields.set("ALIAS", validateConfiguration(NonEmptyString, paymentMethod.reference, "paymentMethod.reference"));
      return;

    case "invoice":
    case "onlineTransfer":
    case "wallet":
      unsupportedPaymentMethod("Ogone", paymentMethod);
      return;

    default:
      assertNever(paymentMethod);
  }
}

function addCard(fields: FieldSet, card: CardPresent): void {
  fields
    .set("CN", cardholderName(card))
    .set("CARDNO", card.number)
    .set("ED", expiryDate(card))
    .set("CVC", card.verificationValue);
}
