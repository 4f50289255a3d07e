import type {
  Address,
  BankAccount,
  InvoiceLine,
  OnlineTransfer,
  PaymentOperationKind,
  PersonalData,
  RedirectUrls,
  ThreeDSecureOptions,
} from "@gatewire/core";

export const PAYONE_URL = "https://api.pay1.de/post-gateway/";

/**
 * Status value of an approved transaction.
 */
export const APPROVED_STATUS = "APPROVED";

/**
 * Single-letter `cardtype` codes by card brand.
 */
export const CARD_BRAND_CODES: Readonly<Record<string, string>> = {
  visa: "V",
  mastercard: "M",
  amex: "A",
  diners: "D",
  jcb: "J",
  maestro: "O",
};

/**
 * `clearingtype` codes selecting the settlement rail.
 */
export const CLEARING_TYPES = {
  CARD: "cc",
  DEBIT: "elv",
  ONLINE_TRANSFER: "sb",
  WALLET: "wlt",
  INVOICE: "rec",
} as const;

/**
 * `request` verb sent for each operation.
 */
export const PAYONE_REQUESTS: Readonly<Record<PaymentOperationKind, string>> = {
  purchase: "authorization",
  authorize: "preauthorization",
  capture: "capture",
  refund: "refund",
  store: "creditcardcheck",
  directDebit: "authorization",
};

/**
 * Country sent when no address supplies one.
 */
export const DEFAULT_COUNTRY = "DE";

export const ECOMMERCE_MODES = {
  INTERNET: "internet",
  THREE_D_SECURE: "3dsecure",
} as const;

// ============================================================================
// Allow-lists: structured input key -> PayOne field
// ============================================================================

export const ADDRESS_FIELDS: ReadonlyArray<readonly [keyof Address, string]> = [
  ["street", "street"],
  ["zip", "zip"],
  ["city", "city"],
  ["country", "country"],
];

export const PERSONAL_DATA_FIELDS: ReadonlyArray<readonly [keyof PersonalData, string]> = [
  ["customerId", "customerid"],
  ["salutation", "salutation"],
  ["firstName", "firstname"],
  ["lastName", "lastname"],
  ["company", "company"],
  ["email", "email"],
];

export const THREE_D_SECURE_FIELDS: ReadonlyArray<readonly [keyof ThreeDSecureOptions, string]> = [
  ["xid", "xid"],
  ["cavv", "cavv"],
  ["eci", "eci"],
  ["successUrl", "successurl"],
  ["errorUrl", "errorurl"],
];

export const DEBIT_FIELDS: ReadonlyArray<readonly [keyof BankAccount, string]> = [
  ["country", "bankcountry"],
  ["accountNumber", "bankaccount"],
  ["bankCode", "bankcode"],
  ["holder", "bankaccountholder"],
  ["iban", "iban"],
  ["bic", "bic"],
];

export const ONLINE_TRANSFER_FIELDS: ReadonlyArray<readonly [keyof OnlineTransfer, string]> = [
  ["transferType", "onlinebanktransfertype"],
  ["bankCountry", "bankcountry"],
  ["bankAccount", "bankaccount"],
  ["bankCode", "bankcode"],
  ["bankGroupType", "bankgrouptype"],
  ["iban", "iban"],
  ["bic", "bic"],
];

export const REDIRECT_FIELDS: ReadonlyArray<readonly [keyof RedirectUrls, string]> = [
  ["successUrl", "successurl"],
  ["errorUrl", "errorurl"],
  ["backUrl", "backurl"],
];

/**
 * Invoice line fields, written with the `[1]` index suffix.
 */
export const INVOICE_LINE_FIELDS: ReadonlyArray<readonly [keyof InvoiceLine, string]> = [
  ["id", "id[1]"],
  ["price", "pr[1]"],
  ["quantity", "no[1]"],
  ["description", "de[1]"],
  ["vat", "va[1]"],
];
