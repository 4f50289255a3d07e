import type { VerificationResult } from "../constants";

export type { GatewayDialect, GatewayRequest } from "./dialect";

/**
 * Amount expressed as an integer count of minor currency units (e.g. cents).
 */
export type MinorUnits = number;

export type GatewayMode = "test" | "live";

export type SignatureAlgorithm = "none" | "sha1" | "sha256" | "sha512" | "md5-password";

/**
 * Merchant credentials. Which members are required depends on the dialect;
 * each dialect validates its own set when it is constructed.
 */
export interface Credentials {
  /** PayOne `mid`, Ogone `PSPID` */
  merchantId: string;
  /** PayOne `portalid`, Ogone `USERID` */
  loginId?: string;
  /** PayOne `aid` */
  subAccountId?: string;
  /** Ogone `PSWD` */
  password?: string;
  /** PayOne portal key or Ogone SHA-IN passphrase */
  secret?: string;
  signatureAlgorithm?: SignatureAlgorithm;
}

// ============================================================================
// Payment methods
// ============================================================================

export interface CardPresent {
  type: "card";
  number: string;
  month: number;
  year: number;
  brand: string;
  verificationValue?: string;
  firstName?: string;
  lastName?: string;
}

/**
 * Identifier issued by the gateway on an earlier store or purchase call:
 * an alias, a pseudo card number or a numeric user id.
 */
export interface StoredReference {
  type: "stored";
  reference: string;
}

/**
 * Raw token used for non-card clearing such as invoice or recurring billing.
 */
export interface InvoiceReference {
  type: "invoice";
  reference: string;
}

export interface OnlineTransfer {
  type: "onlineTransfer";
  /** e.g. "PNT" (Sofort), "GPY" (giropay), "IDL" (iDEAL) */
  transferType: string;
  bankCountry?: string;
  bankAccount?: string;
  bankCode?: string;
  bankGroupType?: string;
  iban?: string;
  bic?: string;
}

export interface EWallet {
  type: "wallet";
  /** "PPE" for PayPal Express */
  walletType: string;
}

export type PaymentMethod = CardPresent | StoredReference | InvoiceReference | OnlineTransfer | EWallet;

export interface BankAccount {
  holder: string;
  iban?: string;
  bic?: string;
  accountNumber?: string;
  bankCode?: string;
  country?: string;
}

// ============================================================================
// Structured options
// ============================================================================

export interface Address {
  street?: string;
  zip?: string;
  city?: string;
  country?: string;
  phone?: string;
}

export interface PersonalData {
  customerId?: string;
  salutation?: string;
  firstName?: string;
  lastName?: string;
  company?: string;
  email?: string;
}

export interface InvoiceLine {
  id: string;
  /** Unit price in minor units */
  price: MinorUnits;
  quantity: number;
  description?: string;
  /** VAT rate in percent */
  vat?: number;
}

export type ThreeDSecureDisplayMode = "mainWindow" | "popUp" | "popIx";

export interface ThreeDSecureOptions {
  xid?: string;
  cavv?: string;
  eci?: string;
  successUrl?: string;
  errorUrl?: string;
  exceptionUrl?: string;
  displayMode?: ThreeDSecureDisplayMode;
  httpAccept?: string;
  userAgent?: string;
  language?: string;
  paramPlus?: string;
  comPlus?: string;
}

export interface RedirectUrls {
  successUrl?: string;
  errorUrl?: string;
  backUrl?: string;
}

export interface ChargeOptions {
  orderId?: string;
  reference?: string;
  description?: string;
  currency?: string;
  /** Ask the gateway to keep the card under this alias */
  billingId?: string;
  customerIp?: string;
  vatId?: string;
  address?: Address;
  personalData?: PersonalData;
  invoiceLine?: InvoiceLine;
  threeDSecure?: ThreeDSecureOptions;
  redirect?: RedirectUrls;
}

export interface CaptureOptions {
  currency?: string;
  reference?: string;
  sequenceNumber?: number;
  invoiceLine?: InvoiceLine;
}

export interface RefundOptions {
  currency?: string;
  sequenceNumber?: number;
  narrativeText?: string;
  useCustomerData?: boolean;
}

export interface StoreOptions {
  billingId?: string;
  orderId?: string;
  currency?: string;
}

export interface DirectDebitOptions {
  orderId?: string;
  reference?: string;
  currency?: string;
  address?: Address;
  personalData?: PersonalData;
}

// ============================================================================
// Operations
// ============================================================================

export interface PurchaseOperation {
  kind: "purchase";
  amount: MinorUnits;
  paymentMethod: PaymentMethod;
  options?: ChargeOptions;
}

export interface AuthorizeOperation {
  kind: "authorize";
  amount: MinorUnits;
  paymentMethod: PaymentMethod;
  options?: ChargeOptions;
}

export interface CaptureOperation {
  kind: "capture";
  amount: MinorUnits;
  authorization: string;
  options?: CaptureOptions;
}

export interface RefundOperation {
  kind: "refund";
  amount: MinorUnits;
  authorization: string;
  options?: RefundOptions;
}

export interface StoreOperation {
  kind: "store";
  card: CardPresent;
  options?: StoreOptions;
}

export interface DirectDebitOperation {
  kind: "directDebit";
  amount: MinorUnits;
  bankAccount: BankAccount;
  options?: DirectDebitOptions;
}

export type PaymentOperation =
  | PurchaseOperation
  | AuthorizeOperation
  | CaptureOperation
  | RefundOperation
  | StoreOperation
  | DirectDebitOperation;

export type PaymentOperationKind = PaymentOperation["kind"];

// ============================================================================
// Responses
// ============================================================================

/**
 * Flat field mapping decoded from a gateway response body.
 */
export type ParsedResponse = Record<string, string>;

export interface GatewayResult {
  success: boolean;
  message: string;
  /**
   * Opaque token to hand back on follow-up operations (capture after
   * authorize, refund after capture).
   */
  authorization: string;
  rawFields: ParsedResponse;
  avsResult?: VerificationResult;
  cvvResult?: VerificationResult;
  testMode: boolean;
  errorCode?: string;
  redirectUrl?: string;
  htmlAnswer?: string;
  billingId?: string;
  orderId?: string;
}
