import { VERIFICATION_RESULTS } from "@gatewire/core";
import type {
  PaymentOperationKind,
  ThreeDSecureDisplayMode,
  ThreeDSecureOptions,
  VerificationTable,
} from "@gatewire/core";

export const OGONE_TEST_URL = "https://secure.ogone.com/ncol/test/";
export const OGONE_LIVE_URL = "https://secure.ogone.com/ncol/prod/";

/**
 * Endpoint for new orders.
 */
export const ORDER_PATH = "orderdirect.asp";

/**
 * Endpoint for follow-ups on an existing payment (requests carrying a PAYID).
 */
export const MAINTENANCE_PATH = "maintenancedirect.asp";

/**
 * `Operation` code sent for each operation.
 */
export const OGONE_OPERATIONS: Readonly<Record<PaymentOperationKind, string>> = {
  purchase: "SAL",
  authorize: "RES",
  capture: "SAL",
  refund: "RFD",
  store: "RES",
  directDebit: "SAL",
};

export const AVS_RESULTS: VerificationTable = {
  OK: VERIFICATION_RESULTS.MATCHED,
  KO: VERIFICATION_RESULTS.FAILED,
  NO: VERIFICATION_RESULTS.UNAVAILABLE,
};

export const CVV_RESULTS: VerificationTable = {
  OK: VERIFICATION_RESULTS.MATCHED,
  KO: VERIFICATION_RESULTS.FAILED,
  NO: VERIFICATION_RESULTS.NOT_CHECKED,
};

/**
 * `WIN3DS` codes selecting where the 3-D Secure identification page is shown.
 */
export const THREE_D_SECURE_DISPLAY_MODES: Readonly<Record<ThreeDSecureDisplayMode, string>> = {
  /** Main window (default) */
  mainWindow: "MAINW",
  /** Pop-up, returning to the main window at the end */
  popUp: "POPUP",
  /** Pop-up, staying in the pop-up at the end */
  popIx: "POPIX",
};

export const DEFAULT_HTTP_ACCEPT = "*/*";

export const THREE_D_SECURE_FIELDS: ReadonlyArray<readonly [keyof ThreeDSecureOptions, string]> = [
  ["userAgent", "HTTP_USER_AGENT"],
  ["successUrl", "ACCEPTURL"],
  ["errorUrl", "DECLINEURL"],
  ["exceptionUrl", "EXCEPTIONURL"],
  ["paramPlus", "PARAMPLUS"],
  ["comPlus", "COMPLUS"],
  ["language", "LANGUAGE"],
];

/**
 * Fields concatenated, in this order, by the legacy SHA-1 signature.
 */
export const LEGACY_SIGNATURE_FIELDS = ["orderID", "amount", "currency", "CARDNO", "PSPID", "Operation", "ALIAS"] as const;

export const SIGNATURE_FIELD = "SHASign";

/**
 * Element carrying the 3-D Secure identification page.
 */
export const HTML_ANSWER = "HTML_ANSWER";

/**
 * Separator between PAYID and operation in authorization tokens.
 */
export const AUTHORIZATION_SEPARATOR = ";";

/**
 * Amount authorized (and left unused) when registering an alias.
 */
export const DEFAULT_STORE_AMOUNT = 1;

export const DIRECT_DEBIT = {
  PAYMENT_METHOD: "Direct Debits DE",
  EXPIRY: "9999",
} as const;

/**
 * Alias generated by Ogone when the caller does not choose one.
 */
export const ALIAS_OPERATION_BY_PSP = "BYPSP";

/**
 * Maximum length Ogone accepts for `orderID`.
 */
export const ORDER_ID_MAX_LENGTH = 30;
