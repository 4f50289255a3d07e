/**
 * @module @gatewire/ogone - Ogone DirectLink dialect
 *
 * Encodes operations as SHA-signed form posts and decodes XML attribute
 * responses, including the 3-D Secure `HTML_ANSWER` fragment.
 */

export { OgoneDialect, OgoneConfigSchema } from "./dialect";
export type { OgoneConfig } from "./dialect";
export { buildOperationFields, expiryDate, generateOrderId, orderIdOrGenerated, paymentIdFrom } from "./fields";
export {
  AVS_RESULTS,
  CVV_RESULTS,
  LEGACY_SIGNATURE_FIELDS,
  MAINTENANCE_PATH,
  OGONE_LIVE_URL,
  OGONE_OPERATIONS,
  OGONE_TEST_URL,
  ORDER_PATH,
  THREE_D_SECURE_DISPLAY_MODES,
} from "./constants";
