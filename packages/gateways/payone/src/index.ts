/**
 * @module @gatewire/payone - PayOne Server API dialect
 *
 * Encodes operations as form posts and decodes `KEY=value` line responses.
 */

export { PayOneDialect, PayOneConfigSchema } from "./dialect";
export type { PayOneConfig } from "./dialect";
export { buildOperationFields, cardTypeCode, expiryDate } from "./fields";
export {
  APPROVED_STATUS,
  CARD_BRAND_CODES,
  CLEARING_TYPES,
  DEFAULT_COUNTRY,
  PAYONE_REQUESTS,
  PAYONE_URL,
} from "./constants";
