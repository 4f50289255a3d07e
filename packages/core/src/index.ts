export * from "./constants";
export * from "./errors";
export * from "./fields";
export * from "./schemas";
export * from "./signing";
export * from "./parsing";
export * from "./normalize";
export * from "./http";
export * from "./utils";
export { GatewayClient } from "./client/gatewayClient";
export type { GatewayClientConfig } from "./client/gatewayClient";
export type * from "./types";
