import type { FieldSet } from "../fields";
import type { GatewayResult, ParsedResponse, PaymentOperation } from ".";

export interface GatewayRequest {
  url: string;
  fields: FieldSet;
}

/**
 * A gateway wire dialect. The client drives every dialect through the same
 * pipeline: build, sign, post, parse, normalize.
 */
export interface GatewayDialect {
  readonly name: string;
  readonly testMode: boolean;

  /**
   * Assembles the unsigned request for an operation.
   *
   * @throws ConfigurationError when a required structured input is missing
   */
  buildRequest(operation: PaymentOperation): GatewayRequest;

  signRequest(fields: FieldSet): FieldSet;

  /**
   * @throws ParseError when the body does not match the dialect
   */
  parseResponse(body: string): ParsedResponse;

  /**
   * Classifies a parsed response. The signed request is passed along for
   * dialects whose authorization token depends on what was sent.
   */
  normalizeResponse(response: ParsedResponse, request: GatewayRequest): GatewayResult;
}
