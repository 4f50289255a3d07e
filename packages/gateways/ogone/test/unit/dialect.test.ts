import { createHash } from "crypto";
import { describe, it, expect, vi } from "vitest";
import {
  ConfigurationError,
  GatewayClient,
  MISSING_SIGNATURE_WARNING,
  PARSE_FAILURE_MESSAGE,
  SUCCESS_MESSAGE,
} from "@gatewire/core";
import type { CardPresent } from "@gatewire/core";
import { buildMockTransport } from "../../../../core/test/mocks";
import { OgoneDialect } from "../../src/dialect";
import type { OgoneConfig } from "../../src/dialect";

const config: OgoneConfig = {
  credentials: {
    merchantId: "shop",
    loginId: "api",
    password: "pw",
    secret: "pass",
    signatureAlgorithm: "sha1",
  },
  mode: "test",
};

const card: CardPresent = {
  type: "card",
  number: "4111111111111111",
  month: 8,
  year: 2009,
  brand: "visa",
  verificationValue: "123",
  firstName: "Bob",
  lastName: "Bobsen",
};

const SORTED_CANONICAL =
  "AMOUNT=1000passCARDNO=4111111111111111passCN=Bob BobsenpassCURRENCY=EURpassCVC=123pass" +
  "ED=0809passOPERATION=SALpassORDERID=1passPSPID=shoppassPSWD=pwpassUSERID=apipass";

describe("OgoneDialect", () => {
  describe("configuration", () => {
    it("should require the API password", () => {
      try {
        new OgoneDialect({ credentials: { merchantId: "shop", loginId: "api", password: " " } });
        expect.fail("expected a ConfigurationError");
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.field).toBe("config.credentials.password");
        }
      }
    });
  });

  describe("buildRequest", () => {
    it("should append amount, currency, credentials and operation", () => {
      const request = new OgoneDialect(config).buildRequest({
        kind: "purchase",
        amount: 1000,
        paymentMethod: card,
        options: { orderId: "1" },
      });

      expect(request.fields.entries()).toEqual([
        ["orderID", "1"],
        ["CN", "Bob Bobsen"],
        ["CARDNO", "4111111111111111"],
        ["ED", "0809"],
        ["CVC", "123"],
        ["amount", "1000"],
        ["currency", "EUR"],
        ["PSPID", "shop"],
        ["USERID", "api"],
        ["PSWD", "pw"],
        ["Operation", "SAL"],
      ]);
    });

    it("should send new orders to the test order endpoint", () => {
      const request = new OgoneDialect(config).buildRequest({ kind: "authorize", amount: 1000, paymentMethod: card });

      expect(request.url).toBe("https://secure.ogone.com/ncol/test/orderdirect.asp");
      expect(request.fields.get("Operation")).toBe("RES");
    });

    it("should send follow-ups to the maintenance endpoint", () => {
      const dialect = new OgoneDialect(config);

      const capture = dialect.buildRequest({ kind: "capture", amount: 1000, authorization: "3014726;RES" });
      const refund = dialect.buildRequest({ kind: "refund", amount: 500, authorization: "3014726;SAL" });

      expect(capture.url).toBe("https://secure.ogone.com/ncol/test/maintenancedirect.asp");
      expect(capture.fields.get("Operation")).toBe("SAL");
      expect(refund.fields.get("Operation")).toBe("RFD");
    });

    it("should use the production host in live mode", () => {
      const request = new OgoneDialect({ ...config, mode: "live" }).buildRequest({
        kind: "purchase",
        amount: 1000,
        paymentMethod: card,
      });

      expect(request.url).toBe("https://secure.ogone.com/ncol/prod/orderdirect.asp");
    });

    it("should send a generated order id when the given one is blank", () => {
      const request = new OgoneDialect(config).buildRequest({
        kind: "purchase",
        amount: 1000,
        paymentMethod: card,
        options: { orderId: "" },
      });

      expect(request.fields.get("orderID")).toMatch(/^[0-9a-f]{30}$/);
    });

    it("should honour a base URL override", () => {
      const request = new OgoneDialect({ ...config, baseUrl: "https://ogone.test/ncol/" }).buildRequest({
        kind: "purchase",
        amount: 1000,
        paymentMethod: card,
      });

      expect(request.url).toBe("https://ogone.test/ncol/orderdirect.asp");
    });

    it("should authorize the store amount when registering an alias", () => {
      const dialect = new OgoneDialect(config);
      const custom = new OgoneDialect({ ...config, storeAmount: 100 });

      expect(dialect.buildRequest({ kind: "store", card }).fields.get("amount")).toBe("1");
      expect(custom.buildRequest({ kind: "store", card }).fields.get("amount")).toBe("100");
      expect(dialect.buildRequest({ kind: "store", card }).fields.get("Operation")).toBe("RES");
    });
  });

  describe("signing", () => {
    const purchase = { kind: "purchase", amount: 1000, paymentMethod: card, options: { orderId: "1" } } as const;

    it("should build the sorted canonical string", () => {
      const dialect = new OgoneDialect(config);

      expect(dialect.signatureInput(dialect.buildRequest(purchase).fields)).toBe(SORTED_CANONICAL);
    });

    it("should attach the upper-case SHA-1 of the canonical string", () => {
      const dialect = new OgoneDialect(config);

      const signed = dialect.signRequest(dialect.buildRequest(purchase).fields);

      expect(signed.get("SHASign")).toBe(createHash("sha1").update(SORTED_CANONICAL).digest("hex").toUpperCase());
    });

    it("should concatenate the legacy fields when no algorithm is configured", () => {
      const dialect = new OgoneDialect({
        ...config,
        credentials: { merchantId: "shop", loginId: "api", password: "pw", secret: "pass" },
      });

      expect(dialect.signatureInput(dialect.buildRequest(purchase).fields)).toBe(
        "11000EUR4111111111111111shopSALpass",
      );
    });

    it("should warn and send unsigned requests without a passphrase", () => {
      const warn = vi.fn();
      const dialect = new OgoneDialect(
        { ...config, credentials: { merchantId: "shop", loginId: "api", password: "pw" } },
        warn,
      );

      const signed = dialect.signRequest(dialect.buildRequest(purchase).fields);

      expect(signed.has("SHASign")).toBe(false);
      expect(warn).toHaveBeenCalledWith(MISSING_SIGNATURE_WARNING);
    });

    it("should neither sign nor warn without a passphrase when signing is disabled", () => {
      const warn = vi.fn();
      const dialect = new OgoneDialect(
        { ...config, credentials: { merchantId: "shop", loginId: "api", password: "pw", signatureAlgorithm: "none" } },
        warn,
      );

      const signed = dialect.signRequest(dialect.buildRequest(purchase).fields);

      expect(signed.has("SHASign")).toBe(false);
      expect(warn).not.toHaveBeenCalled();
    });

    it("should still sign with SHA-1 when signing is disabled but a passphrase is set", () => {
      const warn = vi.fn();
      const dialect = new OgoneDialect(
        { ...config, credentials: { ...config.credentials, signatureAlgorithm: "none" } },
        warn,
      );

      const signed = dialect.signRequest(dialect.buildRequest(purchase).fields);

      expect(signed.get("SHASign")).toBe(createHash("sha1").update(SORTED_CANONICAL).digest("hex").toUpperCase());
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe("normalizeResponse", () => {
    const dialect = new OgoneDialect(config);
    const request = dialect.buildRequest({ kind: "purchase", amount: 1000, paymentMethod: card, options: { orderId: "1" } });

    it("should treat NCERROR=0 as success", () => {
      const response = { orderID: "1", PAYID: "3014726", NCERROR: "0", STATUS: "9", AAVCheck: "OK", CVCCheck: "NO" };

      expect(dialect.normalizeResponse(response, request)).toEqual({
        success: true,
        message: SUCCESS_MESSAGE,
        authorization: "3014726;SAL",
        rawFields: response,
        avsResult: "matched",
        cvvResult: "not_checked",
        testMode: true,
        orderId: "1",
      });
    });

    it("should format a decline", () => {
      const result = dialect.normalizeResponse(
        { PAYID: "3014727", NCERROR: "50001112", NCERRORPLUS: "Rejected|Invalid card", STATUS: "2" },
        request,
      );

      expect(result.success).toBe(false);
      expect(result.message).toBe("Rejected, invalid card");
      expect(result.errorCode).toBe("50001112");
      expect(result.authorization).toBe("3014727;SAL");
    });

    it("should report unknown check codes", () => {
      const result = dialect.normalizeResponse({ NCERROR: "0", AAVCheck: "XX", CVCCheck: "KO" }, request);

      expect(result.avsResult).toBe("unknown");
      expect(result.cvvResult).toBe("failed");
      expect(result.authorization).toBe(";SAL");
    });

    it("should leave check results unset when absent", () => {
      const result = dialect.normalizeResponse({ NCERROR: "0", PAYID: "1" }, request);

      expect(result.avsResult).toBeUndefined();
      expect(result.cvvResult).toBeUndefined();
    });
  });

  describe("with GatewayClient", () => {
    it("should authorize with 3-D Secure and return the identification page", async () => {
      const { transport, post } = buildMockTransport({
        body:
          '<?xml version="1.0"?><ncresponse orderID="1" PAYID="3014726" NCERROR="0" NCERRORPLUS="!" STATUS="46">' +
          "<HTML_ANSWER>PGZvcm0+PC9mb3JtPg==</HTML_ANSWER></ncresponse>",
      });
      const client = new GatewayClient(new OgoneDialect(config), { transport });

      const result = await client.authorize(1000, card, {
        orderId: "1",
        threeDSecure: { successUrl: "https://shop.test/ok" },
      });

      const sent = new URLSearchParams(post.mock.calls[0]?.[1]);
      expect(post.mock.calls[0]?.[0]).toBe("https://secure.ogone.com/ncol/test/orderdirect.asp");
      expect(sent.get("FLAG3D")).toBe("Y");
      expect(sent.get("ACCEPTURL")).toBe("https://shop.test/ok");
      expect(sent.get("SHASign")).toMatch(/^[0-9A-F]{40}$/);
      expect(result.success).toBe(true);
      expect(result.authorization).toBe("3014726;RES");
      expect(result.htmlAnswer).toBe("PGZvcm0+PC9mb3JtPg==");
      expect(result.orderId).toBe("1");
    });

    it("should capture against the maintenance endpoint", async () => {
      const { transport, post } = buildMockTransport({
        body: '<ncresponse orderID="1" PAYID="3014726" NCERROR="0" STATUS="91"/>',
      });
      const client = new GatewayClient(new OgoneDialect(config), { transport });

      const result = await client.capture(1000, "3014726;RES");

      const sent = new URLSearchParams(post.mock.calls[0]?.[1]);
      expect(post.mock.calls[0]?.[0]).toBe("https://secure.ogone.com/ncol/test/maintenancedirect.asp");
      expect(sent.get("PAYID")).toBe("3014726");
      expect(sent.get("Operation")).toBe("SAL");
      expect(result.authorization).toBe("3014726;SAL");
    });

    it("should return the issued alias after storing a card", async () => {
      const { transport } = buildMockTransport({
        body: '<ncresponse orderID="7" PAYID="3014730" NCERROR="0" ALIAS="alias-7"/>',
      });
      const client = new GatewayClient(new OgoneDialect(config), { transport });

      const result = await client.store(card, { orderId: "7" });

      expect(result.billingId).toBe("alias-7");
    });

    it("should report a declined purchase", async () => {
      const { transport } = buildMockTransport({
        body:
          '<ncresponse orderID="1" PAYID="0" NCERROR="50001112" NCERRORPLUS="Rejected|Invalid card" STATUS="0"/>',
      });
      const client = new GatewayClient(new OgoneDialect(config), { transport });

      const result = await client.purchase(1000, card, { orderId: "1" });

      expect(result.success).toBe(false);
      expect(result.message).toBe("Rejected, invalid card");
      expect(result.errorCode).toBe("50001112");
    });

    it("should return a failed result for an unparseable body", async () => {
      const { transport } = buildMockTransport({ body: "<html><body>Service Unavailable" });
      const client = new GatewayClient(new OgoneDialect(config), { transport });

      const result = await client.purchase(1000, card, { orderId: "1" });

      expect(result).toEqual({
        success: false,
        message: PARSE_FAILURE_MESSAGE,
        authorization: "",
        rawFields: { body: "<html><body>Service Unavailable" },
        testMode: true,
      });
    });
  });
});
