import { describe, it, expect, vi } from "vitest";
import { FetchTransport } from "../../../src/http";
import { TransportError } from "../../../src/errors";

describe("FetchTransport", () => {
  it("should POST the form body and return status and text", async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockResolvedValue(new Response("status=APPROVED", { status: 200 }));
    const transport = new FetchTransport({ fetch: fetchMock });

    const response = await transport.post("https://gateway.test/post", "a=1", { "X-Trace": "t-1" });

    expect(response).toEqual({ status: 200, body: "status=APPROVED" });
    expect(fetchMock).toHaveBeenCalledWith("https://gateway.test/post", {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded", "X-Trace": "t-1" },
      body: "a=1",
      signal: undefined,
    });
  });

  it("should merge configured headers", async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockResolvedValue(new Response("", { status: 200 }));
    const transport = new FetchTransport({ fetch: fetchMock, headers: { "User-Agent": "gatewire-test" } });

    await transport.post("https://gateway.test/post", "a=1", {});

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded",
      "User-Agent": "gatewire-test",
    });
  });

  it("should return non-2xx responses without throwing", async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockResolvedValue(new Response("Service Unavailable", { status: 503 }));

    const response = await new FetchTransport({ fetch: fetchMock }).post("https://gateway.test/post", "", {});

    expect(response).toEqual({ status: 503, body: "Service Unavailable" });
  });

  it("should attach an abort signal when a timeout is configured", async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockResolvedValue(new Response("", { status: 200 }));

    await new FetchTransport({ fetch: fetchMock, timeoutMs: 5000 }).post("https://gateway.test/post", "", {});

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should wrap network failures in a TransportError", async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockRejectedValue(new Error("ECONNREFUSED"));

    await expect(
      new FetchTransport({ fetch: fetchMock }).post("https://gateway.test/post", "", {}),
    ).rejects.toThrow(new TransportError("POST https://gateway.test/post failed: ECONNREFUSED"));
  });
});
