import { afterEach, describe, expect, it, vi } from "vitest";
import { ProviderError } from "../src/services/payments/types.js";
import { createUnconfiguredProvider, createYookassaProvider } from "../src/services/payments/yookassa.js";

const OPTS = { shopId: "123", secretKey: "test-secret", returnUrl: "https://t.me/test_bot", timeoutMs: 1000 };

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("yookassa provider", () => {
  it("creates a redirect payment with basic auth and the idempotence key", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse(200, {
        id: "2d1b-test",
        status: "pending",
        confirmation: { type: "redirect", confirmation_url: "https://yoomoney.test/checkout/2d1b-test" }
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = createYookassaProvider(OPTS);
    const checkout = await provider.createCheckout({
      amount: 500,
      currency: "RUB",
      description: "Донат для перехода на уровень 4",
      metadata: { user_id: 1, current_level: 3, target_level: 4 },
      idempotenceKey: "key-1"
    });

    expect(checkout).toEqual({ paymentId: "2d1b-test", checkoutUrl: "https://yoomoney.test/checkout/2d1b-test" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    const url = call?.[0];
    const init = call?.[1];
    expect(url).toBe("https://api.yookassa.ru/v3/payments");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Authorization: "Basic " + Buffer.from("123:test-secret").toString("base64"),
      "Content-Type": "application/json",
      "Idempotence-Key": "key-1"
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      amount: { value: "500.00", currency: "RUB" },
      confirmation: { type: "redirect", return_url: "https://t.me/test_bot" },
      capture: true,
      description: "Донат для перехода на уровень 4",
      metadata: { user_id: 1, current_level: 3, target_level: 4 }
    });
  });

  it("reads a payment status", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse(200, { id: "p-1", status: "waiting_for_capture" }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await createYookassaProvider(OPTS).getStatus("p-1")).toBe("waiting_for_capture");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.yookassa.ru/v3/payments/p-1");
    expect(fetchMock.mock.calls[0]?.[1].method).toBe("GET");
  });

  it("turns HTTP errors, odd bodies and network failures into ProviderError", async () => {
    const provider = createYookassaProvider(OPTS);

    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(401, { type: "error", code: "invalid_credentials" })));
    await expect(provider.getStatus("p-1")).rejects.toBeInstanceOf(ProviderError);

    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(200, { id: "p-1", status: "refunded" })));
    await expect(provider.getStatus("p-1")).rejects.toBeInstanceOf(ProviderError);

    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>", { status: 200 })));
    await expect(provider.getStatus("p-1")).rejects.toBeInstanceOf(ProviderError);

    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));
    await expect(provider.getStatus("p-1")).rejects.toThrow("yookassa GET /payments/p-1: fetch failed");
  });

  it("refuses a checkout without a confirmation url", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(200, { id: "p-2", status: "pending" })));
    await expect(
      createYookassaProvider(OPTS).createCheckout({ amount: 1, currency: "RUB", description: "d", metadata: {}, idempotenceKey: "k" })
    ).rejects.toThrow("yookassa payment p-2 has no confirmation_url");
  });
});

describe("unconfigured provider", () => {
  it("fails every call", async () => {
    const provider = createUnconfiguredProvider();
    await expect(provider.getStatus("x")).rejects.toBeInstanceOf(ProviderError);
  });
});
