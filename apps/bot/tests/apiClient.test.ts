import { afterEach, describe, expect, it, vi } from "vitest";
import { ApiError, createApiClient } from "../src/apiClient.js";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("api client", () => {
  it("posts the event and returns the reply", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse(200, { ok: true, messages: [{ text: "Выберите язык:", keyboard: [["Русский"]] }] })
    );
    vi.stubGlobal("fetch", fetchMock);

    const reply = await createApiClient("http://api.test").sendEvent(42, "/start");
    expect(reply).toEqual({ messages: [{ text: "Выберите язык:", keyboard: [["Русский"]] }] });
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://api.test/bot/event");
    expect(JSON.parse(String(call?.[1].body))).toEqual({ telegram_user_id: 42, text: "/start" });
  });

  it("asks for admin stats on its own route", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse(200, { ok: true, messages: [{ text: "stats" }] }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await createApiClient("http://api.test").adminStats(1)).toEqual({ messages: [{ text: "stats" }] });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://api.test/bot/admin/stats");
  });

  it("throws ApiError on a failed request", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(400, { ok: false, error: "validation" })));
    const err = await createApiClient("http://api.test").sendEvent(1, "x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 400 });
  });

  it("throws ApiError on a body that is not a reply", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("not json", { status: 200 })));
    await expect(createApiClient("http://api.test").sendEvent(1, "x")).rejects.toThrow("/bot/event returned non-JSON");

    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(200, { ok: true })));
    await expect(createApiClient("http://api.test").sendEvent(1, "x")).rejects.toThrow("/bot/event returned an unexpected body");
  });
});
