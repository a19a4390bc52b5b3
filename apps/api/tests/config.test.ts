import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("fills defaults for the memory store", () => {
    const cfg = loadConfig({ STORE_DRIVER: "memory" });
    expect(cfg).toMatchObject({
      storeDriver: "memory",
      port: 3001,
      logLevel: "info",
      donationAmountRub: 500,
      paymentTimeoutMs: 10_000,
      reconcileIntervalMs: 60_000
    });
    expect(cfg.yookassa).toBeUndefined();
    expect(cfg.adminIds.size).toBe(0);
  });

  it("requires Supabase credentials for the default driver", () => {
    expect(() => loadConfig({})).toThrow("Missing env: SUPABASE_URL");
    expect(() => loadConfig({ SUPABASE_URL: "http://localhost:54321" })).toThrow("Missing env: SUPABASE_SERVICE_ROLE_KEY");
    expect(loadConfig({ SUPABASE_URL: "http://localhost:54321", SUPABASE_SERVICE_ROLE_KEY: "test-secret" }).storeDriver).toBe("supabase");
  });

  it("rejects an unknown driver", () => {
    expect(() => loadConfig({ STORE_DRIVER: "sqlite" })).toThrow("Invalid STORE_DRIVER: sqlite");
  });

  it("parses the optional settings", () => {
    const cfg = loadConfig({
      STORE_DRIVER: "memory",
      PORT: "8080",
      TELEGRAM_BOT_USERNAME: "@test_bot",
      ADMIN_IDS: "1, 2,x,3",
      DONATION_AMOUNT_RUB: "-5",
      COMMUNITY_URL: "  ",
      YOOKASSA_SHOP_ID: "123",
      YOOKASSA_SECRET_KEY: "test-secret"
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.telegramBotUsername).toBe("test_bot");
    expect([...cfg.adminIds]).toEqual([1, 2, 3]);
    expect(cfg.donationAmountRub).toBe(500);
    expect(cfg.communityUrl).toBeUndefined();
    expect(cfg.yookassa).toEqual({ shopId: "123", secretKey: "test-secret", returnUrl: "https://t.me" });
  });

  it("needs both shop id and secret to enable payments", () => {
    expect(loadConfig({ STORE_DRIVER: "memory", YOOKASSA_SHOP_ID: "123" }).yookassa).toBeUndefined();
  });
});
