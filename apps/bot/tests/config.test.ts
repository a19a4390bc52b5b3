import path from "node:path";
import { describe, expect, it } from "vitest";
import { botDir, loadBotConfig } from "../src/config.js";

describe("loadBotConfig", () => {
  it("needs a bot token", () => {
    expect(() => loadBotConfig({})).toThrow("Missing TELEGRAM_BOT_TOKEN");
  });

  it("fills defaults", () => {
    expect(loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token" })).toEqual({
      botToken: "test-token",
      apiBaseUrl: "http://localhost:3001",
      levelAssetsDir: path.join(botDir, "assets", "levels"),
      requestTimeoutMs: 15_000
    });
  });

  it("strips trailing slashes from the API url", () => {
    const cfg = loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token", API_BASE_URL: "http://api.test//", API_TIMEOUT_MS: "500" });
    expect(cfg.apiBaseUrl).toBe("http://api.test");
    expect(cfg.requestTimeoutMs).toBe(500);
  });
});
