import path from "node:path";
import { fileURLToPath } from "node:url";

export type BotConfig = {
  botToken: string;
  apiBaseUrl: string;
  /** Directory with level_<n>.jpg / level_<n>.png. */
  levelAssetsDir: string;
  requestTimeoutMs: number;
};

// apps/bot, where env.local and the default assets directory live.
export const botDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

export function loadBotConfig(source: Record<string, string | undefined> = process.env): BotConfig {
  const botToken = source.TELEGRAM_BOT_TOKEN?.trim();
  if (!botToken) throw new Error("Missing TELEGRAM_BOT_TOKEN");
  const timeout = Number(source.API_TIMEOUT_MS);
  return {
    botToken,
    apiBaseUrl: (source.API_BASE_URL?.trim() || "http://localhost:3001").replace(/\/+$/, ""),
    levelAssetsDir: path.resolve(botDir, source.LEVEL_ASSETS_DIR?.trim() || "assets/levels"),
    requestTimeoutMs: Number.isInteger(timeout) && timeout > 0 ? timeout : 15_000
  };
}
