import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadEnvLocal, parseIdList, parsePositiveInt } from "@awaken/shared";

export type StoreDriver = "supabase" | "memory";

export type YookassaConfig = {
  shopId: string;
  secretKey: string;
  returnUrl: string;
};

export type AppConfig = {
  storeDriver: StoreDriver;
  supabaseUrl?: string | undefined;
  supabaseServiceRoleKey?: string | undefined;
  port: number;
  logLevel: string;
  telegramBotToken?: string | undefined; // enables outbound notifications from the reconciler
  telegramBotUsername?: string | undefined; // used for referral deep links
  yookassa?: YookassaConfig | undefined;
  donationAmountRub: number;
  paymentTimeoutMs: number;
  reconcileIntervalMs: number;
  adminIds: Set<number>;
  adminDashboardToken?: string | undefined;
  communityUrl?: string | undefined;
};

type EnvSource = Record<string, string | undefined>;

function opt(source: EnvSource, key: string): string | undefined {
  return source[key]?.trim() || undefined;
}

export function loadConfig(source: EnvSource = process.env): AppConfig {
  const driver = opt(source, "STORE_DRIVER") ?? "supabase";
  if (driver !== "supabase" && driver !== "memory") throw new Error(`Invalid STORE_DRIVER: ${driver}`);

  const supabaseUrl = opt(source, "SUPABASE_URL");
  const supabaseServiceRoleKey = opt(source, "SUPABASE_SERVICE_ROLE_KEY");
  if (driver === "supabase") {
    for (const [k, v] of [["SUPABASE_URL", supabaseUrl], ["SUPABASE_SERVICE_ROLE_KEY", supabaseServiceRoleKey]] as const) {
      if (!v) throw new Error(`Missing env: ${k}`);
    }
  }

  const shopId = opt(source, "YOOKASSA_SHOP_ID");
  const secretKey = opt(source, "YOOKASSA_SECRET_KEY");
  const returnUrl = opt(source, "PAYMENT_RETURN_URL") ?? "https://t.me";

  return {
    storeDriver: driver,
    supabaseUrl,
    supabaseServiceRoleKey,
    port: parsePositiveInt(source.PORT, 3001),
    logLevel: opt(source, "LOG_LEVEL") ?? "info",
    telegramBotToken: opt(source, "TELEGRAM_BOT_TOKEN"),
    telegramBotUsername: opt(source, "TELEGRAM_BOT_USERNAME")?.replace(/^@/, ""),
    yookassa: shopId && secretKey ? { shopId, secretKey, returnUrl } : undefined,
    donationAmountRub: parsePositiveInt(source.DONATION_AMOUNT_RUB, 500),
    paymentTimeoutMs: parsePositiveInt(source.PAYMENT_TIMEOUT_MS, 10_000),
    reconcileIntervalMs: parsePositiveInt(source.RECONCILE_INTERVAL_MS, 60_000),
    adminIds: parseIdList(source.ADMIN_IDS),
    adminDashboardToken: opt(source, "ADMIN_DASHBOARD_TOKEN"),
    communityUrl: opt(source, "COMMUNITY_URL")
  };
}

// Directory holding this app's env.local (apps/api).
export const appDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
