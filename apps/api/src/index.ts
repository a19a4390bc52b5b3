import { createClient } from "@supabase/supabase-js";
import { loadEnvLocal } from "@awaken/shared";
import { appDir, loadConfig, type AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { buildServer } from "./server.js";
import { systemClock } from "./services/context.js";
import { createServices } from "./services/index.js";
import { createTelegramNotifier, noopNotifier } from "./services/notifier.js";
import { createUnconfiguredProvider, createYookassaProvider } from "./services/payments/yookassa.js";
import { startReconciliationLoop } from "./services/reconciliation.js";
import { createMemoryStore } from "./services/store/memoryStore.js";
import { createSupabaseStore } from "./services/store/supabaseStore.js";
import type { Store } from "./services/store/types.js";

loadEnvLocal(appDir);

const config = loadConfig();
const log = createLogger(config.logLevel);

function buildStore(cfg: AppConfig): Store {
  if (cfg.storeDriver === "memory") {
    log.warn("STORE_DRIVER=memory: state is lost on restart");
    return createMemoryStore();
  }
  if (!cfg.supabaseUrl || !cfg.supabaseServiceRoleKey) throw new Error("Missing env: SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY");
  return createSupabaseStore(
    createClient(cfg.supabaseUrl, cfg.supabaseServiceRoleKey, { auth: { persistSession: false } })
  );
}

const provider = config.yookassa
  ? createYookassaProvider({ ...config.yookassa, timeoutMs: config.paymentTimeoutMs })
  : createUnconfiguredProvider();
if (!config.yookassa) log.warn("YOOKASSA_SHOP_ID / YOOKASSA_SECRET_KEY not set: donations are disabled");

const botUsername = config.telegramBotUsername ?? "awaken_bot";
if (!config.telegramBotUsername) log.warn({ botUsername }, "TELEGRAM_BOT_USERNAME not set: referral links use the default");

const services = createServices({ store: buildStore(config), log, clock: systemClock }, provider, {
  donationAmountRub: config.donationAmountRub,
  botUsername
});

const notifier = config.telegramBotToken ? createTelegramNotifier(config.telegramBotToken, config.paymentTimeoutMs) : noopNotifier;

const app = buildServer({
  services,
  notifier,
  settings: { communityUrl: config.communityUrl },
  adminIds: config.adminIds,
  adminDashboardToken: config.adminDashboardToken,
  logLevel: config.logLevel
});

const loop = startReconciliationLoop(services, notifier, config.reconcileIntervalMs);
app.addHook("onClose", async () => loop.stop());

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.close().then(
      () => process.exit(0),
      (e: unknown) => {
        log.error({ err: e }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: config.port, host: "0.0.0.0" });
