import Fastify from "fastify";
import cors from "@fastify/cors";
import type { ConversationSettings } from "./conversation/index.js";
import { loggerOptions } from "./logger.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerBotRoutes } from "./routes/bot.js";
import { registerPaymentRoutes } from "./routes/payments.js";
import type { Services } from "./services/index.js";
import type { Notifier } from "./services/notifier.js";

/** Everything a request handler may touch. Built once in index.ts (or a test) and passed down. */
export type AppDeps = {
  services: Services;
  notifier: Notifier;
  settings: ConversationSettings;
  adminIds: ReadonlySet<number>;
  adminDashboardToken?: string | undefined;
  /** false turns request logging off (tests). */
  logLevel?: string | false;
};

export function buildServer(deps: AppDeps) {
  const app = Fastify({
    logger: deps.logLevel === false ? false : loggerOptions(deps.logLevel)
  });

  void app.register(cors, { origin: true });

  app.get("/health", async () => {
    return { ok: true, service: "awaken-api", ts: new Date().toISOString() };
  });

  registerBotRoutes(app, deps);
  registerAdminRoutes(app, deps);
  registerPaymentRoutes(app, deps);

  return app;
}
