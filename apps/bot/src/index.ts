import { loadEnvLocal } from "@awaken/shared";
import { startBot } from "./bot.js";
import { botDir, loadBotConfig } from "./config.js";

loadEnvLocal(botDir);

const config = loadBotConfig();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => process.exit(0));
}

await startBot(config);
