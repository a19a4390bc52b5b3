import { USER_ERROR_MESSAGE, type Reply } from "@awaken/shared";
import { Bot, InputFile, type Context } from "grammy";
import { createApiClient, type ApiClient } from "./apiClient.js";
import type { BotConfig } from "./config.js";
import { planReply } from "./render.js";

const ADMIN_COMMAND = /^\/admin(?:@\w+)?$/;

async function sendReply(ctx: Context, reply: Reply, assetsDir: string) {
  for (const op of planReply(reply, assetsDir)) {
    if (op.kind === "photo") {
      await ctx.replyWithPhoto(new InputFile(op.file));
    } else {
      await ctx.reply(op.text, op.markup ? { reply_markup: op.markup } : {});
    }
  }
}

export function createBot(config: BotConfig, api: ApiClient = createApiClient(config.apiBaseUrl, config.requestTimeoutMs)) {
  const bot = new Bot(config.botToken);

  // Minimal observability: one line per command.
  bot.use(async (ctx, next) => {
    const text = ctx.message?.text;
    if (text?.trimStart().startsWith("/")) {
      console.log(
        JSON.stringify({
          t: "cmd",
          update_id: ctx.update.update_id,
          chat_id: ctx.chat?.id,
          chat_type: ctx.chat?.type,
          from_id: ctx.from?.id,
          text: text.slice(0, 120)
        })
      );
    }
    await next();
  });

  // Private chats only; the game has no group mode. Everything but /admin, /start with its
  // deep-link payload included, goes to the API as-is.
  bot.chatType("private").on("message:text", async (ctx) => {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    const text = ctx.message.text;
    let reply: Reply;
    try {
      reply = ADMIN_COMMAND.test(text.trim()) ? await api.adminStats(userId) : await api.sendEvent(userId, text);
    } catch (e) {
      console.error("api call failed", e);
      await ctx.reply(USER_ERROR_MESSAGE);
      return;
    }
    await sendReply(ctx, reply, config.levelAssetsDir);
  });

  bot.catch((err) => {
    console.error("Bot error:", err.error);
  });

  return bot;
}

export async function startBot(config: BotConfig) {
  const bot = createBot(config);

  // Ensure we are the only consumer (no webhook), and ensure command list is up-to-date.
  await bot.api.deleteWebhook({ drop_pending_updates: true });
  await bot.api.setMyCommands([
    { command: "start", description: "старт" },
    { command: "admin", description: "статистика (для администраторов)" }
  ]);

  console.log(JSON.stringify({ t: "start", api: config.apiBaseUrl, assets: config.levelAssetsDir }));
  await bot.start();
}
