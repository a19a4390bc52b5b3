import type { OutboundMessage, Reply } from "@awaken/shared";
import { telegramSendMessage, type TelegramReplyMarkup } from "@awaken/telegram";

/** Pushes a reply to a user outside of a request/response turn. */
export interface Notifier {
  notify(userId: number, reply: Reply): Promise<void>;
}

export function toReplyMarkup(msg: OutboundMessage): TelegramReplyMarkup | undefined {
  if (msg.links && msg.links.length > 0) {
    return { inline_keyboard: msg.links.map((l) => [{ text: l.text, url: l.url }]) };
  }
  if (msg.keyboard && msg.keyboard.length > 0) {
    return { keyboard: msg.keyboard.map((row) => row.map((text) => ({ text }))), resize_keyboard: true };
  }
  return undefined;
}

// Level images are only attached by the bot process; the API side sends text.
export function createTelegramNotifier(botToken: string, timeoutMs = 10_000): Notifier {
  return {
    async notify(userId, reply) {
      for (const msg of reply.messages) {
        const replyMarkup = toReplyMarkup(msg);
        await telegramSendMessage({ botToken, chatId: userId, text: msg.text, timeoutMs, ...(replyMarkup ? { replyMarkup } : {}) });
      }
    }
  };
}

export const noopNotifier: Notifier = {
  async notify() {}
};
