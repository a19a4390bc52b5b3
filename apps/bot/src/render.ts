import type { OutboundMessage, Reply } from "@awaken/shared";
import { InlineKeyboard, Keyboard } from "grammy";
import type { ReplyKeyboardRemove } from "grammy/types";
import { resolveLevelImage } from "./assets.js";

export type Markup = Keyboard | InlineKeyboard | ReplyKeyboardRemove;

export type Outgoing = { kind: "photo"; file: string } | { kind: "text"; text: string; markup?: Markup };

export function replyKeyboard(rows: string[][]): Keyboard | ReplyKeyboardRemove {
  if (rows.length === 0) return { remove_keyboard: true };
  const k = new Keyboard();
  rows.forEach((row, i) => {
    if (i > 0) k.row();
    for (const label of row) k.text(label);
  });
  return k.resized();
}

export function linkKeyboard(links: { text: string; url: string }[]): InlineKeyboard {
  const k = new InlineKeyboard();
  links.forEach((link, i) => {
    if (i > 0) k.row();
    k.url(link.text, link.url);
  });
  return k;
}

function markupFor(msg: OutboundMessage): Markup | undefined {
  // Telegram takes one markup per message; links win over the reply keyboard.
  if (msg.links && msg.links.length > 0) return linkKeyboard(msg.links);
  if (msg.keyboard) return replyKeyboard(msg.keyboard);
  return undefined;
}

/** Turns a Reply into the sends the bot performs, in order. Missing level pictures are skipped. */
export function planReply(reply: Reply, assetsDir: string): Outgoing[] {
  const out: Outgoing[] = [];
  for (const msg of reply.messages) {
    if (msg.level_image !== undefined) {
      const file = resolveLevelImage(assetsDir, msg.level_image);
      if (file) out.push({ kind: "photo", file });
    }
    const markup = markupFor(msg);
    out.push(markup ? { kind: "text", text: msg.text, markup } : { kind: "text", text: msg.text });
  }
  return out;
}
