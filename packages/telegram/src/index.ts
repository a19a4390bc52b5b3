export type TelegramReplyMarkup =
  | { keyboard: Array<Array<{ text: string }>>; resize_keyboard?: boolean }
  | { inline_keyboard: Array<Array<{ text: string; url: string }>> };

export type TelegramResult = { ok: boolean; description?: string };

function isTelegramResult(x: unknown): x is TelegramResult {
  if (typeof x !== "object" || x === null || !("ok" in x) || typeof x.ok !== "boolean") return false;
  return !("description" in x) || x.description === undefined || typeof x.description === "string";
}

async function telegramCall(botToken: string, method: string, body: Record<string, unknown>, timeoutMs: number) {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);
  try {
    const res = await fetch(`https://api.telegram.org/bot${botToken}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: ctrl.signal
    });
    const json: unknown = await res.json();
    if (!isTelegramResult(json) || !json.ok) {
      const description = isTelegramResult(json) ? json.description : undefined;
      throw new Error(`${method} failed: ${res.status} ${description ?? ""}`.trim());
    }
    return json;
  } finally {
    clearTimeout(t);
  }
}

// Outbound-only helper for processes that are not the long-polling bot (e.g. the payment reconciler).
export async function telegramSendMessage(params: {
  botToken: string;
  chatId: number;
  text: string;
  replyMarkup?: TelegramReplyMarkup;
  timeoutMs?: number;
}): Promise<void> {
  await telegramCall(
    params.botToken,
    "sendMessage",
    {
      chat_id: params.chatId,
      text: params.text,
      ...(params.replyMarkup ? { reply_markup: params.replyMarkup } : {})
    },
    params.timeoutMs ?? 10_000
  );
}
