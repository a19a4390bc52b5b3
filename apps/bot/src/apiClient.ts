import type { Reply } from "@awaken/shared";
import { z } from "zod";

const replySchema = z.object({
  ok: z.literal(true),
  messages: z.array(
    z.object({
      text: z.string(),
      keyboard: z.array(z.array(z.string())).optional(),
      links: z.array(z.object({ text: z.string(), url: z.string() })).optional(),
      level_image: z.number().int().optional()
    })
  )
});

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export type ApiClient = {
  sendEvent(telegramUserId: number, text: string): Promise<Reply>;
  adminStats(telegramUserId: number): Promise<Reply>;
};

export function createApiClient(baseUrl: string, timeoutMs = 15_000): ApiClient {
  async function post(path: string, body: Record<string, unknown>): Promise<Reply> {
    const ctrl = new AbortController();
    const t = setTimeout(() => ctrl.abort(), timeoutMs);
    try {
      const res = await fetch(`${baseUrl}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: ctrl.signal
      });
      const text = await res.text();
      if (!res.ok) throw new ApiError(res.status, `${path} failed: ${res.status} ${text.slice(0, 200)}`.trim());
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        throw new ApiError(res.status, `${path} returned non-JSON`);
      }
      const parsed = replySchema.safeParse(json);
      if (!parsed.success) throw new ApiError(res.status, `${path} returned an unexpected body`);
      return { messages: parsed.data.messages };
    } finally {
      clearTimeout(t);
    }
  }

  return {
    sendEvent: (telegramUserId, text) => post("/bot/event", { telegram_user_id: telegramUserId, text }),
    adminStats: (telegramUserId) => post("/bot/admin/stats", { telegram_user_id: telegramUserId })
  };
}
