import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { handleAdminStats, handleEvent } from "../conversation/index.js";
import type { AppDeps } from "../server.js";

const eventBody = z.object({
  telegram_user_id: z.number().int().positive(),
  text: z.string().max(4096)
});

const adminBody = z.object({
  telegram_user_id: z.number().int().positive()
});

// The bot process is a thin transport: every inbound text lands here and a Reply goes back.
export function registerBotRoutes(app: FastifyInstance, deps: AppDeps) {
  // POST /bot/event
  // body: { telegram_user_id: number, text: string }
  app.post("/bot/event", async (req, reply) => {
    const body = eventBody.safeParse(req.body);
    if (!body.success) {
      reply.code(400);
      return { ok: false, error: "validation", message: body.error.issues[0]?.message };
    }
    const out = await handleEvent(deps.services, deps.settings, body.data.telegram_user_id, body.data.text);
    return { ok: true, ...out };
  });

  // POST /bot/admin/stats
  // body: { telegram_user_id: number }
  app.post("/bot/admin/stats", async (req, reply) => {
    const body = adminBody.safeParse(req.body);
    if (!body.success) {
      reply.code(400);
      return { ok: false, error: "validation", message: body.error.issues[0]?.message };
    }
    const out = await handleAdminStats(deps.services, deps.adminIds, body.data.telegram_user_id);
    return { ok: true, ...out };
  });
}
