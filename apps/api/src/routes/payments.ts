import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { AppDeps } from "../server.js";
import { announceApplied } from "../services/reconciliation.js";

// Only the payment id is taken from the notification; the status is re-read from the provider.
const notification = z.object({
  event: z.string().optional(),
  object: z.object({ id: z.string().min(1) })
});

export function registerPaymentRoutes(app: FastifyInstance, deps: AppDeps) {
  // POST /payments/webhook
  // Always 200 unless the body is unusable, so the provider stops retrying unknown payments.
  app.post("/payments/webhook", async (req, reply) => {
    const body = notification.safeParse(req.body);
    if (!body.success) {
      reply.code(400);
      return { ok: false, error: "validation" };
    }
    const { donations, log } = deps.services;
    const paymentId = body.data.object.id;

    const found = await donations.getByPaymentId(paymentId);
    if (!found.ok) {
      reply.code(503);
      return { ok: false, error: found.error };
    }
    if (!found.donation) {
      log.info({ paymentId, event: body.data.event }, "webhook for unknown payment");
      return { ok: true, handled: false };
    }

    const settled = await donations.settle(found.donation);
    if (!settled.ok) {
      log.warn({ paymentId, error: settled.error }, "webhook: donation not settled");
      return { ok: true, handled: false };
    }
    if (settled.applied === "applied") await announceApplied(deps.services, deps.notifier, found.donation, settled.level);
    return { ok: true, handled: true, status: settled.status, applied: settled.applied };
  });
}
