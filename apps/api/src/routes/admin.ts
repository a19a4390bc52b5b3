import type { FastifyInstance, FastifyRequest } from "fastify";
import type { AppDeps } from "../server.js";
import { storeCall } from "../services/storeCall.js";

class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
  }
}

// Shared dashboard token via the x-admin-token header. No token configured means no access.
function requireDashboard(request: FastifyRequest, token: string | undefined) {
  const header = request.headers["x-admin-token"];
  const given = Array.isArray(header) ? header[0] : header;
  if (!token || given !== token) throw new HttpError(401, "unauthorized");
}

export function registerAdminRoutes(app: FastifyInstance, deps: AppDeps) {
  app.get("/admin/stats", async (req, reply) => {
    try {
      requireDashboard(req, deps.adminDashboardToken);
    } catch (e) {
      if (!(e instanceof HttpError)) throw e;
      reply.code(e.statusCode);
      return { ok: false, error: e.message };
    }
    const { store, log } = deps.services;
    const res = await storeCall(log, "stats.get", async () => ({ stats: await store.stats.getAdminStats() }));
    if (!res.ok) {
      reply.code(503);
      return { ok: false, error: res.error };
    }
    return { ok: true, stats: res.stats };
  });
}
