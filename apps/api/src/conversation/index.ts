import { errorMessage, isBotState, reply, type Reply } from "@awaken/shared";
import type { Services } from "../services/index.js";
import { storeCall } from "../services/storeCall.js";
import { classifyEvent } from "./events.js";
import { GLOBAL, resolveHandler, type ConversationSettings } from "./transitions.js";
import { adminForbidden, adminStatsText, errorReply, useButtonsReply } from "./views.js";

export type { ConversationSettings } from "./transitions.js";

/**
 * One inbound text from one user, start to finish. Never throws: anything unexpected is
 * logged and turned into the generic error reply.
 */
export async function handleEvent(services: Services, settings: ConversationSettings, userId: number, text: string): Promise<Reply> {
  const { log, store } = services;
  const event = classifyEvent(text);
  try {
    const found = await storeCall(log, "users.get", async () => ({ user: await store.users.getUser(userId) }));
    if (!found.ok) return errorReply();

    // Unknown users are treated as if they had sent /start.
    if (!found.user) {
      const start = GLOBAL.start;
      if (!start) return errorReply();
      return await start({ services, settings, userId, event: { ...event, kind: "start" } });
    }

    const state = found.user.current_state;
    if (!isBotState(state)) {
      log.error({ userId, state }, "user in unknown state");
      return errorReply();
    }

    const handler = resolveHandler(state, event.kind);
    if (!handler) {
      log.debug({ userId, state, event: event.kind }, "no transition");
      return useButtonsReply();
    }
    return await handler({ services, settings, userId, event });
  } catch (e) {
    log.error({ userId, event: event.kind, err: errorMessage(e) }, "conversation turn failed");
    return errorReply();
  }
}

/** `/admin` from the chat: stats for ids in ADMIN_IDS, a refusal for everyone else. */
export async function handleAdminStats(services: Services, adminIds: ReadonlySet<number>, userId: number): Promise<Reply> {
  if (!adminIds.has(userId)) {
    services.log.warn({ userId }, "admin stats refused");
    return adminForbidden();
  }
  const stats = await storeCall(services.log, "stats.get", async () => ({ stats: await services.store.stats.getAdminStats() }));
  if (!stats.ok) return errorReply();
  return reply({ text: adminStatsText(stats.stats) });
}
