import { fail, ok, type DbReferral, type Result } from "@awaken/shared";
import type { LedgerContext } from "./context.js";
import { storeCall } from "./storeCall.js";

export type CreateEdgeError = "duplicate" | "self_referral" | "unknown_referrer" | "already_registered" | "storage_unavailable";

export type ReferralStatus = { total: number; completed: number; pending: number };

export type ReferralLedger = {
  createEdge(referrerId: number, refereeId: number, level: number): Promise<Result<object, CreateEdgeError>>;
  /** Called once per referee, right after registration completes. */
  completeReferral(refereeId: number): Promise<Result<{ edges: DbReferral[] }, "storage_unavailable">>;
  getStatus(userId: number, level: number): Promise<Result<ReferralStatus, "storage_unavailable">>;
};

export function createReferralLedger({ store, log, clock }: LedgerContext): ReferralLedger {
  return {
    async createEdge(referrerId, refereeId, level) {
      if (referrerId === refereeId) {
        log.warn({ userId: refereeId }, "self referral rejected");
        return fail("self_referral");
      }
      const users = await storeCall(log, "referrals.lookup", async () => ({
        referrer: await store.users.getUser(referrerId),
        referee: await store.users.getUser(refereeId)
      }));
      if (!users.ok) return users;
      if (!users.referrer) return fail("unknown_referrer");
      if (users.referee?.registration_complete) return fail("already_registered");

      const res = await storeCall(log, "referrals.create", async () => ({
        created: await store.referrals.createEdge(referrerId, refereeId, level, clock())
      }));
      if (!res.ok) return res;
      if (!res.created) {
        log.debug({ referrerId, refereeId, level }, "referral edge already exists");
        return fail("duplicate");
      }
      log.info({ referrerId, refereeId, level }, "referral edge created");
      return ok({});
    },

    async completeReferral(refereeId) {
      const res = await storeCall(log, "referrals.complete", async () => ({
        edges: await store.referrals.completeReferral(refereeId, clock())
      }));
      if (res.ok && res.edges.length) {
        log.info({ refereeId, referrers: res.edges.map((e) => e.referrer_id) }, "referrals completed");
      }
      return res;
    },

    async getStatus(userId, level) {
      const res = await storeCall(log, "referrals.status", () => store.referrals.countEdges(userId, level));
      if (!res.ok) return res;
      return ok({ total: res.total, completed: res.completed, pending: res.total - res.completed });
    }
  };
}

export function referralLink(botUsername: string, userId: number): string {
  return `https://t.me/${botUsername}?start=ref${userId}`;
}

/** "ref123" -> 123; anything else -> null. */
export function parseStartPayload(payload: string | undefined): number | null {
  const m = payload?.trim().match(/^ref(\d{1,15})$/);
  if (!m) return null;
  const id = Number(m[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
