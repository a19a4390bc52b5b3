import { MAX_LEVEL, fail, ok, type Result } from "@awaken/shared";
import type { LedgerContext } from "./context.js";
import { storeCall } from "./storeCall.js";

export type PromoteResult = Result<{ promoted: boolean; level: number }, "storage_unavailable" | "invariant_violation">;

export type Promote = (userId: number, fromLevel: number) => Promise<PromoteResult>;

/**
 * The only path that raises `current_level`: compare-and-set from -> from + 1.
 * Concurrent callers with the same `fromLevel` race on the store and exactly one wins.
 * `level` is the user's level after the call.
 */
export function createPromote({ store, log }: LedgerContext): Promote {
  return async (userId, fromLevel) => {
    const to = fromLevel + 1;
    if (to > MAX_LEVEL) {
      log.warn({ userId, fromLevel }, "invariant_violation: promotion past max level rejected");
      return ok({ promoted: false, level: fromLevel });
    }
    const bumped = await storeCall(log, "users.bumpLevel", async () => ({
      moved: await store.users.bumpLevel(userId, fromLevel, to)
    }));
    if (!bumped.ok) return bumped;
    if (!bumped.moved) {
      const user = await storeCall(log, "users.get", async () => ({ user: await store.users.getUser(userId) }));
      if (!user.ok) return user;
      if (!user.user) return fail("invariant_violation", `user ${userId} not found`);
      log.warn({ userId, fromLevel, currentLevel: user.user.current_level }, "invariant_violation: level bump lost compare-and-set");
      return ok({ promoted: false, level: user.user.current_level });
    }
    const saved = await storeCall(log, "profile.viewed", async () => {
      await store.users.saveProfile(userId, { viewed_level: to });
      return {};
    });
    if (!saved.ok) return saved;
    log.info({ userId, from: fromLevel, to }, "level promoted");
    return ok({ promoted: true, level: to });
  };
}
