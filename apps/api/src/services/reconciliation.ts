import { CHARITY_LEVEL, MAX_LEVEL, errorMessage, type DbDonation, type Reply } from "@awaken/shared";
import { charityThanks, unlocked } from "../conversation/views.js";
import type { Services } from "./index.js";
import type { Notifier } from "./notifier.js";

export type ReconcileSummary = {
  checked: number;
  applied: number;
  updated: number;
  failed: number;
};

async function notifyBestEffort(services: Services, notifier: Notifier, userId: number, reply: Reply): Promise<void> {
  try {
    await notifier.notify(userId, reply);
  } catch (e) {
    services.log.warn({ userId, err: errorMessage(e) }, "payment notification not delivered");
  }
}

/** Moves the user onto the result of a payment and tells them, best-effort. */
export async function announceApplied(services: Services, notifier: Notifier, donation: DbDonation, level: number | null): Promise<void> {
  const userId = donation.user_id;
  if (donation.level === CHARITY_LEVEL) {
    const pos = await services.engine.position(userId);
    if (!pos.ok) return;
    const exit = pos.current >= MAX_LEVEL ? ("final_level" as const) : ("main_menu" as const);
    const saved = await services.engine.setState(userId, exit);
    if (!saved.ok) return;
    await notifyBestEffort(services, notifier, userId, charityThanks(exit, pos.registered));
    return;
  }
  const shown = await services.engine.showLevel(userId, level ?? donation.level + 1);
  if (!shown.ok) return;
  await notifyBestEffort(services, notifier, userId, unlocked(shown.screen, "Платеж подтвержден!"));
}

/**
 * One sweep over unprocessed pending donations. At most one donation per user is acted on in a
 * pass; a donation whose status did not move lets the next one of that user be checked.
 */
export async function runReconciliationPass(services: Services, notifier: Notifier): Promise<ReconcileSummary> {
  const { donations, log } = services;
  const summary: ReconcileSummary = { checked: 0, applied: 0, updated: 0, failed: 0 };

  const pending = await donations.getPending();
  if (!pending.ok) {
    summary.failed += 1;
    return summary;
  }

  const seen = new Set<number>();
  for (const donation of pending.donations) {
    if (donation.processed || seen.has(donation.user_id)) continue;
    summary.checked += 1;
    try {
      const settled = await donations.settle(donation);
      if (!settled.ok) {
        summary.failed += 1;
        log.warn({ donationId: donation.id, error: settled.error }, "reconcile: donation not settled");
        continue;
      }
      // A donation still sitting in the same status does not use up the user's turn.
      const changed = settled.applied !== null || settled.status !== donation.status;
      if (!changed) continue;
      seen.add(donation.user_id);
      if (settled.status === "canceled" || (settled.status === "waiting_for_capture" && donation.status === "pending")) summary.updated += 1;
      if (settled.applied === "applied") {
        summary.applied += 1;
        await announceApplied(services, notifier, donation, settled.level);
      }
    } catch (e) {
      summary.failed += 1;
      log.error({ donationId: donation.id, err: errorMessage(e) }, "reconcile: donation failed");
    }
  }

  if (summary.checked > 0) log.info(summary, "reconcile pass done");
  return summary;
}

export type ReconciliationLoop = { stop(): void };

/** Runs passes every `intervalMs`; the next pass is scheduled only after the previous one finished. */
export function startReconciliationLoop(services: Services, notifier: Notifier, intervalMs: number): ReconciliationLoop {
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const tick = async () => {
    try {
      await runReconciliationPass(services, notifier);
    } catch (e) {
      services.log.error({ err: errorMessage(e) }, "reconcile pass crashed");
    }
    if (!stopped) timer = setTimeout(() => void tick(), intervalMs);
  };

  timer = setTimeout(() => void tick(), intervalMs);
  return {
    stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
    }
  };
}
