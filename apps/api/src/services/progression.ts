import { MAX_LEVEL, fail, ok, type BotState, type DonationStatus, type Result } from "@awaken/shared";
import type { LedgerContext } from "./context.js";
import type { DonationLedger } from "./donations.js";
import type { Promote } from "./promotion.js";
import { referralLink, type ReferralLedger, type ReferralStatus } from "./referrals.js";
import type { ProfilePatch } from "./store/types.js";
import { storeCall } from "./storeCall.js";
import { TIME_TASK_DURATION_MS, type TaskLedger } from "./tasks.js";

export type EngineSettings = {
  donationAmountRub: number;
  botUsername: string;
};

export type EngineDeps = LedgerContext & {
  tasks: TaskLedger;
  referrals: ReferralLedger;
  donations: DonationLedger;
  promote: Promote;
  settings: EngineSettings;
};

type EngineError = "storage_unavailable" | "provider_unavailable" | "invariant_violation";
type EngineResult<T extends object> = Promise<Result<T, EngineError>>;

/** Everything needed to render one level page. */
export type LevelScreen = {
  level: number;
  currentLevel: number;
  content: string | null;
  rules: string | null;
};

export type Position = {
  state: BotState;
  registered: boolean;
  current: number;
  viewed: number;
};

export type AdvanceOutcome =
  | { outcome: "level"; screen: LevelScreen }
  | { outcome: "promoted"; screen: LevelScreen }
  | { outcome: "task_required"; level: number }
  | { outcome: "final"; level: number };

export type BackOutcome =
  | { outcome: "level"; screen: LevelScreen }
  | { outcome: "main_menu"; registered: boolean }
  | { outcome: "final"; level: number };

export type TimeTaskView = { active: boolean; endsAt: string | null; remainingMs: number };

export type StartTimeOutcome =
  | { outcome: "started" | "active"; endsAt: string; remainingMs: number }
  | { outcome: "already_completed" }
  | { outcome: "final"; level: number };

export type CompleteTimeOutcome =
  | { outcome: "promoted"; screen: LevelScreen }
  | { outcome: "too_early"; remainingMs: number; endsAt: string }
  | { outcome: "no_active_task" }
  | { outcome: "final"; level: number };

export type ReferralCheckOutcome =
  | { outcome: "promoted"; screen: LevelScreen; completed: number }
  | { outcome: "pending"; status: ReferralStatus }
  | { outcome: "final"; level: number };

export type DonationSelectOutcome =
  | { outcome: "checkout"; checkoutUrl: string; amount: number; targetLevel: number }
  | { outcome: "final"; level: number };

export type DonationCheckOutcome =
  | { outcome: "promoted"; screen: LevelScreen }
  | { outcome: "already_applied"; screen: LevelScreen }
  | { outcome: "not_found" }
  | { outcome: "unpaid"; status: Exclude<DonationStatus, "succeeded"> };

export type ProgressionEngine = ReturnType<typeof createProgressionEngine>;

export function createProgressionEngine(deps: EngineDeps) {
  const { store, log, clock, tasks, referrals, donations, promote, settings } = deps;

  async function position(userId: number): EngineResult<Position> {
    const res = await storeCall(log, "engine.position", async () => ({
      user: await store.users.getUser(userId),
      profile: await store.users.getProfile(userId)
    }));
    if (!res.ok) return res;
    if (!res.user) return fail("invariant_violation", `unknown user ${userId}`);
    const current = res.user.current_level;
    // viewed_level <= current_level is held here, not by storage.
    const viewed = Math.min(Math.max(res.profile?.viewed_level ?? current, 1), current);
    return ok({ state: res.user.current_state, registered: res.user.registration_complete, current, viewed });
  }

  async function setState(userId: number, state: BotState, profile?: ProfilePatch): EngineResult<object> {
    return storeCall(log, "engine.setState", async () => {
      if (profile) await store.users.saveProfile(userId, profile);
      await store.users.setState(userId, state);
      return {};
    });
  }

  async function screen(level: number, currentLevel: number): EngineResult<LevelScreen> {
    const res = await storeCall(log, "levels.get", async () => ({ row: await store.levels.getLevel(level) }));
    if (!res.ok) return res;
    if (!res.row) log.warn({ level }, "no content for level");
    return ok({ level, currentLevel, content: res.row?.content ?? null, rules: res.row?.rules ?? null });
  }

  /** Moves the display to `level` (clamped to what is unlocked) and enters level_content. */
  async function showLevel(userId: number, level: number): EngineResult<{ screen: LevelScreen }> {
    const pos = await position(userId);
    if (!pos.ok) return pos;
    const target = Math.min(Math.max(Math.trunc(level), 1), pos.current);
    if (target !== level) log.warn({ userId, requested: level, current: pos.current }, "level view clamped");
    const saved = await setState(userId, "level_content", { viewed_level: target });
    if (!saved.ok) return saved;
    const s = await screen(target, pos.current);
    if (!s.ok) return s;
    return ok({ screen: s });
  }

  /** Promotes from `from` and lands the user on whatever level they hold afterwards. */
  async function promoteAndShow(userId: number, from: number): EngineResult<{ screen: LevelScreen; promoted: boolean }> {
    const p = await promote(userId, from);
    if (!p.ok) return p;
    const shown = await showLevel(userId, p.level);
    if (!shown.ok) return shown;
    return ok({ screen: shown.screen, promoted: p.promoted });
  }

  async function toFinal(userId: number, level: number) {
    const saved = await setState(userId, "final_level");
    if (!saved.ok) return saved;
    return ok({ outcome: "final" as const, level });
  }

  return {
    position,
    setState,
    showLevel,

    async advance(userId: number): EngineResult<AdvanceOutcome> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      const { current, viewed } = pos;

      if (viewed < current) {
        const shown = await showLevel(userId, viewed + 1);
        if (!shown.ok) return shown;
        return ok({ outcome: "level" as const, screen: shown.screen });
      }
      if (current >= MAX_LEVEL) return toFinal(userId, current);

      if (current === 1) {
        const now = clock();
        const auto = await tasks.recordTask(userId, 1, "auto", now, now, true);
        if (!auto.ok && auto.error !== "already_completed") return fail(auto.error, auto.message);
      }

      const done = await tasks.isAnyTaskCompleted(userId, current);
      if (!done.ok) return done;
      if (!done.completed) {
        const saved = await setState(userId, "task_selection");
        if (!saved.ok) return saved;
        return ok({ outcome: "task_required" as const, level: current });
      }

      const moved = await promoteAndShow(userId, current);
      if (!moved.ok) return moved;
      return ok({ outcome: moved.promoted ? ("promoted" as const) : ("level" as const), screen: moved.screen });
    },

    promote,

    async back(userId: number): EngineResult<BackOutcome> {
      const pos = await position(userId);
      if (!pos.ok) return pos;

      if (pos.state === "charity_input") {
        if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);
        const saved = await setState(userId, "main_menu");
        if (!saved.ok) return saved;
        return ok({ outcome: "main_menu" as const, registered: pos.registered });
      }

      const returnsToLevel: BotState[] = ["faq", "task_selection", "time_task", "referral_task", "donation_task"];
      const target = returnsToLevel.includes(pos.state) ? pos.viewed : pos.viewed - 1;
      if (target < 1) {
        const saved = await setState(userId, "main_menu");
        if (!saved.ok) return saved;
        return ok({ outcome: "main_menu" as const, registered: pos.registered });
      }
      const shown = await showLevel(userId, target);
      if (!shown.ok) return shown;
      return ok({ outcome: "level" as const, screen: shown.screen });
    },

    async openMainMenu(userId: number): EngineResult<{ registered: boolean }> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      const saved = await setState(userId, "main_menu");
      if (!saved.ok) return saved;
      return ok({ registered: pos.registered });
    },

    async openFaq(userId: number): EngineResult<object> {
      return setState(userId, "faq");
    },

    /** Rules text for the level on display. */
    async levelRules(userId: number): EngineResult<{ level: number; rules: string | null }> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      const s = await screen(pos.viewed, pos.current);
      if (!s.ok) return s;
      return ok({ level: pos.viewed, rules: s.rules });
    },

    async openTaskSelection(userId: number): EngineResult<{ level: number } | { outcome: "final"; level: number }> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);
      const saved = await setState(userId, "task_selection");
      if (!saved.ok) return saved;
      return ok({ level: pos.current });
    },

    async openTimeTask(userId: number): EngineResult<TimeTaskView | { outcome: "final"; level: number }> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);
      const active = await tasks.getActiveTimeTask(userId, pos.current);
      if (!active.ok) return active;
      const saved = await setState(userId, "time_task");
      if (!saved.ok) return saved;
      if (!active.task) return ok({ active: false, endsAt: null, remainingMs: 0 });
      const endsAt = active.task.end_time;
      return ok({ active: true, endsAt, remainingMs: Math.max(0, Date.parse(endsAt) - clock().getTime()) });
    },

    async startTimeTask(userId: number): EngineResult<StartTimeOutcome> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);
      const now = clock();

      const active = await tasks.getActiveTimeTask(userId, pos.current);
      if (!active.ok) return active;
      if (active.task) {
        const endsAt = active.task.end_time;
        return ok({ outcome: "active" as const, endsAt, remainingMs: Math.max(0, Date.parse(endsAt) - now.getTime()) });
      }

      const end = new Date(now.getTime() + TIME_TASK_DURATION_MS);
      const rec = await tasks.recordTask(userId, pos.current, "time", now, end, false);
      if (!rec.ok) {
        if (rec.error === "already_completed") return ok({ outcome: "already_completed" as const });
        return fail(rec.error, rec.message);
      }
      const saved = await setState(userId, "time_task");
      if (!saved.ok) return saved;
      log.info({ userId, level: pos.current, endsAt: end.toISOString() }, "time task started");
      return ok({ outcome: "started" as const, endsAt: end.toISOString(), remainingMs: TIME_TASK_DURATION_MS });
    },

    async completeTimeTask(userId: number): EngineResult<CompleteTimeOutcome> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);

      const active = await tasks.getActiveTimeTask(userId, pos.current);
      if (!active.ok) return active;
      if (!active.task) {
        const done = await tasks.isAnyTaskCompleted(userId, pos.current, "time");
        if (!done.ok) return done;
        if (!done.completed) return ok({ outcome: "no_active_task" as const });
      } else {
        const remainingMs = Date.parse(active.task.end_time) - clock().getTime();
        if (remainingMs > 0) return ok({ outcome: "too_early" as const, remainingMs, endsAt: active.task.end_time });
        const marked = await tasks.markCompleted(userId, pos.current, "time");
        if (!marked.ok) return marked;
      }

      // The task write is confirmed before the bump is attempted.
      const moved = await promoteAndShow(userId, pos.current);
      if (!moved.ok) return moved;
      return ok({ outcome: "promoted" as const, screen: moved.screen });
    },

    async openReferralTask(userId: number): EngineResult<{ link: string; status: ReferralStatus } | { outcome: "final"; level: number }> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);
      const status = await referrals.getStatus(userId, pos.current);
      if (!status.ok) return status;
      const saved = await setState(userId, "referral_task");
      if (!saved.ok) return saved;
      return ok({
        link: referralLink(settings.botUsername, userId),
        status: { total: status.total, completed: status.completed, pending: status.pending }
      });
    },

    async checkReferralStatus(userId: number): EngineResult<ReferralCheckOutcome> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);

      const status = await referrals.getStatus(userId, pos.current);
      if (!status.ok) return status;
      const taskDone = await tasks.isAnyTaskCompleted(userId, pos.current, "referral");
      if (!taskDone.ok) return taskDone;
      if (status.completed === 0 && !taskDone.completed) {
        return ok({ outcome: "pending" as const, status: { total: status.total, completed: status.completed, pending: status.pending } });
      }

      if (!taskDone.completed) {
        const now = clock();
        const rec = await tasks.recordTask(userId, pos.current, "referral", now, now, true);
        if (!rec.ok && rec.error !== "already_completed") return fail(rec.error, rec.message);
      }
      const moved = await promoteAndShow(userId, pos.current);
      if (!moved.ok) return moved;
      return ok({ outcome: "promoted" as const, screen: moved.screen, completed: status.completed });
    },

    async selectDonation(userId: number): EngineResult<DonationSelectOutcome> {
      const pos = await position(userId);
      if (!pos.ok) return pos;
      if (pos.current >= MAX_LEVEL) return toFinal(userId, pos.current);
      const saved = await setState(userId, "donation_task");
      if (!saved.ok) return saved;

      // A repeated tap gets the checkout that is still open instead of a second payment.
      const open = await donations.getOpen(userId, pos.current);
      if (!open.ok) return open;
      const reusable = open.donations.find((d) => d.status === "pending" && d.amount === settings.donationAmountRub);
      if (reusable?.checkout_url) {
        log.info({ userId, level: pos.current, donationId: reusable.id }, "reusing open checkout");
        return ok({
          outcome: "checkout" as const,
          checkoutUrl: reusable.checkout_url,
          amount: reusable.amount,
          targetLevel: pos.current + 1
        });
      }

      const intent = await donations.createIntent(userId, pos.current, settings.donationAmountRub);
      if (!intent.ok) return intent;
      return ok({
        outcome: "checkout" as const,
        checkoutUrl: intent.checkoutUrl,
        amount: intent.donation.amount,
        targetLevel: pos.current + 1
      });
    },

    async checkDonationStatus(userId: number): EngineResult<DonationCheckOutcome> {
      const pos = await position(userId);
      if (!pos.ok) return pos;

      // Any open checkout for the level may be the one that was paid.
      const open = await donations.getOpen(userId, pos.current);
      if (!open.ok) return open;
      let unpaid: Exclude<DonationStatus, "succeeded"> | null = null;
      for (const donation of open.donations) {
        const settled = await donations.settle(donation);
        if (!settled.ok) {
          if (settled.error === "not_found") continue;
          return fail(settled.error, settled.message);
        }
        if (settled.status !== "succeeded") {
          if (unpaid === null) unpaid = settled.status;
          continue;
        }
        const shown = await showLevel(userId, settled.level ?? pos.current);
        if (!shown.ok) return shown;
        return ok({ outcome: settled.applied === "applied" ? ("promoted" as const) : ("already_applied" as const), screen: shown.screen });
      }
      if (unpaid) return ok({ outcome: "unpaid" as const, status: unpaid });

      const last = await donations.getLast(userId, pos.current);
      if (!last.ok) return last;
      if (!last.donation) {
        // The reconciler may already have applied it and moved the user up.
        if (pos.current > 1) {
          const prev = await donations.getLast(userId, pos.current - 1);
          if (!prev.ok) return prev;
          if (prev.donation?.processed && prev.donation.status === "succeeded") {
            const shown = await showLevel(userId, pos.current);
            if (!shown.ok) return shown;
            return ok({ outcome: "already_applied" as const, screen: shown.screen });
          }
        }
        return ok({ outcome: "not_found" as const });
      }

      const settled = await donations.settle(last.donation);
      if (!settled.ok) {
        if (settled.error === "not_found") return ok({ outcome: "not_found" as const });
        return fail(settled.error, settled.message);
      }
      if (settled.status !== "succeeded") return ok({ outcome: "unpaid" as const, status: settled.status });

      const shown = await showLevel(userId, settled.level ?? pos.current);
      if (!shown.ok) return shown;
      return ok({ outcome: settled.applied === "applied" ? ("promoted" as const) : ("already_applied" as const), screen: shown.screen });
    }
  };
}
