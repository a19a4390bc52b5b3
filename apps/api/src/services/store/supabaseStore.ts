import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { BOT_STATES, DONATION_STATUSES, TASK_TYPES, type AdminStats } from "@awaken/shared";
import { StoreError, type ApplyOutcome, type Store } from "./types.js";

// Postgres-backed store. Single-row conditional writes are compare-and-set updates;
// the two cross-row transactions live in SQL functions (supabase/migrations/001_init.sql).

const UNIQUE_VIOLATION = "23505";

const userRow = z.object({
  id: z.coerce.number(),
  registration_complete: z.boolean(),
  current_level: z.number().int(),
  current_state: z.enum(BOT_STATES),
  registration_date: z.string()
});

const profileRow = z.object({
  user_id: z.coerce.number(),
  name: z.string().nullable(),
  birthdate: z.string().nullable(),
  location: z.string().nullable(),
  language: z.string().nullable(),
  viewed_level: z.number().int()
});

const levelRow = z.object({
  level_number: z.number().int(),
  content: z.string(),
  rules: z.string().nullable(),
  image_ref: z.string().nullable()
});

const taskRow = z.object({
  id: z.coerce.number(),
  user_id: z.coerce.number(),
  level: z.number().int(),
  task_type: z.enum(TASK_TYPES),
  start_time: z.string(),
  end_time: z.string(),
  completed: z.boolean(),
  completion_time: z.string().nullable()
});

const referralRow = z.object({
  id: z.coerce.number(),
  referrer_id: z.coerce.number(),
  referee_id: z.coerce.number(),
  level: z.number().int(),
  referral_date: z.string(),
  registration_date: z.string().nullable()
});

const donationRow = z.object({
  id: z.coerce.number(),
  user_id: z.coerce.number(),
  level: z.number().int(),
  amount: z.coerce.number(),
  currency: z.string(),
  status: z.enum(DONATION_STATUSES),
  payment_id: z.string(),
  checkout_url: z.string().nullable(),
  processed: z.boolean(),
  donation_date: z.string().nullable(),
  created_at: z.string()
});

const applyOutcome = z.enum(["applied", "already_applied", "not_found"]);

function storeError(op: string, error: PostgrestError): StoreError {
  return new StoreError(`${op}: ${error.code || "?"} ${error.message}`, error);
}

function parseRow<T>(op: string, schema: z.ZodType<T>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new StoreError(`${op}: unexpected row shape`, parsed.error);
  return parsed.data;
}

function parseRows<T>(op: string, schema: z.ZodType<T>, data: unknown): T[] {
  return parseRow(op, z.array(schema), data ?? []);
}

export function createSupabaseStore(db: SupabaseClient): Store {
  return {
    users: {
      async getUser(id) {
        const res = await db.from("users").select("*").eq("id", id).maybeSingle();
        if (res.error) throw storeError("users.get", res.error);
        return res.data ? parseRow("users.get", userRow, res.data) : null;
      },
      async createUser(id, now) {
        const res = await db
          .from("users")
          .insert([{ id, registration_complete: false, current_level: 1, current_state: "language_selection", registration_date: now.toISOString() }]);
        if (res.error?.code === UNIQUE_VIOLATION) return false;
        if (res.error) throw storeError("users.create", res.error);
        return true;
      },
      async setState(id, state) {
        const res = await db.from("users").update({ current_state: state }).eq("id", id);
        if (res.error) throw storeError("users.setState", res.error);
      },
      async completeRegistration(id, now) {
        const res = await db
          .from("users")
          .update({ registration_complete: true, registration_date: now.toISOString() })
          .eq("id", id)
          .eq("registration_complete", false)
          .select("id");
        if (res.error) throw storeError("users.completeRegistration", res.error);
        return (res.data ?? []).length > 0;
      },
      async bumpLevel(id, from, to) {
        if (to <= from) return false;
        const res = await db.from("users").update({ current_level: to }).eq("id", id).eq("current_level", from).select("id");
        // CHECK (current_level <= 21) rejects overshoot as 23514.
        if (res.error?.code === "23514") return false;
        if (res.error) throw storeError("users.bumpLevel", res.error);
        return (res.data ?? []).length > 0;
      },
      async getProfile(id) {
        const res = await db.from("user_data").select("*").eq("user_id", id).maybeSingle();
        if (res.error) throw storeError("user_data.get", res.error);
        return res.data ? parseRow("user_data.get", profileRow, res.data) : null;
      },
      async saveProfile(id, patch) {
        const res = await db.from("user_data").upsert([{ user_id: id, ...patch }], { onConflict: "user_id" });
        if (res.error) throw storeError("user_data.save", res.error);
      }
    },

    tasks: {
      async upsertTask(input, now) {
        const row = {
          start_time: input.start_time.toISOString(),
          end_time: input.end_time.toISOString(),
          completed: input.completed,
          completion_time: input.completed ? now.toISOString() : null
        };
        const ins = await db
          .from("tasks")
          .insert([{ user_id: input.user_id, level: input.level, task_type: input.task_type, ...row }]);
        if (!ins.error) return "inserted";
        if (ins.error.code !== UNIQUE_VIOLATION) throw storeError("tasks.insert", ins.error);
        // Row exists: only an incomplete one may be rewritten.
        const upd = await db
          .from("tasks")
          .update(row)
          .eq("user_id", input.user_id)
          .eq("level", input.level)
          .eq("task_type", input.task_type)
          .eq("completed", false)
          .select("id");
        if (upd.error) throw storeError("tasks.update", upd.error);
        return (upd.data ?? []).length > 0 ? "updated" : "already_completed";
      },
      async markCompleted(userId, level, type, now) {
        const res = await db
          .from("tasks")
          .update({ completed: true, completion_time: now.toISOString() })
          .eq("user_id", userId)
          .eq("level", level)
          .eq("task_type", type)
          .eq("completed", false)
          .select("id");
        if (res.error) throw storeError("tasks.markCompleted", res.error);
        return (res.data ?? []).length > 0;
      },
      async hasCompleted(userId, level, type) {
        let q = db.from("tasks").select("id", { count: "exact", head: true }).eq("user_id", userId).eq("level", level).eq("completed", true);
        if (type) q = q.eq("task_type", type);
        const res = await q;
        if (res.error) throw storeError("tasks.hasCompleted", res.error);
        return (res.count ?? 0) > 0;
      },
      async getActiveTimeTask(userId, level) {
        const res = await db
          .from("tasks")
          .select("*")
          .eq("user_id", userId)
          .eq("level", level)
          .eq("task_type", "time")
          .eq("completed", false)
          .maybeSingle();
        if (res.error) throw storeError("tasks.getActiveTime", res.error);
        return res.data ? parseRow("tasks.getActiveTime", taskRow, res.data) : null;
      }
    },

    referrals: {
      async createEdge(referrerId, refereeId, level, now) {
        const res = await db
          .from("referrals")
          .insert([{ referrer_id: referrerId, referee_id: refereeId, level, referral_date: now.toISOString() }]);
        if (res.error?.code === UNIQUE_VIOLATION) return false;
        if (res.error) throw storeError("referrals.create", res.error);
        return true;
      },
      async completeReferral(refereeId, now) {
        const res = await db.rpc("complete_referral", { p_referee_id: refereeId, p_now: now.toISOString() });
        if (res.error) throw storeError("referrals.complete", res.error);
        return parseRows("referrals.complete", referralRow, res.data);
      },
      async countEdges(referrerId, level) {
        const total = await db
          .from("referrals")
          .select("id", { count: "exact", head: true })
          .eq("referrer_id", referrerId)
          .eq("level", level);
        if (total.error) throw storeError("referrals.countTotal", total.error);
        const completed = await db
          .from("referrals")
          .select("id", { count: "exact", head: true })
          .eq("referrer_id", referrerId)
          .eq("level", level)
          .not("registration_date", "is", null);
        if (completed.error) throw storeError("referrals.countCompleted", completed.error);
        return { total: total.count ?? 0, completed: completed.count ?? 0 };
      }
    },

    donations: {
      async createDonation(input, now) {
        const res = await db
          .from("donations")
          .insert([{ ...input, status: "pending", processed: false, created_at: now.toISOString() }])
          .select("*")
          .single();
        if (res.error) throw storeError("donations.create", res.error);
        return parseRow("donations.create", donationRow, res.data);
      },
      async getDonation(id) {
        const res = await db.from("donations").select("*").eq("id", id).maybeSingle();
        if (res.error) throw storeError("donations.get", res.error);
        return res.data ? parseRow("donations.get", donationRow, res.data) : null;
      },
      async getByPaymentId(paymentId) {
        const res = await db.from("donations").select("*").eq("payment_id", paymentId).maybeSingle();
        if (res.error) throw storeError("donations.getByPaymentId", res.error);
        return res.data ? parseRow("donations.getByPaymentId", donationRow, res.data) : null;
      },
      async getLastDonation(userId, level) {
        const res = await db
          .from("donations")
          .select("*")
          .eq("user_id", userId)
          .eq("level", level)
          .order("created_at", { ascending: false })
          .order("id", { ascending: false })
          .limit(1);
        if (res.error) throw storeError("donations.getLast", res.error);
        return parseRows("donations.getLast", donationRow, res.data)[0] ?? null;
      },
      async getPendingDonations() {
        const res = await db
          .from("donations")
          .select("*")
          .in("status", ["pending", "waiting_for_capture"])
          .eq("processed", false)
          .order("created_at", { ascending: true });
        if (res.error) throw storeError("donations.getPending", res.error);
        return parseRows("donations.getPending", donationRow, res.data);
      },
      async getOpenDonations(userId, level) {
        const res = await db
          .from("donations")
          .select("*")
          .eq("user_id", userId)
          .eq("level", level)
          .in("status", ["pending", "waiting_for_capture"])
          .eq("processed", false)
          .order("created_at", { ascending: false })
          .order("id", { ascending: false });
        if (res.error) throw storeError("donations.getOpen", res.error);
        return parseRows("donations.getOpen", donationRow, res.data);
      },
      async setStatus(id, status) {
        const res = await db.from("donations").update({ status }).eq("id", id).neq("status", "succeeded").select("id");
        if (res.error) throw storeError("donations.setStatus", res.error);
        return (res.data ?? []).length > 0;
      },
      async applyDonationSuccess(id, now): Promise<ApplyOutcome> {
        const res = await db.rpc("apply_donation_success", { p_donation_id: id, p_now: now.toISOString() });
        if (res.error) throw storeError("donations.applySuccess", res.error);
        return parseRow("donations.applySuccess", applyOutcome, res.data);
      }
    },

    levels: {
      async getLevel(level) {
        const res = await db.from("levels").select("*").eq("level_number", level).maybeSingle();
        if (res.error) throw storeError("levels.get", res.error);
        return res.data ? parseRow("levels.get", levelRow, res.data) : null;
      }
    },

    stats: {
      async getAdminStats(): Promise<AdminStats> {
        const active = await db
          .from("users")
          .select("id", { count: "exact", head: true })
          .or("current_level.gt.1,registration_complete.eq.true");
        if (active.error) throw storeError("stats.active", active.error);

        const deeds = await db
          .from("tasks")
          .select("id", { count: "exact", head: true })
          .eq("completed", true)
          .neq("task_type", "donation");
        if (deeds.error) throw storeError("stats.deeds", deeds.error);

        const registered = await db.from("users").select("current_level").eq("registration_complete", true);
        if (registered.error) throw storeError("stats.levels", registered.error);
        const perLevel = new Map<number, number>();
        for (const row of parseRows("stats.levels", z.object({ current_level: z.number().int() }), registered.data)) {
          perLevel.set(row.current_level, (perLevel.get(row.current_level) ?? 0) + 1);
        }

        const succeeded = await db.from("donations").select("amount").eq("status", "succeeded");
        if (succeeded.error) throw storeError("stats.donations", succeeded.error);
        const amounts = parseRows("stats.donations", z.object({ amount: z.coerce.number() }), succeeded.data);

        const refTotal = await db.from("referrals").select("id", { count: "exact", head: true });
        if (refTotal.error) throw storeError("stats.referrals", refTotal.error);
        const refDone = await db
          .from("referrals")
          .select("id", { count: "exact", head: true })
          .not("registration_date", "is", null);
        if (refDone.error) throw storeError("stats.referrals", refDone.error);

        const total = refTotal.count ?? 0;
        const completed = refDone.count ?? 0;
        return {
          active_users: active.count ?? 0,
          completed_good_deeds: deeds.count ?? 0,
          levels: [...perLevel.entries()].sort((a, b) => a[0] - b[0]).map(([level, users]) => ({ level, users })),
          donations: {
            total_count: amounts.length,
            total_amount: Math.round(amounts.reduce((sum, r) => sum + r.amount, 0) * 100) / 100
          },
          referrals: { total, completed, pending: total - completed }
        };
      }
    }
  };
}
