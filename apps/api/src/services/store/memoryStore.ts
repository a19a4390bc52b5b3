import {
  MAX_LEVEL,
  type AdminStats,
  type DbDonation,
  type DbLevel,
  type DbReferral,
  type DbTask,
  type DbUser,
  type DbUserProfile
} from "@awaken/shared";
import { StoreError, type Store, type TaskInput } from "./types.js";
import { defaultLevels } from "./levels.js";

// In-process store with the same constraints as the SQL schema.
// No method awaits before it has finished mutating, so every call is atomic on the event loop.

type Tables = {
  users: Map<number, DbUser>;
  profiles: Map<number, DbUserProfile>;
  levels: Map<number, DbLevel>;
  tasks: DbTask[];
  referrals: DbReferral[];
  donations: DbDonation[];
};

export type MemoryStore = Store & {
  /** Copies of the raw tables, for assertions. */
  dump(): { users: DbUser[]; profiles: DbUserProfile[]; tasks: DbTask[]; referrals: DbReferral[]; donations: DbDonation[] };
};

function isOpen(d: DbDonation): boolean {
  return !d.processed && (d.status === "pending" || d.status === "waiting_for_capture");
}

export function createMemoryStore(levels: DbLevel[] = defaultLevels()): MemoryStore {
  const t: Tables = {
    users: new Map(),
    profiles: new Map(),
    levels: new Map(levels.map((l) => [l.level_number, l])),
    tasks: [],
    referrals: [],
    donations: []
  };
  let seq = 0;
  const nextId = () => ++seq;

  const findTask = (userId: number, level: number, type: string) =>
    t.tasks.find((x) => x.user_id === userId && x.level === level && x.task_type === type);

  function completeTaskRow(userId: number, level: number, type: DbTask["task_type"], now: Date) {
    const iso = now.toISOString();
    const existing = findTask(userId, level, type);
    if (existing) {
      if (!existing.completed) {
        existing.completed = true;
        existing.completion_time = iso;
      }
      return;
    }
    t.tasks.push({
      id: nextId(),
      user_id: userId,
      level,
      task_type: type,
      start_time: iso,
      end_time: iso,
      completed: true,
      completion_time: iso
    });
  }

  return {
    users: {
      async getUser(id) {
        const u = t.users.get(id);
        return u ? { ...u } : null;
      },
      async createUser(id, now) {
        if (t.users.has(id)) return false;
        t.users.set(id, {
          id,
          registration_complete: false,
          current_level: 1,
          current_state: "language_selection",
          registration_date: now.toISOString()
        });
        return true;
      },
      async setState(id, state) {
        const u = t.users.get(id);
        if (u) u.current_state = state;
      },
      async completeRegistration(id, now) {
        const u = t.users.get(id);
        if (!u || u.registration_complete) return false;
        u.registration_complete = true;
        u.registration_date = now.toISOString();
        return true;
      },
      async bumpLevel(id, from, to) {
        const u = t.users.get(id);
        if (!u || u.current_level !== from) return false;
        if (to <= from || to > MAX_LEVEL) return false;
        u.current_level = to;
        return true;
      },
      async getProfile(id) {
        const p = t.profiles.get(id);
        return p ? { ...p } : null;
      },
      async saveProfile(id, patch) {
        const p = t.profiles.get(id) ?? {
          user_id: id,
          name: null,
          birthdate: null,
          location: null,
          language: null,
          viewed_level: 1
        };
        t.profiles.set(id, { ...p, ...patch });
      }
    },

    tasks: {
      async upsertTask(input: TaskInput, now) {
        const existing = findTask(input.user_id, input.level, input.task_type);
        const row = {
          start_time: input.start_time.toISOString(),
          end_time: input.end_time.toISOString(),
          completed: input.completed,
          completion_time: input.completed ? now.toISOString() : null
        };
        if (existing) {
          if (existing.completed) return "already_completed";
          Object.assign(existing, row);
          return "updated";
        }
        t.tasks.push({ id: nextId(), user_id: input.user_id, level: input.level, task_type: input.task_type, ...row });
        return "inserted";
      },
      async markCompleted(userId, level, type, now) {
        const row = findTask(userId, level, type);
        if (!row || row.completed) return false;
        row.completed = true;
        row.completion_time = now.toISOString();
        return true;
      },
      async hasCompleted(userId, level, type) {
        return t.tasks.some(
          (x) => x.user_id === userId && x.level === level && x.completed && (type === undefined || x.task_type === type)
        );
      },
      async getActiveTimeTask(userId, level) {
        const row = t.tasks.find((x) => x.user_id === userId && x.level === level && x.task_type === "time" && !x.completed);
        return row ? { ...row } : null;
      }
    },

    referrals: {
      async createEdge(referrerId, refereeId, level, now) {
        if (referrerId === refereeId) return false;
        const dup = t.referrals.some((r) => r.referrer_id === referrerId && r.referee_id === refereeId && r.level === level);
        if (dup) return false;
        t.referrals.push({
          id: nextId(),
          referrer_id: referrerId,
          referee_id: refereeId,
          level,
          referral_date: now.toISOString(),
          registration_date: null
        });
        return true;
      },
      async completeReferral(refereeId, now) {
        const stamped: DbReferral[] = [];
        for (const r of t.referrals) {
          if (r.referee_id !== refereeId || r.registration_date !== null) continue;
          r.registration_date = now.toISOString();
          completeTaskRow(r.referrer_id, r.level, "referral", now);
          stamped.push({ ...r });
        }
        return stamped;
      },
      async countEdges(referrerId, level) {
        const edges = t.referrals.filter((r) => r.referrer_id === referrerId && r.level === level);
        return { total: edges.length, completed: edges.filter((r) => r.registration_date !== null).length };
      }
    },

    donations: {
      async createDonation(input, now) {
        if (t.donations.some((d) => d.payment_id === input.payment_id)) {
          throw new StoreError(`duplicate payment_id ${input.payment_id}`);
        }
        const row: DbDonation = {
          id: nextId(),
          ...input,
          checkout_url: input.checkout_url ?? null,
          status: "pending",
          processed: false,
          donation_date: null,
          created_at: now.toISOString()
        };
        t.donations.push(row);
        return { ...row };
      },
      async getDonation(id) {
        const d = t.donations.find((x) => x.id === id);
        return d ? { ...d } : null;
      },
      async getByPaymentId(paymentId) {
        const d = t.donations.find((x) => x.payment_id === paymentId);
        return d ? { ...d } : null;
      },
      async getLastDonation(userId, level) {
        const rows = t.donations.filter((x) => x.user_id === userId && x.level === level);
        const last = rows[rows.length - 1];
        return last ? { ...last } : null;
      },
      async getPendingDonations() {
        return t.donations.filter(isOpen).map((d) => ({ ...d }));
      },
      async getOpenDonations(userId, level) {
        return t.donations
          .filter((d) => d.user_id === userId && d.level === level && isOpen(d))
          .reverse()
          .map((d) => ({ ...d }));
      },
      async setStatus(id, status) {
        const d = t.donations.find((x) => x.id === id);
        if (!d || d.status === "succeeded") return false;
        d.status = status;
        return true;
      },
      async applyDonationSuccess(id, now) {
        const d = t.donations.find((x) => x.id === id);
        if (!d) return "not_found";
        if (d.status === "succeeded" && d.processed) return "already_applied";
        d.status = "succeeded";
        d.processed = true;
        d.donation_date = d.donation_date ?? now.toISOString();
        if (d.level > 0) completeTaskRow(d.user_id, d.level, "donation", now);
        return "applied";
      }
    },

    levels: {
      async getLevel(level) {
        const l = t.levels.get(level);
        return l ? { ...l } : null;
      }
    },

    stats: {
      async getAdminStats(): Promise<AdminStats> {
        const users = [...t.users.values()];
        const perLevel = new Map<number, number>();
        for (const u of users) {
          if (!u.registration_complete) continue;
          perLevel.set(u.current_level, (perLevel.get(u.current_level) ?? 0) + 1);
        }
        const succeeded = t.donations.filter((d) => d.status === "succeeded");
        const completedRefs = t.referrals.filter((r) => r.registration_date !== null).length;
        return {
          active_users: users.filter((u) => u.current_level > 1 || u.registration_complete).length,
          completed_good_deeds: t.tasks.filter((x) => x.completed && x.task_type !== "donation").length,
          levels: [...perLevel.entries()].sort((a, b) => a[0] - b[0]).map(([level, count]) => ({ level, users: count })),
          donations: {
            total_count: succeeded.length,
            total_amount: Math.round(succeeded.reduce((sum, d) => sum + d.amount, 0) * 100) / 100
          },
          referrals: { total: t.referrals.length, completed: completedRefs, pending: t.referrals.length - completedRefs }
        };
      }
    },

    dump() {
      return {
        users: [...t.users.values()].map((u) => ({ ...u })),
        profiles: [...t.profiles.values()].map((p) => ({ ...p })),
        tasks: t.tasks.map((x) => ({ ...x })),
        referrals: t.referrals.map((r) => ({ ...r })),
        donations: t.donations.map((d) => ({ ...d }))
      };
    }
  };
}
