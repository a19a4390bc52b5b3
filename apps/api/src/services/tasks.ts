import { fail, ok, type DbTask, type Result, type TaskType } from "@awaken/shared";
import type { LedgerContext } from "./context.js";
import { storeCall } from "./storeCall.js";

export const TIME_TASK_DURATION_MS = 24 * 60 * 60 * 1000;

export type TaskLedger = {
  recordTask(
    userId: number,
    level: number,
    type: TaskType,
    start: Date,
    end: Date,
    completed: boolean
  ): Promise<Result<{ status: "inserted" | "updated" }, "already_completed" | "storage_unavailable">>;
  markCompleted(userId: number, level: number, type: TaskType): Promise<Result<{ changed: boolean }, "storage_unavailable">>;
  /** type omitted: the "unlocked for advancement" predicate across all task types. */
  isAnyTaskCompleted(userId: number, level: number, type?: TaskType): Promise<Result<{ completed: boolean }, "storage_unavailable">>;
  getActiveTimeTask(userId: number, level: number): Promise<Result<{ task: DbTask | null }, "storage_unavailable">>;
};

export function createTaskLedger({ store, log, clock }: LedgerContext): TaskLedger {
  return {
    async recordTask(userId, level, type, start, end, completed) {
      const res = await storeCall(log, "tasks.record", async () => ({
        status: await store.tasks.upsertTask(
          { user_id: userId, level, task_type: type, start_time: start, end_time: end, completed },
          clock()
        )
      }));
      if (!res.ok) return res;
      if (res.status === "already_completed") {
        log.debug({ userId, level, type }, "task already completed; record skipped");
        return fail("already_completed");
      }
      return ok({ status: res.status });
    },

    async markCompleted(userId, level, type) {
      const res = await storeCall(log, "tasks.markCompleted", async () => ({
        changed: await store.tasks.markCompleted(userId, level, type, clock())
      }));
      if (res.ok && !res.changed) log.debug({ userId, level, type }, "no incomplete task to complete");
      return res;
    },

    async isAnyTaskCompleted(userId, level, type) {
      return storeCall(log, "tasks.isAnyCompleted", async () => ({
        completed: await store.tasks.hasCompleted(userId, level, type)
      }));
    },

    async getActiveTimeTask(userId, level) {
      return storeCall(log, "tasks.activeTime", async () => ({ task: await store.tasks.getActiveTimeTask(userId, level) }));
    }
  };
}
