import { describe, expect, it } from "vitest";
import { parseStartPayload, referralLink } from "../src/services/referrals.js";
import { START, seedUser, testServices, userRow } from "./helpers.js";

const HOUR = 60 * 60 * 1000;

describe("task ledger", () => {
  it("inserts, updates, then refuses to touch a completed task", async () => {
    const { services, store } = testServices();
    const { tasks } = services;
    await seedUser(store, 1, 2);
    const end = new Date(START.getTime() + 24 * HOUR);

    expect(await tasks.recordTask(1, 2, "time", START, end, false)).toEqual({ ok: true, status: "inserted" });
    expect(await tasks.recordTask(1, 2, "time", START, end, false)).toEqual({ ok: true, status: "updated" });
    expect(await tasks.markCompleted(1, 2, "time")).toEqual({ ok: true, changed: true });
    expect(await tasks.markCompleted(1, 2, "time")).toEqual({ ok: true, changed: false });
    expect(await tasks.recordTask(1, 2, "time", START, end, false)).toEqual({ ok: false, error: "already_completed" });

    const rows = store.dump().tasks.filter((t) => t.user_id === 1 && t.level === 2 && t.task_type === "time");
    expect(rows).toHaveLength(1);
    expect(rows[0]?.completed).toBe(true);
    expect(rows[0]?.completion_time).toBe(START.toISOString());
  });

  it("answers isAnyTaskCompleted per level and optionally per type", async () => {
    const { services, store } = testServices();
    await seedUser(store, 1, 2);
    await services.tasks.recordTask(1, 2, "referral", START, START, true);
    expect(await services.tasks.isAnyTaskCompleted(1, 2)).toEqual({ ok: true, completed: true });
    expect(await services.tasks.isAnyTaskCompleted(1, 2, "time")).toEqual({ ok: true, completed: false });
    expect(await services.tasks.isAnyTaskCompleted(1, 3)).toEqual({ ok: true, completed: false });
  });

  it("returns only an incomplete time task as active", async () => {
    const { services, store } = testServices();
    await seedUser(store, 1, 2);
    const end = new Date(START.getTime() + 24 * HOUR);
    await services.tasks.recordTask(1, 2, "time", START, end, false);
    const active = await services.tasks.getActiveTimeTask(1, 2);
    expect(active.ok && active.task?.end_time).toBe(end.toISOString());
    await services.tasks.markCompleted(1, 2, "time");
    expect(await services.tasks.getActiveTimeTask(1, 2)).toEqual({ ok: true, task: null });
  });
});

describe("referral ledger", () => {
  it("stores an edge once and rejects self referral", async () => {
    const { services, store } = testServices();
    await seedUser(store, 1, 3);
    await store.users.createUser(2, START);

    expect(await services.referrals.createEdge(1, 2, 3)).toEqual({ ok: true });
    expect(await services.referrals.createEdge(1, 2, 3)).toEqual({ ok: false, error: "duplicate" });
    expect(await services.referrals.createEdge(1, 1, 3)).toEqual({ ok: false, error: "self_referral" });
    expect(store.dump().referrals).toHaveLength(1);
  });

  it("rejects unknown referrers and already registered referees", async () => {
    const { services, store } = testServices();
    await seedUser(store, 1, 3);
    await seedUser(store, 2, 1);
    expect(await services.referrals.createEdge(99, 2, 1)).toEqual({ ok: false, error: "unknown_referrer" });
    expect(await services.referrals.createEdge(1, 2, 3)).toEqual({ ok: false, error: "already_registered" });
  });

  it("completes every open edge of the referee together with the referrer's task", async () => {
    const { services, store } = testServices();
    await seedUser(store, 1, 3);
    await seedUser(store, 5, 2);
    await store.users.createUser(2, START);
    await services.referrals.createEdge(1, 2, 3);
    await services.referrals.createEdge(5, 2, 2);

    const done = await services.referrals.completeReferral(2);
    expect(done.ok && done.edges.map((e) => e.referrer_id)).toEqual([1, 5]);
    expect(await services.tasks.isAnyTaskCompleted(1, 3, "referral")).toEqual({ ok: true, completed: true });
    expect(await services.tasks.isAnyTaskCompleted(5, 2, "referral")).toEqual({ ok: true, completed: true });
    expect(await services.referrals.getStatus(1, 3)).toEqual({ ok: true, total: 1, completed: 1, pending: 0 });

    const again = await services.referrals.completeReferral(2);
    expect(again.ok && again.edges).toEqual([]);
  });

  it("builds and parses deep links", () => {
    expect(referralLink("test_bot", 42)).toBe("https://t.me/test_bot?start=ref42");
    expect(parseStartPayload("ref42")).toBe(42);
    expect(parseStartPayload("ref0")).toBeNull();
    expect(parseStartPayload("ref-1")).toBeNull();
    expect(parseStartPayload("42")).toBeNull();
    expect(parseStartPayload(undefined)).toBeNull();
  });
});

describe("donation ledger", () => {
  it("creates a pending row keyed to the provider payment", async () => {
    const { services, store, provider } = testServices();
    await seedUser(store, 1, 4);
    const res = await services.donations.createIntent(1, 4, 500);
    expect(res.ok && res.checkoutUrl).toBe("https://pay.test/pay-1");
    expect(res.ok && res.donation).toMatchObject({ user_id: 1, level: 4, amount: 500, currency: "RUB", status: "pending", processed: false, payment_id: "pay-1" });
    expect(provider.requests[0]).toMatchObject({
      amount: 500,
      currency: "RUB",
      description: "Донат для перехода на уровень 5",
      metadata: { user_id: 1, current_level: 4, target_level: 5 }
    });
  });

  it("describes charity payments separately", async () => {
    const { services, provider } = testServices();
    await services.donations.createIntent(7, 0, 150);
    expect(provider.requests[0]?.description).toBe("Благотворительное пожертвование");
    expect(provider.requests[0]?.metadata).toEqual({ user_id: 7, for_level: 0, is_charity: true });
  });

  it("writes nothing when the provider is down", async () => {
    const { services, store, provider } = testServices();
    provider.setDown(true);
    const res = await services.donations.createIntent(1, 2, 500);
    expect(res).toMatchObject({ ok: false, error: "provider_unavailable" });
    expect(store.dump().donations).toEqual([]);
  });

  it("applies a success once, however often it is called", async () => {
    const { services, store } = testServices();
    await seedUser(store, 1, 5);
    const intent = await services.donations.createIntent(1, 5, 500);
    if (!intent.ok) throw new Error("intent failed");
    const id = intent.donation.id;

    const results = await Promise.all([1, 2, 3].map(() => services.donations.applySuccess(id)));
    expect(results.filter((r) => r.ok && r.outcome === "applied")).toHaveLength(1);
    expect(results.filter((r) => r.ok && r.outcome === "already_applied")).toHaveLength(2);

    const tasks = store.dump().tasks.filter((t) => t.user_id === 1 && t.level === 5 && t.task_type === "donation");
    expect(tasks).toHaveLength(1);
    expect(tasks[0]?.completed).toBe(true);
    expect(await services.donations.applySuccess(9999)).toEqual({ ok: false, error: "not_found" });
  });

  it("reports an invariant violation when a succeeded donation would move back", async () => {
    const { services, store } = testServices();
    await seedUser(store, 1, 2);
    const intent = await services.donations.createIntent(1, 2, 500);
    if (!intent.ok) throw new Error("intent failed");
    await services.donations.applySuccess(intent.donation.id);

    expect(await services.donations.setStatus(intent.donation.id, "canceled")).toEqual({
      ok: false,
      error: "invariant_violation",
      message: "succeeded is terminal"
    });
    expect(await services.donations.setStatus(12345, "canceled")).toEqual({ ok: false, error: "not_found" });
  });

  describe("settle", () => {
    it("records cancellation and leaves pending alone", async () => {
      const { services, store, provider } = testServices();
      await seedUser(store, 1, 2);
      const a = await services.donations.createIntent(1, 2, 500);
      if (!a.ok) throw new Error("intent failed");

      expect(await services.donations.settle(a.donation)).toEqual({ ok: true, status: "pending", applied: null, promoted: false, level: null });

      provider.setStatus("pay-1", "canceled");
      expect(await services.donations.settle(a.donation)).toEqual({ ok: true, status: "canceled", applied: null, promoted: false, level: null });
      expect(store.dump().donations[0]?.status).toBe("canceled");
    });

    it("applies and promotes on success, then reports already_applied without a second bump", async () => {
      const { services, store, provider } = testServices();
      await seedUser(store, 1, 5);
      const a = await services.donations.createIntent(1, 5, 500);
      if (!a.ok) throw new Error("intent failed");
      provider.setStatus("pay-1", "succeeded");

      expect(await services.donations.settle(a.donation)).toEqual({ ok: true, status: "succeeded", applied: "applied", promoted: true, level: 6 });
      expect(await services.donations.settle(a.donation)).toEqual({
        ok: true,
        status: "succeeded",
        applied: "already_applied",
        promoted: false,
        level: 6
      });
      expect((await userRow(store, 1)).current_level).toBe(6);
    });

    it("re-runs a lost promotion when the payment was already applied", async () => {
      const { services, store, provider } = testServices();
      await seedUser(store, 1, 5);
      const a = await services.donations.createIntent(1, 5, 500);
      if (!a.ok) throw new Error("intent failed");
      provider.setStatus("pay-1", "succeeded");
      // Applied, but the process died before the level bump.
      await store.donations.applyDonationSuccess(a.donation.id, START);

      const settled = await services.donations.settle(a.donation);
      expect(settled).toEqual({ ok: true, status: "succeeded", applied: "already_applied", promoted: true, level: 6 });
    });

    it("never touches progression for charity", async () => {
      const { services, store, provider } = testServices();
      await seedUser(store, 1, 5);
      const a = await services.donations.createIntent(1, 0, 100);
      if (!a.ok) throw new Error("intent failed");
      provider.setStatus("pay-1", "succeeded");
      expect(await services.donations.settle(a.donation)).toEqual({ ok: true, status: "succeeded", applied: "applied", promoted: false, level: null });
      expect((await userRow(store, 1)).current_level).toBe(5);
      expect(store.dump().tasks).toEqual([]);
    });

    it("keeps the donation pending when the provider cannot be reached", async () => {
      const { services, store, provider } = testServices();
      await seedUser(store, 1, 2);
      const a = await services.donations.createIntent(1, 2, 500);
      if (!a.ok) throw new Error("intent failed");
      provider.setDown(true);
      expect(await services.donations.settle(a.donation)).toMatchObject({ ok: false, error: "provider_unavailable" });
      expect(store.dump().donations[0]?.status).toBe("pending");
    });
  });
});
