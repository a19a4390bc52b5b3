import { describe, expect, it } from "vitest";
import { StoreError } from "../src/services/store/types.js";
import { createMemoryStore } from "../src/services/store/memoryStore.js";
import { START, seedUser, userRow } from "./helpers.js";

describe("memory store: users", () => {
  it("creates a user once, at level 1 in language_selection", async () => {
    const store = createMemoryStore();
    expect(await store.users.createUser(1, START)).toBe(true);
    expect(await store.users.createUser(1, START)).toBe(false);
    expect(await userRow(store, 1)).toEqual({
      id: 1,
      registration_complete: false,
      current_level: 1,
      current_state: "language_selection",
      registration_date: START.toISOString()
    });
  });

  it("bumps the level only by compare-and-set, never down or past 21", async () => {
    const store = createMemoryStore();
    await seedUser(store, 1, 3);
    expect(await store.users.bumpLevel(1, 2, 3)).toBe(false);
    expect(await store.users.bumpLevel(1, 3, 3)).toBe(false);
    expect(await store.users.bumpLevel(1, 3, 2)).toBe(false);
    expect(await store.users.bumpLevel(1, 3, 4)).toBe(true);
    expect((await userRow(store, 1)).current_level).toBe(4);

    await seedUser(store, 2, 21);
    expect(await store.users.bumpLevel(2, 21, 22)).toBe(false);
    expect((await userRow(store, 2)).current_level).toBe(21);
  });

  it("completes registration exactly once", async () => {
    const store = createMemoryStore();
    await store.users.createUser(1, START);
    expect(await store.users.completeRegistration(1, START)).toBe(true);
    expect(await store.users.completeRegistration(1, START)).toBe(false);
  });

  it("merges profile patches", async () => {
    const store = createMemoryStore();
    await store.users.saveProfile(1, { name: "Анна" });
    await store.users.saveProfile(1, { location: "Казань" });
    expect(await store.users.getProfile(1)).toEqual({
      user_id: 1,
      name: "Анна",
      birthdate: null,
      location: "Казань",
      language: null,
      viewed_level: 1
    });
  });
});

describe("memory store: donations", () => {
  it("rejects a second row for the same payment id", async () => {
    const store = createMemoryStore();
    const input = { user_id: 1, level: 2, amount: 500, currency: "RUB", payment_id: "pay-1" };
    await store.donations.createDonation(input, START);
    await expect(store.donations.createDonation(input, START)).rejects.toBeInstanceOf(StoreError);
  });

  it("never moves a succeeded donation back", async () => {
    const store = createMemoryStore();
    const d = await store.donations.createDonation(
      { user_id: 1, level: 2, amount: 500, currency: "RUB", payment_id: "pay-1" },
      START
    );
    expect(await store.donations.applyDonationSuccess(d.id, START)).toBe("applied");
    for (const status of ["pending", "canceled", "waiting_for_capture"] as const) {
      expect(await store.donations.setStatus(d.id, status)).toBe(false);
    }
    expect((await store.donations.getDonation(d.id))?.status).toBe("succeeded");
  });

  it("lists only unprocessed pending and waiting rows, oldest first", async () => {
    const store = createMemoryStore();
    const a = await store.donations.createDonation({ user_id: 1, level: 1, amount: 500, currency: "RUB", payment_id: "a" }, START);
    const b = await store.donations.createDonation({ user_id: 2, level: 1, amount: 500, currency: "RUB", payment_id: "b" }, START);
    const c = await store.donations.createDonation({ user_id: 3, level: 1, amount: 500, currency: "RUB", payment_id: "c" }, START);
    await store.donations.setStatus(b.id, "waiting_for_capture");
    await store.donations.setStatus(c.id, "canceled");
    await store.donations.applyDonationSuccess(a.id, START);
    expect((await store.donations.getPendingDonations()).map((d) => d.payment_id)).toEqual(["b"]);
  });
});

describe("memory store: stats", () => {
  it("aggregates users, deeds, donations and referrals", async () => {
    const store = createMemoryStore();
    await seedUser(store, 1, 3);
    await seedUser(store, 2, 3);
    await seedUser(store, 3, 1, { registered: false });
    await store.tasks.upsertTask(
      { user_id: 1, level: 3, task_type: "time", start_time: START, end_time: START, completed: true },
      START
    );
    const d = await store.donations.createDonation(
      { user_id: 2, level: 3, amount: 250.5, currency: "RUB", payment_id: "p" },
      START
    );
    await store.donations.applyDonationSuccess(d.id, START);
    await store.referrals.createEdge(1, 3, 3, START);

    expect(await store.stats.getAdminStats()).toEqual({
      active_users: 2,
      completed_good_deeds: 1,
      levels: [{ level: 3, users: 2 }],
      donations: { total_count: 1, total_amount: 250.5 },
      referrals: { total: 1, completed: 0, pending: 1 }
    });
  });
});
