import type { BotState, DonationStatus } from "@awaken/shared";
import { nullLogger } from "../src/logger.js";
import type { Clock } from "../src/services/context.js";
import { createServices } from "../src/services/index.js";
import { ProviderError, type CheckoutRequest, type PaymentProvider } from "../src/services/payments/types.js";
import { createMemoryStore, type MemoryStore } from "../src/services/store/memoryStore.js";

export const START = new Date("2026-03-02T09:00:00.000Z");

export type ManualClock = Clock & { advance(ms: number): void; set(d: Date): void };

export function manualClock(start: Date = START): ManualClock {
  let now = start.getTime();
  const clock = () => new Date(now);
  return Object.assign(clock, {
    advance(ms: number) {
      now += ms;
    },
    set(d: Date) {
      now = d.getTime();
    }
  });
}

export type FakeProvider = PaymentProvider & {
  requests: CheckoutRequest[];
  statusChecks: string[];
  setStatus(paymentId: string, status: DonationStatus): void;
  setDown(down: boolean): void;
};

/** Payments are minted as pay-1, pay-2, ... with checkout URLs on pay.test. */
export function fakeProvider(): FakeProvider {
  const statuses = new Map<string, DonationStatus>();
  const requests: CheckoutRequest[] = [];
  const statusChecks: string[] = [];
  let down = false;
  return {
    requests,
    statusChecks,
    setStatus(paymentId, status) {
      statuses.set(paymentId, status);
    },
    setDown(value) {
      down = value;
    },
    async createCheckout(req) {
      if (down) throw new ProviderError("provider down");
      requests.push(req);
      const paymentId = `pay-${requests.length}`;
      statuses.set(paymentId, "pending");
      return { paymentId, checkoutUrl: `https://pay.test/${paymentId}` };
    },
    async getStatus(paymentId) {
      statusChecks.push(paymentId);
      if (down) throw new ProviderError("provider down");
      const status = statuses.get(paymentId);
      if (!status) throw new ProviderError(`unknown payment ${paymentId}`);
      return status;
    }
  };
}

export function testServices(opts: { store?: MemoryStore; provider?: FakeProvider; clock?: ManualClock } = {}) {
  const store = opts.store ?? createMemoryStore();
  const provider = opts.provider ?? fakeProvider();
  const clock = opts.clock ?? manualClock();
  const services = createServices({ store, log: nullLogger(), clock }, provider, {
    donationAmountRub: 500,
    botUsername: "test_bot"
  });
  return { services, store, provider, clock };
}

/** A registered user sitting on `level`, viewing it. */
export async function seedUser(
  store: MemoryStore,
  id: number,
  level: number,
  opts: { registered?: boolean; state?: BotState } = {}
): Promise<void> {
  await store.users.createUser(id, START);
  if (opts.registered ?? true) await store.users.completeRegistration(id, START);
  for (let l = 1; l < level; l++) await store.users.bumpLevel(id, l, l + 1);
  await store.users.saveProfile(id, { name: "Анна", viewed_level: level });
  await store.users.setState(id, opts.state ?? "level_content");
}

export async function userRow(store: MemoryStore, id: number) {
  const user = await store.users.getUser(id);
  if (!user) throw new Error(`no user ${id}`);
  return user;
}
