import { randomUUID } from "node:crypto";
import {
  CHARITY_LEVEL,
  errorMessage,
  fail,
  ok,
  type DbDonation,
  type DonationStatus,
  type Result
} from "@awaken/shared";
import type { LedgerContext } from "./context.js";
import type { Checkout, PaymentProvider } from "./payments/types.js";
import type { Promote } from "./promotion.js";
import { storeCall } from "./storeCall.js";

export type SettleOutcome = {
  /** Status after settling. */
  status: DonationStatus;
  /** Set once the provider has reported success. */
  applied: "applied" | "already_applied" | null;
  promoted: boolean;
  /** The user's level after settling; null for charity donations. */
  level: number | null;
};

type LedgerError = "storage_unavailable";

export type DonationLedger = {
  createIntent(
    userId: number,
    level: number,
    amount: number,
    currency?: string
  ): Promise<Result<{ donation: DbDonation; checkoutUrl: string }, "provider_unavailable" | LedgerError>>;
  applySuccess(donationId: number): Promise<Result<{ outcome: "applied" | "already_applied" }, "not_found" | LedgerError>>;
  setStatus(
    donationId: number,
    status: Exclude<DonationStatus, "succeeded">
  ): Promise<Result<object, "not_found" | "invariant_violation" | LedgerError>>;
  getLast(userId: number, level: number): Promise<Result<{ donation: DbDonation | null }, LedgerError>>;
  getPending(): Promise<Result<{ donations: DbDonation[] }, LedgerError>>;
  /** Unsettled donations of one user for one level, newest first. */
  getOpen(userId: number, level: number): Promise<Result<{ donations: DbDonation[] }, LedgerError>>;
  getByPaymentId(paymentId: string): Promise<Result<{ donation: DbDonation | null }, LedgerError>>;
  /** Refresh from the provider and apply. Shared by the interactive check, the reconciler and the webhook. */
  settle(
    donation: DbDonation
  ): Promise<Result<SettleOutcome, "provider_unavailable" | "not_found" | "invariant_violation" | LedgerError>>;
};

export type DonationDeps = {
  provider: PaymentProvider;
  promote: Promote;
};

function describe(level: number): string {
  return level === CHARITY_LEVEL ? "Благотворительное пожертвование" : `Донат для перехода на уровень ${level + 1}`;
}

export function createDonationLedger(ctx: LedgerContext, { provider, promote }: DonationDeps): DonationLedger {
  const { store, log, clock } = ctx;

  const ledger: DonationLedger = {
    async createIntent(userId, level, amount, currency = "RUB") {
      let checkout: Checkout;
      try {
        checkout = await provider.createCheckout({
          amount,
          currency,
          description: describe(level),
          metadata:
            level === CHARITY_LEVEL
              ? { user_id: userId, for_level: CHARITY_LEVEL, is_charity: true }
              : { user_id: userId, current_level: level, target_level: level + 1 },
          idempotenceKey: randomUUID()
        });
      } catch (e) {
        log.error({ userId, level, err: e }, "checkout creation failed");
        return fail("provider_unavailable", errorMessage(e));
      }
      const res = await storeCall(log, "donations.create", async () => ({
        donation: await store.donations.createDonation(
          { user_id: userId, level, amount, currency, payment_id: checkout.paymentId, checkout_url: checkout.checkoutUrl },
          clock()
        )
      }));
      if (!res.ok) {
        // The provider-side payment exists without a row; it expires unpaid on the provider side.
        log.error({ userId, level, paymentId: checkout.paymentId }, "donation row not stored for minted payment");
        return res;
      }
      log.info({ userId, level, amount, donationId: res.donation.id, paymentId: checkout.paymentId }, "donation intent created");
      return ok({ donation: res.donation, checkoutUrl: checkout.checkoutUrl });
    },

    async applySuccess(donationId) {
      const res = await storeCall(log, "donations.applySuccess", async () => ({
        outcome: await store.donations.applyDonationSuccess(donationId, clock())
      }));
      if (!res.ok) return res;
      if (res.outcome === "not_found") return fail("not_found");
      if (res.outcome === "already_applied") log.info({ donationId }, "donation already applied");
      else log.info({ donationId }, "donation applied");
      return ok({ outcome: res.outcome });
    },

    async setStatus(donationId, status) {
      const res = await storeCall(log, "donations.setStatus", async () => ({
        changed: await store.donations.setStatus(donationId, status)
      }));
      if (!res.ok) return res;
      if (res.changed) return ok({});
      const row = await storeCall(log, "donations.get", async () => ({ donation: await store.donations.getDonation(donationId) }));
      if (!row.ok) return row;
      if (!row.donation) return fail("not_found");
      log.warn({ donationId, status }, "invariant_violation: succeeded donation status is terminal");
      return fail("invariant_violation", "succeeded is terminal");
    },

    async getLast(userId, level) {
      return storeCall(log, "donations.getLast", async () => ({ donation: await store.donations.getLastDonation(userId, level) }));
    },

    async getPending() {
      return storeCall(log, "donations.getPending", async () => ({ donations: await store.donations.getPendingDonations() }));
    },

    async getOpen(userId, level) {
      return storeCall(log, "donations.getOpen", async () => ({ donations: await store.donations.getOpenDonations(userId, level) }));
    },

    async getByPaymentId(paymentId) {
      return storeCall(log, "donations.getByPaymentId", async () => ({
        donation: await store.donations.getByPaymentId(paymentId)
      }));
    },

    async settle(donation) {
      let status: DonationStatus;
      if (donation.processed && donation.status === "succeeded") {
        status = "succeeded";
      } else {
        try {
          status = await provider.getStatus(donation.payment_id);
        } catch (e) {
          log.error({ donationId: donation.id, paymentId: donation.payment_id, err: e }, "payment status check failed");
          return fail("provider_unavailable", errorMessage(e));
        }
      }

      if (status !== "succeeded") {
        if (status !== donation.status && status !== "pending") {
          const updated = await ledger.setStatus(donation.id, status);
          if (!updated.ok) return updated;
          log.info({ donationId: donation.id, from: donation.status, to: status }, "donation status updated");
        }
        return ok({ status, applied: null, promoted: false, level: null });
      }

      const applied = await ledger.applySuccess(donation.id);
      if (!applied.ok) return applied;
      if (donation.level === CHARITY_LEVEL) {
        return ok({ status, applied: applied.outcome, promoted: false, level: null });
      }
      // Also run on already_applied: the compare-and-set makes it a no-op unless an earlier bump was lost.
      const promoted = await promote(donation.user_id, donation.level);
      if (!promoted.ok) return promoted;
      return ok({ status, applied: applied.outcome, promoted: promoted.promoted, level: promoted.level });
    }
  };

  return ledger;
}
