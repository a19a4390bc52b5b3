import { CHARITY_LEVEL, MAX_LEVEL, fail, ok, parseDonationAmount, type DonationStatus, type Result } from "@awaken/shared";
import type { EngineDeps, ProgressionEngine } from "./progression.js";

type FlowError = "validation" | "storage_unavailable" | "invariant_violation" | "provider_unavailable";

export type CharityCheckOutcome =
  | { outcome: "not_found" }
  | { outcome: "succeeded"; exit: "main_menu" | "final_level"; registered: boolean }
  | { outcome: "unpaid"; status: Exclude<DonationStatus, "succeeded"> };

export type CharityFlow = ReturnType<typeof createCharityFlow>;

// Free-standing donations (level 0). They never touch progression.
export function createCharityFlow(deps: EngineDeps, engine: ProgressionEngine) {
  const { donations } = deps;

  return {
    async startCharity(userId: number): Promise<Result<object, FlowError>> {
      return engine.setState(userId, "charity_input");
    },

    async submitCharityAmount(userId: number, text: string): Promise<Result<{ checkoutUrl: string; amount: number }, FlowError>> {
      const parsed = parseDonationAmount(text);
      if (!parsed.ok) return parsed;
      const intent = await donations.createIntent(userId, CHARITY_LEVEL, parsed.amount);
      if (!intent.ok) return intent;
      return ok({ checkoutUrl: intent.checkoutUrl, amount: intent.donation.amount });
    },

    async checkCharityStatus(userId: number): Promise<Result<CharityCheckOutcome, FlowError>> {
      const last = await donations.getLast(userId, CHARITY_LEVEL);
      if (!last.ok) return last;
      if (!last.donation) return ok({ outcome: "not_found" as const });

      const settled = await donations.settle(last.donation);
      if (!settled.ok) {
        if (settled.error === "not_found") return ok({ outcome: "not_found" as const });
        return fail(settled.error, settled.message);
      }
      if (settled.status !== "succeeded") return ok({ outcome: "unpaid" as const, status: settled.status });

      const pos = await engine.position(userId);
      if (!pos.ok) return pos;
      const exit = pos.current >= MAX_LEVEL ? ("final_level" as const) : ("main_menu" as const);
      const saved = await engine.setState(userId, exit);
      if (!saved.ok) return saved;
      return ok({ outcome: "succeeded" as const, exit, registered: pos.registered });
    }
  };
}
