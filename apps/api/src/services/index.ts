import { createCharityFlow } from "./charity.js";
import type { LedgerContext } from "./context.js";
import { createDonationLedger } from "./donations.js";
import type { PaymentProvider } from "./payments/types.js";
import { createProgressionEngine, type EngineSettings } from "./progression.js";
import { createPromote } from "./promotion.js";
import { createReferralLedger } from "./referrals.js";
import { createRegistrationFlow } from "./registration.js";
import { createTaskLedger } from "./tasks.js";

export type Services = ReturnType<typeof createServices>;

export function createServices(ctx: LedgerContext, provider: PaymentProvider, settings: EngineSettings) {
  const tasks = createTaskLedger(ctx);
  const referrals = createReferralLedger(ctx);
  const promote = createPromote(ctx);
  const donations = createDonationLedger(ctx, { provider, promote });
  const deps = { ...ctx, tasks, referrals, donations, promote, settings };
  const engine = createProgressionEngine(deps);
  return {
    ...ctx,
    tasks,
    referrals,
    donations,
    engine,
    registration: createRegistrationFlow(deps, engine),
    charity: createCharityFlow(deps, engine)
  };
}
