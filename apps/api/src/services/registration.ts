import { fail, ok, parseBirthdate, validateLocation, validateName, type Result } from "@awaken/shared";
import type { EngineDeps, ProgressionEngine } from "./progression.js";
import { parseStartPayload } from "./referrals.js";
import { storeCall } from "./storeCall.js";

type FlowError = "validation" | "storage_unavailable" | "invariant_violation" | "provider_unavailable";
type FlowResult<T extends object> = Promise<Result<T, FlowError>>;

const LANGUAGES: Record<string, string> = { "русский": "ru", russian: "ru" };

export type RegistrationFlow = ReturnType<typeof createRegistrationFlow>;

// First contact, language choice, and the name -> birthdate -> location questionnaire.
export function createRegistrationFlow(deps: EngineDeps, engine: ProgressionEngine) {
  const { store, log, clock, referrals } = deps;

  async function linkReferrer(userId: number, payload: string | undefined) {
    const referrerId = parseStartPayload(payload);
    if (referrerId === null) return;
    const referrer = await storeCall(log, "users.get", async () => ({ user: await store.users.getUser(referrerId) }));
    if (!referrer.ok) return;
    // The edge counts toward the level the referrer holds right now.
    const level = referrer.user?.current_level ?? 1;
    const edge = await referrals.createEdge(referrerId, userId, level);
    if (!edge.ok) log.info({ referrerId, userId, reason: edge.error }, "referral link ignored");
  }

  return {
    /** `/start [ref<id>]`. Creates the user on first contact. */
    async start(userId: number, payload?: string): FlowResult<{ created: boolean; registered: boolean }> {
      const created = await storeCall(log, "users.create", async () => ({ created: await store.users.createUser(userId, clock()) }));
      if (!created.ok) return created;
      if (created.created) log.info({ userId }, "user created");

      await linkReferrer(userId, payload);

      const pos = await engine.position(userId);
      if (!pos.ok) return pos;
      const saved = await engine.setState(userId, pos.registered ? "main_menu" : "language_selection");
      if (!saved.ok) return saved;
      return ok({ created: created.created, registered: pos.registered });
    },

    async selectLanguage(userId: number, text: string): FlowResult<{ accepted: boolean }> {
      const language = LANGUAGES[text.trim().toLowerCase()];
      if (!language) return ok({ accepted: false });
      const saved = await engine.setState(userId, "main_menu", { language });
      if (!saved.ok) return saved;
      return ok({ accepted: true });
    },

    async acceptRules(userId: number): FlowResult<{ registered: boolean }> {
      const pos = await engine.position(userId);
      if (!pos.ok) return pos;
      if (pos.registered) return ok({ registered: true });
      const saved = await engine.setState(userId, "registration_name");
      if (!saved.ok) return saved;
      return ok({ registered: false });
    },

    async submitName(userId: number, text: string): FlowResult<object> {
      if (!validateName(text)) return fail("validation", "name");
      return engine.setState(userId, "registration_birthdate", { name: text.trim() });
    },

    async submitBirthdate(userId: number, text: string): FlowResult<object> {
      const birthdate = parseBirthdate(text, clock());
      if (!birthdate) return fail("validation", "birthdate");
      return engine.setState(userId, "registration_location", { birthdate });
    },

    /**
     * Last questionnaire step. Completing registration fires the referral completion for
     * everyone who invited this user; on a storage failure the state stays put so a retry
     * re-runs the (idempotent) completion.
     */
    async submitLocation(userId: number, text: string): FlowResult<{ completed: boolean }> {
      if (!validateLocation(text)) return fail("validation", "location");
      const done = await storeCall(log, "users.completeRegistration", async () => {
        await store.users.saveProfile(userId, { location: text.trim() });
        return { completed: await store.users.completeRegistration(userId, clock()) };
      });
      if (!done.ok) return done;
      if (done.completed) log.info({ userId }, "registration complete");

      const refs = await referrals.completeReferral(userId);
      if (!refs.ok) return refs;

      const saved = await engine.setState(userId, "main_menu");
      if (!saved.ok) return saved;
      return ok({ completed: done.completed });
    },

    /** "Начать игру": show the level the user holds. */
    async startGame(userId: number) {
      const pos = await engine.position(userId);
      if (!pos.ok) return pos;
      if (!pos.registered) return ok({ registered: false as const });
      const shown = await engine.showLevel(userId, pos.current);
      if (!shown.ok) return shown;
      return ok({ registered: true as const, screen: shown.screen });
    }
  };
}
