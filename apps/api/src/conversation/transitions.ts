import type { BotState, Fail, Reply } from "@awaken/shared";
import type { Services } from "../services/index.js";
import type { LevelScreen } from "../services/progression.js";
import type { BotEvent, EventKind } from "./events.js";
import { LABELS } from "./labels.js";
import * as v from "./views.js";

export type ConversationSettings = {
  communityUrl?: string | undefined;
};

export type Turn = {
  services: Services;
  settings: ConversationSettings;
  userId: number;
  event: BotEvent;
};

export type Handler = (turn: Turn) => Promise<Reply>;

function failure(turn: Turn, f: Fail<string>): Reply {
  turn.services.log.warn({ userId: turn.userId, event: turn.event.kind, error: f.error }, "transition aborted");
  return v.errorReply();
}

function levelOrFinal(r: { outcome: "final"; level: number } | { screen: LevelScreen }, note?: string): Reply {
  if ("screen" in r) return note ? v.unlocked(r.screen, note) : v.levelScreen(r.screen);
  return v.finalScreen();
}

// --- handlers shared by several states ---

const advance: Handler = async (turn) => {
  const r = await turn.services.engine.advance(turn.userId);
  if (!r.ok) return failure(turn, r);
  switch (r.outcome) {
    case "task_required":
      return v.taskSelection(r.level);
    case "final":
      return v.finalScreen();
    case "promoted":
    case "level":
      return v.levelScreen(r.screen);
  }
};

const gotoLevel: Handler = async (turn) => {
  const r = await turn.services.engine.showLevel(turn.userId, turn.event.level ?? 1);
  if (!r.ok) return failure(turn, r);
  return v.levelScreen(r.screen);
};

const community: Handler = async (turn) => v.communityScreen(turn.settings.communityUrl);

const selectDonation: Handler = async (turn) => {
  const r = await turn.services.engine.selectDonation(turn.userId);
  if (!r.ok) return failure(turn, r);
  if (r.outcome === "final") return v.finalScreen();
  return v.donationCheckout(r.checkoutUrl, r.amount, r.targetLevel);
};

// --- global handlers: valid in every state ---

export const GLOBAL: Partial<Record<EventKind, Handler>> = {
  async start(turn) {
    const r = await turn.services.registration.start(turn.userId, turn.event.payload);
    if (!r.ok) return failure(turn, r);
    return r.registered ? v.mainMenu(true) : v.languagePrompt();
  },

  async back(turn) {
    const r = await turn.services.engine.back(turn.userId);
    if (!r.ok) return failure(turn, r);
    if (r.outcome === "main_menu") return v.mainMenu(r.registered);
    if (r.outcome === "final") return v.finalScreen();
    return v.levelScreen(r.screen);
  },

  async charity(turn) {
    const r = await turn.services.charity.startCharity(turn.userId);
    if (!r.ok) return failure(turn, r);
    return v.charityPrompt();
  },

  async check_charity(turn) {
    const r = await turn.services.charity.checkCharityStatus(turn.userId);
    if (!r.ok) {
      if (r.error === "provider_unavailable") return v.paymentUnavailable(LABELS.checkCharity);
      return failure(turn, r);
    }
    if (r.outcome === "not_found") return v.charityNotFound();
    if (r.outcome === "unpaid") return v.paymentUnpaid(r.status, LABELS.checkCharity);
    return v.charityThanks(r.exit, r.registered);
  }
};

// --- (state, event) -> handler ---

export const TRANSITIONS: Record<BotState, Partial<Record<EventKind, Handler>>> = {
  language_selection: {
    async text(turn) {
      const r = await turn.services.registration.selectLanguage(turn.userId, turn.event.text);
      if (!r.ok) return failure(turn, r);
      return r.accepted ? v.welcome() : v.languageRetry();
    }
  },

  main_menu: {
    async rules(turn) {
      const r = await turn.services.engine.position(turn.userId);
      if (!r.ok) return failure(turn, r);
      return v.rulesScreen(r.registered);
    },
    about: async (turn) => v.aboutScreen(turn.settings.communityUrl),
    community,
    async accept_rules(turn) {
      const r = await turn.services.registration.acceptRules(turn.userId);
      if (!r.ok) return failure(turn, r);
      return r.registered ? v.mainMenu(true) : v.registrationStart();
    },
    async start_game(turn) {
      const r = await turn.services.registration.startGame(turn.userId);
      if (!r.ok) return failure(turn, r);
      if (!r.registered) return v.rulesScreen(false);
      return v.levelScreen(r.screen);
    }
  },

  registration_name: {
    async text(turn) {
      const r = await turn.services.registration.submitName(turn.userId, turn.event.text);
      if (!r.ok) return r.error === "validation" ? { messages: [{ text: v.registrationPrompts.nameRetry }] } : failure(turn, r);
      return { messages: [{ text: v.registrationPrompts.birthdate }] };
    }
  },

  registration_birthdate: {
    async text(turn) {
      const r = await turn.services.registration.submitBirthdate(turn.userId, turn.event.text);
      if (!r.ok) return r.error === "validation" ? { messages: [{ text: v.registrationPrompts.birthdateRetry }] } : failure(turn, r);
      return { messages: [{ text: v.registrationPrompts.location }] };
    }
  },

  registration_location: {
    async text(turn) {
      const r = await turn.services.registration.submitLocation(turn.userId, turn.event.text);
      if (!r.ok) return r.error === "validation" ? { messages: [{ text: v.registrationPrompts.locationRetry }] } : failure(turn, r);
      return v.registrationDone();
    }
  },

  level_content: {
    next: advance,
    goto_level: gotoLevel,
    async faq(turn) {
      const r = await turn.services.engine.openFaq(turn.userId);
      if (!r.ok) return failure(turn, r);
      return v.faqScreen();
    },
    async level_rules(turn) {
      const r = await turn.services.engine.levelRules(turn.userId);
      if (!r.ok) return failure(turn, r);
      return v.levelRulesScreen(r.rules);
    }
  },

  task_selection: {
    next: advance,
    goto_level: gotoLevel,
    async choose_time(turn) {
      const r = await turn.services.engine.openTimeTask(turn.userId);
      if (!r.ok) return failure(turn, r);
      if ("outcome" in r) return v.finalScreen();
      return v.timeTaskIntro(r);
    },
    async choose_referral(turn) {
      const r = await turn.services.engine.openReferralTask(turn.userId);
      if (!r.ok) return failure(turn, r);
      if ("outcome" in r) return v.finalScreen();
      return v.referralIntro(r.link, r.status);
    },
    choose_donation: selectDonation
  },

  time_task: {
    next: advance,
    async start_time_task(turn) {
      const r = await turn.services.engine.startTimeTask(turn.userId);
      if (!r.ok) return failure(turn, r);
      if (r.outcome === "final") return v.finalScreen();
      if (r.outcome === "already_completed") return v.taskAlreadyDone();
      return v.timeTaskStarted(r.endsAt, r.remainingMs, r.outcome === "started");
    },
    async complete_time_task(turn) {
      const r = await turn.services.engine.completeTimeTask(turn.userId);
      if (!r.ok) return failure(turn, r);
      if (r.outcome === "too_early") return v.timeTaskTooEarly(r.remainingMs);
      if (r.outcome === "no_active_task") return v.noActiveTask();
      return levelOrFinal(r, "Задание на время выполнено!");
    }
  },

  referral_task: {
    next: advance,
    async check_status(turn) {
      const r = await turn.services.engine.checkReferralStatus(turn.userId);
      if (!r.ok) return failure(turn, r);
      if (r.outcome === "pending") return v.referralPending(r.status);
      return levelOrFinal(r, `Реферальное задание выполнено! Приглашено: ${"completed" in r ? r.completed : 0}.`);
    }
  },

  donation_task: {
    next: advance,
    choose_donation: selectDonation,
    async check_status(turn) {
      const r = await turn.services.engine.checkDonationStatus(turn.userId);
      if (!r.ok) {
        if (r.error === "provider_unavailable") return v.paymentUnavailable(LABELS.checkStatus);
        return failure(turn, r);
      }
      switch (r.outcome) {
        case "not_found":
          return v.donationNotFound();
        case "unpaid":
          return v.paymentUnpaid(r.status, LABELS.checkStatus);
        case "already_applied":
          return v.unlocked(r.screen, "Этот платеж уже был обработан.");
        case "promoted":
          return v.unlocked(r.screen, "Платеж успешно завершен!");
      }
    }
  },

  final_level: {
    next: advance,
    goto_level: gotoLevel,
    community
  },

  charity_input: {
    async text(turn) {
      const r = await turn.services.charity.submitCharityAmount(turn.userId, turn.event.text);
      if (!r.ok) {
        if (r.error === "validation") return v.charityAmountRetry(r.message);
        return failure(turn, r);
      }
      return v.charityCheckout(r.checkoutUrl, r.amount);
    }
  },

  faq: {}
};

const QUESTIONNAIRE: ReadonlySet<BotState> = new Set(["registration_name", "registration_birthdate", "registration_location"]);

// Charity is not offered until the questionnaire is done.
const AFTER_QUESTIONNAIRE: ReadonlySet<EventKind> = new Set(["charity", "check_charity"]);

/**
 * Global handlers win; then the state's own entry; then the state's free-text entry,
 * so that a registration answer which happens to match a button caption is still taken as text.
 */
export function resolveHandler(state: BotState, kind: EventKind): Handler | undefined {
  const global = GLOBAL[kind];
  if (global && !(QUESTIONNAIRE.has(state) && AFTER_QUESTIONNAIRE.has(kind))) return global;
  const entry = TRANSITIONS[state];
  return entry[kind] ?? entry.text;
}
