import { LABELS } from "./labels.js";

export const EVENT_KINDS = [
  "start",
  "select_language",
  "rules",
  "about",
  "accept_rules",
  "start_game",
  "faq",
  "next",
  "goto_level",
  "level_rules",
  "choose_time",
  "choose_referral",
  "choose_donation",
  "start_time_task",
  "complete_time_task",
  "check_status",
  "check_charity",
  "charity",
  "community",
  "back",
  "text"
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export type BotEvent = {
  kind: EventKind;
  /** Inbound text, trimmed. */
  text: string;
  /** goto_level target. */
  level?: number;
  /** /start deep-link payload. */
  payload?: string;
};

const EXACT: Record<string, EventKind> = {
  [LABELS.russian]: "select_language",
  [LABELS.rules]: "rules",
  [LABELS.about]: "about",
  [LABELS.accept]: "accept_rules",
  [LABELS.startGame]: "start_game",
  [LABELS.faq]: "faq",
  [LABELS.next]: "next",
  [LABELS.nextLevel]: "next",
  [LABELS.nextLevelShort]: "next",
  [LABELS.levelRules]: "level_rules",
  [LABELS.time]: "choose_time",
  [LABELS.referral]: "choose_referral",
  [LABELS.donation]: "choose_donation",
  [LABELS.startTask]: "start_time_task",
  [LABELS.taskDone]: "complete_time_task",
  [LABELS.checkStatus]: "check_status",
  [LABELS.checkCharity]: "check_charity",
  [LABELS.charity]: "charity",
  [LABELS.community]: "community",
  [LABELS.communityMenu]: "community",
  [LABELS.back]: "back"
};

/** Maps one inbound text to its event. Handlers never look at raw button text again. */
export function classifyEvent(raw: string): BotEvent {
  const text = raw.trim();

  const start = text.match(/^\/start(?:@\w+)?(?:\s+(\S+))?$/);
  if (start) return start[1] ? { kind: "start", text, payload: start[1] } : { kind: "start", text };

  const exact = EXACT[text];
  if (exact) return { kind: exact, text };

  const level = text.match(/^(\d{1,2}) уровень$/);
  if (level) return { kind: "goto_level", text, level: Number(level[1]) };

  return { kind: "text", text };
}
