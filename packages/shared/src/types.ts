// Shared domain types. Keep this file small and explicit.

export const MAX_LEVEL = 21;

export const BOT_STATES = [
  "language_selection",
  "main_menu",
  "registration_name",
  "registration_birthdate",
  "registration_location",
  "level_content",
  "task_selection",
  "time_task",
  "referral_task",
  "donation_task",
  "final_level",
  "charity_input",
  "faq"
] as const;

export type BotState = (typeof BOT_STATES)[number];

export const TASK_TYPES = ["time", "referral", "donation", "auto"] as const;
export type TaskType = (typeof TASK_TYPES)[number];

export const DONATION_STATUSES = ["pending", "waiting_for_capture", "succeeded", "canceled"] as const;
export type DonationStatus = (typeof DONATION_STATUSES)[number];

/** level = 0 on a donation row marks a charity payment with no progression effect. */
export const CHARITY_LEVEL = 0;

export function isBotState(x: unknown): x is BotState {
  return typeof x === "string" && (BOT_STATES as readonly string[]).includes(x);
}

export function isDonationStatus(x: unknown): x is DonationStatus {
  return typeof x === "string" && (DONATION_STATUSES as readonly string[]).includes(x);
}

export function isValidLevel(level: number): boolean {
  return Number.isInteger(level) && level >= 1 && level <= MAX_LEVEL;
}

export interface DbUser {
  id: number;
  registration_complete: boolean;
  current_level: number;
  current_state: BotState;
  registration_date: string;
}

export interface DbUserProfile {
  user_id: number;
  name: string | null;
  birthdate: string | null;
  location: string | null;
  language: string | null;
  viewed_level: number;
}

export interface DbLevel {
  level_number: number;
  content: string;
  rules: string | null;
  image_ref: string | null;
}

export interface DbTask {
  id: number;
  user_id: number;
  level: number;
  task_type: TaskType;
  start_time: string;
  end_time: string;
  completed: boolean;
  completion_time: string | null;
}

export interface DbReferral {
  id: number;
  referrer_id: number;
  referee_id: number;
  level: number;
  referral_date: string;
  registration_date: string | null;
}

export interface DbDonation {
  id: number;
  user_id: number;
  level: number;
  amount: number;
  currency: string;
  status: DonationStatus;
  payment_id: string;
  /** Provider checkout page, kept so a repeated tap hands out the same payment. */
  checkout_url: string | null;
  processed: boolean;
  donation_date: string | null;
  created_at: string;
}

export interface AdminStats {
  active_users: number;
  completed_good_deeds: number;
  levels: Array<{ level: number; users: number }>;
  donations: { total_count: number; total_amount: number };
  referrals: { total: number; completed: number; pending: number };
}
