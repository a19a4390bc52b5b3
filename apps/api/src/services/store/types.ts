import type {
  AdminStats,
  BotState,
  DbDonation,
  DbLevel,
  DbReferral,
  DbTask,
  DbUser,
  DbUserProfile,
  DonationStatus,
  TaskType
} from "@awaken/shared";

/** Thrown by store implementations when the backing database cannot serve a call. */
export class StoreError extends Error {
  readonly code = "storage_unavailable" as const;
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StoreError";
  }
}

export type ProfilePatch = Partial<Pick<DbUserProfile, "name" | "birthdate" | "location" | "language" | "viewed_level">>;

export interface UserStore {
  getUser(id: number): Promise<DbUser | null>;
  /** Inserts with level 1 / language_selection. Returns false when the user already exists. */
  createUser(id: number, now: Date): Promise<boolean>;
  setState(id: number, state: BotState): Promise<void>;
  /** false -> true transition only; returns whether this call performed it. */
  completeRegistration(id: number, now: Date): Promise<boolean>;
  /** Compare-and-set current_level from -> to. Returns whether this call moved it. */
  bumpLevel(id: number, from: number, to: number): Promise<boolean>;
  getProfile(id: number): Promise<DbUserProfile | null>;
  saveProfile(id: number, patch: ProfilePatch): Promise<void>;
}

export type TaskInput = {
  user_id: number;
  level: number;
  task_type: TaskType;
  start_time: Date;
  end_time: Date;
  completed: boolean;
};

export interface TaskStore {
  /**
   * Upserts on (user_id, level, task_type). An existing completed row is left untouched
   * and reported as "already_completed".
   */
  upsertTask(input: TaskInput, now: Date): Promise<"inserted" | "updated" | "already_completed">;
  /** Incomplete -> completed. Returns false when no incomplete row matched. */
  markCompleted(userId: number, level: number, type: TaskType, now: Date): Promise<boolean>;
  hasCompleted(userId: number, level: number, type?: TaskType): Promise<boolean>;
  getActiveTimeTask(userId: number, level: number): Promise<DbTask | null>;
}

export interface ReferralStore {
  /** Returns false when the (referrer, referee, level) edge already exists. */
  createEdge(referrerId: number, refereeId: number, level: number, now: Date): Promise<boolean>;
  /**
   * Stamps registration_date on every open edge of the referee and completes each referrer's
   * referral task for the edge level, in one transaction. Returns the edges stamped by this call.
   */
  completeReferral(refereeId: number, now: Date): Promise<DbReferral[]>;
  countEdges(referrerId: number, level: number): Promise<{ total: number; completed: number }>;
}

export type DonationInput = {
  user_id: number;
  level: number;
  amount: number;
  currency: string;
  payment_id: string;
  checkout_url?: string | null;
};

export type ApplyOutcome = "applied" | "already_applied" | "not_found";

export interface DonationStore {
  createDonation(input: DonationInput, now: Date): Promise<DbDonation>;
  getDonation(id: number): Promise<DbDonation | null>;
  getByPaymentId(paymentId: string): Promise<DbDonation | null>;
  getLastDonation(userId: number, level: number): Promise<DbDonation | null>;
  /** Unprocessed rows in pending or waiting_for_capture, oldest first. */
  getPendingDonations(): Promise<DbDonation[]>;
  /** Same filter for one user and level, newest first. */
  getOpenDonations(userId: number, level: number): Promise<DbDonation[]>;
  /** Returns false when the row is missing or already succeeded (terminal). */
  setStatus(id: number, status: Exclude<DonationStatus, "succeeded">): Promise<boolean>;
  /**
   * Row-locked read-modify-write: marks the donation succeeded + processed and, for level > 0,
   * completes the donation task for (user, level) in the same transaction.
   */
  applyDonationSuccess(id: number, now: Date): Promise<ApplyOutcome>;
}

export interface LevelStore {
  getLevel(level: number): Promise<DbLevel | null>;
}

export interface StatsStore {
  getAdminStats(): Promise<AdminStats>;
}

export interface Store {
  users: UserStore;
  tasks: TaskStore;
  referrals: ReferralStore;
  donations: DonationStore;
  levels: LevelStore;
  stats: StatsStore;
}
