/** Timestamps throughout are seconds since the Unix epoch. */
export type EpochSeconds = number;

export interface Listing {
  source: string;
  id: string;
  title: string;
  /** Non-negative amount in the source's currency; null when unknown. */
  price: number | null;
  createdTs: EpochSeconds;
  url: string;
}

export interface WeightRecord {
  value: number;
  updatedTs: EpochSeconds;
}

export interface CooldownRecord {
  untilTs: EpochSeconds;
}

export interface SeenRecord {
  source: string;
  id: string;
  seenTs: EpochSeconds;
}

export interface ScoringConfig {
  weightClamp: number;
  cooldownDamping: number;
  sigmoidSlope: number;
  sigmoidMidpoint: number;
}

export interface EngineConfig {
  /** Per-day multiplicative decay, in (0, 1). */
  decayRate: number;
  cooldownDurationSeconds: number;
  excitationThreshold: number;
  feedbackStep: number;
  scoring: ScoringConfig;
}

export interface KeyContribution {
  key: string;
  weight: number;
  contribution: number;
  onCooldown: boolean;
}

export interface ScoreBreakdown {
  excitation: number;
  baseScore: number;
  priceScore: number;
  recencyScore: number;
  runningScore: number;
  damping: number;
  keys: KeyContribution[];
  scoredAt: EpochSeconds;
}

export type ListingOutcome =
  | { status: "rejected"; reason: "duplicate" }
  | { status: "suppressed"; breakdown: ScoreBreakdown }
  | { status: "notified"; breakdown: ScoreBreakdown };

export interface Notification {
  listing: Listing;
  excitation: number;
  breakdown: ScoreBreakdown;
  notifiedAt: EpochSeconds;
}

export type FeedbackDirection = "up" | "down";

export interface KeyInspection {
  key: string;
  storedWeight: number | null;
  weightUpdatedTs: EpochSeconds | null;
  weight: number;
  cooldownUntilTs: EpochSeconds | null;
  onCooldown: boolean;
}
