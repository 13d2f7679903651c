import type { EpochSeconds, Listing, ScoringConfig } from "../types/listing.js";

export const SECONDS_PER_DAY = 86_400;
export const SECONDS_PER_HOUR = 3_600;

const PRICE_SCORE_CAP = 0.25;
const RECENCY_SCORE_CAP = 0.25;
const RECENCY_TIME_CONSTANT_HOURS = 12;

export const DEFAULT_SCORING: ScoringConfig = {
  weightClamp: 0.35,
  cooldownDamping: 0.5,
  sigmoidSlope: 3,
  sigmoidMidpoint: 0.35,
};

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/**
 * Weight as seen at `now`. Elapsed time before the write counts as zero, so a
 * read never amplifies the stored value.
 */
export function decayWeight(
  storedValue: number,
  storedTs: EpochSeconds,
  now: EpochSeconds,
  decayRate: number,
): number {
  const days = Math.max((now - storedTs) / SECONDS_PER_DAY, 0);
  if (days === 0) return storedValue;
  return storedValue * Math.pow(1 - clamp(decayRate, 0, 1), days);
}

export function computePriceScore(price: number | null): number {
  if (price === null || !Number.isFinite(price) || price < 0) return 0;
  return clamp(1 / (1 + price), 0, PRICE_SCORE_CAP);
}

export function computeRecencyScore(createdTs: EpochSeconds, now: EpochSeconds): number {
  const ageHours = (now - createdTs) / SECONDS_PER_HOUR;
  return clamp(Math.exp(-ageHours / RECENCY_TIME_CONSTANT_HOURS) * RECENCY_SCORE_CAP, 0, RECENCY_SCORE_CAP);
}

export function computeBaseScore(
  listing: Pick<Listing, "price" | "createdTs">,
  now: EpochSeconds,
): { baseScore: number; priceScore: number; recencyScore: number } {
  const priceScore = computePriceScore(listing.price);
  const recencyScore = computeRecencyScore(listing.createdTs, now);
  return { baseScore: priceScore + recencyScore, priceScore, recencyScore };
}

export function clampContribution(weight: number, scoring: ScoringConfig): number {
  return clamp(weight, -scoring.weightClamp, scoring.weightClamp);
}

export function combineExcitation(
  baseScore: number,
  weights: number[],
  cooledKeyCount: number,
  scoring: ScoringConfig = DEFAULT_SCORING,
): { excitation: number; runningScore: number; damping: number } {
  let runningScore = baseScore;
  for (const weight of weights) {
    runningScore += clampContribution(weight, scoring);
  }

  let damping = 1;
  for (let i = 0; i < cooledKeyCount; i += 1) {
    damping *= scoring.cooldownDamping;
  }

  const squashed = sigmoid(scoring.sigmoidSlope * (runningScore - scoring.sigmoidMidpoint));
  return { excitation: clamp(squashed * damping, 0, 1), runningScore, damping };
}

export function shouldNotify(excitation: number, threshold: number): boolean {
  return excitation >= threshold;
}
