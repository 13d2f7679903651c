import { deriveKeys, isValidKey } from "../domain/keys.js";
import {
  clamp,
  clampContribution,
  combineExcitation,
  computeBaseScore,
  decayWeight,
  shouldNotify,
} from "../domain/scoring.js";
import { InvalidKeyError, InvalidListingError } from "../middleware/error-handler.js";
import type {
  EngineConfig,
  EpochSeconds,
  FeedbackDirection,
  KeyContribution,
  KeyInspection,
  Listing,
  ListingOutcome,
  ScoreBreakdown,
} from "../types/listing.js";
import type { ExcitationStore } from "./excitation-store.js";

const REINFORCED_WEIGHT_LIMIT = 1;

interface ExcitationEngineOptions {
  store: ExcitationStore;
  config: EngineConfig;
  nowFn?: () => EpochSeconds;
}

export function epochSecondsNow(): EpochSeconds {
  return Date.now() / 1000;
}

function assertIdentity(listing: Pick<Listing, "source" | "id">): void {
  if (!listing.source.trim()) {
    throw new InvalidListingError("Listing source must not be empty");
  }
  if (!listing.id.trim()) {
    throw new InvalidListingError("Listing id must not be empty");
  }
}

function assertKey(key: string): void {
  if (!isValidKey(key)) throw new InvalidKeyError(key);
}

export class ExcitationEngine {
  private readonly store: ExcitationStore;
  private readonly config: EngineConfig;
  private readonly nowFn: () => EpochSeconds;

  constructor(options: ExcitationEngineOptions) {
    this.store = options.store;
    this.config = options.config;
    this.nowFn = options.nowFn ?? epochSecondsNow;
  }

  get threshold(): number {
    return this.config.excitationThreshold;
  }

  now(): EpochSeconds {
    return this.nowFn();
  }

  async getWeight(key: string, now: EpochSeconds = this.nowFn()): Promise<number> {
    const record = await this.store.readWeight(key);
    if (!record) return 0;
    return decayWeight(record.value, record.updatedTs, now, this.config.decayRate);
  }

  async isOnCooldown(key: string, now: EpochSeconds = this.nowFn()): Promise<boolean> {
    const record = await this.store.readCooldown(key);
    return record !== undefined && now < record.untilTs;
  }

  async hasSeen(source: string, id: string): Promise<boolean> {
    return this.store.hasSeen(source, id);
  }

  async markSeen(source: string, id: string): Promise<void> {
    await this.store.markSeen(source, id, this.nowFn());
  }

  /** Dedupe gate: true for the first caller with this identity, false for every later one. */
  async admit(listing: Listing): Promise<boolean> {
    assertIdentity(listing);
    return this.store.markSeen(listing.source, listing.id, this.nowFn());
  }

  async score(listing: Listing, now: EpochSeconds = this.nowFn()): Promise<ScoreBreakdown> {
    const { baseScore, priceScore, recencyScore } = computeBaseScore(listing, now);

    const keys: KeyContribution[] = [];
    for (const key of deriveKeys(listing)) {
      const weight = await this.getWeight(key, now);
      const onCooldown = await this.isOnCooldown(key, now);
      keys.push({
        key,
        weight,
        contribution: clampContribution(weight, this.config.scoring),
        onCooldown,
      });
    }

    const { excitation, runningScore, damping } = combineExcitation(
      baseScore,
      keys.map((entry) => entry.weight),
      keys.filter((entry) => entry.onCooldown).length,
      this.config.scoring,
    );

    return {
      excitation,
      baseScore,
      priceScore,
      recencyScore,
      runningScore,
      damping,
      keys,
      scoredAt: now,
    };
  }

  async excitation(listing: Listing, now?: EpochSeconds): Promise<number> {
    const breakdown = await this.score(listing, now);
    return breakdown.excitation;
  }

  async evaluate(listing: Listing): Promise<ListingOutcome> {
    const admitted = await this.admit(listing);
    if (!admitted) {
      return { status: "rejected", reason: "duplicate" };
    }

    const breakdown = await this.score(listing);
    if (shouldNotify(breakdown.excitation, this.config.excitationThreshold)) {
      return { status: "notified", breakdown };
    }
    return { status: "suppressed", breakdown };
  }

  async setWeight(key: string, value: number): Promise<KeyInspection> {
    assertKey(key);
    const now = this.nowFn();
    await this.store.writeWeight(key, { value, updatedTs: now });
    return this.inspectKey(key, now);
  }

  async reinforce(key: string, delta: number = this.config.feedbackStep): Promise<KeyInspection> {
    assertKey(key);
    const now = this.nowFn();
    const current = await this.getWeight(key, now);
    const value = clamp(current + delta, -REINFORCED_WEIGHT_LIMIT, REINFORCED_WEIGHT_LIMIT);
    await this.store.writeWeight(key, { value, updatedTs: now });
    return this.inspectKey(key, now);
  }

  async startCooldown(
    key: string,
    durationSeconds: number = this.config.cooldownDurationSeconds,
  ): Promise<KeyInspection> {
    assertKey(key);
    const now = this.nowFn();
    await this.store.writeCooldown(key, { untilTs: now + Math.max(0, durationSeconds) });
    return this.inspectKey(key, now);
  }

  async clearCooldown(key: string): Promise<KeyInspection> {
    assertKey(key);
    await this.store.deleteCooldown(key);
    return this.inspectKey(key);
  }

  async applyFeedback(listing: Listing, direction: FeedbackDirection): Promise<KeyInspection[]> {
    const delta = direction === "up" ? this.config.feedbackStep : -this.config.feedbackStep;
    const results: KeyInspection[] = [];
    for (const key of deriveKeys(listing)) {
      results.push(await this.reinforce(key, delta));
    }
    if (direction === "down") {
      const sourceKey = deriveKeys(listing)[0];
      if (sourceKey) {
        const cooled = await this.startCooldown(sourceKey);
        const index = results.findIndex((entry) => entry.key === sourceKey);
        if (index >= 0) results[index] = cooled;
      }
    }
    return results;
  }

  async inspectKey(key: string, now: EpochSeconds = this.nowFn()): Promise<KeyInspection> {
    assertKey(key);
    const weightRecord = await this.store.readWeight(key);
    const cooldownRecord = await this.store.readCooldown(key);
    return {
      key,
      storedWeight: weightRecord?.value ?? null,
      weightUpdatedTs: weightRecord?.updatedTs ?? null,
      weight: weightRecord
        ? decayWeight(weightRecord.value, weightRecord.updatedTs, now, this.config.decayRate)
        : 0,
      cooldownUntilTs: cooldownRecord?.untilTs ?? null,
      onCooldown: cooldownRecord !== undefined && now < cooldownRecord.untilTs,
    };
  }
}
