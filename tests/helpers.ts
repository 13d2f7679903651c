import { DEFAULT_SCORING } from "../src/domain/scoring.js";
import type { EngineConfig, Listing } from "../src/types/listing.js";

export const NOW = 1_760_000_000;
export const DAY = 86_400;

export const TEST_CONFIG: EngineConfig = {
  decayRate: 0.05,
  cooldownDurationSeconds: 3600,
  excitationThreshold: 0.7,
  feedbackStep: 0.08,
  scoring: { ...DEFAULT_SCORING },
};

export function makeListing(overrides: Partial<Listing> = {}): Listing {
  return {
    source: "gumtree",
    id: "1001",
    title: "Vintage road bike",
    price: null,
    createdTs: NOW,
    url: "https://example.com/listing/1001",
    ...overrides,
  };
}

export function makeClock(start = NOW) {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    },
    advance: (seconds: number) => {
      current += seconds;
    },
  };
}
