import type { EngineConfig } from "../types/listing.js";
import type { Env } from "./env.js";

export function resolveEngineConfig(
  source: Pick<
    Env,
    | "DECAY_RATE"
    | "COOLDOWN_SECONDS"
    | "EXCITATION_THRESHOLD"
    | "FEEDBACK_STEP"
    | "WEIGHT_CLAMP"
    | "COOLDOWN_DAMPING"
    | "SIGMOID_SLOPE"
    | "SIGMOID_MIDPOINT"
  >,
): EngineConfig {
  return {
    decayRate: source.DECAY_RATE,
    cooldownDurationSeconds: source.COOLDOWN_SECONDS,
    excitationThreshold: source.EXCITATION_THRESHOLD,
    feedbackStep: source.FEEDBACK_STEP,
    scoring: {
      weightClamp: source.WEIGHT_CLAMP,
      cooldownDamping: source.COOLDOWN_DAMPING,
      sigmoidSlope: source.SIGMOID_SLOPE,
      sigmoidMidpoint: source.SIGMOID_MIDPOINT,
    },
  };
}
