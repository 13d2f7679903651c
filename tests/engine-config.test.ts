import { describe, expect, test } from "vitest";
import { resolveEngineConfig } from "../src/config/engine-config.js";
import { env } from "../src/config/env.js";

describe("resolveEngineConfig", () => {
  test("defaults match the calibrated constants", () => {
    expect(resolveEngineConfig(env)).toEqual({
      decayRate: 0.05,
      cooldownDurationSeconds: 3600,
      excitationThreshold: 0.7,
      feedbackStep: 0.08,
      scoring: {
        weightClamp: 0.35,
        cooldownDamping: 0.5,
        sigmoidSlope: 3,
        sigmoidMidpoint: 0.35,
      },
    });
  });

  test("maps overrides onto the engine shape", () => {
    const config = resolveEngineConfig({
      ...env,
      DECAY_RATE: 0.1,
      EXCITATION_THRESHOLD: 0.5,
      COOLDOWN_DAMPING: 0.25,
    });
    expect(config.decayRate).toBe(0.1);
    expect(config.excitationThreshold).toBe(0.5);
    expect(config.scoring.cooldownDamping).toBe(0.25);
  });
});
