import { describe, expect, test } from "vitest";
import {
  DEFAULT_SCORING,
  clamp,
  combineExcitation,
  computeBaseScore,
  computePriceScore,
  computeRecencyScore,
  decayWeight,
  shouldNotify,
  sigmoid,
} from "../src/domain/scoring.js";

const DAY = 86_400;
const NOW = 1_760_000_000;

describe("decayWeight", () => {
  test("returns the stored value exactly at the write time", () => {
    expect(decayWeight(0.35, NOW, NOW, 0.05)).toBe(0.35);
  });

  test("shrinks by the daily rate per elapsed day", () => {
    expect(decayWeight(1, NOW, NOW + DAY, 0.05)).toBeCloseTo(0.95, 10);
    expect(decayWeight(0.5, NOW, NOW + 2 * DAY, 0.05)).toBeCloseTo(0.45125, 10);
  });

  test("is strictly decreasing for positive weights", () => {
    const samples = [1, 60, 3600, DAY, 10 * DAY].map((offset) => decayWeight(0.3, NOW, NOW + offset, 0.05));
    for (let i = 1; i < samples.length; i += 1) {
      expect(samples[i]).toBeLessThan(samples[i - 1] ?? Number.POSITIVE_INFINITY);
    }
    expect(samples[0]).toBeLessThan(0.3);
  });

  test("never amplifies over negative elapsed time", () => {
    expect(decayWeight(0.5, NOW, NOW - 3 * DAY, 0.05)).toBe(0.5);
    expect(decayWeight(-0.2, NOW, NOW - DAY, 0.05)).toBe(-0.2);
  });

  test("moves negative weights toward zero", () => {
    const decayed = decayWeight(-0.4, NOW, NOW + DAY, 0.05);
    expect(decayed).toBeGreaterThan(-0.4);
    expect(decayed).toBeLessThan(0);
  });
});

describe("base score", () => {
  test("price contribution saturates at 0.25", () => {
    expect(computePriceScore(0)).toBe(0.25);
    expect(computePriceScore(1)).toBe(0.25);
    expect(computePriceScore(9)).toBeCloseTo(0.1, 10);
    expect(computePriceScore(999)).toBeCloseTo(0.001, 10);
  });

  test("unknown, negative or non-finite price contributes nothing", () => {
    expect(computePriceScore(null)).toBe(0);
    expect(computePriceScore(-5)).toBe(0);
    expect(computePriceScore(Number.NaN)).toBe(0);
  });

  test("recency starts at 0.25 and falls with a 12 hour time constant", () => {
    expect(computeRecencyScore(NOW, NOW)).toBe(0.25);
    expect(computeRecencyScore(NOW - 12 * 3600, NOW)).toBeCloseTo(0.0919699, 6);
  });

  test("listings from the future are capped at 0.25", () => {
    expect(computeRecencyScore(NOW + 3600, NOW)).toBe(0.25);
  });

  test("adds price and recency", () => {
    const result = computeBaseScore({ price: 9, createdTs: NOW }, NOW);
    expect(result.priceScore).toBeCloseTo(0.1, 10);
    expect(result.recencyScore).toBe(0.25);
    expect(result.baseScore).toBeCloseTo(0.35, 10);
  });
});

describe("combineExcitation", () => {
  test("fresh listing without history lands near 0.43", () => {
    const result = combineExcitation(0.25, [], 0);
    expect(result.runningScore).toBe(0.25);
    expect(result.damping).toBe(1);
    expect(result.excitation).toBeCloseTo(0.425557, 5);
  });

  test("neutral running score maps to 0.5", () => {
    expect(combineExcitation(0.35, [], 0).excitation).toBe(0.5);
  });

  test("clamps each weight contribution to the configured bound", () => {
    const result = combineExcitation(0.25, [5, -0.1], 0);
    expect(result.runningScore).toBeCloseTo(0.5, 10);
  });

  test("each cooled key halves the excitation", () => {
    const plain = combineExcitation(0.25, [0.35], 0).excitation;
    expect(combineExcitation(0.25, [0.35], 1).excitation).toBe(plain / 2);
    expect(combineExcitation(0.25, [0.35], 2).excitation).toBe(plain / 4);
  });

  test("honours custom calibration", () => {
    const result = combineExcitation(0.25, [0.2], 1, {
      ...DEFAULT_SCORING,
      weightClamp: 0.1,
      cooldownDamping: 0.25,
    });
    expect(result.runningScore).toBeCloseTo(0.35, 10);
    expect(result.excitation).toBeCloseTo(0.125, 10);
  });

  test("stays within [0, 1] for extreme inputs", () => {
    const inputs: Array<[number, number[], number]> = [
      [1e9, [1e9, 1e9], 0],
      [-1e9, [-1e9], 0],
      [0.5, [0.35, 0.35, 0.35], 5],
      [0, [], 0],
    ];
    for (const [base, weights, cooled] of inputs) {
      const { excitation } = combineExcitation(base, weights, cooled);
      expect(excitation).toBeGreaterThanOrEqual(0);
      expect(excitation).toBeLessThanOrEqual(1);
    }
  });
});

describe("helpers", () => {
  test("clamp and sigmoid", () => {
    expect(clamp(2, 0, 1)).toBe(1);
    expect(clamp(-2, 0, 1)).toBe(0);
    expect(clamp(0.4, 0, 1)).toBe(0.4);
    expect(sigmoid(0)).toBe(0.5);
  });

  test("shouldNotify is an inclusive comparison", () => {
    expect(shouldNotify(0.7, 0.7)).toBe(true);
    expect(shouldNotify(0.71, 0.7)).toBe(true);
    expect(shouldNotify(0.7 - 1e-9, 0.7)).toBe(false);
    expect(shouldNotify(0.7 - Number.EPSILON, 0.7)).toBe(false);
  });
});
