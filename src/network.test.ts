import { describe, expect, test } from "vitest";
import {
  DEFAULT_THRESHOLDS,
  FeatureLengthError,
  RiskNetwork,
  confidenceFor,
  generateWeights,
  prepareFeatures,
  riskLevelFor,
  scoreFeatures,
} from "./network";
import { MODELS } from "./models";

function oneHot(...indices: number[]): number[] {
  const v = new Array<number>(20).fill(0);
  for (const i of indices) v[i] = 1;
  return v;
}

const reading = { importance: MODELS.dyslexia.importance };

describe("weights", () => {
  test("layer shapes and zero biases", () => {
    const w = generateWeights();
    expect(w.w1).toHaveLength(64);
    expect(w.w1[0]).toHaveLength(20);
    expect(w.w2).toHaveLength(32);
    expect(w.w2[0]).toHaveLength(64);
    expect(w.w3).toHaveLength(1);
    expect(w.w3[0]).toHaveLength(32);
    expect([...w.b1, ...w.b2, ...w.b3].every((b) => b === 0)).toBe(true);
  });

  test("seed 42 draws N(0,1) * 0.5 + 0.2 row-major", () => {
    const w = generateWeights();
    expect(w.w1[0][0]).toBeCloseTo(0.44835707650561635, 12);
    expect(w.w1[0][1]).toBeCloseTo(0.13086784941440768, 12);
    expect(w.w3[0][31]).toBeCloseTo(-0.2898606123584034, 10);
  });

  test("deterministic", () => {
    expect(generateWeights(42)).toEqual(generateWeights(42));
  });
});

describe("forward pass", () => {
  test("rejects a vector that is not 20 long", () => {
    const net = new RiskNetwork();
    expect(() => net.forward([0.5, 0.5])).toThrow(FeatureLengthError);
    expect(() => net.forward(new Array<number>(21).fill(0.5))).toThrow(
      "Expected 20 features, received 21"
    );
  });

  test("all-zero input sits at the sigmoid midpoint", () => {
    expect(new RiskNetwork().forward(oneHot())).toBe(0.5);
  });

  test("score stays inside (0, 1)", () => {
    const net = new RiskNetwork();
    for (let i = 0; i < 20; i += 1) {
      const s = net.forward(oneHot(i));
      expect(s).toBeGreaterThan(0);
      expect(s).toBeLessThan(1);
    }
  });
});

describe("tiers", () => {
  test("threshold boundaries", () => {
    expect(riskLevelFor(0.8299)).toBe("None");
    expect(riskLevelFor(0.83)).toBe("Low");
    expect(riskLevelFor(0.87)).toBe("Medium");
    expect(riskLevelFor(0.9)).toBe("High");
  });

  test("monotonic in the score", () => {
    const order = ["None", "Low", "Medium", "High"];
    let prev = 0;
    for (let s = 0; s <= 1; s += 0.005) {
      const rank = order.indexOf(riskLevelFor(s, DEFAULT_THRESHOLDS));
      expect(rank).toBeGreaterThanOrEqual(prev);
      prev = rank;
    }
  });
});

describe("scoreFeatures", () => {
  test("reaches every tier", () => {
    expect(scoreFeatures(oneHot(4), reading).riskLevel).toBe("None");
    expect(scoreFeatures(oneHot(1, 13), reading).riskLevel).toBe("Low");
    expect(scoreFeatures(oneHot(3), reading).riskLevel).toBe("Medium");
    expect(scoreFeatures(oneHot(6), reading).riskLevel).toBe("High");
  });

  test("known scores", () => {
    expect(scoreFeatures(oneHot(6), reading).riskScore).toBeCloseTo(0.99230346, 6);
    expect(scoreFeatures(oneHot(1, 13), reading).riskScore).toBeCloseTo(0.84957236, 6);
    expect(scoreFeatures(oneHot(6), reading).confidence).toBeCloseTo(0.94516904, 6);
  });

  test("same input, same result", () => {
    const f = oneHot(2, 7, 11).map((v) => v * 0.7 + 0.1);
    expect(scoreFeatures(f, reading)).toEqual(scoreFeatures([...f], reading));
  });

  test("short, long and non-finite vectors are repaired", () => {
    expect(prepareFeatures([2, -1, Number.NaN])).toEqual([
      1, 0, 0.5, ...new Array<number>(17).fill(0.5),
    ]);
    expect(prepareFeatures(new Array<number>(25).fill(0.3))).toHaveLength(20);

    const r = scoreFeatures([0.2, 0.9], reading);
    expect(r.riskScore).toBeGreaterThan(0);
    expect(r.riskScore).toBeLessThan(1);
  });

  test("confidence is bounded to [0.5, 0.99]", () => {
    expect(confidenceFor(new Array<number>(20).fill(0.5), 0.5)).toBe(0.5);
    expect(confidenceFor(new Array<number>(20).fill(0.5), 1)).toBe(0.99);
    expect(confidenceFor(oneHot(0, 1, 2, 3, 4, 5, 6, 7, 8, 9), 0.5)).toBe(0.5);
  });
});
