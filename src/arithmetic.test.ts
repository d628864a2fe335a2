import { describe, expect, test } from "vitest";
import { ARITHMETIC_FEATURES, analyzeArithmetic, extractArithmeticFeatures } from "./arithmetic";
import { featureNames } from "./features";

function feature(features: number[], name: string): number {
  return features[featureNames(ARITHMETIC_FEATURES).indexOf(name)];
}

describe("arithmetic features", () => {
  test("empty session is neutral throughout", () => {
    expect(extractArithmeticFeatures({})).toEqual(new Array<number>(20).fill(0.5));
    expect(extractArithmeticFeatures("not a session")).toEqual(new Array<number>(20).fill(0.5));
  });

  test("subitizing weighs accuracy with recognition speed", () => {
    const fast = extractArithmeticFeatures({ subitizing: { correct: 9, total: 10, avg_rt: 1200 } });
    expect(feature(fast, "subitizing")).toBeCloseTo(0.93, 12);

    const slow = extractArithmeticFeatures({ subitizing: { correct: 9, total: 10, avg_rt: 2750 } });
    expect(feature(slow, "subitizing")).toBeCloseTo(0.78, 12);
  });

  test("operations by task name or operation field", () => {
    const f = extractArithmeticFeatures({
      addition: { correct: 9, total: 10 },
      drill: { operation: "subtraction", correct: 3, total: 4 },
    });
    expect(feature(f, "addition")).toBeCloseTo(0.9, 12);
    expect(feature(f, "subtraction")).toBe(0.75);
    expect(feature(f, "multiplication")).toBe(0.5);
  });

  test("mixed operations task covers missing operations", () => {
    const f = extractArithmeticFeatures({ operations: { correct: 6, total: 10 } });
    expect(feature(f, "multiplication")).toBeCloseTo(0.6, 12);
  });

  test("calculation speed from task time in seconds", () => {
    const f = extractArithmeticFeatures({ addition: { correct: 5, total: 5, time: 60 } });
    expect(feature(f, "calculation_speed")).toBeCloseTo(0.25, 12);
    expect(feature(f, "speed_accuracy")).toBeCloseTo(0.7, 12);
  });

  test("recurring error types", () => {
    const f = extractArithmeticFeatures({ a: { error_types: ["carry", "carry", "carry", "sign"] } });
    expect(feature(f, "systematic_errors")).toBeCloseTo(0.75, 12);
  });

  test("steady response times", () => {
    const f = extractArithmeticFeatures({ a: { response_times: [1000, 1000, 1000] } });
    expect(feature(f, "response_consistency")).toBe(1);
  });

  test("malformed input stays in range", () => {
    const f = extractArithmeticFeatures({
      subitizing: { correct: "?", avg_rt: -400 },
      a: { error_types: [null, {}, 3], total_errors: 0, conceptual_errors: 9 },
      b: { response_times: "fast", rt_std: 10, avg_rt: -1 },
    });
    expect(f).toHaveLength(20);
    expect(f.every((v) => v >= 0 && v <= 1)).toBe(true);
  });
});

describe("arithmetic analysis", () => {
  test("groups the features", () => {
    const a = analyzeArithmetic(extractArithmeticFeatures({ addition: { correct: 9, total: 10 } }));
    expect(Object.keys(a)).toEqual(["number_sense", "operations", "processing", "reasoning"]);
    expect(a.operations.addition).toBeCloseTo(0.9, 12);
    expect(a.number_sense.subitizing).toBe(0.5);
  });
});
