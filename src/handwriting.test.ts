import { describe, expect, test } from "vitest";
import { featureNames } from "./features";
import { analyzeHandwriting, extractHandwritingFeatures, HANDWRITING_FEATURES } from "./handwriting";

function feature(features: number[], name: string): number {
  return features[featureNames(HANDWRITING_FEATURES).indexOf(name)];
}

describe("handwriting features", () => {
  test("empty session", () => {
    const f = extractHandwritingFeatures({});
    expect(f).toHaveLength(20);
    expect(feature(f, "writing_speed")).toBeCloseTo(0.2, 12);
    expect(f.filter((_, i) => i !== 4).every((v) => v === 0.5)).toBe(true);
  });

  test("a straight stroke is fully straight", () => {
    const f = extractHandwritingFeatures({
      trace_line: { strokes: [{ points: [[0, 0], [10, 10], [20, 20]] }] },
    });
    expect(feature(f, "straightness")).toBeCloseTo(1, 10);
    expect(feature(f, "smoothness")).toBe(1);
  });

  test("vertical strokes are measured along their own axis", () => {
    const f = extractHandwritingFeatures({
      trace_line: { strokes: [{ points: [[5, 0], [5, 10], [5, 20], [5, 30]] }] },
    });
    expect(feature(f, "straightness")).toBe(1);
  });

  test("compact per-stroke metrics", () => {
    const f = extractHandwritingFeatures({
      copy_letter: {
        strokes: [
          { smoothness: 0.8, straightness: 0.6, pressure: 0.5, tremor: 0.2 },
          { smoothness: 0.6, straightness: 0.8, pressure: 0.7, tremor: 0.4 },
        ],
        time: 5,
        completion: 0.9,
      },
    });
    expect(feature(f, "smoothness")).toBeCloseTo(0.7, 12);
    expect(feature(f, "straightness")).toBeCloseTo(0.7, 12);
    expect(feature(f, "pressure_consistency")).toBeCloseTo(0.9, 12);
    expect(feature(f, "tremor")).toBeCloseTo(0.3, 12);
    expect(feature(f, "size_consistency")).toBeCloseTo(0.9, 12);
    expect(feature(f, "legibility")).toBeCloseTo(0.8, 12);
    expect(feature(f, "grip_tension")).toBeCloseTo(0.6, 12);
    expect(feature(f, "effort_ratio")).toBeCloseTo(0.04, 12);
    expect(feature(f, "completion_rate")).toBe(1);
  });

  test("jittery path reads as full tremor", () => {
    const f = extractHandwritingFeatures({
      shape_draw: { strokes: [{ points: [[0, 0], [10, 10], [20, 0], [30, 10], [40, 0]] }] },
    });
    expect(feature(f, "tremor")).toBe(1);
  });

  test("stroke speeds from timed strokes", () => {
    const f = extractHandwritingFeatures({
      timed_write: {
        strokes: [
          { points: [[0, 0], [100, 0]], duration_ms: 1000 },
          { points: [[0, 20], [300, 20]], duration_ms: 1000 },
        ],
      },
    });
    expect(feature(f, "speed_consistency")).toBeCloseTo(0.5, 12);
    expect(feature(f, "speed_fatigue")).toBe(0);
  });

  test("malformed strokes stay in range", () => {
    for (const session of [
      { a: { strokes: "lots" } },
      { a: { strokes: [{ points: [[0, 0], ["x", 1], [Infinity, 2]] }, 3] } },
      { a: { strokes: [{ tremor: "high" }], time: -5, completion: 40 } },
    ]) {
      const f = extractHandwritingFeatures(session);
      expect(f).toHaveLength(20);
      expect(f.every((v) => v >= 0 && v <= 1)).toBe(true);
    }
  });
});

describe("handwriting analysis", () => {
  test("groups the features", () => {
    const a = analyzeHandwriting(extractHandwritingFeatures({}));
    expect(Object.keys(a)).toEqual(["motor_control", "writing_speed", "formation", "quality"]);
    expect(a.writing_speed.overall_speed).toBeCloseTo(0.2, 12);
  });
});
