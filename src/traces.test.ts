import { describe, expect, test } from "vitest";
import {
  accuracyOf,
  findTask,
  meanLatency,
  parseLooseNumber,
  parsePoint,
  parseStrokes,
  parseTiming,
  readCounts,
  readSession,
  taskMatches,
} from "./traces";

describe("loose number parsing", () => {
  test("accepts numbers and numeric strings with units", () => {
    expect(parseLooseNumber(12)).toEqual({ value: 12, valid: true });
    expect(parseLooseNumber(" 1200ms ")).toEqual({ value: 1200, valid: true });
    expect(parseLooseNumber("-0.5")).toEqual({ value: -0.5, valid: true });
  });

  test("rejects everything else", () => {
    expect(parseLooseNumber("fast")).toEqual({ value: null, valid: false });
    expect(parseLooseNumber(Number.NaN)).toEqual({ value: null, valid: false });
    expect(parseLooseNumber(null)).toEqual({ value: null, valid: false });
    expect(parseLooseNumber([3])).toEqual({ value: null, valid: false });
  });
});

describe("sessions", () => {
  test("unwraps the games wrapper", () => {
    const tasks = readSession({ games: { rhyme: { correct: 3 } } });
    expect(tasks).toEqual([{ name: "rhyme", record: { correct: 3 } }]);
  });

  test("non-mapping input is an empty session", () => {
    expect(readSession(null)).toEqual([]);
    expect(readSession([1, 2])).toEqual([]);
    expect(readSession("games")).toEqual([]);
  });

  test("non-object task values read as empty records", () => {
    expect(readSession({ a: 5 })).toEqual([{ name: "a", record: {} }]);
  });

  test("findTask takes the first present alias", () => {
    const tasks = readSession({ number_sense: {}, counting: { total: 4 } });
    expect(findTask(tasks, ["counting", "number_sense"])?.name).toBe("counting");
    expect(findTask(tasks, ["missing"])).toBeUndefined();
  });

  test("taskMatches looks at name, type and task_type", () => {
    const [byType] = readSession({ t1: { type: "Phoneme_Delete" } });
    const [byKind] = readSession({ t2: { task_type: "memory_span" } });
    expect(taskMatches(byType, "phoneme")).toBe(true);
    expect(taskMatches(byKind, "memory")).toBe(true);
    expect(taskMatches(byKind, "phoneme")).toBe(false);
  });
});

describe("counts", () => {
  test("reads aliases and defaults", () => {
    expect(readCounts({ correct_count: 4, total_count: "5" })).toEqual({ correct: 4, total: 5 });
    expect(readCounts({})).toEqual({ correct: 0, total: 1 });
  });

  test("accuracy never divides by zero", () => {
    expect(accuracyOf({ correct: 8, total: 10 })).toBe(0.8);
    expect(accuracyOf({ correct: 0, total: 0 })).toBe(0);
  });
});

describe("timing", () => {
  test("prefers raw samples over summaries", () => {
    const timing = parseTiming({ response_times: [1000, "2000", "x"], avg_rt: 50 });
    expect(timing).toEqual({ kind: "samples", samples: [1000, 2000] });
    expect(meanLatency(timing)).toBe(1500);
  });

  test("falls back to avg_rt then avg_response_time_ms", () => {
    expect(meanLatency(parseTiming({ avg_rt: 900 }))).toBe(900);
    expect(meanLatency(parseTiming({ avg_response_time_ms: 700 }))).toBe(700);
    expect(meanLatency(parseTiming({}))).toBeNull();
  });
});

describe("strokes", () => {
  test("points as pairs or objects", () => {
    expect(parsePoint([3, 4, 0.2])).toEqual({ x: 3, y: 4 });
    expect(parsePoint({ x: "1", y: 2 })).toEqual({ x: 1, y: 2 });
    expect(parsePoint([1])).toBeNull();
    expect(parsePoint("1,2")).toBeNull();
  });

  test("raw paths", () => {
    const set = parseStrokes([{ points: [[0, 0], [1, 1], "bad"], duration_ms: 120 }]);
    expect(set).toEqual({
      format: "path",
      strokes: [{ points: [{ x: 0, y: 0 }, { x: 1, y: 1 }], durationMs: 120 }],
    });
  });

  test("summary metrics", () => {
    const set = parseStrokes([{ smoothness: 0.9, tremor: 0.1 }, 7]);
    expect(set).toEqual({
      format: "summary",
      strokes: [{ smoothness: 0.9, straightness: null, pressure: null, tremor: 0.1 }],
    });
  });

  test("anything else is an empty path set", () => {
    expect(parseStrokes(undefined)).toEqual({ format: "path", strokes: [] });
    expect(parseStrokes([[0, 0]])).toEqual({ format: "path", strokes: [] });
  });
});
