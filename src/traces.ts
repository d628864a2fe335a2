import type { TaskEntry, TaskRecord } from "./types";

/**
 * Stringifies unknown values safely.
 *
 * Normalizes `null`/`undefined` into an empty string so `.trim()` never
 * throws.
 */
function asString(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Narrows plain objects (not arrays, not null).
 */
export function isRecord(value: unknown): value is TaskRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Coerces anything that is not a plain object into `{}`.
 */
export function asRecord(value: unknown): TaskRecord {
  return isRecord(value) ? value : {};
}

/**
 * Attempts to parse a number from unknown input.
 * - Accepts finite numbers
 * - Accepts numeric strings, including values with units ("1200ms" -> 1200)
 */
export function parseLooseNumber(value: unknown): {
  value: number | null;
  valid: boolean;
} {
  if (typeof value === "number" && Number.isFinite(value))
    return { value, valid: true };
  if (typeof value !== "string") return { value: null, valid: false };

  const s = value.trim();
  if (!s) return { value: null, valid: false };

  const match = s.match(/-?\d+(?:\.\d+)?/);
  if (!match) return { value: null, valid: false };

  const n = Number.parseFloat(match[0]);
  if (!Number.isFinite(n)) return { value: null, valid: false };
  return { value: n, valid: true };
}

function keyList(keys: string | string[]): string[] {
  return typeof keys === "string" ? [keys] : keys;
}

/**
 * Reads the first alias holding a parseable number, or `null`.
 *
 * Clients have shipped the same field under several names
 * (`correct` / `correct_count`), so callers pass every known alias.
 */
export function readOptionalNumber(
  record: TaskRecord,
  keys: string | string[]
): number | null {
  for (const k of keyList(keys)) {
    const parsed = parseLooseNumber(record[k]);
    if (parsed.valid && parsed.value !== null) return parsed.value;
  }
  return null;
}

export function readNumber(
  record: TaskRecord,
  keys: string | string[],
  fallback: number
): number {
  return readOptionalNumber(record, keys) ?? fallback;
}

/**
 * Whether any alias holds a parseable number.
 */
export function hasNumber(record: TaskRecord, keys: string | string[]): boolean {
  return readOptionalNumber(record, keys) !== null;
}

/**
 * Reads a list field. Scalars, `null` and missing values become `[]`.
 */
export function readList(record: TaskRecord, key: string): unknown[] {
  const value = record[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Reads a numeric list, dropping entries that do not parse.
 */
export function readNumberList(record: TaskRecord, key: string): number[] {
  const out: number[] = [];
  for (const item of readList(record, key)) {
    const parsed = parseLooseNumber(item);
    if (parsed.valid && parsed.value !== null) out.push(parsed.value);
  }
  return out;
}

export function readString(
  record: TaskRecord,
  key: string,
  fallback = ""
): string {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return fallback;
}

/**
 * Truthiness in the loose sense the capture client uses (`true`, `1`,
 * `"true"`, `"yes"`).
 */
export function readBoolean(record: TaskRecord, key: string): boolean {
  const value = record[key];
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  const s = asString(value).trim().toLowerCase();
  return s === "true" || s === "yes" || s === "1";
}

/**
 * Reads a session as ordered task entries.
 *
 * Accepts either the bare task mapping or the `{ games: { ... } }` wrapper the
 * capture client stores. Non-mapping input reads as an empty session, and
 * task values that are not objects read as empty records.
 */
export function readSession(value: unknown): TaskEntry[] {
  const root = asRecord(value);
  const games = isRecord(root.games) ? root.games : root;
  return Object.entries(games).map(([name, record]) => ({
    name,
    record: asRecord(record),
  }));
}

/**
 * Looks up the first present task among several accepted names.
 */
export function findTask(
  tasks: TaskEntry[],
  names: string[]
): TaskEntry | undefined {
  for (const name of names) {
    const hit = tasks.find((t) => t.name === name);
    if (hit) return hit;
  }
  return undefined;
}

/**
 * Whether a task is of a given kind: the keyword appears in its name, `type`
 * or `task_type` (case-insensitive).
 */
export function taskMatches(entry: TaskEntry, keyword: string): boolean {
  const needle = keyword.toLowerCase();
  return [
    entry.name,
    readString(entry.record, "type"),
    readString(entry.record, "task_type"),
  ].some((s) => s.toLowerCase().includes(needle));
}

/**
 * Correct/total counts with their aliases. A missing total counts as one item.
 */
export function readCounts(record: TaskRecord): {
  correct: number;
  total: number;
} {
  return {
    correct: readNumber(record, ["correct", "correct_count"], 0),
    total: readNumber(record, ["total", "total_count"], 1),
  };
}

export function accuracyOf(record: TaskRecord): number {
  const { correct, total } = readCounts(record);
  return correct / Math.max(1, total);
}

/**
 * Response-timing evidence for one task, in order of preference.
 */
export type Timing =
  | { kind: "samples"; samples: number[] }
  | { kind: "summary"; meanMs: number }
  | { kind: "none" };

export function parseTiming(record: TaskRecord): Timing {
  const samples = readNumberList(record, "response_times");
  if (samples.length > 0) return { kind: "samples", samples };

  const meanMs = readOptionalNumber(record, ["avg_rt", "avg_response_time_ms"]);
  if (meanMs !== null) return { kind: "summary", meanMs };

  return { kind: "none" };
}

/**
 * Mean latency in ms, or `null` when the task carries no timing.
 */
export function meanLatency(timing: Timing): number | null {
  switch (timing.kind) {
    case "samples":
      return timing.samples.reduce((a, b) => a + b, 0) / timing.samples.length;
    case "summary":
      return timing.meanMs;
    case "none":
      return null;
  }
}

export type Point = { x: number; y: number };

/**
 * Parses one pointer sample. Accepted shapes: `[x, y, ...]` and `{ x, y }`.
 */
export function parsePoint(value: unknown): Point | null {
  if (Array.isArray(value)) {
    if (value.length < 2) return null;
    const x = parseLooseNumber(value[0]);
    const y = parseLooseNumber(value[1]);
    if (x.value === null || y.value === null) return null;
    return { x: x.value, y: y.value };
  }
  if (isRecord(value)) {
    const x = readOptionalNumber(value, "x");
    const y = readOptionalNumber(value, "y");
    if (x === null || y === null) return null;
    return { x, y };
  }
  return null;
}

/**
 * A raw pen path. `durationMs` is `null` when the client did not time it.
 */
export type PathStroke = {
  points: Point[];
  durationMs: number | null;
};

/**
 * Per-stroke metrics precomputed by the capture client, each in [0, 1].
 */
export type StrokeSummary = {
  smoothness: number | null;
  straightness: number | null;
  pressure: number | null;
  tremor: number | null;
};

export type StrokeSet =
  | { format: "path"; strokes: PathStroke[] }
  | { format: "summary"; strokes: StrokeSummary[] };

function parsePathStroke(value: unknown): PathStroke {
  const record = asRecord(value);
  const points: Point[] = [];
  for (const raw of readList(record, "points")) {
    const p = parsePoint(raw);
    if (p) points.push(p);
  }
  return { points, durationMs: readOptionalNumber(record, "duration_ms") };
}

function parseStrokeSummary(value: unknown): StrokeSummary {
  const record = asRecord(value);
  return {
    smoothness: readOptionalNumber(record, "smoothness"),
    straightness: readOptionalNumber(record, "straightness"),
    pressure: readOptionalNumber(record, "pressure"),
    tremor: readOptionalNumber(record, "tremor"),
  };
}

/**
 * Parses a `strokes` field into one of the two accepted shapes.
 *
 * The first stroke decides the shape for the whole task:
 * - an object with a `points` list -> raw paths
 * - any other object -> compact per-stroke metrics
 * - anything else (or no strokes) -> an empty path set
 *
 * Non-object entries are dropped from a summary set and read as empty paths
 * in a path set.
 */
export function parseStrokes(value: unknown): StrokeSet {
  const items = Array.isArray(value) ? value : [];
  const first = items[0];

  if (isRecord(first) && !Array.isArray(first.points)) {
    return {
      format: "summary",
      strokes: items.filter(isRecord).map(parseStrokeSummary),
    };
  }

  if (isRecord(first)) {
    return { format: "path", strokes: items.map(parsePathStroke) };
  }

  return { format: "path", strokes: [] };
}
