import { pathLength } from "./geometry";
import { sum } from "./stats";
import {
  accuracyOf,
  isRecord,
  parseStrokes,
  readList,
  readNumber,
} from "./traces";
import type { Domain, ScreeningLevel, ScreeningResult, TaskRecord } from "./types";

/**
 * Lower bounds of the three better tiers on the normalised score; anything
 * below `medium` is "High risk".
 */
type ScreeningCutoffs = { none: number; low: number; medium: number };

type Weighted = Record<string, number>;

type Screen = {
  level: ScreeningLevel;
  normScore: number;
  perTask: Record<string, Record<string, number>>;
  warnings: string[];
};

const READING_WEIGHTS: Weighted = {
  phoneme_delete: 1.6,
  letter_sound: 1.5,
  rhyme_recog: 1.2,
  word_scramble: 1.3,
  lexical_decision: 1.2,
  rapid_naming: 1.4,
};

const ARITHMETIC_WEIGHTS: Weighted = {
  subitizing: 1.5,
  comparison: 1.2,
  symbol_match: 1.4,
  sequencing: 1.3,
  memory_span: 1.1,
  story_arith: 1.4,
};

const HANDWRITING_WEIGHTS: Weighted = {
  trace_line: 1.2,
  copy_letter: 1.5,
  write_audio: 1.3,
  timed_write: 1.2,
  shape_draw: 1.0,
};

const EXPECTED_DURATION_MS = 2500;
const EXPECTED_LIFTS_PER_S = 0.8;

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function levelFor(norm: number, cutoffs: ScreeningCutoffs): ScreeningLevel {
  if (norm >= cutoffs.none) return "No risk likely";
  if (norm >= cutoffs.low) return "Low risk";
  if (norm >= cutoffs.medium) return "Medium risk";
  return "High risk";
}

function weightedMean(scores: Record<string, number>, weights: Weighted): number {
  let aggregate = 0;
  let weightSum = 0;
  for (const [name, w] of Object.entries(weights)) {
    aggregate += (scores[name] ?? 0) * w;
    weightSum += w;
  }
  return aggregate / Math.max(1e-6, weightSum);
}

function taskRecord(games: TaskRecord, name: string): TaskRecord {
  const value = games[name];
  return isRecord(value) ? value : {};
}

/**
 * Accuracy against 78% and latency against 1.2 s; slow answers cost points
 * and fast answers earn them.
 */
function screenReading(games: TaskRecord): Screen {
  const perTask: Record<string, Record<string, number>> = {};
  const components: Record<string, number> = {};
  const warnings: string[] = [];

  for (const name of Object.keys(READING_WEIGHTS)) {
    const record = taskRecord(games, name);
    const acc = accuracyOf(record);
    const avgRt = readNumber(record, ["avg_rt", "avg_response_time_ms"], 1000);
    const component = acc - 0.78 - (avgRt - 1200) / 2500;

    components[name] = component;
    perTask[name] = {
      acc: round(acc, 3),
      avg_rt: Math.round(avgRt),
      component: round(component, 3),
    };

    if (acc < 0.55) warnings.push(`Low accuracy in ${name} (${acc.toFixed(2)})`);
    if (avgRt > 2500) warnings.push(`Slow responses in ${name} (avg ${Math.round(avgRt)}ms)`);
  }

  const normScore = weightedMean(components, READING_WEIGHTS);
  return {
    level: levelFor(normScore, { none: -0.04, low: -0.22, medium: -0.5 }),
    normScore,
    perTask,
    warnings,
  };
}

/**
 * Accuracy against 80%; latency only penalised above 1.5 s.
 */
function screenArithmetic(games: TaskRecord): Screen {
  const perTask: Record<string, Record<string, number>> = {};
  const components: Record<string, number> = {};
  const warnings: string[] = [];

  for (const name of Object.keys(ARITHMETIC_WEIGHTS)) {
    const record = taskRecord(games, name);
    const acc = accuracyOf(record);
    const avgRt = readNumber(record, ["avg_rt", "avg_response_time_ms"], 1500);
    const component = acc - 0.8 - Math.max(0, (avgRt - 1500) / 2500);

    components[name] = component;
    perTask[name] = {
      acc: round(acc, 3),
      avg_rt: round(avgRt, 1),
      component: round(component, 3),
    };

    if (acc < 0.5) warnings.push(`Low accuracy in ${name} (${acc.toFixed(2)})`);
    if (avgRt > 3500) warnings.push(`Slow responses in ${name} (avg ${Math.round(avgRt)}ms)`);
  }

  const normScore = weightedMean(components, ARITHMETIC_WEIGHTS);
  return {
    level: levelFor(normScore, { none: -0.05, low: -0.25, medium: -0.6 }),
    normScore,
    perTask,
    warnings,
  };
}

/**
 * Pen metrics for one handwriting task. Path length is summed within strokes;
 * travel between strokes is not counted.
 */
export function penMetrics(record: TaskRecord): Record<string, number> {
  const strokeCount = readList(record, "strokes").length;
  const durationMs = Math.max(0, readNumber(record, "duration_ms", 0));
  const set = parseStrokes(record.strokes);
  const length =
    set.format === "path" ? sum(set.strokes.map((s) => pathLength(s.points))) : 0;
  const lifts = Math.max(0, strokeCount - 1);
  const liftsPerS = durationMs > 0 ? lifts / (durationMs / 1000) : 0;

  return {
    n_strokes: strokeCount,
    duration_ms: Math.trunc(durationMs),
    avg_speed_px_s: durationMs > 0 ? (length * 1000) / durationMs : 0,
    path_length_px: round(length, 2),
    lifts,
    lifts_per_s: round(liftsPerS, 3),
  };
}

/**
 * Task score in [-1, 1] from pen lifts per second and time over the
 * expected 2.5 s.
 */
export function penScore(metrics: Record<string, number>): number {
  const duration = metrics.duration_ms ?? 0;
  const liftsPerS = metrics.lifts_per_s ?? 0;
  const durScore = 1 - Math.min(1, Math.max(0, duration / EXPECTED_DURATION_MS - 1));
  const liftScore = Math.max(0, 1 - liftsPerS / EXPECTED_LIFTS_PER_S);
  return (0.5 * liftScore + 0.5 * durScore - 0.5) * 2;
}

function screenHandwriting(games: TaskRecord): Screen {
  const perTask: Record<string, Record<string, number>> = {};
  const scores: Record<string, number> = {};

  for (const name of Object.keys(games)) {
    const metrics = penMetrics(taskRecord(games, name));
    const score = round(penScore(metrics), 3);
    scores[name] = score;
    perTask[name] = { ...metrics, score };
  }

  const warnings: string[] = [];
  for (const name of Object.keys(HANDWRITING_WEIGHTS)) {
    const s = scores[name] ?? 0;
    if (s < -0.6) warnings.push(`Significant difficulty on ${name} (score ${s.toFixed(2)})`);
    else if (s < -0.25) warnings.push(`Some difficulty on ${name} (score ${s.toFixed(2)})`);
  }

  const normScore = weightedMean(scores, HANDWRITING_WEIGHTS);
  return {
    level: levelFor(normScore, { none: 0, low: -0.25, medium: -0.55 }),
    normScore,
    perTask,
    warnings,
  };
}

const SCREENS: Record<Domain, (games: TaskRecord) => Screen> = {
  dyslexia: screenReading,
  dyscalculia: screenArithmetic,
  dysgraphia: screenHandwriting,
};

function emptyResult(domain: Domain, level: ScreeningLevel, warning: string): ScreeningResult {
  return {
    domain,
    risk_level: level,
    details: { norm_score: 0, per_task: {}, warnings: [warning] },
  };
}

/**
 * Weighted baseline screen over the known task names of one domain.
 *
 * Tasks the domain expects but the session lacks count as zero-accuracy
 * records (reading, arithmetic) or a neutral zero score (handwriting).
 */
export function screenSession(domain: Domain, session: unknown): ScreeningResult {
  if (!isRecord(session)) return emptyResult(domain, "Unknown", "Invalid input data");

  const games = isRecord(session.games) ? session.games : session;
  if (Object.keys(games).length === 0) {
    return domain === "dysgraphia"
      ? emptyResult(domain, "Unknown", "No game data")
      : emptyResult(domain, "No data", "No assessment data available");
  }

  const screen = SCREENS[domain](games);
  return {
    domain,
    risk_level: screen.level,
    details: {
      norm_score: round(screen.normScore, 3),
      per_task: screen.perTask,
      warnings: screen.warnings,
    },
  };
}
