import {
  NEUTRAL,
  boundedRatio,
  extractFeatures,
  meanAccuracy,
  meanOrNeutral,
  presentValues,
  type FeatureDefinition,
} from "./features";
import { clip, mean, normalize, std, sum, trendSlope } from "./stats";
import {
  accuracyOf,
  hasNumber,
  meanLatency,
  parseTiming,
  readBoolean,
  readCounts,
  readList,
  readNumber,
  readOptionalNumber,
  readString,
  taskMatches,
} from "./traces";
import type { DetailedAnalysis, FeatureVector, TaskEntry } from "./types";

const MAX_WPM = 300;
const EMPTY_SESSION_WPM = 100;
const FALLBACK_LATENCY_MS = 2000;
const FALLBACK_LATENCY_SPREAD_MS = 1000;

/**
 * Mean latency of every task that carries timing, in session order.
 */
function taskLatencies(tasks: TaskEntry[]): number[] {
  const out: number[] = [];
  for (const t of tasks) {
    const latency = meanLatency(parseTiming(t.record));
    if (latency !== null) out.push(latency);
  }
  return out;
}

/**
 * Words-per-minute proxy for one task.
 *
 * Latency maps to `max(50, 200 - rt / 10)`; a `words_read` count over
 * `duration_ms` is used as-is; accuracy x 100 is the last resort.
 */
function taskWpm(task: TaskEntry): number {
  const latency = meanLatency(parseTiming(task.record));
  if (latency !== null) return Math.max(50, 200 - latency / 10);

  const durationMs = readOptionalNumber(task.record, "duration_ms");
  const wordsRead = readOptionalNumber(task.record, "words_read");
  if (durationMs !== null && wordsRead !== null && durationMs > 0) {
    return wordsRead / (durationMs / 60000);
  }

  return accuracyOf(task.record) * 100;
}

function readingSpeed(tasks: TaskEntry[]): number {
  const wpm = tasks.length > 0 ? mean(tasks.map(taskWpm)) : EMPTY_SESSION_WPM;
  return normalize(wpm, 0, MAX_WPM);
}

function speedConsistency(tasks: TaskEntry[]): number {
  const latencies = taskLatencies(tasks);
  if (latencies.length < 2) return NEUTRAL;
  return 1 - Math.min(1, std(latencies) / 1000);
}

/**
 * Latency trend across tasks in code-point name order; above 0.5 means the reader
 * slowed down over the session.
 */
function speedTrend(tasks: TaskEntry[]): number {
  const ordered = [...tasks].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  const latencies = taskLatencies(ordered);
  if (latencies.length < 2) return NEUTRAL;
  return normalize(clip(trendSlope(latencies) / 50, -1, 1), -1, 1);
}

function overallAccuracy(tasks: TaskEntry[]): number {
  let correct = 0;
  let total = 0;
  for (const t of tasks) {
    const counts = readCounts(t.record);
    correct += counts.correct;
    total += counts.total;
  }
  return total > 0 ? correct / total : NEUTRAL;
}

/**
 * Error budget used as the denominator of the error-type rates: the larger of
 * the reported `total_errors` (default 1) and the missed items.
 */
function errorBudget(tasks: TaskEntry[]): number {
  return sum(
    tasks.map((t) => {
      const { correct, total } = readCounts(t.record);
      return Math.max(readNumber(t.record, "total_errors", 1), total - correct);
    })
  );
}

function letterConfusion(tasks: TaskEntry[]): number {
  const sources = tasks.filter(
    (t) => hasNumber(t.record, "letter_confusion_errors") || Array.isArray(t.record.errors)
  );
  if (sources.length === 0) return NEUTRAL;

  const confusions = sum(
    sources.map(
      (t) =>
        readOptionalNumber(t.record, "letter_confusion_errors") ??
        readList(t.record, "errors").length
    )
  );
  return boundedRatio(confusions, errorBudget(tasks));
}

function wordErrors(tasks: TaskEntry[]): number {
  const errors = presentValues(tasks, "word_order_errors");
  if (errors.length === 0) return NEUTRAL;
  return boundedRatio(sum(errors), errorBudget(tasks));
}

function phonemeAwareness(tasks: TaskEntry[]): number {
  return meanAccuracy(tasks.filter((t) => taskMatches(t, "phoneme")));
}

function performanceConsistency(tasks: TaskEntry[]): number {
  const accuracies = tasks
    .filter((t) => readCounts(t.record).total > 0)
    .map((t) => accuracyOf(t.record));
  if (accuracies.length < 2) return NEUTRAL;

  const cv = std(accuracies) / (mean(accuracies) + 0.1);
  return Math.max(0, 1 - cv);
}

/**
 * Spread of error positions within long error sequences; errors scattered
 * across the task score higher than errors bunched together.
 */
function attentionStability(tasks: TaskEntry[]): number {
  const spreads: number[] = [];
  for (const t of tasks) {
    const sequence = readList(t.record, "error_sequence");
    if (sequence.length <= 5) continue;

    const positions = sequence
      .map((e, i) => (e === true || (typeof e === "number" && e !== 0) ? i : -1))
      .filter((i) => i >= 0);
    spreads.push(positions.length === 0 ? 10 : std(positions));
  }
  if (spreads.length === 0) return NEUTRAL;
  return Math.min(1, mean(spreads) / 10);
}

function difficultyGap(tasks: TaskEntry[]): number {
  const easy: number[] = [];
  const hard: number[] = [];
  for (const t of tasks) {
    const difficulty = readString(t.record, "difficulty", "medium").toLowerCase();
    if (difficulty === "easy") easy.push(accuracyOf(t.record));
    else if (difficulty === "hard") hard.push(accuracyOf(t.record));
  }
  if (easy.length === 0 && hard.length === 0) return NEUTRAL;
  return Math.max(0, mean(easy, 0.8) - mean(hard, 0.4));
}

function complexityHandling(tasks: TaskEntry[]): number {
  return meanAccuracy(
    tasks.filter((t) => readNumber(t.record, "complexity_level", 0) > 7)
  );
}

function responseTime(tasks: TaskEntry[]): number {
  return normalize(mean(taskLatencies(tasks), FALLBACK_LATENCY_MS), 500, 5000);
}

function responseTimeVariance(tasks: TaskEntry[]): number {
  const latencies = taskLatencies(tasks);
  const spread = latencies.length > 1 ? std(latencies) : FALLBACK_LATENCY_SPREAD_MS;
  return Math.min(1, spread / 2000);
}

function hesitation(tasks: TaskEntry[]): number {
  const pauses = presentValues(tasks, "hesitation_count");
  if (pauses.length === 0) return NEUTRAL;
  const items = sum(tasks.map((t) => readCounts(t.record).total));
  return boundedRatio(sum(pauses), items);
}

function selfCorrection(tasks: TaskEntry[]): number {
  const corrections = presentValues(tasks, "self_corrections");
  if (corrections.length === 0) return NEUTRAL;
  const errors = sum(tasks.map((t) => readNumber(t.record, "total_errors", 1)));
  return boundedRatio(sum(corrections), errors);
}

function errorLearning(tasks: TaskEntry[]): number {
  return meanOrNeutral(presentValues(tasks, "error_recovery"));
}

function visualProcessing(tasks: TaskEntry[]): number {
  return meanOrNeutral(presentValues(tasks, "visual_processing_score"));
}

function cognitiveLoad(tasks: TaskEntry[]): number {
  return meanOrNeutral(
    tasks.map((t) => readNumber(t.record, "cognitive_load", NEUTRAL))
  );
}

function workingMemory(tasks: TaskEntry[]): number {
  return meanAccuracy(tasks.filter((t) => taskMatches(t, "memory")));
}

function executiveFunction(tasks: TaskEntry[]): number {
  return meanAccuracy(tasks.filter((t) => readBoolean(t.record, "requires_planning")));
}

/**
 * Reading feature schema. Order is part of the model contract.
 */
export const READING_FEATURES: FeatureDefinition[] = [
  // speed
  { name: "reading_speed", compute: readingSpeed },
  { name: "speed_consistency", compute: speedConsistency },
  { name: "speed_trend", compute: speedTrend },
  // accuracy and error patterns
  { name: "accuracy", compute: overallAccuracy },
  { name: "letter_confusion", compute: letterConfusion },
  { name: "word_errors", compute: wordErrors },
  { name: "phoneme_awareness", compute: phonemeAwareness },
  // consistency
  { name: "performance_consistency", compute: performanceConsistency },
  { name: "attention_stability", compute: attentionStability },
  // difficulty progression
  { name: "difficulty_gap", compute: difficultyGap },
  { name: "complexity_handling", compute: complexityHandling },
  // response timing
  { name: "response_time", compute: responseTime },
  { name: "response_time_variance", compute: responseTimeVariance },
  { name: "hesitation", compute: hesitation },
  // error recovery
  { name: "self_correction", compute: selfCorrection },
  { name: "error_learning", compute: errorLearning },
  // visual processing and cognitive load
  { name: "visual_processing", compute: visualProcessing },
  { name: "cognitive_load", compute: cognitiveLoad },
  { name: "working_memory", compute: workingMemory },
  { name: "executive_function", compute: executiveFunction },
];

export function extractReadingFeatures(session: unknown): FeatureVector {
  return extractFeatures(READING_FEATURES, session);
}

export function analyzeReading(f: FeatureVector): DetailedAnalysis {
  return {
    reading_speed_profile: {
      average_wpm: f[0] * MAX_WPM,
      consistency: f[1],
      trend: f[2],
    },
    accuracy_profile: {
      overall_accuracy: f[3],
      letter_confusion_rate: f[4],
      word_error_rate: f[5],
      phoneme_awareness: f[6],
    },
    consistency_profile: {
      performance_consistency: f[7],
      attention_stability: f[8],
    },
    cognitive_profile: {
      working_memory: f[18],
      executive_function: f[19],
      cognitive_load: f[17],
    },
  };
}
