import {
  NEUTRAL,
  boundedRatio,
  extractFeatures,
  meanAccuracy,
  meanOrNeutral,
  presentValues,
  type FeatureDefinition,
} from "./features";
import { mean, normalize, std, sum } from "./stats";
import {
  accuracyOf,
  findTask,
  meanLatency,
  parseTiming,
  readList,
  readNumber,
  readOptionalNumber,
  readString,
  taskMatches,
} from "./traces";
import type { DetailedAnalysis, FeatureVector, TaskEntry } from "./types";

const MAX_PROBLEMS_PER_MINUTE = 20;

type Operation = "addition" | "subtraction" | "multiplication";

function latencyOr(task: TaskEntry, fallbackMs: number): number {
  return meanLatency(parseTiming(task.record)) ?? fallbackMs;
}

/**
 * Tasks whose `type` is one of the given kinds.
 */
function tasksOfType(tasks: TaskEntry[], kinds: string[]): TaskEntry[] {
  return tasks.filter((t) => kinds.includes(readString(t.record, "type")));
}

/**
 * Quick recognition of small quantities: accurate and fast (under 1.5 s).
 */
function subitizing(tasks: TaskEntry[]): number {
  const task = findTask(tasks, ["subitizing", "number_sense", "number_recognition"]);
  if (!task) return NEUTRAL;

  const rt = latencyOr(task, 1000);
  const speed = rt < 1500 ? 1 : Math.max(0, (4000 - rt) / 2500);
  return accuracyOf(task.record) * 0.7 + speed * 0.3;
}

function comparison(tasks: TaskEntry[]): number {
  const task =
    findTask(tasks, ["comparison", "number_comparison"]) ??
    tasksOfType(tasks, ["comparison", "number_comparison"])[0] ??
    findTask(tasks, ["number_sense"]);
  return task ? accuracyOf(task.record) : NEUTRAL;
}

function magnitude(tasks: TaskEntry[]): number {
  return meanAccuracy(tasksOfType(tasks, ["magnitude"]));
}

function counting(tasks: TaskEntry[]): number {
  const task = findTask(tasks, ["counting", "number_counting", "number_sense"]);
  if (!task) return NEUTRAL;

  const rt = latencyOr(task, 1500);
  const speedBonus = rt > 0 ? Math.min(1, Math.max(0, (4000 - rt) / 2500)) : NEUTRAL;
  return accuracyOf(task.record) * 0.6 + speedBonus * 0.4;
}

function sequencing(tasks: TaskEntry[]): number {
  const task =
    findTask(tasks, ["sequencing", "number_sequencing"]) ??
    tasksOfType(tasks, ["sequencing", "number_sequencing"])[0];
  return task ? accuracyOf(task.record) : NEUTRAL;
}

function skipCounting(tasks: TaskEntry[]): number {
  return meanAccuracy(tasksOfType(tasks, ["skip_count"]));
}

/**
 * Accuracy on one operation. Falls back to a mixed `operations` task.
 */
function operationScore(tasks: TaskEntry[], operation: Operation): number {
  const matching = tasks.filter(
    (t) =>
      t.name === operation ||
      readString(t.record, "operation") === operation ||
      readString(t.record, "type") === operation
  );
  if (matching.length > 0) return meanAccuracy(matching);

  const mixed = findTask(tasks, ["operations"]);
  return mixed ? accuracyOf(mixed.record) : NEUTRAL;
}

/**
 * Time spent on a task: summed response times, else `duration_ms`, else
 * `time` in seconds. `null` when the task carries none of them.
 */
function taskTimeMs(task: TaskEntry): number | null {
  const timing = parseTiming(task.record);
  if (timing.kind === "samples") return sum(timing.samples);

  const durationMs = readOptionalNumber(task.record, "duration_ms");
  if (durationMs !== null) return durationMs;

  const seconds = readOptionalNumber(task.record, "time");
  return seconds !== null ? seconds * 1000 : null;
}

/**
 * Problems per minute over a set of tasks, or `null` with no usable time.
 */
function problemsPerMinute(tasks: TaskEntry[]): number | null {
  const times = tasks.map(taskTimeMs).filter((t): t is number => t !== null);
  const totalMs = sum(times);
  if (totalMs <= 0) return null;

  const problems = sum(tasks.map((t) => readNumber(t.record, ["total", "total_count"], 0)));
  return problems / (totalMs / 60000);
}

function calculationSpeed(tasks: TaskEntry[]): number {
  const rate = problemsPerMinute(tasks);
  return rate === null ? NEUTRAL : normalize(rate, 0, MAX_PROBLEMS_PER_MINUTE);
}

/**
 * Rewards high accuracy and high speed together.
 */
function speedAccuracy(tasks: TaskEntry[]): number {
  if (tasks.length === 0) return NEUTRAL;

  const accuracies = tasks.map((t) => accuracyOf(t.record));
  const speeds = tasks.map((t) => problemsPerMinute([t]) ?? 0);
  return mean(accuracies) * 0.6 + (mean(speeds) / MAX_PROBLEMS_PER_MINUTE) * 0.4;
}

/**
 * `1 - cv` of latency. Pools raw samples when any task has them; otherwise
 * uses tasks that report `rt_std` next to `avg_rt`.
 */
function responseConsistency(tasks: TaskEntry[]): number {
  const pooled = tasks.flatMap((t) => {
    const timing = parseTiming(t.record);
    return timing.kind === "samples" ? timing.samples : [];
  });

  if (pooled.length > 0) {
    const cv = std(pooled) / (mean(pooled) + 1);
    return Math.max(0, 1 - Math.min(1, cv));
  }

  const summaryCvs: number[] = [];
  for (const t of tasks) {
    const rtStd = readOptionalNumber(t.record, "rt_std");
    const avgRt = readOptionalNumber(t.record, "avg_rt");
    if (rtStd !== null && avgRt !== null) summaryCvs.push(rtStd / (avgRt + 1));
  }
  if (summaryCvs.length === 0) return NEUTRAL;
  return Math.max(0, 1 - Math.min(1, mean(summaryCvs)));
}

function multistep(tasks: TaskEntry[]): number {
  return meanAccuracy(
    tasks.filter((t) => readString(t.record, "complexity") === "multistep")
  );
}

function memorySpan(tasks: TaskEntry[]): number {
  return meanAccuracy(tasks.filter((t) => taskMatches(t, "memory")));
}

/**
 * Share of error types that recur more than twice. Repeating the same
 * mistake points at a misconception rather than a slip.
 */
function systematicErrors(tasks: TaskEntry[]): number {
  const counts = new Map<string, number>();
  for (const t of tasks) {
    for (const e of readList(t.record, "error_types")) {
      if (typeof e !== "string" && typeof e !== "number") continue;
      const key = String(e);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  if (counts.size === 0) return NEUTRAL;

  const recurring = [...counts.values()].filter((c) => c > 2).length;
  const total = sum([...counts.values()]);
  return Math.min(1, recurring / Math.max(1, total / 3));
}

function errorShare(tasks: TaskEntry[], key: string): number {
  const values = presentValues(tasks, key);
  if (values.length === 0) return NEUTRAL;
  const errors = sum(tasks.map((t) => readNumber(t.record, "total_errors", 1)));
  return boundedRatio(sum(values), errors);
}

function conceptualErrors(tasks: TaskEntry[]): number {
  return errorShare(tasks, "conceptual_errors");
}

function errorRecovery(tasks: TaskEntry[]): number {
  return errorShare(tasks, "self_corrections");
}

function comprehension(tasks: TaskEntry[]): number {
  return meanAccuracy(
    tasks.filter((t) => taskMatches(t, "word_problem") || taskMatches(t, "story"))
  );
}

/**
 * Recall of number facts; accuracy weighted with recall speed.
 */
function factFluency(tasks: TaskEntry[]): number {
  const facts = tasks.filter((t) => taskMatches(t, "fact"));
  return meanOrNeutral(
    facts.map((t) => {
      const rt = latencyOr(t, 1000);
      const speed = Math.min(1, Math.max(0, 1 - (rt - 500) / 2000));
      return accuracyOf(t.record) * 0.7 + speed * 0.3;
    })
  );
}

function reasoning(tasks: TaskEntry[]): number {
  return meanAccuracy(tasks.filter((t) => taskMatches(t, "reasoning")));
}

/**
 * Arithmetic feature schema. Order is part of the model contract.
 */
export const ARITHMETIC_FEATURES: FeatureDefinition[] = [
  // number sense
  { name: "subitizing", compute: subitizing },
  { name: "comparison", compute: comparison },
  { name: "magnitude", compute: magnitude },
  // counting and sequencing
  { name: "counting", compute: counting },
  { name: "sequencing", compute: sequencing },
  { name: "skip_counting", compute: skipCounting },
  // operations
  { name: "addition", compute: (tasks) => operationScore(tasks, "addition") },
  { name: "subtraction", compute: (tasks) => operationScore(tasks, "subtraction") },
  { name: "multiplication", compute: (tasks) => operationScore(tasks, "multiplication") },
  // calculation speed
  { name: "calculation_speed", compute: calculationSpeed },
  { name: "speed_accuracy", compute: speedAccuracy },
  { name: "response_consistency", compute: responseConsistency },
  // working memory
  { name: "multistep", compute: multistep },
  { name: "memory_span", compute: memorySpan },
  // error patterns
  { name: "systematic_errors", compute: systematicErrors },
  { name: "conceptual_errors", compute: conceptualErrors },
  { name: "error_recovery", compute: errorRecovery },
  // reasoning
  { name: "comprehension", compute: comprehension },
  { name: "fact_fluency", compute: factFluency },
  { name: "reasoning", compute: reasoning },
];

export function extractArithmeticFeatures(session: unknown): FeatureVector {
  return extractFeatures(ARITHMETIC_FEATURES, session);
}

export function analyzeArithmetic(f: FeatureVector): DetailedAnalysis {
  return {
    number_sense: {
      subitizing: f[0],
      comparison: f[1],
      magnitude: f[2],
    },
    operations: {
      addition: f[6],
      subtraction: f[7],
      multiplication: f[8],
    },
    processing: {
      calculation_speed: f[9],
      accuracy_speed_ratio: f[10],
      consistency: f[11],
    },
    reasoning: {
      working_memory: f[13],
      multistep_solving: f[12],
      problem_comprehension: f[17],
    },
  };
}
