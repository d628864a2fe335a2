import {
  NEUTRAL,
  extractFeatures,
  meanAccuracy,
  meanOrNeutral,
  presentValues,
  type FeatureDefinition,
} from "./features";
import {
  boundingDiagonal,
  consistency,
  distance,
  lineDeviation,
  pathLength,
  pathSmoothness,
  segmentLengths,
  tremorEnergy,
} from "./geometry";
import { mean, normalize, std, sum, trendSlope } from "./stats";
import {
  hasNumber,
  parseStrokes,
  readNumber,
  readOptionalNumber,
  type PathStroke,
  type StrokeSet,
  type StrokeSummary,
} from "./traces";
import type { DetailedAnalysis, FeatureVector, TaskEntry } from "./types";

const MAX_SPEED_PX_S = 500;
const EMPTY_SESSION_SPEED_PX_S = 100;
const FALLBACK_TASK_MS = 1000;

type WritingTask = {
  strokes: StrokeSet;
  durationMs: number | null;
  completion: number;
};

/**
 * Task duration in ms. `time` below 100 is taken to be seconds.
 */
function taskDurationMs(entry: TaskEntry): number | null {
  const time = readOptionalNumber(entry.record, "time");
  if (time !== null) return time < 100 ? time * 1000 : time;
  return readOptionalNumber(entry.record, "duration_ms");
}

function toWritingTask(entry: TaskEntry): WritingTask {
  return {
    strokes: parseStrokes(entry.record.strokes),
    durationMs: taskDurationMs(entry),
    completion: readNumber(entry.record, "completion", 1),
  };
}

function writingTasks(tasks: TaskEntry[]): WritingTask[] {
  return tasks.map(toWritingTask);
}

function pathStrokes(tasks: WritingTask[]): PathStroke[] {
  return tasks.flatMap((t) => (t.strokes.format === "path" ? t.strokes.strokes : []));
}

function summaryMetric(
  strokes: StrokeSummary[],
  metric: keyof StrokeSummary
): number[] {
  return strokes.map((s) => s[metric] ?? NEUTRAL);
}

function strokeCount(task: WritingTask): number {
  return task.strokes.strokes.length;
}

/**
 * Pen speed of every timed path stroke, in px/s and drawing order. Untimed
 * strokes share their task's duration evenly.
 */
function strokeSpeeds(tasks: WritingTask[]): number[] {
  const speeds: number[] = [];
  for (const task of tasks) {
    if (task.strokes.format !== "path") continue;
    const share = (task.durationMs ?? FALLBACK_TASK_MS) / Math.max(1, strokeCount(task));
    for (const stroke of task.strokes.strokes) {
      if (stroke.points.length < 2) continue;
      const ms = stroke.durationMs ?? share;
      if (ms > 0) speeds.push(pathLength(stroke.points) / (ms / 1000));
    }
  }
  return speeds;
}

function smoothness(tasks: TaskEntry[]): number {
  return meanOrNeutral(
    writingTasks(tasks).map(({ strokes }) =>
      strokes.format === "summary"
        ? meanOrNeutral(summaryMetric(strokes.strokes, "smoothness"))
        : pathSmoothness(strokes.strokes.map((s) => s.points))
    )
  );
}

function straightness(tasks: TaskEntry[]): number {
  const scores: number[] = [];
  for (const { strokes } of writingTasks(tasks)) {
    if (strokes.format === "summary") {
      scores.push(meanOrNeutral(summaryMetric(strokes.strokes, "straightness")));
      continue;
    }
    for (const stroke of strokes.strokes) {
      if (stroke.points.length >= 3) {
        scores.push(1 - Math.min(1, lineDeviation(stroke.points)));
      }
    }
  }
  return meanOrNeutral(scores);
}

/**
 * Pressure steadiness. Raw paths have no pressure channel, so the spread of
 * segment lengths (pen velocity) stands in for it.
 */
function pressureConsistency(tasks: TaskEntry[]): number {
  const scores: number[] = [];
  for (const { strokes } of writingTasks(tasks)) {
    if (strokes.format === "summary") {
      if (strokes.strokes.length > 0) {
        scores.push(1 - std(summaryMetric(strokes.strokes, "pressure")));
      }
      continue;
    }
    for (const stroke of strokes.strokes) {
      if (stroke.points.length < 2) continue;
      scores.push(1 - Math.min(1, std(segmentLengths(stroke.points)) / 50));
    }
  }
  return meanOrNeutral(scores);
}

/**
 * Tremor level; higher means shakier.
 */
function tremor(tasks: TaskEntry[]): number {
  const levels: number[] = [];
  for (const { strokes } of writingTasks(tasks)) {
    if (strokes.format === "summary") {
      levels.push(...summaryMetric(strokes.strokes, "tremor"));
      continue;
    }
    for (const stroke of strokes.strokes) {
      if (stroke.points.length >= 5) {
        levels.push(Math.min(1, tremorEnergy(stroke.points) / 100));
      }
    }
  }
  return meanOrNeutral(levels);
}

function writingSpeed(tasks: TaskEntry[]): number {
  const speeds: number[] = [];
  for (const task of writingTasks(tasks)) {
    if (strokeCount(task) === 0) continue;
    const ms = task.durationMs ?? FALLBACK_TASK_MS;
    if (ms <= 0) continue;

    if (task.strokes.format === "path") {
      const travelled = sum(task.strokes.strokes.map((s) => pathLength(s.points)));
      speeds.push(travelled / (ms / 1000));
    } else {
      // Summary strokes carry no geometry; completion per unit time stands in.
      const msPerCompletion = ms / (task.completion + 0.1);
      speeds.push(500 / Math.max(msPerCompletion / 1000, 0.1));
    }
  }
  return normalize(mean(speeds, EMPTY_SESSION_SPEED_PX_S), 0, MAX_SPEED_PX_S);
}

function speedConsistency(tasks: TaskEntry[]): number {
  const speeds = strokeSpeeds(writingTasks(tasks));
  if (speeds.length < 2) return NEUTRAL;
  return consistency(speeds) ?? NEUTRAL;
}

/**
 * Slowdown across the session; 0 means no slowdown.
 */
function speedFatigue(tasks: TaskEntry[]): number {
  const speeds = strokeSpeeds(writingTasks(tasks));
  if (speeds.length < 2) return NEUTRAL;
  return Math.min(1, Math.max(0, -trendSlope(speeds) / 50));
}

/**
 * Per-task formation score: completion for summary tasks, otherwise the
 * consistency of a per-stroke measure (tasks with fewer than `minSamples`
 * measurements are skipped).
 */
function formationScore(
  tasks: TaskEntry[],
  measure: (strokes: PathStroke[]) => number[],
  minSamples: number
): number {
  const scores: number[] = [];
  for (const task of writingTasks(tasks)) {
    if (task.strokes.format === "summary") {
      if (strokeCount(task) > 0) scores.push(task.completion);
      continue;
    }
    const samples = measure(task.strokes.strokes);
    if (samples.length < minSamples) continue;
    const score = consistency(samples);
    if (score !== null) scores.push(score);
  }
  return meanOrNeutral(scores);
}

function letterSizes(strokes: PathStroke[]): number[] {
  return strokes.map((s) => boundingDiagonal(s.points)).filter((d) => d > 0);
}

function strokeGaps(strokes: PathStroke[]): number[] {
  const gaps: number[] = [];
  for (let i = 1; i < strokes.length; i += 1) {
    const prev = strokes[i - 1].points;
    const curr = strokes[i].points;
    if (prev.length > 0 && curr.length > 0) {
      gaps.push(distance(prev[prev.length - 1], curr[0]));
    }
  }
  return gaps;
}

function strokeLengths(strokes: PathStroke[]): number[] {
  return strokes.map((s) => pathLength(s.points)).filter((l) => l > 0);
}

function sizeConsistency(tasks: TaskEntry[]): number {
  return formationScore(tasks, letterSizes, 2);
}

function spacingUniformity(tasks: TaskEntry[]): number {
  return formationScore(tasks, strokeGaps, 2);
}

function shapeAccuracy(tasks: TaskEntry[]): number {
  return formationScore(tasks, strokeLengths, 1);
}

function legibility(tasks: TaskEntry[]): number {
  return mean([
    smoothness(tasks),
    sizeConsistency(tasks),
    spacingUniformity(tasks),
    1 - tremor(tasks),
  ]);
}

/**
 * Scored recognition when the tasks report correct/total counts, otherwise
 * shape regularity.
 */
function recognition(tasks: TaskEntry[]): number {
  const scored = tasks.filter((t) => hasNumber(t.record, ["correct", "correct_count"]));
  return scored.length > 0 ? meanAccuracy(scored) : shapeAccuracy(tasks);
}

function smoothnessOfLongStrokes(tasks: TaskEntry[], minPoints: number): number {
  return meanOrNeutral(
    pathStrokes(writingTasks(tasks))
      .filter((s) => s.points.length >= minPoints)
      .map((s) => pathSmoothness([s.points]))
  );
}

function coordination(tasks: TaskEntry[]): number {
  return smoothnessOfLongStrokes(tasks, 3);
}

function bilateralCoordination(tasks: TaskEntry[]): number {
  return meanOrNeutral(presentValues(tasks, "bilateral_score"));
}

function endurance(tasks: TaskEntry[]): number {
  const written = writingTasks(tasks);
  const durations = written
    .map((t) => t.durationMs)
    .filter((d): d is number => d !== null);
  if (durations.length === 0) return NEUTRAL;

  const minutes = sum(durations) / 60000;
  const strokes = sum(written.map(strokeCount));
  return Math.min(1, minutes * (strokes / 50));
}

/**
 * Smoothness lost between the first and second half of a task's strokes.
 */
function fatigue(tasks: TaskEntry[]): number {
  const drops: number[] = [];
  for (const { strokes } of writingTasks(tasks)) {
    if (strokes.format !== "path" || strokes.strokes.length <= 4) continue;
    const half = Math.floor(strokes.strokes.length / 2);
    const quality = (part: PathStroke[]) => mean(part.map((s) => pathSmoothness([s.points])));
    const early = quality(strokes.strokes.slice(0, half));
    const late = quality(strokes.strokes.slice(half));
    drops.push(Math.max(0, early - late));
  }
  return meanOrNeutral(drops);
}

function completionRate(tasks: TaskEntry[]): number {
  if (tasks.length === 0) return NEUTRAL;
  const written = writingTasks(tasks).filter((t) => strokeCount(t) > 0).length;
  return written / tasks.length;
}

/**
 * Strokes per second of writing, scaled so 10 strokes/s is the ceiling.
 */
function effortRatio(tasks: TaskEntry[]): number {
  const written = writingTasks(tasks);
  const totalMs = sum(written.map((t) => t.durationMs ?? 0));
  if (totalMs <= 0) return NEUTRAL;
  return Math.min(1, sum(written.map(strokeCount)) / (totalMs / 1000) / 10);
}

/**
 * Grip tension; erratic pen velocity on raw paths, reported pressure on
 * summary strokes.
 */
function gripTension(tasks: TaskEntry[]): number {
  const indicators: number[] = [];
  for (const { strokes } of writingTasks(tasks)) {
    if (strokes.format === "summary") {
      indicators.push(...summaryMetric(strokes.strokes, "pressure"));
      continue;
    }
    for (const stroke of strokes.strokes) {
      if (stroke.points.length < 3) continue;
      indicators.push(Math.min(1, std(segmentLengths(stroke.points)) / 30));
    }
  }
  return meanOrNeutral(indicators);
}

function motorPlanning(tasks: TaskEntry[]): number {
  return smoothnessOfLongStrokes(tasks, 6);
}

/**
 * Handwriting feature schema. Order is part of the model contract.
 */
export const HANDWRITING_FEATURES: FeatureDefinition[] = [
  // motor control
  { name: "smoothness", compute: smoothness },
  { name: "straightness", compute: straightness },
  { name: "pressure_consistency", compute: pressureConsistency },
  { name: "tremor", compute: tremor },
  // writing speed
  { name: "writing_speed", compute: writingSpeed },
  { name: "speed_consistency", compute: speedConsistency },
  { name: "speed_fatigue", compute: speedFatigue },
  // letter formation
  { name: "size_consistency", compute: sizeConsistency },
  { name: "spacing_uniformity", compute: spacingUniformity },
  { name: "shape_accuracy", compute: shapeAccuracy },
  // legibility
  { name: "legibility", compute: legibility },
  { name: "recognition", compute: recognition },
  // coordination
  { name: "coordination", compute: coordination },
  { name: "bilateral_coordination", compute: bilateralCoordination },
  // stamina
  { name: "endurance", compute: endurance },
  { name: "fatigue", compute: fatigue },
  // task completion
  { name: "completion_rate", compute: completionRate },
  { name: "effort_ratio", compute: effortRatio },
  // grip and planning
  { name: "grip_tension", compute: gripTension },
  { name: "motor_planning", compute: motorPlanning },
];

export function extractHandwritingFeatures(session: unknown): FeatureVector {
  return extractFeatures(HANDWRITING_FEATURES, session);
}

export function analyzeHandwriting(f: FeatureVector): DetailedAnalysis {
  return {
    motor_control: {
      smoothness: f[0],
      straightness: f[1],
      pressure_consistency: f[2],
      tremor: f[3],
    },
    writing_speed: {
      overall_speed: f[4],
      consistency: f[5],
      fatigue: f[6],
    },
    formation: {
      size_consistency: f[7],
      spacing: f[8],
      shape_accuracy: f[9],
    },
    quality: {
      legibility: f[10],
      coordination: f[12],
    },
  };
}
