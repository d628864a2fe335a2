import { clip, mean } from "./stats";
import { accuracyOf, readOptionalNumber, readSession } from "./traces";
import type { FeatureVector, TaskEntry } from "./types";

/**
 * Value a feature takes when the data it needs is absent, so a missing task
 * never pushes the score toward either extreme.
 */
export const NEUTRAL = 0.5;

/**
 * One named feature of a domain schema.
 *
 * `compute` may return any finite number; the runner clamps it to [0, 1].
 */
export type FeatureDefinition = {
  name: string;
  compute: (tasks: TaskEntry[]) => number;
};

/**
 * Mean of the collected values, or the neutral value when nothing was
 * collected.
 */
export function meanOrNeutral(values: number[]): number {
  return mean(values, NEUTRAL);
}

/**
 * `numerator / max(1, denominator)`, capped at 1.
 */
export function boundedRatio(numerator: number, denominator: number): number {
  return Math.min(1, numerator / Math.max(1, denominator));
}

/**
 * Mean per-task accuracy, neutral for no tasks.
 */
export function meanAccuracy(tasks: TaskEntry[]): number {
  return meanOrNeutral(tasks.map((t) => accuracyOf(t.record)));
}

/**
 * Every parseable value of a numeric field, in session order.
 */
export function presentValues(tasks: TaskEntry[], keys: string | string[]): number[] {
  const out: number[] = [];
  for (const t of tasks) {
    const v = readOptionalNumber(t.record, keys);
    if (v !== null) out.push(v);
  }
  return out;
}

/**
 * Evaluates a schema against a raw session.
 *
 * A non-finite feature value reads as neutral.
 */
export function extractFeatures(
  schema: FeatureDefinition[],
  session: unknown
): FeatureVector {
  const tasks = readSession(session);
  return schema.map((feature) => {
    const value = feature.compute(tasks);
    return Number.isFinite(value) ? clip(value, 0, 1) : NEUTRAL;
  });
}

export function featureNames(schema: FeatureDefinition[]): string[] {
  return schema.map((f) => f.name);
}
