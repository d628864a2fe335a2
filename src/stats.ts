/**
 * Small numeric helpers shared by the extractors and the scorer.
 *
 * Variance and standard deviation are population statistics (divide by n),
 * matching how the feature thresholds were calibrated.
 */

export function clip(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}

/**
 * Min/max normalisation into [0, 1].
 *
 * Returns 0.5 for a degenerate range and for non-finite input.
 */
export function normalize(value: number, min: number, max: number): number {
  if (min === max || !Number.isFinite(value)) return 0.5;
  return clip((value - min) / (max - min), 0, 1);
}

export function sum(values: number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Arithmetic mean, or `fallback` for an empty list.
 */
export function mean(values: number[], fallback = 0): number {
  if (values.length === 0) return fallback;
  return sum(values) / values.length;
}

export function variance(values: number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) * (v - m);
  return acc / values.length;
}

export function std(values: number[]): number {
  return Math.sqrt(variance(values));
}

/**
 * Consecutive differences: `[b - a, c - b, ...]`.
 */
export function diff(values: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < values.length; i += 1) out.push(values[i] - values[i - 1]);
  return out;
}

/**
 * Least-squares first-degree fit `y = slope * x + intercept`.
 *
 * A zero-variance `xs` yields a flat line through the mean of `ys`.
 */
export function linearFit(
  xs: number[],
  ys: number[]
): { slope: number; intercept: number } {
  const n = Math.min(xs.length, ys.length);
  if (n === 0) return { slope: 0, intercept: 0 };

  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < n; i += 1) {
    sxy += (xs[i] - mx) * (ys[i] - my);
    sxx += (xs[i] - mx) * (xs[i] - mx);
  }

  if (sxx === 0) return { slope: 0, intercept: my };
  const slope = sxy / sxx;
  return { slope, intercept: my - slope * mx };
}

/**
 * Slope of a sequence sampled at x = 0, 1, 2, ... (session order).
 */
export function trendSlope(series: number[]): number {
  return linearFit(
    series.map((_, i) => i),
    series
  ).slope;
}
