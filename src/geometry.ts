import { diff, linearFit, mean, std, variance } from "./stats";
import type { Point } from "./traces";

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Lengths of the segments between consecutive points.
 */
export function segmentLengths(points: Point[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    out.push(distance(points[i - 1], points[i]));
  }
  return out;
}

export function pathLength(points: Point[]): number {
  return segmentLengths(points).reduce((a, b) => a + b, 0);
}

/**
 * Diagonal of the bounding box, used as the size of a letter or shape.
 */
export function boundingDiagonal(points: Point[]): number {
  if (points.length === 0) return 0;
  const xs = points.map((p) => p.x);
  const ys = points.map((p) => p.y);
  return Math.hypot(
    Math.max(...xs) - Math.min(...xs),
    Math.max(...ys) - Math.min(...ys)
  );
}

/**
 * Unsigned turn angles (radians) between consecutive motion vectors.
 * Zero-length vectors are skipped.
 */
export function turnAngles(points: Point[]): number[] {
  const angles: number[] = [];
  for (let i = 2; i < points.length; i += 1) {
    const v1 = { x: points[i - 1].x - points[i - 2].x, y: points[i - 1].y - points[i - 2].y };
    const v2 = { x: points[i].x - points[i - 1].x, y: points[i].y - points[i - 1].y };
    const mag1 = Math.hypot(v1.x, v1.y);
    const mag2 = Math.hypot(v2.x, v2.y);
    if (mag1 === 0 || mag2 === 0) continue;

    const cos = (v1.x * v2.x + v1.y * v2.y) / (mag1 * mag2);
    angles.push(Math.acos(Math.min(1, Math.max(-1, cos))));
  }
  return angles;
}

/**
 * Smoothness of a group of paths: `1 - var(turn angles) / (pi / 2)`, floored
 * at 0. Paths with fewer than 3 points contribute no angles; no angles at all
 * reads as 0.5.
 */
export function pathSmoothness(paths: Point[][]): number {
  const angles = paths.filter((p) => p.length >= 3).flatMap(turnAngles);
  if (angles.length === 0) return 0.5;
  return Math.max(0, 1 - variance(angles) / (Math.PI / 2));
}

/**
 * Mean absolute residual of a least-squares line, relative to the spread of
 * the dependent axis (at least 1 px).
 *
 * The line is fitted along the dominant axis so vertical strokes are measured
 * as well as horizontal ones.
 */
export function lineDeviation(points: Point[]): number {
  if (points.length < 3) return 0;

  const xs = points.map((p) => p.x);
  const ys = points.map((p) => p.y);
  const xSpread = Math.max(...xs) - Math.min(...xs);
  const ySpread = Math.max(...ys) - Math.min(...ys);
  const [indep, dep] = xSpread >= ySpread ? [xs, ys] : [ys, xs];

  const { slope, intercept } = linearFit(indep, dep);
  const residuals = dep.map((v, i) => Math.abs(v - (slope * indep[i] + intercept)));
  const range = Math.max(1, Math.max(...dep) - Math.min(...dep));
  return mean(residuals) / range;
}

/**
 * Jerk proxy: mean of the variances of the second differences of x and y.
 */
export function tremorEnergy(points: Point[]): number {
  const d2x = diff(diff(points.map((p) => p.x)));
  const d2y = diff(diff(points.map((p) => p.y)));
  return (variance(d2x) + variance(d2y)) / 2;
}

/**
 * Consistency of a set of magnitudes as `1 - min(1, cv)`, or `null` for an
 * empty set.
 */
export function consistency(values: number[]): number | null {
  if (values.length === 0) return null;
  const m = mean(values);
  if (m <= 0) return 1;
  return 1 - Math.min(1, std(values) / m);
}
