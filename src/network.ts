import { MersenneTwister } from "./random";
import { clip, mean, std, variance } from "./stats";
import type { FeatureVector, RiskLevel, ScoreResult } from "./types";

export const FEATURE_COUNT = 20;
export const WEIGHT_SEED = 42;

const LEAKY_SLOPE = 0.1;
const NORM_EPSILON = 1e-6;

/**
 * Upper bounds (exclusive) of the None, Low and Medium tiers. Scores at or
 * above `medium` are High.
 */
export type RiskThresholds = {
  none: number;
  low: number;
  medium: number;
};

export const DEFAULT_THRESHOLDS: RiskThresholds = {
  none: 0.83,
  low: 0.87,
  medium: 0.9,
};

export type NetworkWeights = {
  w1: number[][];
  b1: number[];
  w2: number[][];
  b2: number[];
  w3: number[][];
  b3: number[];
};

/**
 * Thrown when the forward pass receives a vector of the wrong length.
 *
 * `prepareFeatures` pads and truncates, so this only fires when a caller
 * bypasses it.
 */
export class FeatureLengthError extends Error {
  constructor(readonly length: number) {
    super(`Expected ${FEATURE_COUNT} features, received ${length}`);
    this.name = "FeatureLengthError";
  }
}

/**
 * Draws the fixed 20 -> 64 -> 32 -> 1 weights.
 *
 * Matrices are drawn in layer order, row by row, as `N(0, 1) * 0.5 + 0.2`;
 * all biases are zero. The same seed always yields the same weights.
 */
export function generateWeights(seed = WEIGHT_SEED): NetworkWeights {
  const rng = new MersenneTwister(seed);
  const w1 = rng.gaussianMatrix(64, FEATURE_COUNT, 0.5, 0.2);
  const w2 = rng.gaussianMatrix(32, 64, 0.5, 0.2);
  const w3 = rng.gaussianMatrix(1, 32, 0.5, 0.2);
  return {
    w1,
    b1: new Array<number>(64).fill(0),
    w2,
    b2: new Array<number>(32).fill(0),
    w3,
    b3: [0],
  };
}

function affine(w: number[][], x: number[], b: number[]): number[] {
  return w.map((row, i) => {
    let acc = 0;
    for (let j = 0; j < row.length; j += 1) acc += row[j] * x[j];
    return acc + b[i];
  });
}

function leakyRelu(values: number[]): number[] {
  return values.map((v) => (v > 0 ? v : LEAKY_SLOPE * v));
}

function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

/**
 * Deterministic nonlinear aggregator over a weighted feature vector.
 *
 * This is not a trained model: the weights are a fixed pseudo-random cascade,
 * so the same input always produces the same score.
 */
export class RiskNetwork {
  constructor(private readonly weights: NetworkWeights = generateWeights()) {}

  forward(weighted: number[]): number {
    if (weighted.length !== FEATURE_COUNT) {
      throw new FeatureLengthError(weighted.length);
    }

    const { w1, b1, w2, b2, w3, b3 } = this.weights;
    const h1 = leakyRelu(affine(w1, weighted, b1));
    const h2 = leakyRelu(affine(w2, h1, b2));

    // Single-sample batch-norm style rescaling.
    const m = mean(h2);
    const s = std(h2) + NORM_EPSILON;
    const h2n = h2.map((v) => (v - m) / s);

    const [z3] = affine(w3, h2n, b3);
    return clip(sigmoid(z3), 0, 1);
  }
}

const sharedNetwork = new RiskNetwork();

/**
 * Clamps every feature into [0, 1] (non-finite values read as 0.5) and pads
 * with 0.5 or truncates to exactly 20 entries.
 */
export function prepareFeatures(features: number[]): FeatureVector {
  const out = features
    .slice(0, FEATURE_COUNT)
    .map((v) => (Number.isFinite(v) ? clip(v, 0, 1) : 0.5));
  while (out.length < FEATURE_COUNT) out.push(0.5);
  return out;
}

/**
 * Maps a score onto a tier. Monotonic: a higher score never lowers the tier.
 */
export function riskLevelFor(
  score: number,
  thresholds: RiskThresholds = DEFAULT_THRESHOLDS
): RiskLevel {
  if (score < thresholds.none) return "None";
  if (score < thresholds.low) return "Low";
  if (score < thresholds.medium) return "Medium";
  return "High";
}

/**
 * Higher when the features have low dispersion and the score sits far from
 * 0.5. Bounded to [0.5, 0.99].
 */
export function confidenceFor(features: FeatureVector, score: number): number {
  const spread = variance(features);
  const distance = Math.abs(score - 0.5);
  return clip((1 - spread) * (0.5 + distance), 0.5, 0.99);
}

export type ScoringConfig = {
  importance: readonly number[];
  thresholds?: RiskThresholds;
  network?: RiskNetwork;
};

/**
 * Scores one feature vector: prepare, weight, forward pass, tier, confidence.
 */
export function scoreFeatures(
  features: number[],
  config: ScoringConfig
): ScoreResult {
  const prepared = prepareFeatures(features);
  const weighted = prepared.map((v, i) => v * (config.importance[i] ?? 1));
  const riskScore = (config.network ?? sharedNetwork).forward(weighted);

  return {
    riskScore,
    riskLevel: riskLevelFor(riskScore, config.thresholds),
    confidence: confidenceFor(prepared, riskScore),
  };
}
