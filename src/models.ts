import { analyzeArithmetic, ARITHMETIC_FEATURES, extractArithmeticFeatures } from "./arithmetic";
import { analyzeHandwriting, extractHandwritingFeatures, HANDWRITING_FEATURES } from "./handwriting";
import { DEFAULT_THRESHOLDS, scoreFeatures, type RiskThresholds } from "./network";
import { analyzeReading, extractReadingFeatures, READING_FEATURES } from "./reading";
import type { FeatureDefinition } from "./features";
import type { DetailedAnalysis, Domain, FeatureVector, ScoreResult } from "./types";

export const DOMAINS: readonly Domain[] = ["dyslexia", "dyscalculia", "dysgraphia"];

/**
 * Names callers may use for a domain besides its key.
 */
const DOMAIN_ALIASES: Record<string, Domain> = {
  dyslexia: "dyslexia",
  reading: "dyslexia",
  dyscalculia: "dyscalculia",
  arithmetic: "dyscalculia",
  math: "dyscalculia",
  dysgraphia: "dysgraphia",
  handwriting: "dysgraphia",
  writing: "dysgraphia",
};

export function isDomain(value: string): value is Domain {
  return DOMAINS.some((d) => d === value);
}

/**
 * Resolves a domain key or alias (case-insensitive), or `null`.
 */
export function resolveDomain(value: string): Domain | null {
  const key = value.trim().toLowerCase();
  return Object.hasOwn(DOMAIN_ALIASES, key) ? DOMAIN_ALIASES[key] : null;
}

export class UnknownDomainError extends Error {
  constructor(readonly domain: string) {
    super(`Unknown assessment domain: ${domain}`);
    this.name = "UnknownDomainError";
  }
}

/**
 * Everything needed to score one domain.
 */
export type DomainModel = {
  domain: Domain;
  name: string;
  schema: FeatureDefinition[];
  /** Element-wise weights applied before the forward pass. */
  importance: readonly number[];
  thresholds: RiskThresholds;
  extract: (session: unknown) => FeatureVector;
  analyze: (features: FeatureVector) => DetailedAnalysis;
};

export const MODELS: Record<Domain, DomainModel> = {
  dyslexia: {
    domain: "dyslexia",
    name: "Dyslexia Neural Predictor v2.0",
    schema: READING_FEATURES,
    importance: [
      1.3, 1.2, 0.9, // speed
      1.4, 1.2, 1.1, // accuracy and error patterns
      1.0, 0.95, 1.1, // consistency
      1.1, 0.9, 0.8, // difficulty
      0.7, 0.8, 0.75, // response time
      0.9, 0.95, 0.85, // error recovery
      1.0, 0.95, // processing and efficiency
    ],
    thresholds: DEFAULT_THRESHOLDS,
    extract: extractReadingFeatures,
    analyze: analyzeReading,
  },
  dyscalculia: {
    domain: "dyscalculia",
    name: "Dyscalculia Neural Predictor v2.0",
    schema: ARITHMETIC_FEATURES,
    importance: [
      1.2, 1.1, 1.0, // number sense
      1.1, 0.95, 0.8, // counting and sequencing
      1.3, 1.2, 1.1, // operations
      0.7, 0.9, 0.6, // calculation speed
      1.0, 0.95, 0.7, // working memory
      0.8, 0.75, 0.7, // error patterns
      0.85, 0.9, // reasoning
    ],
    thresholds: DEFAULT_THRESHOLDS,
    extract: extractArithmeticFeatures,
    analyze: analyzeArithmetic,
  },
  dysgraphia: {
    domain: "dysgraphia",
    name: "Dysgraphia Neural Predictor v2.0",
    schema: HANDWRITING_FEATURES,
    importance: [
      1.3, 1.2, 1.1, 0.6, // motor control
      1.1, 0.95, 0.8, // writing speed
      1.2, 1.1, 1.15, // letter formation
      1.3, 1.1, 0.9, // legibility and coordination
      0.8, 0.7, 0.75, // stamina
      1.0, 0.95, 0.85, 0.9, // completion and planning
    ],
    thresholds: DEFAULT_THRESHOLDS,
    extract: extractHandwritingFeatures,
    analyze: analyzeHandwriting,
  },
};

export type RiskEstimate = ScoreResult & {
  features: FeatureVector;
  analysis: DetailedAnalysis;
};

/**
 * Extracts, scores and analyses one session for one domain.
 */
export function predictRisk(domain: Domain, session: unknown): RiskEstimate {
  const model = MODELS[domain];
  const features = model.extract(session);
  const score = scoreFeatures(features, {
    importance: model.importance,
    thresholds: model.thresholds,
  });
  return { ...score, features, analysis: model.analyze(features) };
}
