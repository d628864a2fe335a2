import { FEATURE_COUNT } from "./network";
import { DOMAINS, MODELS, predictRisk, resolveDomain } from "./models";
import { recommend } from "./recommendations";
import { buildSummary } from "./summary";
import { isRecord } from "./traces";
import type {
  AssessOptions,
  Domain,
  DomainResult,
  FailedPrediction,
  UnifiedAssessment,
} from "./types";

export const MODEL_VERSION = "2.0 - Neural Networks";

const INCOMPLETE_DATA_ADVICE = "Please ensure all assessment data is complete";

function clock(options: AssessOptions): () => Date {
  return options.now ?? (() => new Date());
}

function failure(domain: Domain, err: unknown, timestamp: string): FailedPrediction {
  return {
    domain,
    risk_level: "Unable to assess",
    risk_score: 0,
    confidence: 0,
    error: err instanceof Error ? err.message : String(err),
    recommendations: [INCOMPLETE_DATA_ADVICE],
    model: MODEL_VERSION,
    timestamp,
  };
}

/**
 * Scores one session for one domain.
 *
 * Never throws: a failure anywhere in extraction or scoring is returned as a
 * result with `risk_level: "Unable to assess"` and the error message.
 */
export function predictDomain(
  domain: Domain,
  session: unknown,
  options: AssessOptions = {}
): DomainResult {
  const timestamp = clock(options)().toISOString();
  try {
    const estimate = predictRisk(domain, session);
    return {
      domain,
      risk_level: estimate.riskLevel,
      risk_score: estimate.riskScore,
      confidence: estimate.confidence,
      detailed_analysis: estimate.analysis,
      recommendations: recommend(estimate.riskLevel, domain),
      model: MODELS[domain].name,
      timestamp,
    };
  } catch (err) {
    return failure(domain, err, timestamp);
  }
}

/**
 * Runs every domain present in `sessions` and summarises them.
 *
 * Keys may be domain names or their aliases (`reading`, `arithmetic`,
 * `handwriting`); unknown keys are ignored. When a domain is given under two
 * names, the later key wins.
 */
export function assess(
  sessions: unknown,
  options: AssessOptions = {}
): UnifiedAssessment {
  const input = isRecord(sessions) ? sessions : {};
  const picked = new Map<Domain, unknown>();
  for (const [key, session] of Object.entries(input)) {
    const domain = resolveDomain(key);
    if (domain) picked.set(domain, session);
  }

  const results: Partial<Record<Domain, DomainResult>> = {};
  for (const domain of DOMAINS) {
    if (picked.has(domain)) results[domain] = predictDomain(domain, picked.get(domain), options);
  }

  return {
    individual_results: results,
    comprehensive_summary: buildSummary(results),
    model_version: MODEL_VERSION,
    assessment_date: clock(options)().toISOString(),
  };
}

export type ModelInfo = {
  version: string;
  models: Record<Domain, string>;
  features_per_model: number;
  architecture: string;
  activation_function: string;
  prediction_method: string;
};

export function getModelInfo(): ModelInfo {
  return {
    version: MODEL_VERSION,
    models: {
      dyslexia: MODELS.dyslexia.name,
      dyscalculia: MODELS.dyscalculia.name,
      dysgraphia: MODELS.dysgraphia.name,
    },
    features_per_model: FEATURE_COUNT,
    architecture: `${FEATURE_COUNT}-64-32-1 feed-forward, LeakyReLU(0.1) hidden layers`,
    activation_function: "Sigmoid",
    prediction_method: "Neural Network with Feature Engineering",
  };
}
