/**
 * Assessed condition. Each one has its own feature schema and
 * recommendation table.
 */
export type Domain = "dyslexia" | "dyscalculia" | "dysgraphia";

/**
 * Ordered risk tiers produced by the scorer (None < Low < Medium < High).
 */
export type RiskLevel = "None" | "Low" | "Medium" | "High";

/**
 * Label carried by a domain that threw while being scored.
 */
export type UnassessedLevel = "Unable to assess";

/**
 * One captured mini-task ("game").
 *
 * Client-captured traces are untrusted and inconsistent in shape, so records
 * are modelled as arbitrary objects and read through the helpers in
 * `traces.ts`.
 */
export type TaskRecord = Record<string, unknown>;

/**
 * A task record paired with the name it was captured under.
 */
export type TaskEntry = {
  name: string;
  record: TaskRecord;
};

/**
 * Exactly 20 normalised scalars in [0, 1], in the order fixed by the domain.
 */
export type FeatureVector = number[];

/**
 * Named sub-scores grouped by theme, e.g.
 * `{ accuracy_profile: { overall_accuracy: 0.8 } }`.
 */
export type DetailedAnalysis = Record<string, Record<string, number>>;

/**
 * Output of the risk scorer for one feature vector.
 */
export type ScoreResult = {
  riskScore: number;
  riskLevel: RiskLevel;
  confidence: number;
};

/**
 * Per-domain prediction in the wire shape consumed by the web application.
 */
export type Prediction = {
  domain: Domain;
  risk_level: RiskLevel;
  risk_score: number;
  confidence: number;
  detailed_analysis: DetailedAnalysis;
  recommendations: string[];
  model: string;
  timestamp: string;
};

/**
 * Degraded prediction for a domain whose scoring threw.
 */
export type FailedPrediction = {
  domain: Domain;
  risk_level: UnassessedLevel;
  risk_score: 0;
  confidence: 0;
  error: string;
  recommendations: string[];
  model: string;
  timestamp: string;
};

export type DomainResult = Prediction | FailedPrediction;

export type RiskProfileEntry = {
  risk_level: RiskLevel | UnassessedLevel;
  risk_score: number;
  confidence: number;
};

/**
 * Aggregate over up to three domain results.
 */
export type UnifiedSummary = {
  overall_risk_level: RiskLevel;
  average_risk_score: number;
  average_confidence: number;
  risk_profile: Partial<Record<Domain, RiskProfileEntry>>;
  combined_recommendations: string[];
  next_steps: string[];
  clinical_notes: string;
};

/**
 * Full report returned by `assess(...)`.
 */
export type UnifiedAssessment = {
  individual_results: Partial<Record<Domain, DomainResult>>;
  comprehensive_summary: UnifiedSummary;
  model_version: string;
  assessment_date: string;
};

export type ScreeningLevel =
  | "No risk likely"
  | "Low risk"
  | "Medium risk"
  | "High risk"
  | "Unknown"
  | "No data";

/**
 * Output of the weighted baseline screen in `screening.ts`.
 */
export type ScreeningResult = {
  domain: Domain;
  risk_level: ScreeningLevel;
  details: {
    norm_score: number;
    per_task: Record<string, Record<string, number>>;
    warnings: string[];
  };
};

/**
 * Injected clock so reports can be made reproducible in tests.
 */
export type AssessOptions = {
  now?: () => Date;
};
