import nextSteps from "./data/next-steps.json";
import { mean } from "./stats";
import type {
  Domain,
  DomainResult,
  Prediction,
  RiskLevel,
  RiskProfileEntry,
  UnifiedSummary,
} from "./types";

const NEXT_STEPS: Record<RiskLevel, string[]> = nextSteps;

function isScored(result: DomainResult): result is Prediction {
  return result.risk_level !== "Unable to assess";
}

/**
 * Combines per-domain tiers:
 * - two or more High -> High
 * - one High, or two or more Medium -> Medium
 * - one Medium, or any Low -> Low
 * - otherwise None
 *
 * Unassessed domains do not count towards any tier.
 */
export function overallRiskLevel(levels: string[]): RiskLevel {
  const high = levels.filter((l) => l === "High").length;
  const medium = levels.filter((l) => l === "Medium").length;

  if (high >= 2) return "High";
  if (high === 1 || medium >= 2) return "Medium";
  if (medium === 1 || levels.includes("Low")) return "Low";
  return "None";
}

/**
 * Concatenates recommendation lists, keeping the first occurrence of each.
 */
export function combineRecommendations(lists: string[][]): string[] {
  return Array.from(new Set(lists.flat()));
}

export function nextStepsFor(level: RiskLevel): string[] {
  return [...NEXT_STEPS[level]];
}

function titleCase(key: string): string {
  return key
    .split("_")
    .filter((w) => w.length > 0)
    .map((w) => w[0].toUpperCase() + w.slice(1).toLowerCase())
    .join(" ");
}

/**
 * Plain-text report for practitioners. Each domain opens with a blank line
 * and an upper-case heading; each analysis group lists its first three
 * metrics.
 */
export function clinicalNotes(results: Partial<Record<Domain, DomainResult>>): string {
  const lines: string[] = [];

  for (const [domain, result] of Object.entries(results)) {
    if (!result) continue;

    lines.push(`\n${domain.toUpperCase()} ASSESSMENT:`);
    lines.push(`  Risk Level: ${result.risk_level}`);
    lines.push(`  Confidence: ${(result.confidence * 100).toFixed(1)}%`);

    if (!isScored(result)) {
      lines.push(`  Error: ${result.error}`);
      continue;
    }

    for (const [group, metrics] of Object.entries(result.detailed_analysis)) {
      const items = Object.entries(metrics)
        .filter(([, v]) => Number.isFinite(v))
        .slice(0, 3);
      if (items.length === 0) continue;

      lines.push(`  ${titleCase(group)}:`);
      for (const [k, v] of items) lines.push(`    - ${k}: ${v.toFixed(2)}`);
    }
  }

  return lines.join("\n");
}

/**
 * Aggregates per-domain results into the comprehensive summary. Averages are
 * taken over scored domains only and are 0 when none scored.
 */
export function buildSummary(
  results: Partial<Record<Domain, DomainResult>>
): UnifiedSummary {
  const entries = Object.values(results).filter(
    (r): r is DomainResult => r !== undefined
  );
  const scored = entries.filter(isScored);

  const riskProfile: Partial<Record<Domain, RiskProfileEntry>> = {};
  for (const r of entries) {
    riskProfile[r.domain] = {
      risk_level: r.risk_level,
      risk_score: r.risk_score,
      confidence: r.confidence,
    };
  }

  const overall = overallRiskLevel(entries.map((r) => r.risk_level));

  return {
    overall_risk_level: overall,
    average_risk_score: mean(scored.map((r) => r.risk_score)),
    average_confidence: mean(scored.map((r) => r.confidence)),
    risk_profile: riskProfile,
    combined_recommendations: combineRecommendations(
      entries.map((r) => r.recommendations)
    ),
    next_steps: nextStepsFor(overall),
    clinical_notes: clinicalNotes(results),
  };
}
