import table from "./data/recommendations.json";
import { isDomain } from "./models";
import type { Domain, RiskLevel } from "./types";

type RecommendationTable = Record<Domain, Record<RiskLevel, string[]>>;

/**
 * Ordered guidance per domain and tier, most general first. Lists grow in
 * intensity from None to High.
 */
const RECOMMENDATIONS: RecommendationTable = table;

function isKnownLevel(level: string): level is RiskLevel {
  return level === "None" || level === "Low" || level === "Medium" || level === "High";
}

/**
 * Returns a copy of the guidance list for a tier, or `[]` for an unknown tier
 * or domain.
 */
export function recommend(riskLevel: string, domain: string): string[] {
  if (!isKnownLevel(riskLevel) || !isDomain(domain)) return [];
  return [...RECOMMENDATIONS[domain][riskLevel]];
}
