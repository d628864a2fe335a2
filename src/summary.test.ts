import { describe, expect, test } from "vitest";
import {
  buildSummary,
  clinicalNotes,
  combineRecommendations,
  nextStepsFor,
  overallRiskLevel,
} from "./summary";
import type { FailedPrediction, Prediction, RiskLevel } from "./types";

function prediction(
  domain: Prediction["domain"],
  level: RiskLevel,
  score: number,
  confidence: number,
  recommendations: string[] = []
): Prediction {
  return {
    domain,
    risk_level: level,
    risk_score: score,
    confidence,
    detailed_analysis: {
      reading_speed_profile: { average_wpm: 100, consistency: 0.5, trend: 0.25, extra: 0.1 },
    },
    recommendations,
    model: "test-model",
    timestamp: "2024-01-01T00:00:00.000Z",
  };
}

const failed: FailedPrediction = {
  domain: "dysgraphia",
  risk_level: "Unable to assess",
  risk_score: 0,
  confidence: 0,
  error: "bad strokes",
  recommendations: ["Please ensure all assessment data is complete"],
  model: "2.0 - Neural Networks",
  timestamp: "2024-01-01T00:00:00.000Z",
};

describe("overall risk", () => {
  test("combination rule", () => {
    expect(overallRiskLevel(["High", "High", "None"])).toBe("High");
    expect(overallRiskLevel(["High", "None", "None"])).toBe("Medium");
    expect(overallRiskLevel(["Medium", "Medium", "None"])).toBe("Medium");
    expect(overallRiskLevel(["Medium", "None"])).toBe("Low");
    expect(overallRiskLevel(["Low", "None", "None"])).toBe("Low");
    expect(overallRiskLevel(["None", "None", "None"])).toBe("None");
    expect(overallRiskLevel([])).toBe("None");
    expect(overallRiskLevel(["Unable to assess"])).toBe("None");
  });
});

describe("recommendations and next steps", () => {
  test("dedupes keeping first occurrence", () => {
    expect(combineRecommendations([["a", "b"], ["b", "c", "a"], []])).toEqual(["a", "b", "c"]);
  });

  test("next steps playbooks", () => {
    expect(nextStepsFor("None")).toHaveLength(4);
    expect(nextStepsFor("Low")).toHaveLength(5);
    expect(nextStepsFor("High")[0]).toBe(
      "1. Schedule comprehensive professional evaluation (Educational Psychologist)"
    );
  });
});

describe("clinical notes", () => {
  test("formats a scored domain", () => {
    const notes = clinicalNotes({ dyslexia: prediction("dyslexia", "Low", 0.85, 0.756) });
    expect(notes).toBe(
      [
        "",
        "DYSLEXIA ASSESSMENT:",
        "  Risk Level: Low",
        "  Confidence: 75.6%",
        "  Reading Speed Profile:",
        "    - average_wpm: 100.00",
        "    - consistency: 0.50",
        "    - trend: 0.25",
      ].join("\n")
    );
  });

  test("lists the error of a failed domain", () => {
    expect(clinicalNotes({ dysgraphia: failed })).toBe(
      "\nDYSGRAPHIA ASSESSMENT:\n  Risk Level: Unable to assess\n  Confidence: 0.0%\n  Error: bad strokes"
    );
  });
});

describe("buildSummary", () => {
  test("two High and one None", () => {
    const s = buildSummary({
      dyslexia: prediction("dyslexia", "High", 0.95, 0.9, ["x", "y"]),
      dyscalculia: prediction("dyscalculia", "High", 0.91, 0.8, ["y", "z"]),
      dysgraphia: prediction("dysgraphia", "None", 0.6, 0.7, ["x"]),
    });
    expect(s.overall_risk_level).toBe("High");
    expect(s.average_risk_score).toBeCloseTo(0.82, 12);
    expect(s.average_confidence).toBeCloseTo(0.8, 12);
    expect(s.combined_recommendations).toEqual(["x", "y", "z"]);
    expect(s.next_steps).toHaveLength(7);
    expect(s.risk_profile.dyscalculia).toEqual({ risk_level: "High", risk_score: 0.91, confidence: 0.8 });
  });

  test("failed domains are excluded from the averages", () => {
    const s = buildSummary({
      dyslexia: prediction("dyslexia", "Medium", 0.88, 0.6),
      dysgraphia: failed,
    });
    expect(s.overall_risk_level).toBe("Low");
    expect(s.average_risk_score).toBe(0.88);
    expect(s.average_confidence).toBe(0.6);
    expect(s.risk_profile.dysgraphia?.risk_level).toBe("Unable to assess");
    expect(s.combined_recommendations).toEqual(["Please ensure all assessment data is complete"]);
  });

  test("no domains", () => {
    const s = buildSummary({});
    expect(s.overall_risk_level).toBe("None");
    expect(s.average_risk_score).toBe(0);
    expect(s.average_confidence).toBe(0);
    expect(s.clinical_notes).toBe("");
    expect(s.next_steps).toEqual(nextStepsFor("None"));
  });
});
