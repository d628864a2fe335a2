import { readFileSync, writeFileSync } from "node:fs";
import { resolveDomain, UnknownDomainError } from "./models";
import { assess, predictDomain } from "./predictor";
import { screenSession } from "./screening";
import { isRecord } from "./traces";
import type { Domain, DomainResult, ScreeningResult } from "./types";

const DEFAULT_OUT = "assessment-report.json";

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--in session.json`
 * - `--in=session.json`
 *
 * Returns `null` if the flag is not present or has no value.
 */
function getArgValue(flag: string): string | null {
  const idx = process.argv.findIndex(
    (a) => a === flag || a.startsWith(`${flag}=`)
  );
  if (idx === -1) return null;
  const a = process.argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = process.argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

function hasFlag(flag: string): boolean {
  return process.argv.some((a) => a === flag || a.startsWith(`${flag}=`));
}

/**
 * Interprets environment variables as booleans ("1", "true", "yes").
 */
function envFlag(name: string): boolean {
  const v = process.env[name];
  if (!v) return false;
  return v === "1" || v.toLowerCase() === "true" || v.toLowerCase() === "yes";
}

/**
 * First positional argument, used when `--in` is not forwarded.
 * Example: `tsx src/cli.ts session.json`.
 */
function getPositionalArg(index: number): string | null {
  const v = process.argv[index];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function screenAll(input: unknown): ScreeningResult[] {
  if (!isRecord(input)) return [];
  const out: ScreeningResult[] = [];
  for (const [key, session] of Object.entries(input)) {
    const domain = resolveDomain(key);
    if (domain) out.push(screenSession(domain, session));
  }
  return out;
}

function formatResult(result: DomainResult): string {
  const score = result.risk_score.toFixed(3);
  const confidence = (result.confidence * 100).toFixed(1);
  return `${result.domain}: ${result.risk_level} (score ${score}, confidence ${confidence}%)`;
}

/**
 * CLI entrypoint.
 *
 * Pipeline:
 * 1) Resolve input/output paths and mode from flags or env.
 * 2) Parse the session file.
 * 3) Score one domain (`--domain`) or every domain present.
 * 4) Optionally add the baseline screen (`--screen`).
 * 5) Write the report as JSON.
 */
export async function runCli(): Promise<void> {
  const inPath =
    getArgValue("--in") || process.env.RISK_ENGINE_IN || getPositionalArg(2);
  const outPath =
    getArgValue("--out") || process.env.RISK_ENGINE_OUT || DEFAULT_OUT;
  const domainArg = getArgValue("--domain");
  const shouldScreen = hasFlag("--screen") || envFlag("RISK_ENGINE_SCREEN");
  const quiet = hasFlag("--quiet");

  if (!inPath) {
    console.error("Missing input file. Pass --in <file> or set RISK_ENGINE_IN.");
    process.exit(1);
  }

  let domain: Domain | null = null;
  if (domainArg) {
    domain = resolveDomain(domainArg);
    if (!domain) throw new UnknownDomainError(domainArg);
  }

  const input: unknown = JSON.parse(readFileSync(inPath, "utf8"));

  let report: Record<string, unknown>;
  let results: DomainResult[];
  let overall: string | null = null;

  if (domain) {
    const result = predictDomain(domain, input);
    results = [result];
    report = shouldScreen
      ? { result, screening: [screenSession(domain, input)] }
      : { result };
  } else {
    const assessment = assess(input);
    results = Object.values(assessment.individual_results).filter(
      (r): r is DomainResult => r !== undefined
    );
    report = shouldScreen
      ? { ...assessment, screening: screenAll(input) }
      : { ...assessment };
    overall = assessment.comprehensive_summary.overall_risk_level;

    if (results.length === 0) {
      console.warn("Warning: no known domain keys in input (expected dyslexia, dyscalculia or dysgraphia).");
    }
  }

  writeFileSync(outPath, JSON.stringify(report, null, 2), "utf8");

  if (quiet) return;
  console.log(`Wrote ${outPath}`);
  for (const r of results) console.log(formatResult(r));
  if (overall !== null && results.length > 0) console.log(`Overall: ${overall}`);
}

runCli().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
