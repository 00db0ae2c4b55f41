/**
 * Risk Scorer
 *
 * Turns a report summary into a 0-100 risk score (0 = no weighted findings,
 * 100 = critical risk), a letter grade and a deployment verdict.
 */

import type { Grade, Report, ScoredReport, SeverityCounts } from "../types/index.js";

// ============================================================================
// Weights
// ============================================================================

export const SEVERITY_WEIGHTS = Object.freeze({
  critical: 40,
  high: 20,
  medium: 10,
  low: 3,
  informational: 0,
  optimization: 0,
} satisfies Omit<SeverityCounts, "total">);

export const MAX_SCORE = 100;

/**
 * Upper bounds (exclusive) for each grade below F.
 */
const GRADE_BOUNDS: ReadonlyArray<readonly [Grade, number]> = [
  ["A", 10],
  ["B", 25],
  ["C", 50],
  ["D", 75],
];

const VERDICTS: Readonly<Record<Grade, string>> = Object.freeze({
  A: "✅ Low risk. Review findings before deployment.",
  B: "⚠️  Minor issues found. Address before mainnet deployment.",
  C: "🟠 Moderate risk. Fix all Medium+ findings before deployment.",
  D: "🔴 High risk. Do not deploy until Critical/High findings are resolved.",
  F: "🚨 Critical risk. This contract must not be deployed.",
});

// ============================================================================
// Scoring
// ============================================================================

/**
 * Weighted sum of the per-severity counts, capped at 100.
 */
export function calculateScore(summary: Readonly<SeverityCounts>): number {
  const raw =
    summary.critical * SEVERITY_WEIGHTS.critical +
    summary.high * SEVERITY_WEIGHTS.high +
    summary.medium * SEVERITY_WEIGHTS.medium +
    summary.low * SEVERITY_WEIGHTS.low +
    summary.informational * SEVERITY_WEIGHTS.informational +
    summary.optimization * SEVERITY_WEIGHTS.optimization;

  return Math.min(MAX_SCORE, raw);
}

/**
 * A [0,10), B [10,25), C [25,50), D [50,75), F [75,100]
 */
export function calculateGrade(score: number): Grade {
  for (const [grade, bound] of GRADE_BOUNDS) {
    if (score < bound) {
      return grade;
    }
  }
  return "F";
}

export function getVerdict(grade: Grade): string {
  return VERDICTS[grade];
}

/**
 * Attach score, grade and verdict to a report.
 */
export function scoreReport(report: Report): ScoredReport {
  const riskScore = calculateScore(report.summary);
  const grade = calculateGrade(riskScore);

  return Object.freeze({
    ...report,
    riskScore,
    grade,
    verdict: getVerdict(grade),
  });
}
