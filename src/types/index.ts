/**
 * Core types for the contract-sentry analysis pipeline
 */

export enum Severity {
  CRITICAL = "Critical",
  HIGH = "High",
  MEDIUM = "Medium",
  LOW = "Low",
  INFORMATIONAL = "Informational",
  OPTIMIZATION = "Optimization",
}

/** Provenance tag. Reporting only, never used for dedup or ordering. */
export type FindingSource = "heuristic" | "slither" | "external";

export interface Finding {
  readonly id: string;
  readonly source: FindingSource;
  /** Stable identifier of the rule that produced the finding */
  readonly check: string;
  readonly title: string;
  readonly description: string;
  readonly severity: Severity;
  /** "High" | "Medium" | "Low" from the heuristics; passed through from Slither */
  readonly confidence: string;
  readonly file: string;
  /** 1-based line numbers in discovery order, e.g. [callLine, mutationLine] */
  readonly lines: readonly number[];
  readonly remediation: string;
  /** SWC registry cross-reference, may be empty */
  readonly swcId: string;
  readonly references: readonly string[];
}

export interface SeverityCounts {
  total: number;
  critical: number;
  high: number;
  medium: number;
  low: number;
  informational: number;
  optimization: number;
}

export interface Report {
  readonly target: string;
  /** ISO-8601 UTC, second precision */
  readonly generatedAt: string;
  readonly summary: Readonly<SeverityCounts>;
  readonly findings: readonly Finding[];
}

export type Grade = "A" | "B" | "C" | "D" | "F";

export interface ScoredReport extends Report {
  readonly riskScore: number;
  readonly grade: Grade;
  readonly verdict: string;
}

export interface RuleInfo {
  check: string;
  severity: string;
  description: string;
}
