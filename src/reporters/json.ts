/**
 * JSON Reporter
 *
 * Writes the report in its persisted wire form (snake_case keys).
 */

import type { Finding, ScoredReport, SeverityCounts } from "../types/index.js";
import type { Reporter } from "./types.js";

export interface WireFinding {
  id: string;
  source: string;
  check: string;
  title: string;
  description: string;
  severity: string;
  confidence: string;
  file: string;
  lines: number[];
  remediation: string;
  swc_ref: string;
  references: string[];
}

export interface WireReport {
  target: string;
  generated_at: string;
  summary: SeverityCounts;
  findings: WireFinding[];
  risk_score: number;
  grade: string;
  verdict: string;
}

export function toWireFinding(finding: Finding): WireFinding {
  return {
    id: finding.id,
    source: finding.source,
    check: finding.check,
    title: finding.title,
    description: finding.description,
    severity: finding.severity,
    confidence: finding.confidence,
    file: finding.file,
    lines: [...finding.lines],
    remediation: finding.remediation,
    swc_ref: finding.swcId,
    references: [...finding.references],
  };
}

export function toWireReport(report: ScoredReport): WireReport {
  return {
    target: report.target,
    generated_at: report.generatedAt,
    summary: { ...report.summary },
    findings: report.findings.map(toWireFinding),
    risk_score: report.riskScore,
    grade: report.grade,
    verdict: report.verdict,
  };
}

export class JsonReporter implements Reporter {
  readonly name = "json" as const;
  readonly extension = "json";

  render(report: ScoredReport): string {
    return JSON.stringify(toWireReport(report), null, 2);
  }
}
