/**
 * SARIF Reporter
 *
 * Generates Static Analysis Results Interchange Format (SARIF) reports
 * for integration with GitHub Code Scanning and other SARIF-compatible tools.
 *
 * SARIF Specification: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
 */

import { Severity, type Finding, type Grade, type ScoredReport } from "../types/index.js";
import { TOOL_INFORMATION_URI, TOOL_NAME, TOOL_VERSION } from "../config.js";
import type { Reporter } from "./types.js";

// ============================================================================
// SARIF Types
// ============================================================================

interface SarifReport {
  $schema: string;
  version: string;
  runs: SarifRun[];
}

interface SarifRun {
  tool: SarifTool;
  results: SarifResult[];
  properties: {
    riskScore: number;
    grade: Grade;
  };
}

interface SarifTool {
  driver: SarifDriver;
}

interface SarifDriver {
  name: string;
  version: string;
  informationUri: string;
  rules: SarifRule[];
}

interface SarifRule {
  id: string;
  name: string;
  shortDescription: {
    text: string;
  };
  helpUri?: string;
  defaultConfiguration: {
    level: SarifLevel;
  };
  properties: {
    tags: string[];
    "security-severity": string;
  };
}

interface SarifResult {
  ruleId: string;
  ruleIndex: number;
  level: SarifLevel;
  message: {
    text: string;
  };
  locations: SarifLocation[];
  fingerprints: Record<string, string>;
  properties: {
    source: string;
    confidence: string;
    swcId?: string;
  };
}

interface SarifLocation {
  physicalLocation: {
    artifactLocation: {
      uri: string;
    };
    region: {
      startLine: number;
    };
  };
}

type SarifLevel = "none" | "note" | "warning" | "error";

export const SARIF_SCHEMA = "https://json.schemastore.org/sarif-2.1.0.json";

// ============================================================================
// SARIF Generation
// ============================================================================

/**
 * Generate a SARIF log with one run from a scored report.
 */
export function generateSarifReport(report: ScoredReport): SarifReport {
  const rules = extractRules(report.findings);
  const ruleIndex = new Map(rules.map((rule, index) => [rule.id, index]));
  const results = report.findings.map((finding) =>
    convertFindingToResult(finding, ruleIndex.get(finding.check) ?? 0)
  );

  return {
    $schema: SARIF_SCHEMA,
    version: "2.1.0",
    runs: [
      {
        tool: {
          driver: {
            name: TOOL_NAME,
            version: TOOL_VERSION,
            informationUri: TOOL_INFORMATION_URI,
            rules,
          },
        },
        results,
        properties: {
          riskScore: report.riskScore,
          grade: report.grade,
        },
      },
    ],
  };
}

/**
 * One rule per distinct check, described by the first finding that uses it.
 */
function extractRules(findings: readonly Finding[]): SarifRule[] {
  const rulesMap = new Map<string, SarifRule>();

  for (const finding of findings) {
    if (rulesMap.has(finding.check)) {
      continue;
    }

    const rule: SarifRule = {
      id: finding.check,
      name: finding.title,
      shortDescription: {
        text: finding.title,
      },
      defaultConfiguration: {
        level: severityToLevel(finding.severity),
      },
      properties: {
        tags: getTagsForFinding(finding),
        "security-severity": getSecuritySeverityScore(finding.severity),
      },
    };

    const helpUri = finding.references[0];
    if (helpUri) {
      rule.helpUri = helpUri;
    }

    rulesMap.set(finding.check, rule);
  }

  return Array.from(rulesMap.values());
}

function convertFindingToResult(finding: Finding, ruleIndex: number): SarifResult {
  const result: SarifResult = {
    ruleId: finding.check,
    ruleIndex,
    level: severityToLevel(finding.severity),
    message: {
      text: `${finding.description}\n\nRemediation: ${finding.remediation}`,
    },
    locations: [
      {
        physicalLocation: {
          artifactLocation: {
            uri: finding.file,
          },
          region: {
            startLine: finding.lines[0] ?? 1,
          },
        },
      },
    ],
    fingerprints: {
      primaryLocationLineHash: createFingerprint(finding),
    },
    properties: {
      source: finding.source,
      confidence: finding.confidence,
    },
  };

  if (finding.swcId) {
    result.properties.swcId = finding.swcId;
  }

  return result;
}

/**
 * Convert severity to SARIF level.
 */
export function severityToLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case Severity.CRITICAL:
    case Severity.HIGH:
      return "error";
    case Severity.MEDIUM:
      return "warning";
    default:
      return "note";
  }
}

/**
 * Get security severity score (0.0-10.0 scale for GitHub).
 */
function getSecuritySeverityScore(severity: Severity): string {
  switch (severity) {
    case Severity.CRITICAL:
      return "9.0";
    case Severity.HIGH:
      return "7.0";
    case Severity.MEDIUM:
      return "5.0";
    case Severity.LOW:
      return "3.0";
    default:
      return "1.0";
  }
}

function getTagsForFinding(finding: Finding): string[] {
  const tags = ["security", "smart-contract", "solidity", finding.source];
  if (finding.swcId) {
    tags.push(finding.swcId);
  }
  return tags;
}

/**
 * 32-bit rolling hash of the finding's identity fields, hex encoded.
 */
function createFingerprint(finding: Finding): string {
  const str = [finding.check, finding.file, finding.lines.join("-")].join("|");

  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = (hash << 5) - hash + str.charCodeAt(i);
    hash = hash & hash;
  }

  return Math.abs(hash).toString(16).padStart(8, "0");
}

export class SarifReporter implements Reporter {
  readonly name = "sarif" as const;
  readonly extension = "sarif";

  render(report: ScoredReport): string {
    return JSON.stringify(generateSarifReport(report), null, 2);
  }
}

export type { SarifReport, SarifRun, SarifResult, SarifRule };
