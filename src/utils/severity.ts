/**
 * Severity utilities
 *
 * Centralized severity ranking, ordering and counting used by the detectors,
 * the consolidator, the scorer and the CLI threshold check.
 */

import { Severity, type Finding, type SeverityCounts } from "../types/index.js";

// ============================================================================
// Severity Order (for sorting)
// ============================================================================

/**
 * Numeric ordering for severity levels (lower = more severe)
 */
export const SEVERITY_ORDER: Readonly<Record<Severity, number>> = Object.freeze({
  [Severity.CRITICAL]: 0,
  [Severity.HIGH]: 1,
  [Severity.MEDIUM]: 2,
  [Severity.LOW]: 3,
  [Severity.INFORMATIONAL]: 4,
  [Severity.OPTIMIZATION]: 5,
});

/** Rank given to anything outside the enumeration */
export const UNKNOWN_SEVERITY_RANK = 6;

const SEVERITY_VALUES: ReadonlySet<string> = new Set(Object.values(Severity));

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITY_VALUES.has(value);
}

/**
 * Rank a severity. Unrecognized values (including a missing severity on an
 * upstream finding) rank last so they never satisfy a threshold.
 */
export function severityRank(severity: unknown): number {
  return isSeverity(severity) ? SEVERITY_ORDER[severity] : UNKNOWN_SEVERITY_RANK;
}

/**
 * Compare two severities for sorting (most severe first)
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

/**
 * Report ordering: severity rank, then file path ascending.
 */
export function compareFindings(a: Finding, b: Finding): number {
  const bySeverity = compareSeverity(a.severity, b.severity);
  if (bySeverity !== 0) {
    return bySeverity;
  }
  if (a.file < b.file) return -1;
  if (a.file > b.file) return 1;
  return 0;
}

/**
 * Sort findings into report order. The sort is stable, so findings with the
 * same severity and file keep their incoming order.
 */
export function sortFindings<T extends Finding>(findings: readonly T[]): T[] {
  return [...findings].sort(compareFindings);
}

// ============================================================================
// Thresholds
// ============================================================================

export type SeverityThreshold = Severity | "none";

/**
 * Parse a user-supplied threshold such as "high" or "NONE".
 *
 * @returns The threshold, or undefined when the text names no severity
 */
export function parseSeverityThreshold(text: string): SeverityThreshold | undefined {
  const lower = text.trim().toLowerCase();
  if (lower === "none") {
    return "none";
  }
  return Object.values(Severity).find((severity) => severity.toLowerCase() === lower);
}

/**
 * True when `severity` is at or above `threshold` (rank <= threshold rank).
 */
export function isAtOrAbove(severity: unknown, threshold: Severity): boolean {
  return severityRank(severity) <= severityRank(threshold);
}

export function countAtOrAbove(findings: readonly Finding[], threshold: SeverityThreshold): number {
  if (threshold === "none") {
    return 0;
  }
  return findings.filter((f) => isAtOrAbove(f.severity, threshold)).length;
}

// ============================================================================
// Severity Emojis
// ============================================================================

export const SEVERITY_EMOJI: Readonly<Record<Severity, string>> = Object.freeze({
  [Severity.CRITICAL]: "🔴",
  [Severity.HIGH]: "🟠",
  [Severity.MEDIUM]: "🟡",
  [Severity.LOW]: "🟢",
  [Severity.INFORMATIONAL]: "🔵",
  [Severity.OPTIMIZATION]: "⚪",
});

export function getSeverityEmoji(severity: Severity): string {
  return SEVERITY_EMOJI[severity];
}

// ============================================================================
// Severity Counts
// ============================================================================

export function emptyCounts(): SeverityCounts {
  return {
    total: 0,
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
    informational: 0,
    optimization: 0,
  };
}

/**
 * Count findings by severity level in a single pass.
 *
 * Only findings that land in a bucket are added to `total`, so the total is
 * always the sum of the six per-severity counts.
 */
export function countBySeverity(items: readonly { severity: unknown }[]): SeverityCounts {
  const counts = emptyCounts();

  for (const item of items) {
    switch (item.severity) {
      case Severity.CRITICAL:
        counts.critical++;
        break;
      case Severity.HIGH:
        counts.high++;
        break;
      case Severity.MEDIUM:
        counts.medium++;
        break;
      case Severity.LOW:
        counts.low++;
        break;
      case Severity.INFORMATIONAL:
        counts.informational++;
        break;
      case Severity.OPTIMIZATION:
        counts.optimization++;
        break;
      default:
        continue;
    }
    counts.total++;
  }

  return counts;
}
