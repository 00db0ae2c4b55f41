/**
 * Reporter contract
 *
 * Each output format renders a scored report to text. Adding a format means
 * implementing this interface and registering it in `getReporter`.
 */

import type { ScoredReport } from "../types/index.js";

export const REPORT_FORMATS = ["json", "sarif", "html"] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface Reporter {
  readonly name: ReportFormat;
  /** File extension without the dot */
  readonly extension: string;
  render(report: ScoredReport): string;
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}
