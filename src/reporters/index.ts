/**
 * Reporter Exports
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ScoredReport } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { HtmlReporter } from "./html.js";
import { JsonReporter } from "./json.js";
import { SarifReporter } from "./sarif.js";
import type { Reporter, ReportFormat } from "./types.js";

export { REPORT_FORMATS, isReportFormat, type Reporter, type ReportFormat } from "./types.js";
export { JsonReporter, toWireReport, toWireFinding, type WireReport, type WireFinding } from "./json.js";
export { SarifReporter, generateSarifReport, type SarifReport } from "./sarif.js";
export { HtmlReporter, renderHtmlReport, escapeHtml } from "./html.js";

export function getReporter(format: ReportFormat): Reporter {
  switch (format) {
    case "json":
      return new JsonReporter();
    case "sarif":
      return new SarifReporter();
    case "html":
      return new HtmlReporter();
  }
}

/**
 * Render a report and write it to disk, creating parent directories.
 */
export async function writeReport(
  reporter: Reporter,
  report: ScoredReport,
  outputPath: string
): Promise<void> {
  const content = reporter.render(report);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, content, "utf-8");
  logger.debug(`[reporter] Wrote ${reporter.name} report to ${outputPath}`);
}
