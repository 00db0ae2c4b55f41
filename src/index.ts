/**
 * contract-sentry
 *
 * Heuristic Solidity vulnerability detection, consolidation with Slither
 * findings, risk scoring, and JSON/SARIF/HTML reports.
 *
 * @example
 * ```ts
 * import { createConsolidator, scoreReport, getReporter, writeReport } from "contract-sentry";
 *
 * const { report } = await createConsolidator().consolidate("./contracts");
 * const scored = scoreReport(report);
 * await writeReport(getReporter("sarif"), scored, "results.sarif");
 * ```
 */

export * from "./types/index.js";
export { type Result, type Ok, type Err, ok, err, tryCatch } from "./types/result.js";
export { TargetError, ConfigError } from "./errors.js";

export {
  SEVERITY_ORDER,
  UNKNOWN_SEVERITY_RANK,
  severityRank,
  compareFindings,
  sortFindings,
  countBySeverity,
  countAtOrAbove,
  isAtOrAbove,
  parseSeverityThreshold,
  type SeverityThreshold,
} from "./utils/severity.js";

export {
  BaseDetector,
  IdSequence,
  type DetectorId,
  type IDetector,
} from "./detectors/IDetector.js";
export { ReentrancyDetector, REENTRANCY_CHECK } from "./detectors/reentrancy.js";
export { AccessControlDetector, ACCESS_CONTROL_CHECK } from "./detectors/accessControl.js";
export {
  IntegerOverflowDetector,
  INTEGER_OVERFLOW_CHECK,
  UNCHECKED_ARITHMETIC_CHECK,
} from "./detectors/integerOverflow.js";
export { DetectorRegistry, getDetectorRegistry } from "./detectors/DetectorRegistry.js";

export {
  Consolidator,
  createConsolidator,
  deduplicateFindings,
  buildReport,
  type ConsolidatorConfig,
  type ConsolidationResult,
  type DetectorOutcome,
  type DetectorProgress,
} from "./analyzers/Consolidator.js";
export {
  runSlither,
  parseSlitherOutput,
  loadSlitherOutput,
  checkSlitherAvailable,
  type SlitherRunOptions,
} from "./analyzers/slither.js";

export { calculateScore, calculateGrade, getVerdict, scoreReport } from "./scoring/scorer.js";

export {
  getReporter,
  writeReport,
  JsonReporter,
  SarifReporter,
  HtmlReporter,
  REPORT_FORMATS,
  type Reporter,
  type ReportFormat,
} from "./reporters/index.js";

export {
  loadConfig,
  resolveSettings,
  TOOL_NAME,
  TOOL_VERSION,
  type AnalyzeSettings,
  type FileConfig,
} from "./config.js";
