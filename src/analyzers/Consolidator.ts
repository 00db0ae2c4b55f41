/**
 * Consolidator
 *
 * Merges externally supplied findings with the heuristic detectors' output
 * into one Report:
 * - target validation (fatal)
 * - sequential detector runs with per-detector failure isolation
 * - first-occurrence-wins deduplication
 * - severity/file ordering and summary
 *
 * Design Patterns:
 * - Facade Pattern: one call runs the whole pipeline
 * - Observer Pattern: progress callbacks (optional)
 */

import type { Finding, Report } from "../types/index.js";
import type { DetectorId, IDetector } from "../detectors/IDetector.js";
import { getDetectorRegistry } from "../detectors/DetectorRegistry.js";
import { type Result, tryCatch } from "../types/result.js";
import { validateTarget } from "../utils/pathValidation.js";
import { countBySeverity, sortFindings } from "../utils/severity.js";
import { TargetError } from "../errors.js";
import { logger } from "../utils/logger.js";

// ============================================================================
// Types
// ============================================================================

export interface ConsolidatorConfig {
  /** Detectors in run order (default: the registry's built-ins) */
  detectors?: IDetector[];
  /** Detector ids to skip */
  disabledDetectors?: DetectorId[];
  /** Clock used for `generatedAt` */
  now?: () => Date;
}

export interface DetectorOutcome {
  detectorId: DetectorId;
  result: Result<Finding[], Error>;
  executionTime: number;
}

export interface ConsolidationResult {
  report: Report;
  outcomes: DetectorOutcome[];
  warnings: string[];
}

export type DetectorProgress = {
  detectorId: DetectorId;
  status: "started" | "completed" | "failed";
  findingCount?: number;
  error?: string;
};

export type ProgressCallback = (progress: DetectorProgress) => void;

// ============================================================================
// Consolidator Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const consolidator = new Consolidator();
 * const { report, warnings } = await consolidator.consolidate("./contracts", slitherFindings);
 * console.log(`${report.summary.total} findings`);
 * ```
 */
export class Consolidator {
  private config: ConsolidatorConfig;
  private progressCallback?: ProgressCallback;

  constructor(config: ConsolidatorConfig = {}) {
    this.config = { ...config };
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  onProgress(callback: ProgressCallback): this {
    this.progressCallback = callback;
    return this;
  }

  // -------------------------------------------------------------------------
  // Main Analysis
  // -------------------------------------------------------------------------

  /**
   * Run every enabled detector against the target and merge the results with
   * the external findings.
   *
   * @param target - A `.sol` file or a directory
   * @param externalFindings - Pre-parsed findings from the external analyzer
   * @throws TargetError when the target is missing, of the wrong kind, or unreadable
   */
  async consolidate(
    target: string,
    externalFindings: readonly Finding[] = []
  ): Promise<ConsolidationResult> {
    const validated = await validateTarget(target);
    if (!validated.ok) {
      throw new TargetError(validated.error);
    }

    const detectors = this.selectDetectors();
    const warnings: string[] = [];
    const outcomes: DetectorOutcome[] = [];

    logger.info(
      `[Consolidator] Running ${detectors.length} detector(s) on ${target}: ` +
        detectors.map((d) => d.id).join(", ")
    );

    for (const detector of detectors) {
      outcomes.push(await this.runDetector(detector, target, warnings));
    }

    const heuristicFindings = outcomes.flatMap((outcome) =>
      outcome.result.ok ? outcome.result.value : []
    );
    const merged = [...externalFindings, ...heuristicFindings];
    const unique = deduplicateFindings(merged);

    if (unique.length < merged.length) {
      logger.debug(`[Consolidator] Deduplicated ${merged.length - unique.length} finding(s)`);
    }

    const report = buildReport(target, unique, (this.config.now ?? (() => new Date()))());

    logger.info(
      `[Consolidator] ${report.summary.total} finding(s) after consolidation ` +
        `(${externalFindings.length} external, ${heuristicFindings.length} heuristic)`
    );

    return { report, outcomes, warnings };
  }

  // -------------------------------------------------------------------------
  // Detector Execution
  // -------------------------------------------------------------------------

  private selectDetectors(): IDetector[] {
    const detectors = this.config.detectors ?? getDetectorRegistry().getAll();
    const disabled = new Set(this.config.disabledDetectors ?? []);
    return detectors.filter((detector) => !disabled.has(detector.id));
  }

  /**
   * A detector failure is contained here: it becomes an error outcome and a
   * warning, and the pipeline moves on.
   */
  private async runDetector(
    detector: IDetector,
    target: string,
    warnings: string[]
  ): Promise<DetectorOutcome> {
    const startTime = Date.now();
    this.notifyProgress({ detectorId: detector.id, status: "started" });

    const result = await tryCatch(() => detector.run(target));
    const executionTime = Date.now() - startTime;

    if (result.ok) {
      this.notifyProgress({
        detectorId: detector.id,
        status: "completed",
        findingCount: result.value.length,
      });
    } else {
      const message = `Detector '${detector.id}' failed: ${result.error.message}`;
      warnings.push(message);
      logger.warn(`[Consolidator] ${message}`);
      this.notifyProgress({ detectorId: detector.id, status: "failed", error: result.error.message });
    }

    return { detectorId: detector.id, result, executionTime };
  }

  private notifyProgress(progress: DetectorProgress): void {
    if (!this.progressCallback) {
      return;
    }
    try {
      this.progressCallback(progress);
    } catch (error) {
      logger.warn(`[Consolidator] Progress callback error: ${String(error)}`);
    }
  }
}

// ============================================================================
// Deduplication
// ============================================================================

/**
 * Dedup key: (SWC reference, file, first line). An empty SWC reference still
 * forms a key, so two unrelated findings without a reference on the same
 * file and first line collapse into one.
 */
export function dedupKey(finding: Finding): string {
  const first = finding.lines[0];
  return first === undefined
    ? `${finding.swcId}|${finding.file}`
    : `${finding.swcId}|${finding.file}|${first}`;
}

/**
 * Keep the first finding seen for each key, in input order, whatever its
 * source or text.
 */
export function deduplicateFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];

  for (const finding of findings) {
    const key = dedupKey(finding);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(finding);
  }

  return unique;
}

// ============================================================================
// Report Assembly
// ============================================================================

/**
 * "2024-05-01T12:30:45.123Z" -> "2024-05-01T12:30:45Z"
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Sort, summarize, and freeze. The input is expected to be deduplicated.
 */
export function buildReport(target: string, findings: readonly Finding[], generatedAt: Date): Report {
  const sorted = sortFindings(findings);

  return Object.freeze({
    target,
    generatedAt: formatTimestamp(generatedAt),
    summary: Object.freeze(countBySeverity(sorted)),
    findings: Object.freeze(sorted),
  });
}

export function createConsolidator(config?: ConsolidatorConfig): Consolidator {
  return new Consolidator(config);
}
