/**
 * analyze command
 *
 * Target validation, external findings (Slither run or saved output),
 * consolidation, scoring, report writing, and the threshold exit code.
 *
 * Exit Codes:
 *   0 - No findings at or above the threshold
 *   1 - Findings at or above the threshold
 *   2 - Execution error
 */

import type { Finding, ScoredReport } from "../types/index.js";
import { createConsolidator } from "../analyzers/Consolidator.js";
import { checkSlitherAvailable, loadSlitherOutput, runSlither } from "../analyzers/slither.js";
import { scoreReport } from "../scoring/scorer.js";
import { getReporter, writeReport } from "../reporters/index.js";
import { loadConfig, resolveSettings, type AnalyzeSettings } from "../config.js";
import { validateTarget } from "../utils/pathValidation.js";
import { countAtOrAbove, type SeverityThreshold } from "../utils/severity.js";
import { type Result, ok, err } from "../types/result.js";
import { formatDuration, logger } from "../utils/logger.js";
import { ConfigError } from "../errors.js";

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeCommandOptions {
  target: string;
  /** Flag values; anything unset falls back to the config file, then defaults */
  overrides: Partial<AnalyzeSettings>;
  /** Saved Slither JSON to use instead of running Slither */
  slitherJson?: string;
  configPath?: string;
  ci: boolean;
  quiet: boolean;
  /** Console sink (default: stdout) */
  write?: (text: string) => void;
  now?: () => Date;
}

export const EXIT_PASS = 0;
export const EXIT_THRESHOLD = 1;
export const EXIT_ERROR = 2;

const RULE = "─".repeat(60);

// ============================================================================
// External Findings
// ============================================================================

async function collectExternalFindings(
  target: string,
  settings: AnalyzeSettings,
  slitherJson: string | undefined,
  say: (text: string) => void
): Promise<Result<Finding[], Error>> {
  if (slitherJson) {
    say(`   Loading Slither output from ${slitherJson}...`);
    return loadSlitherOutput(slitherJson);
  }

  if (!settings.slither) {
    logger.debug("[analyze] Slither disabled, running heuristic checks only");
    return ok([]);
  }

  say("   Checking environment...");
  const tool = await checkSlitherAvailable();
  if (!tool.available) {
    return err(
      new Error(
        "Slither not found on PATH. Install it with: pip3 install slither-analyzer " +
          "(or pass --no-slither to run heuristic checks only)"
      )
    );
  }
  say(`   ✅ Slither ${tool.version ?? "(unknown version)"}`);

  say("   Running Slither analysis...");
  const start = Date.now();
  const result = await runSlither(target, {
    exclude: settings.exclude,
    solc: settings.solc,
    timeout: settings.slitherTimeout,
  });
  if (result.ok) {
    say(`   ✅ Slither completed in ${formatDuration(Date.now() - start)}`);
  }
  return result;
}

// ============================================================================
// Console Output
// ============================================================================

export function formatSummary(report: ScoredReport, outputPath: string): string {
  const { summary } = report;
  return [
    "",
    RULE,
    `  Grade: ${report.grade}   Score: ${report.riskScore}/100`,
    `  ${report.verdict}`,
    `  Findings: ${summary.total} total (${summary.critical} critical, ${summary.high} high, ` +
      `${summary.medium} medium, ${summary.low} low)`,
    `  Report: ${outputPath}`,
    RULE,
    "",
  ].join("\n");
}

export function formatThresholdFailure(count: number, threshold: SeverityThreshold): string {
  return `FAIL: ${count} finding(s) at ${threshold.toLowerCase()} severity or above`;
}

// ============================================================================
// Command
// ============================================================================

export async function runAnalyze(options: AnalyzeCommandOptions): Promise<number> {
  const write = options.write ?? ((text: string) => void process.stdout.write(`${text}\n`));
  const verbose = !options.ci && !options.quiet;
  const say = (text: string): void => {
    if (verbose) write(text);
  };

  let settings: AnalyzeSettings;
  try {
    const loaded = await loadConfig({ configPath: options.configPath });
    settings = resolveSettings(options.overrides, loaded.config);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_ERROR;
    }
    throw error;
  }

  const target = await validateTarget(options.target);
  if (!target.ok) {
    logger.error(target.error.message);
    return EXIT_ERROR;
  }

  say(`🔍 Analyzing: ${options.target}`);

  const external = await collectExternalFindings(options.target, settings, options.slitherJson, say);
  if (!external.ok) {
    logger.error(`External analyzer failed: ${external.error.message}`);
    return EXIT_ERROR;
  }

  say("   Running heuristic security checks...");
  const consolidator = createConsolidator({
    disabledDetectors: settings.disabledDetectors,
    now: options.now,
  }).onProgress((progress) => {
    logger.debug(`[analyze] ${progress.detectorId}: ${progress.status}`, {
      findingCount: progress.findingCount,
      error: progress.error,
    });
  });

  const { report, warnings } = await consolidator.consolidate(options.target, external.value);
  // Written in every mode, unlike the narration above
  for (const warning of warnings) {
    write(`   ⚠️  ${warning}`);
  }

  const scored = scoreReport(report);
  await writeReport(getReporter(settings.format), scored, settings.output);

  say(formatSummary(scored, settings.output));

  const failing = countAtOrAbove(scored.findings, settings.failOn);
  if (failing > 0) {
    if (options.ci) {
      write(formatThresholdFailure(failing, settings.failOn));
    }
    return EXIT_THRESHOLD;
  }

  return EXIT_PASS;
}
