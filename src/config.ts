/**
 * Configuration
 *
 * Tool identity plus the optional `.contract-sentry.yml` settings file.
 * Precedence: command-line flags, then the settings file, then defaults.
 */

import { access, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { REPORT_FORMATS, type ReportFormat } from "./reporters/types.js";
import { BUILT_IN_DETECTOR_ORDER } from "./detectors/DetectorRegistry.js";
import type { DetectorId } from "./detectors/IDetector.js";
import { Severity } from "./types/index.js";
import { DEFAULT_SLITHER_TIMEOUT } from "./analyzers/slither.js";
import { parseSeverityThreshold, type SeverityThreshold } from "./utils/severity.js";
import { logger } from "./utils/logger.js";

// ============================================================================
// Tool Identity
// ============================================================================

export const TOOL_NAME = "contract-sentry";
export const TOOL_VERSION = "1.0.0";
export const TOOL_INFORMATION_URI = "https://swcregistry.io";

export const CONFIG_FILE_NAME = ".contract-sentry.yml";

// ============================================================================
// Schema
// ============================================================================

const ThresholdSchema = z.string().transform((value, ctx): SeverityThreshold => {
  const threshold = parseSeverityThreshold(value);
  if (threshold === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid severity threshold "${value}"`,
    });
    return z.NEVER;
  }
  return threshold;
});

const DetectorIdSchema = z.string().refine(
  (value): value is DetectorId => BUILT_IN_DETECTOR_ORDER.some((id) => id === value),
  { message: `Expected one of: ${BUILT_IN_DETECTOR_ORDER.join(", ")}` }
);

export const FileConfigSchema = z
  .object({
    format: z.enum(REPORT_FORMATS).optional(),
    output: z.string().min(1).optional(),
    failOn: ThresholdSchema.optional(),
    exclude: z.array(z.string()).optional(),
    solc: z.string().min(1).optional(),
    slither: z.boolean().optional(),
    slitherTimeout: z.number().int().positive().optional(),
    disabledDetectors: z.array(DetectorIdSchema).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface LoadedConfig {
  config: FileConfig;
  /** Path the settings came from, if any file was found */
  path?: string;
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit settings file; it must exist */
  configPath?: string;
  cwd?: string;
  home?: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse and validate the text of a settings file. An empty file means no
 * settings.
 *
 * @throws ConfigError on YAML syntax errors or schema violations
 */
export function parseConfig(text: string, configPath: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`, configPath);
  }

  const parsed = FileConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${configPath}: ${issues}`, configPath);
  }

  return parsed.data;
}

/**
 * Find and load the settings file: the explicit path if given, else
 * `.contract-sentry.yml` in the working directory, else in the home directory.
 * No file at the default locations means an empty configuration.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const candidates = options.configPath
    ? [resolve(options.configPath)]
    : [
        join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME),
        join(options.home ?? homedir(), CONFIG_FILE_NAME),
      ];

  for (const candidate of candidates) {
    if (!(await exists(candidate))) {
      continue;
    }

    let text: string;
    try {
      text = await readFile(candidate, "utf-8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read ${candidate}: ${message}`, candidate);
    }

    logger.debug(`[config] Loaded ${candidate}`);
    return { config: parseConfig(text, candidate), path: candidate };
  }

  if (options.configPath) {
    throw new ConfigError(`Config file not found: ${options.configPath}`, options.configPath);
  }

  return { config: {} };
}

// ============================================================================
// Resolution
// ============================================================================

export interface AnalyzeSettings {
  format: ReportFormat;
  output: string;
  failOn: SeverityThreshold;
  exclude: string[];
  solc?: string;
  slither: boolean;
  slitherTimeout: number;
  disabledDetectors: DetectorId[];
}

export const DEFAULT_FORMAT: ReportFormat = "html";
export const DEFAULT_FAIL_ON: SeverityThreshold = Severity.HIGH;

export function defaultOutputPath(format: ReportFormat): string {
  return `${TOOL_NAME}-report.${format}`;
}

/**
 * Merge command-line overrides over file settings over defaults.
 */
export function resolveSettings(
  overrides: Partial<AnalyzeSettings>,
  file: FileConfig = {}
): AnalyzeSettings {
  const format = overrides.format ?? file.format ?? DEFAULT_FORMAT;

  return {
    format,
    output: overrides.output ?? file.output ?? defaultOutputPath(format),
    failOn: overrides.failOn ?? file.failOn ?? DEFAULT_FAIL_ON,
    exclude: overrides.exclude ?? file.exclude ?? [],
    solc: overrides.solc ?? file.solc,
    slither: overrides.slither ?? file.slither ?? true,
    slitherTimeout: overrides.slitherTimeout ?? file.slitherTimeout ?? DEFAULT_SLITHER_TIMEOUT,
    disabledDetectors: overrides.disabledDetectors ?? file.disabledDetectors ?? [],
  };
}
