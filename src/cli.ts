#!/usr/bin/env node

/**
 * contract-sentry CLI
 *
 * Usage:
 *   contract-sentry analyze <target> [options]   Run security analysis
 *   contract-sentry rules                        List built-in heuristic checks
 *
 * Exit Codes:
 *   0 - No findings at or above the threshold
 *   1 - Findings at or above the threshold detected
 *   2 - Execution error
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { EXIT_ERROR, EXIT_PASS, runAnalyze } from "./commands/analyze.js";
import { runRules } from "./commands/rules.js";
import { TOOL_NAME, TOOL_VERSION, type AnalyzeSettings } from "./config.js";
import { isReportFormat, REPORT_FORMATS } from "./reporters/types.js";
import { parseSeverityThreshold } from "./utils/severity.js";
import { logger } from "./utils/logger.js";

// ============================================================================
// Types
// ============================================================================

export type CliCommand =
  | {
      name: "analyze";
      target: string;
      overrides: Partial<AnalyzeSettings>;
      slitherJson?: string;
      configPath?: string;
      ci: boolean;
      quiet: boolean;
    }
  | { name: "rules" }
  | { name: "version" }
  | { name: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ============================================================================
// Constants
// ============================================================================

export const HELP_TEXT = `
${TOOL_NAME} v${TOOL_VERSION} - Solidity security analysis

Usage:
  ${TOOL_NAME} <command> [options]

Commands:
  analyze <target>          Analyze a .sol file or a directory of contracts
  rules                     List the built-in heuristic checks
  version                   Show version
  help                      Show this help message

Options (analyze):
  --format, -f <type>       Report format: ${REPORT_FORMATS.join(", ")} (default: html)
  --output, -o <file>       Report path (default: ${TOOL_NAME}-report.<format>)
  --fail-on <level>         Exit 1 when findings at this severity or above exist:
                            critical, high, medium, low, informational, optimization, none
                            (default: high)
  --ci                      CI mode: minimal output, exit code reflects findings
  --quiet, -q               Suppress all console output except errors
  --exclude <detectors>     Slither detectors to skip (comma-separated, repeatable)
  --solc <version>          Pin the solc version Slither compiles with, e.g. 0.8.24
  --no-slither              Skip Slither, run only the heuristic checks
  --slither-json <file>     Use a saved Slither JSON output instead of running Slither
  --config <file>           Settings file (default: ./.contract-sentry.yml, then ~/.contract-sentry.yml)

Examples:
  ${TOOL_NAME} analyze ./contracts/Token.sol
  ${TOOL_NAME} analyze ./contracts --format sarif --output results.sarif
  ${TOOL_NAME} analyze ./contracts --fail-on medium --ci

Exit Codes:
  0 - No findings at or above the threshold
  1 - Findings at or above the threshold detected
  2 - Execution error
`;

// ============================================================================
// Argument Parser using node:util parseArgs
// ============================================================================

const CLI_OPTIONS = {
  format: { type: "string", short: "f" },
  output: { type: "string", short: "o" },
  "fail-on": { type: "string" },
  ci: { type: "boolean", default: false },
  quiet: { type: "boolean", short: "q", default: false },
  exclude: { type: "string", multiple: true },
  solc: { type: "string" },
  "no-slither": { type: "boolean", default: false },
  "slither-json": { type: "string" },
  config: { type: "string" },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", short: "v", default: false },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * @throws UsageError on unknown options, bad values, or a missing target
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);

  if (values.help) {
    return { name: "help" };
  }
  if (values.version) {
    return { name: "version" };
  }

  const command = positionals[0] ?? "help";

  if (command === "help" || command === "version" || command === "rules") {
    return { name: command };
  }
  if (command !== "analyze") {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const target = positionals[1];
  if (!target) {
    throw new UsageError(`Missing target. Usage: ${TOOL_NAME} analyze <target>`);
  }

  const overrides: Partial<AnalyzeSettings> = {};

  if (values.format !== undefined) {
    const format = values.format.toLowerCase();
    if (!isReportFormat(format)) {
      throw new UsageError(`Invalid format: ${values.format}. Use ${REPORT_FORMATS.join(", ")}.`);
    }
    overrides.format = format;
  }

  if (values["fail-on"] !== undefined) {
    const threshold = parseSeverityThreshold(values["fail-on"]);
    if (threshold === undefined) {
      throw new UsageError(
        `Invalid --fail-on value: ${values["fail-on"]}. ` +
          "Use critical, high, medium, low, informational, optimization, or none."
      );
    }
    overrides.failOn = threshold;
  }

  if (values.output !== undefined) overrides.output = values.output;
  if (values.solc !== undefined) overrides.solc = values.solc;
  if (values["no-slither"]) overrides.slither = false;

  if (values.exclude !== undefined) {
    overrides.exclude = values.exclude
      .flatMap((entry) => entry.split(","))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }

  return {
    name: "analyze",
    target,
    overrides,
    slitherJson: values["slither-json"],
    configPath: values.config,
    ci: values.ci ?? false,
    quiet: values.quiet ?? false,
  };
}

// ============================================================================
// Main Entry Point
// ============================================================================

export async function main(
  argv: string[],
  write: (text: string) => void = (text) => void process.stdout.write(`${text}\n`)
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.stderr.write(HELP_TEXT + "\n");
    return EXIT_ERROR;
  }

  switch (command.name) {
    case "help":
      write(HELP_TEXT);
      return EXIT_PASS;

    case "version":
      write(`${TOOL_NAME} v${TOOL_VERSION}`);
      return EXIT_PASS;

    case "rules":
      return runRules(write);

    case "analyze":
      // Keep CI and quiet runs to errors only, unless the level was set explicitly
      if ((command.ci || command.quiet) && process.env["LOG_LEVEL"] === undefined) {
        process.env["LOG_LEVEL"] = "error";
      }
      try {
        return await runAnalyze({ ...command, write });
      } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        return EXIT_ERROR;
      }
  }
}

function isEntryPoint(): boolean {
  const invokedPath = process.argv[1];
  if (!invokedPath) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(invokedPath)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  void main(process.argv.slice(2)).then((code) => process.exit(code));
}
