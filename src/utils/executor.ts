/**
 * Executor Utility
 *
 * Runs the external analyzer as a subprocess.
 * Uses execa for process management with timeout handling.
 */

import { execa, type Options as ExecaOptions } from "execa";
import { logger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

export interface ExecuteResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
  timedOut?: boolean;
}

export interface ExecuteOptions {
  /** Working directory for the command */
  cwd?: string;
  /** Timeout in milliseconds (default: 120000 = 2 minutes) */
  timeout?: number;
  /** Environment variables to add */
  env?: Record<string, string>;
}

export interface ToolAvailability {
  available: boolean;
  version?: string;
  path?: string;
}

const DEFAULT_TIMEOUT = 120_000;

// ============================================================================
// Execute Command
// ============================================================================

/**
 * Execute a command and capture its output.
 *
 * Does NOT throw on non-zero exit codes: slither exits non-zero whenever it
 * reports findings, so the caller decides what counts as failure.
 *
 * @example
 * ```ts
 * const result = await executeCommand("slither", ["--version"], { timeout: 10_000 });
 * if (result.exitCode !== 0) {
 *   logger.error("slither failed", { stderr: result.stderr });
 * }
 * ```
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: ExecuteOptions = {}
): Promise<ExecuteResult> {
  const timeoutMs = options.timeout ?? DEFAULT_TIMEOUT;

  const execaOptions: ExecaOptions = {
    cwd: options.cwd,
    timeout: timeoutMs,
    reject: false,
    env: {
      ...process.env,
      ...options.env,
    },
    encoding: "utf8",
    forceKillAfterDelay: 5000,
  };

  try {
    logger.debug(`Executing command: ${command} ${args.join(" ")}`, {
      cwd: options.cwd,
      timeout: timeoutMs,
    });

    const result = await execa(command, args, execaOptions);

    const executeResult: ExecuteResult = {
      stdout: String(result.stdout ?? ""),
      stderr: String(result.stderr ?? ""),
      exitCode: result.exitCode ?? (result.failed ? 1 : 0),
      timedOut: result.timedOut,
    };

    if (result.signal) {
      executeResult.signal = result.signal;
    }

    return executeResult;
  } catch (error) {
    // Spawn failures (ENOENT, EACCES) land here even with reject: false
    if (error instanceof Error) {
      return {
        stdout: "",
        stderr: error.message,
        exitCode: 1,
        timedOut: error.message.includes("timed out"),
      };
    }

    return {
      stdout: "",
      stderr: "Unknown error executing command",
      exitCode: 1,
    };
  }
}

// ============================================================================
// Check Tool Availability
// ============================================================================

function parseToolVersion(output: string): string | undefined {
  const match = output.match(/(\d+\.\d+\.\d+)/);
  return match?.[1];
}

/**
 * Check if a tool is available in the system PATH, and report its version.
 */
export async function checkToolAvailable(tool: string): Promise<ToolAvailability> {
  const whichCommand = process.platform === "win32" ? "where" : "which";
  const whichResult = await executeCommand(whichCommand, [tool], { timeout: 5000 });

  if (whichResult.exitCode !== 0) {
    return { available: false };
  }

  const toolPath = whichResult.stdout.trim().split("\n")[0];

  const versionResult = await executeCommand(tool, ["--version"], { timeout: 10_000 });
  const version = parseToolVersion(versionResult.stdout || versionResult.stderr);

  return {
    available: true,
    version,
    path: toolPath,
  };
}
