/**
 * Slither Analyzer
 *
 * Wrapper for Slither, the Solidity static analyzer by Trail of Bits.
 * https://github.com/crytic/slither
 *
 * Runs Slither with JSON output and converts its detector results into
 * findings with remediation guidance and SWC cross-references.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { executeCommand, checkToolAvailable, type ToolAvailability } from "../utils/executor.js";
import { Severity, type Finding } from "../types/index.js";
import { type Result, ok, err, toError, tryCatch, tryCatchSync } from "../types/result.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ tool: "slither" });

// ============================================================================
// Output Schema
// ============================================================================

const SourceMappingSchema = z.object({
  filename_absolute: z.string().default(""),
  lines: z.array(z.number().int()).default([]),
});

const SlitherElementSchema = z.object({
  type: z.string().optional(),
  name: z.string().optional(),
  source_mapping: SourceMappingSchema.optional(),
});

const SlitherDetectorSchema = z.object({
  check: z.string(),
  impact: z.string().default(""),
  confidence: z.string().default(""),
  description: z.string().default(""),
  elements: z.array(SlitherElementSchema).default([]),
});

/**
 * Shape of `slither --json` output, restricted to the fields we read.
 * Unknown fields are ignored.
 */
export const SlitherOutputSchema = z.object({
  success: z.boolean(),
  error: z.string().nullable().optional(),
  results: z
    .object({
      detectors: z.array(SlitherDetectorSchema).default([]),
    })
    .default({}),
});

export type SlitherOutput = z.infer<typeof SlitherOutputSchema>;
type SlitherDetector = z.infer<typeof SlitherDetectorSchema>;

export interface SlitherRunOptions {
  /** Slither detectors to skip */
  exclude?: string[];
  /** Pinned solc version, e.g. "0.8.24" */
  solc?: string;
  /** Timeout in milliseconds (default: 5 minutes) */
  timeout?: number;
}

export const DEFAULT_SLITHER_TIMEOUT = 5 * 60_000;

// ============================================================================
// Detector Guidance
// ============================================================================

const GENERIC_REMEDIATION =
  "Review the Slither documentation for this detector and apply the recommended fix.";

export const SLITHER_REMEDIATIONS: Readonly<Record<string, string>> = Object.freeze({
  "reentrancy-eth":
    "Apply the checks-effects-interactions pattern. Move all state changes before external calls. Consider using ReentrancyGuard from OpenZeppelin.",
  "reentrancy-no-eth":
    "Apply the checks-effects-interactions pattern. Move all state changes before external calls.",
  "reentrancy-benign":
    "Although impact is low, apply checks-effects-interactions pattern as defence in depth.",
  "reentrancy-unlimited-gas":
    "Apply the checks-effects-interactions pattern and use ReentrancyGuard.",
  "unprotected-upgrade":
    "Add access control to upgrade functions. Use OpenZeppelin's OwnableUpgradeable.",
  "controlled-delegatecall":
    "Avoid passing user-controlled data to delegatecall. Whitelist allowed targets.",
  "arbitrary-send-eth":
    "Restrict which addresses can receive ETH. Use a withdrawal pattern with explicit recipient validation.",
  suicidal: "Remove selfdestruct or gate it behind a multi-sig with a timelock.",
  backdoor: "Remove any functions that allow unauthorized state manipulation.",
  "tx-origin":
    "Replace tx.origin with msg.sender for authentication. tx.origin is vulnerable to phishing attacks.",
  "weak-prng":
    "Do not use block.timestamp or blockhash for randomness. Use Chainlink VRF or commit-reveal schemes.",
  timestamp:
    "Avoid using block.timestamp for critical logic. Miners can manipulate it by ~15 seconds.",
  "unchecked-transfer":
    "Always check the return value of ERC-20 transfer() and transferFrom(). Use SafeERC20 from OpenZeppelin.",
  "uninitialized-local":
    "Initialize all local variables before use. Uninitialized storage pointers in older Solidity versions can corrupt state.",
  "shadowing-state":
    "Rename the local variable to avoid shadowing the state variable. This causes silent bugs.",
  "abiencoderv2-array":
    "Upgrade to Solidity 0.8.x where ABIEncoderV2 is stable, or avoid nested dynamic arrays.",
  "msg-value-loop":
    "Do not use msg.value inside a loop. It does not change per iteration and causes logic errors.",
  "divide-before-multiply":
    "Perform multiplications before divisions to avoid precision loss due to integer truncation.",
  tautology:
    "Remove the tautological condition. It always evaluates to true/false and may hide a logic error.",
  "boolean-equality":
    "Compare bool directly (if flag) instead of (if flag == true). The latter is redundant and reduces readability.",
});

export const SLITHER_SWC_REFS: Readonly<Record<string, string>> = Object.freeze({
  "reentrancy-eth": "SWC-107",
  "reentrancy-no-eth": "SWC-107",
  "reentrancy-benign": "SWC-107",
  "tx-origin": "SWC-115",
  "weak-prng": "SWC-120",
  timestamp: "SWC-116",
  "unprotected-upgrade": "SWC-112",
  "arbitrary-send-eth": "SWC-105",
  suicidal: "SWC-106",
  "unchecked-transfer": "SWC-104",
  "divide-before-multiply": "SWC-101",
});

function lookup(table: Readonly<Record<string, string>>, check: string): string | undefined {
  return Object.hasOwn(table, check) ? table[check] : undefined;
}

// ============================================================================
// Mapping
// ============================================================================

/**
 * Case-insensitive impact -> severity. Anything unrecognized is Informational.
 */
export function mapImpact(impact: string): Severity {
  const lower = impact.toLowerCase();
  return (
    Object.values(Severity).find((severity) => severity.toLowerCase() === lower) ??
    Severity.INFORMATIONAL
  );
}

/**
 * "reentrancy-eth" -> "Reentrancy Eth"
 */
export function formatTitle(check: string): string {
  return check
    .split(/[-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function getRemediation(check: string): string {
  return lookup(SLITHER_REMEDIATIONS, check) ?? GENERIC_REMEDIATION;
}

export function getReferences(check: string): string[] {
  const refs = [`https://github.com/crytic/slither/wiki/Detector-Documentation#${check}`];
  const swc = lookup(SLITHER_SWC_REFS, check);
  if (swc) {
    refs.push(`https://swcregistry.io/docs/${swc}`);
  }
  return refs;
}

function toFinding(detector: SlitherDetector, index: number): Finding {
  const mapping = detector.elements[0]?.source_mapping;

  return {
    id: `SLITHER-${String(index + 1).padStart(3, "0")}`,
    source: "slither",
    check: detector.check,
    title: formatTitle(detector.check),
    description: detector.description.trim(),
    severity: mapImpact(detector.impact),
    confidence: detector.confidence,
    file: mapping?.filename_absolute ?? "",
    lines: mapping?.lines ?? [],
    remediation: getRemediation(detector.check),
    swcId: lookup(SLITHER_SWC_REFS, detector.check) ?? "",
    references: getReferences(detector.check),
  };
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse the text of a `slither --json` output file into findings.
 *
 * Fails on invalid JSON, on output that does not match the expected shape,
 * and on output where Slither itself reports `success: false`.
 */
export function parseSlitherOutput(text: string): Result<Finding[], Error> {
  const json = tryCatchSync((): unknown => JSON.parse(text));
  if (!json.ok) {
    return err(new Error(`Parsing slither JSON: ${json.error.message}`));
  }

  const parsed = SlitherOutputSchema.safeParse(json.value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err(new Error(`Unexpected slither output: ${issues}`));
  }

  const output = parsed.data;
  if (!output.success) {
    return err(new Error(`Slither analysis failed: ${output.error ?? "unknown error"}`));
  }

  const findings = output.results.detectors.map(toFinding);
  log.debug(`Parsed ${findings.length} detector result(s)`);
  return ok(findings);
}

/**
 * Read and parse an existing Slither JSON output file.
 */
export async function loadSlitherOutput(path: string): Promise<Result<Finding[], Error>> {
  const text = await tryCatch(() => readFile(path, "utf-8"));
  if (!text.ok) {
    return err(new Error(`Reading slither output ${path}: ${text.error.message}`));
  }
  return parseSlitherOutput(text.value);
}

// ============================================================================
// Running
// ============================================================================

export function buildSlitherArgs(
  target: string,
  outputPath: string,
  options: SlitherRunOptions = {}
): string[] {
  const args = [target, "--json", outputPath, "--json-types", "detectors", "--no-fail-pedantic"];

  for (const detector of options.exclude ?? []) {
    args.push("--exclude", detector);
  }

  if (options.solc) {
    args.push("--solc-remaps", `solc=${options.solc}`);
  }

  return args;
}

/**
 * Check if Slither is available on the system
 */
export async function checkSlitherAvailable(): Promise<ToolAvailability> {
  return checkToolAvailable("slither");
}

/**
 * Run Slither against a target and parse its findings.
 *
 * Slither exits non-zero whenever it reports findings, so the exit code is
 * not an error signal: the run only fails when no JSON output was written or
 * the output cannot be parsed.
 *
 * @example
 * ```ts
 * const result = await runSlither("./contracts", { exclude: ["naming-convention"] });
 * if (result.ok) {
 *   console.log(`Slither reported ${result.value.length} issues`);
 * }
 * ```
 */
export async function runSlither(
  target: string,
  options: SlitherRunOptions = {}
): Promise<Result<Finding[], Error>> {
  const workDir = await mkdtemp(join(tmpdir(), "contract-sentry-slither-"));
  const outputPath = join(workDir, "slither.json");
  const args = buildSlitherArgs(target, outputPath, options);

  try {
    log.info(`Running: slither ${args.join(" ")}`);

    const result = await executeCommand("slither", args, {
      timeout: options.timeout ?? DEFAULT_SLITHER_TIMEOUT,
    });

    const text = await tryCatch(() => readFile(outputPath, "utf-8"));
    if (!text.ok) {
      const reason = result.timedOut ? "slither timed out" : "slither did not produce output";
      return err(new Error(`${reason}\nstderr: ${result.stderr}`));
    }

    log.debug(`Exit code ${result.exitCode}`);
    return parseSlitherOutput(text.value);
  } catch (error) {
    return err(toError(error));
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
