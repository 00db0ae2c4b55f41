/**
 * IDetector Interface
 *
 * Defines the contract that every heuristic pattern detector implements.
 * Detectors are line-oriented scanners: they see one file at a time, make a
 * single forward pass over its lines, and keep a small explicit scan-state
 * record that resets at the next bare closing-brace line.
 *
 * Design Patterns Used:
 * - Template Method: BaseDetector walks the target, subclasses scan text
 * - Strategy Pattern: the consolidator treats all detectors alike
 */

import { readFile } from "node:fs/promises";
import type { Finding, RuleInfo } from "../types/index.js";
import { listSourceFiles } from "../utils/pathValidation.js";
import { logger } from "../utils/logger.js";

// ============================================================================
// Identification
// ============================================================================

export type DetectorId = "reentrancy" | "access-control" | "integer-overflow";

// ============================================================================
// Core Interface
// ============================================================================

export interface IDetector {
  /** Unique identifier for this detector */
  readonly id: DetectorId;

  /** Human-readable name */
  readonly name: string;

  readonly description: string;

  /** Rules this detector can emit */
  readonly rules: readonly RuleInfo[];

  /**
   * Scan a file or a directory of `.sol` files.
   *
   * @throws On filesystem errors only; unexpected source text never throws
   */
  run(target: string): Promise<Finding[]>;

  /**
   * Scan one file's text. Pure: no I/O, no state shared across calls.
   *
   * @param ids - Id sequence shared across the files of one run
   */
  scanSource(source: string, file: string, ids?: IdSequence): Finding[];
}

// ============================================================================
// Finding Ids
// ============================================================================

/**
 * Hands out `PREFIX-1`, `PREFIX-2`, ... within one detector run.
 */
export class IdSequence {
  private count = 0;

  constructor(private readonly prefix: string) {}

  next(): string {
    this.count++;
    return `${this.prefix}-${this.count}`;
  }
}

// ============================================================================
// Abstract Base Class
// ============================================================================

export abstract class BaseDetector implements IDetector {
  abstract readonly id: DetectorId;
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly rules: readonly RuleInfo[];

  /** Prefix for finding ids, e.g. "HEUR-REENTRANT" */
  protected abstract readonly idPrefix: string;

  /**
   * Template method: enumerate source files in discovery order and scan
   * each one exactly once.
   */
  async run(target: string): Promise<Finding[]> {
    const files = await listSourceFiles(target);
    const ids = new IdSequence(this.idPrefix);
    const findings: Finding[] = [];

    for (const file of files) {
      const source = await readFile(file, "utf-8");
      findings.push(...this.scanSource(source, file, ids));
    }

    logger.debug(`[${this.id}] Scanned ${files.length} file(s), ${findings.length} finding(s)`);
    return findings;
  }

  scanSource(source: string, file: string, ids: IdSequence = new IdSequence(this.idPrefix)): Finding[] {
    return this.scanLines(splitLines(source), file, ids);
  }

  /**
   * Single forward pass over a file's lines.
   */
  protected abstract scanLines(lines: readonly string[], file: string, ids: IdSequence): Finding[];
}

// ============================================================================
// Line Helpers
// ============================================================================

export function splitLines(source: string): string[] {
  return source.split(/\r?\n/);
}

/**
 * Comment-prefixed lines never carry signals.
 */
export function isCommentLine(trimmed: string): boolean {
  return trimmed.startsWith("//") || trimmed.startsWith("/*") || trimmed.startsWith("*");
}

/**
 * A line consisting solely of a closing brace ends the current construct.
 * Nesting is not tracked.
 */
export function isBlockEnd(trimmed: string): boolean {
  return trimmed === "}";
}

/**
 * "function transfer(address to, uint256 amount)" -> "transfer"
 */
export function extractFunctionName(line: string): string {
  const marker = "function ";
  const start = line.indexOf(marker);
  if (start < 0) {
    return "";
  }
  const rest = line.slice(start + marker.length);
  const match = rest.match(/^[^(\s]*/);
  return match ? match[0] : rest;
}
