/**
 * Integer Overflow / Unchecked Arithmetic Detector
 *
 * Two independent rules keyed on the file's declared compiler version:
 * - before 0.8, arithmetic without SafeMath wraps silently (High)
 * - from 0.8 on, arithmetic inside an `unchecked {` block has its overflow
 *   checks switched off deliberately (Low)
 */

import { Severity, type Finding, type RuleInfo } from "../types/index.js";
import { BaseDetector, isBlockEnd, isCommentLine, type IdSequence } from "./IDetector.js";

// ============================================================================
// Versions
// ============================================================================

export interface CompilerVersion {
  major: number;
  minor: number;
}

/** Version that introduced checked arithmetic by default */
export const CHECKED_ARITHMETIC_VERSION: Readonly<CompilerVersion> = Object.freeze({
  major: 0,
  minor: 8,
});

/** Assumed when no pragma is present or it cannot be parsed */
export const DEFAULT_VERSION: Readonly<CompilerVersion> = CHECKED_ARITHMETIC_VERSION;

/**
 * "pragma solidity ^0.8.24;" -> { major: 0, minor: 8 }
 * ">=0.6.0 <0.8.0" -> { major: 0, minor: 6 } (first numeric pair wins)
 */
export function parsePragmaVersion(pragma: string): CompilerVersion {
  const match = pragma.match(/(\d+)\.(\d+)/);
  const major = match?.[1];
  const minor = match?.[2];
  if (major === undefined || minor === undefined) {
    return { ...DEFAULT_VERSION };
  }
  return { major: parseInt(major, 10), minor: parseInt(minor, 10) };
}

export function isBeforeCheckedArithmetic(version: CompilerVersion): boolean {
  if (version.major !== CHECKED_ARITHMETIC_VERSION.major) {
    return version.major < CHECKED_ARITHMETIC_VERSION.major;
  }
  return version.minor < CHECKED_ARITHMETIC_VERSION.minor;
}

// ============================================================================
// Signals
// ============================================================================

export const ARITHMETIC_OPERATORS: readonly string[] = Object.freeze([
  " + ",
  " - ",
  " * ",
  " / ",
  " % ",
  "++",
  "--",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
]);

export function containsArithmetic(line: string): boolean {
  return ARITHMETIC_OPERATORS.some((op) => line.includes(op));
}

const UNCHECKED_OPEN = /^unchecked\s*\{$/;
const SAFE_MATH = "SafeMath";

export const INTEGER_OVERFLOW_CHECK = "integer-overflow";
export const UNCHECKED_ARITHMETIC_CHECK = "unchecked-arithmetic";

// ============================================================================
// Scan State
// ============================================================================

interface OverflowScanState {
  version: CompilerVersion;
  inUnchecked: boolean;
  uncheckedLine: number;
}

// ============================================================================
// Detector
// ============================================================================

export class IntegerOverflowDetector extends BaseDetector {
  readonly id = "integer-overflow" as const;
  readonly name = "Integer Overflow";
  readonly description = "Unprotected arithmetic before 0.8 and arithmetic in unchecked blocks";
  readonly rules: readonly RuleInfo[] = [
    {
      check: INTEGER_OVERFLOW_CHECK,
      severity: Severity.HIGH,
      description: "Arithmetic without SafeMath in Solidity <0.8",
    },
    {
      check: UNCHECKED_ARITHMETIC_CHECK,
      severity: Severity.LOW,
      description: "Arithmetic inside unchecked{} blocks",
    },
  ];
  protected readonly idPrefix = "HEUR-OVERFLOW";

  protected scanLines(lines: readonly string[], file: string, ids: IdSequence): Finding[] {
    const findings: Finding[] = [];
    const state: OverflowScanState = {
      version: { ...DEFAULT_VERSION },
      inUnchecked: false,
      uncheckedLine: 0,
    };

    lines.forEach((line, index) => {
      const lineNum = index + 1;
      const trimmed = line.trim();

      if (isCommentLine(trimmed)) {
        return;
      }

      if (trimmed.startsWith("pragma solidity")) {
        state.version = parsePragmaVersion(trimmed.slice("pragma solidity".length));
      }

      if (UNCHECKED_OPEN.test(trimmed)) {
        state.inUnchecked = true;
        state.uncheckedLine = lineNum;
      } else if (state.inUnchecked && isBlockEnd(trimmed)) {
        state.inUnchecked = false;
      }

      if (!containsArithmetic(trimmed)) {
        return;
      }

      if (isBeforeCheckedArithmetic(state.version)) {
        if (!trimmed.includes(SAFE_MATH)) {
          findings.push(this.createOverflowFinding(ids.next(), file, lineNum, state.version));
        }
      } else if (state.inUnchecked) {
        findings.push(this.createUncheckedFinding(ids.next(), file, lineNum, state.uncheckedLine));
      }
    });

    return findings;
  }

  private createOverflowFinding(
    id: string,
    file: string,
    lineNum: number,
    version: CompilerVersion
  ): Finding {
    return {
      id,
      source: "heuristic",
      check: INTEGER_OVERFLOW_CHECK,
      title: "Potential Integer Overflow (Solidity < 0.8)",
      description:
        `${file}:${lineNum} - Arithmetic operation in Solidity ${version.major}.${version.minor}.x ` +
        `without SafeMath. Integer overflow/underflow silently wraps in versions before 0.8.0.`,
      severity: Severity.HIGH,
      confidence: "Medium",
      file,
      lines: [lineNum],
      remediation:
        "Upgrade to Solidity ^0.8.0 where overflow/underflow revert by default. " +
        "If upgrading is not possible, use OpenZeppelin SafeMath for all arithmetic.",
      swcId: "SWC-101",
      references: [
        "https://swcregistry.io/docs/SWC-101",
        "https://docs.openzeppelin.com/contracts/4.x/api/utils#SafeMath",
      ],
    };
  }

  private createUncheckedFinding(
    id: string,
    file: string,
    lineNum: number,
    blockLine: number
  ): Finding {
    return {
      id,
      source: "heuristic",
      check: UNCHECKED_ARITHMETIC_CHECK,
      title: "Arithmetic Inside unchecked{} Block",
      description:
        `${file}:${lineNum} - Arithmetic operation inside an unchecked{} block (opened on line ` +
        `${blockLine}). Overflow protection is deliberately disabled here; verify this is ` +
        `intentional and justified.`,
      severity: Severity.LOW,
      confidence: "High",
      file,
      lines: [blockLine, lineNum],
      remediation:
        "Only use unchecked{} when overflow is mathematically impossible " +
        "(e.g. a loop counter bounded by an array length). Add a comment explaining why it is safe.",
      swcId: "SWC-101",
      references: [
        "https://docs.soliditylang.org/en/latest/control-structures.html#checked-or-unchecked-arithmetic",
      ],
    };
  }
}
