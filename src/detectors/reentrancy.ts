/**
 * Reentrancy Ordering Detector
 *
 * Flags the classic checks-effects-interactions violation: inside a function,
 * an external call followed later by a state change, with no reentrancy guard
 * seen so far in that function.
 */

import { Severity, type Finding, type RuleInfo } from "../types/index.js";
import {
  BaseDetector,
  extractFunctionName,
  isBlockEnd,
  isCommentLine,
  type IdSequence,
} from "./IDetector.js";

// ============================================================================
// Signals
// ============================================================================

export const EXTERNAL_CALL_SIGNALS: readonly string[] = Object.freeze([
  ".call{",
  ".call(",
  ".delegatecall(",
  ".transfer(",
  ".send(",
]);

export const GUARD_SIGNALS: readonly string[] = Object.freeze([
  "nonReentrant",
  "ReentrancyGuard",
  "mutex",
]);

/** Checked in order; the first match on a line wins. */
export const STATE_MUTATION_SIGNALS: ReadonlyArray<{ name: string; pattern: RegExp }> =
  Object.freeze([
    { name: "indexed-write", pattern: /\[[^\]]*\]\s*[+\-*/%]?=(?!=)/ },
    { name: "zero-assignment", pattern: /[^=!<>+\-*/%]=\s*0\s*;/ },
    { name: "compound-assignment", pattern: /[+\-*/%]=\s/ },
    { name: "increment", pattern: /\+\+|--/ },
  ]);

export const REENTRANCY_CHECK = "reentrancy-ordering";

// ============================================================================
// Scan State
// ============================================================================

interface ReentrancyScanState {
  inFunction: boolean;
  functionName: string;
  sawExternalCall: boolean;
  callLine: number;
  hasGuard: boolean;
}

function initialState(): ReentrancyScanState {
  return {
    inFunction: false,
    functionName: "",
    sawExternalCall: false,
    callLine: 0,
    hasGuard: false,
  };
}

function isFunctionStart(trimmed: string): boolean {
  return trimmed.includes("function ") && trimmed.includes("(");
}

export function findMutationSignal(trimmed: string): string | undefined {
  return STATE_MUTATION_SIGNALS.find(({ pattern }) => pattern.test(trimmed))?.name;
}

// ============================================================================
// Detector
// ============================================================================

export class ReentrancyDetector extends BaseDetector {
  readonly id = "reentrancy" as const;
  readonly name = "Reentrancy Ordering";
  readonly description = "State change after an external call without a reentrancy guard";
  readonly rules: readonly RuleInfo[] = [
    {
      check: REENTRANCY_CHECK,
      severity: Severity.HIGH,
      description: "State change after external call without reentrancy guard",
    },
  ];
  protected readonly idPrefix = "HEUR-REENTRANT";

  protected scanLines(lines: readonly string[], file: string, ids: IdSequence): Finding[] {
    const findings: Finding[] = [];
    let state = initialState();

    lines.forEach((line, index) => {
      const lineNum = index + 1;
      const trimmed = line.trim();

      if (isCommentLine(trimmed)) {
        return;
      }

      if (isFunctionStart(trimmed)) {
        state = { ...initialState(), inFunction: true, functionName: extractFunctionName(trimmed) };
      }

      if (state.inFunction) {
        if (GUARD_SIGNALS.some((signal) => trimmed.includes(signal))) {
          state.hasGuard = true;
        }

        if (EXTERNAL_CALL_SIGNALS.some((signal) => trimmed.includes(signal))) {
          state.sawExternalCall = true;
          state.callLine = lineNum;
        }

        if (state.sawExternalCall && !state.hasGuard && findMutationSignal(trimmed)) {
          findings.push(this.createFinding(ids.next(), file, state, lineNum));
        }
      }

      if (isBlockEnd(trimmed)) {
        state = initialState();
      }
    });

    return findings;
  }

  private createFinding(
    id: string,
    file: string,
    state: ReentrancyScanState,
    lineNum: number
  ): Finding {
    return {
      id,
      source: "heuristic",
      check: REENTRANCY_CHECK,
      title: "State Change After External Call (Reentrancy Risk)",
      description:
        `In function '${state.functionName}' (${file} line ${lineNum}): state modified after ` +
        `the external call on line ${state.callLine}. If the callee re-enters before the ` +
        `state update, it can act on stale state.`,
      severity: Severity.HIGH,
      confidence: "Medium",
      file,
      lines: [state.callLine, lineNum],
      remediation:
        "Move all state changes before the external call (checks-effects-interactions). " +
        "Alternatively, add OpenZeppelin's nonReentrant modifier.",
      swcId: "SWC-107",
      references: [
        "https://swcregistry.io/docs/SWC-107",
        "https://docs.openzeppelin.com/contracts/4.x/api/security#ReentrancyGuard",
      ],
    };
  }
}
