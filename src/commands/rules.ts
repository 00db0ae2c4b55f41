/**
 * rules command: list the built-in heuristic checks.
 */

import type { RuleInfo } from "../types/index.js";
import { getDetectorRegistry } from "../detectors/DetectorRegistry.js";
import { TOOL_NAME } from "../config.js";

export function formatRules(rules: readonly RuleInfo[]): string {
  const lines = ["", `📋 ${TOOL_NAME} Built-in Heuristic Checks`];
  for (const rule of rules) {
    lines.push(`  ${rule.check.padEnd(40)} [${rule.severity}]`, `    ${rule.description}`, "");
  }
  lines.push(
    "  Plus all Slither detectors: https://github.com/crytic/slither/wiki/Detector-Documentation"
  );
  return lines.join("\n");
}

export function runRules(write: (text: string) => void): number {
  write(formatRules(getDetectorRegistry().getRules()));
  return 0;
}
