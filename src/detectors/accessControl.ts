/**
 * Access Control Gap Detector
 *
 * Flags declarations of sensitive functions (mint, burn, pause, upgrade,
 * ownership, withdraw, selfdestruct) whose declaration line carries neither an
 * access modifier nor a restricting visibility.
 *
 * Only the declaration line itself is inspected, so a modifier list wrapped
 * onto the next line is not seen.
 */

import { Severity, type Finding, type RuleInfo } from "../types/index.js";
import { BaseDetector, extractFunctionName, isCommentLine, type IdSequence } from "./IDetector.js";

// ============================================================================
// Catalog
// ============================================================================

export interface SensitiveFunction {
  readonly keyword: string;
  readonly severity: Severity;
  readonly note: string;
}

export const SENSITIVE_FUNCTIONS: readonly SensitiveFunction[] = Object.freeze([
  {
    keyword: "mint",
    severity: Severity.CRITICAL,
    note: "Unrestricted minting allows anyone to inflate the token supply without limit.",
  },
  {
    keyword: "burn",
    severity: Severity.HIGH,
    note: "Unrestricted burning allows anyone to destroy any holder's tokens.",
  },
  {
    keyword: "pause",
    severity: Severity.HIGH,
    note: "Unrestricted pause allows any caller to halt all transfers (griefing attack).",
  },
  {
    keyword: "unpause",
    severity: Severity.HIGH,
    note: "Unrestricted unpause can bypass emergency stops.",
  },
  {
    keyword: "upgradeTo",
    severity: Severity.CRITICAL,
    note: "Unrestricted upgrades allow full contract takeover.",
  },
  {
    keyword: "upgradeToAndCall",
    severity: Severity.CRITICAL,
    note: "Unrestricted upgrades allow full contract takeover.",
  },
  {
    keyword: "setOwner",
    severity: Severity.CRITICAL,
    note: "Unrestricted owner changes allow full protocol takeover.",
  },
  {
    keyword: "transferOwnership",
    severity: Severity.HIGH,
    note: "Anyone calling it takes over admin rights.",
  },
  {
    keyword: "withdraw",
    severity: Severity.HIGH,
    note: "Unrestricted withdrawals allow draining of contract funds.",
  },
  {
    keyword: "selfdestruct",
    severity: Severity.CRITICAL,
    note: "Unrestricted selfdestruct permanently destroys the contract.",
  },
]);

/** Known Solidity / OpenZeppelin access guard names, matched case-insensitively */
export const ACCESS_MODIFIERS: readonly string[] = Object.freeze([
  "onlyOwner",
  "onlyRole",
  "onlyAdmin",
  "onlyMinter",
  "onlyPauser",
  "requiresAuth",
  "restricted",
  "auth",
  "isOwner",
]);

const LOWERCASE_MODIFIERS = ACCESS_MODIFIERS.map((m) => m.toLowerCase());
const RESTRICTED_VISIBILITY = /\b(?:internal|private)\b/;

export const ACCESS_CONTROL_CHECK = "missing-access-control";

// ============================================================================
// Matching
// ============================================================================

/**
 * True when the line declares a function whose name is `keyword` or starts
 * with it as a camelCase prefix ("mint(", "mintTokens("). The keyword is
 * matched case-insensitively; the character after it must be "(" or an
 * uppercase letter, which rules out "minter(" and "withdrawal(".
 */
export function declaresFunctionNamed(line: string, keyword: string): boolean {
  const needle = `function ${keyword.toLowerCase()}`;
  const idx = line.toLowerCase().indexOf(needle);
  if (idx < 0) {
    return false;
  }
  const next = line.charAt(idx + needle.length);
  return next === "(" || (next >= "A" && next <= "Z");
}

export function hasAccessModifier(line: string): boolean {
  const lower = line.toLowerCase();
  return LOWERCASE_MODIFIERS.some((modifier) => lower.includes(modifier));
}

export function hasRestrictedVisibility(line: string): boolean {
  return RESTRICTED_VISIBILITY.test(line);
}

// ============================================================================
// Detector
// ============================================================================

export class AccessControlDetector extends BaseDetector {
  readonly id = "access-control" as const;
  readonly name = "Access Control Gap";
  readonly description = "Sensitive functions declared without an access modifier";
  readonly rules: readonly RuleInfo[] = [
    {
      check: ACCESS_CONTROL_CHECK,
      severity: `${Severity.CRITICAL}/${Severity.HIGH}`,
      description: "Sensitive functions (mint, burn, pause, upgrade) without access modifiers",
    },
  ];
  protected readonly idPrefix = "HEUR-ACCESS";

  protected scanLines(lines: readonly string[], file: string, ids: IdSequence): Finding[] {
    const findings: Finding[] = [];

    lines.forEach((line, index) => {
      const trimmed = line.trim();

      if (isCommentLine(trimmed) || !trimmed.includes("function ")) {
        return;
      }

      for (const sensitive of SENSITIVE_FUNCTIONS) {
        if (!declaresFunctionNamed(trimmed, sensitive.keyword)) continue;
        if (hasAccessModifier(trimmed)) continue;
        if (hasRestrictedVisibility(trimmed)) continue;

        findings.push(this.createFinding(ids.next(), file, index + 1, trimmed, sensitive));
      }
    });

    return findings;
  }

  private createFinding(
    id: string,
    file: string,
    lineNum: number,
    declaration: string,
    sensitive: SensitiveFunction
  ): Finding {
    const functionName = extractFunctionName(declaration);

    return {
      id,
      source: "heuristic",
      check: ACCESS_CONTROL_CHECK,
      title: `Missing Access Control on ${functionName}()`,
      description:
        `${file}:${lineNum} - Function '${functionName}' appears to be missing an access ` +
        `control modifier. ${sensitive.note}`,
      severity: sensitive.severity,
      confidence: "Medium",
      file,
      lines: [lineNum],
      remediation:
        `Add an access control modifier to '${functionName}()'. Use onlyOwner (OpenZeppelin ` +
        `Ownable) or onlyRole(ROLE) (OpenZeppelin AccessControl) depending on your access model.`,
      swcId: "SWC-105",
      references: [
        "https://swcregistry.io/docs/SWC-105",
        "https://docs.openzeppelin.com/contracts/4.x/access-control",
      ],
    };
  }
}
