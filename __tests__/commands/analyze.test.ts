/**
 * analyze Command Tests
 *
 * End-to-end runs over temp projects with Slither disabled or replaced by a
 * saved output file.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  EXIT_ERROR,
  EXIT_PASS,
  EXIT_THRESHOLD,
  formatSummary,
  formatThresholdFailure,
  runAnalyze,
  type AnalyzeCommandOptions,
} from "../../src/commands/analyze.js";
import { getDetectorRegistry } from "../../src/detectors/DetectorRegistry.js";
import type { IDetector } from "../../src/detectors/IDetector.js";
import { Severity, type ScoredReport } from "../../src/types/index.js";

// ============================================================================
// Test Fixtures
// ============================================================================

const UNPROTECTED_MINT = [
  "pragma solidity ^0.8.0;",
  "contract Token {",
  "    function mint(address to, uint256 amount) public {",
  "    }",
  "}",
].join("\n");

const CLEAN = ["pragma solidity ^0.8.0;", "contract Clean {", "}"].join("\n");

const FIXED_NOW = (): Date => new Date("2024-05-01T12:30:45.000Z");

const FAILING_REENTRANCY: IDetector = {
  id: "reentrancy",
  name: "Broken Reentrancy",
  description: "Fails every run",
  rules: [],
  run: () => Promise.reject(new Error("EIO disk read")),
  scanSource: () => [],
};

describe("runAnalyze()", () => {
  let tempDir: string;
  let configPath: string;
  let output: string;
  let writes: string[];

  function options(overrides: Partial<AnalyzeCommandOptions> = {}): AnalyzeCommandOptions {
    return {
      target: join(tempDir, "Token.sol"),
      overrides: { slither: false, format: "json", output },
      configPath,
      ci: false,
      quiet: true,
      write: (text) => writes.push(text),
      now: FIXED_NOW,
      ...overrides,
    };
  }

  async function readJsonReport(): Promise<unknown> {
    const text = await readFile(output, "utf-8");
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "analyze-test-"));
    configPath = join(tempDir, "settings.yml");
    output = join(tempDir, "out", "report.json");
    writes = [];
    await writeFile(configPath, "");
    await writeFile(join(tempDir, "Token.sol"), UNPROTECTED_MINT);
  });

  afterEach(async () => {
    getDetectorRegistry().reset();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("should exit 1 and print the failure line in CI mode", async () => {
    // Given: an unprotected mint (Critical) and the default High threshold
    // When: running in CI mode
    const code = await runAnalyze(options({ ci: true, quiet: false }));

    // Then: threshold exit and a single failure line
    expect(code).toBe(EXIT_THRESHOLD);
    expect(writes).toEqual(["FAIL: 1 finding(s) at high severity or above"]);
  });

  it("should print detector failures in CI mode", async () => {
    // Given: a reentrancy detector that cannot read its input
    getDetectorRegistry().register(FAILING_REENTRANCY);

    // When: running in CI mode
    const code = await runAnalyze(options({ ci: true, quiet: false }));

    // Then: the skipped detector is reported before the failure line
    expect(code).toBe(EXIT_THRESHOLD);
    expect(writes).toEqual([
      "   ⚠️  Detector 'reentrancy' failed: EIO disk read",
      "FAIL: 1 finding(s) at high severity or above",
    ]);
  });

  it("should print detector failures in quiet mode on a passing run", async () => {
    // Given: a failing detector and no threshold
    getDetectorRegistry().register(FAILING_REENTRANCY);

    // When: running quietly
    const code = await runAnalyze(
      options({ overrides: { slither: false, format: "json", output, failOn: "none" } })
    );

    // Then: the run passes but still says the report is partial
    expect(code).toBe(EXIT_PASS);
    expect(writes).toEqual(["   ⚠️  Detector 'reentrancy' failed: EIO disk read"]);
  });

  it("should write the report in the chosen format", async () => {
    await runAnalyze(options());

    expect(await readJsonReport()).toMatchObject({
      target: join(tempDir, "Token.sol"),
      generated_at: "2024-05-01T12:30:45Z",
      risk_score: 40,
      grade: "C",
      summary: { total: 1, critical: 1 },
      findings: [{ check: "missing-access-control", lines: [3], source: "heuristic" }],
    });
  });

  it("should pass with threshold none", async () => {
    const code = await runAnalyze(
      options({ overrides: { slither: false, format: "json", output, failOn: "none" } })
    );

    expect(code).toBe(EXIT_PASS);
    expect(writes).toEqual([]);
  });

  it("should pass a clean contract", async () => {
    await writeFile(join(tempDir, "Token.sol"), CLEAN);

    expect(await runAnalyze(options())).toBe(EXIT_PASS);
  });

  it("should narrate progress when not quiet", async () => {
    // Given: a verbose run
    // When: analyzing
    await runAnalyze(options({ quiet: false }));

    // Then: the steps then the summary
    const target = join(tempDir, "Token.sol");
    expect(writes[0]).toBe(`🔍 Analyzing: ${target}`);
    expect(writes[1]).toBe("   Running heuristic security checks...");
    expect(writes[2]).toContain("  Grade: C   Score: 40/100\n");
    expect(writes[2]).toContain(`  Report: ${output}\n`);
    expect(writes).toHaveLength(3);
  });

  it("should take thresholds and settings from the config file", async () => {
    // Given: a settings file that turns the access check off
    await writeFile(configPath, "disabledDetectors: [access-control]\nfailOn: low\n");

    // When: analyzing
    const code = await runAnalyze(options());

    // Then: nothing is found
    expect(code).toBe(EXIT_PASS);
    expect(await readJsonReport()).toMatchObject({ summary: { total: 0 } });
  });

  it("should merge findings from a saved Slither output", async () => {
    // Given: a clean contract and a saved Medium Slither finding
    await writeFile(join(tempDir, "Token.sol"), CLEAN);
    const slitherJson = join(tempDir, "slither.json");
    await writeFile(
      slitherJson,
      JSON.stringify({
        success: true,
        results: {
          detectors: [
            {
              check: "tx-origin",
              impact: "Medium",
              confidence: "Medium",
              description: "tx.origin used for authorization",
              elements: [
                { source_mapping: { filename_absolute: join(tempDir, "Token.sol"), lines: [2] } },
              ],
            },
          ],
        },
      })
    );

    // When: analyzing with a Medium threshold
    const code = await runAnalyze(
      options({
        slitherJson,
        overrides: { format: "json", output, failOn: Severity.MEDIUM },
      })
    );

    // Then: the Slither finding is reported and fails the run
    expect(code).toBe(EXIT_THRESHOLD);
    expect(await readJsonReport()).toMatchObject({
      summary: { total: 1, medium: 1 },
      findings: [{ source: "slither", check: "tx-origin", swc_ref: "SWC-115" }],
    });
  });

  it("should exit 2 for a missing target", async () => {
    const code = await runAnalyze(options({ target: join(tempDir, "Missing.sol") }));

    expect(code).toBe(EXIT_ERROR);
  });

  it("should exit 2 for an unreadable Slither output", async () => {
    const code = await runAnalyze(options({ slitherJson: join(tempDir, "nope.json") }));

    expect(code).toBe(EXIT_ERROR);
  });

  it("should exit 2 for an invalid config file", async () => {
    await writeFile(configPath, "failOn: sometimes\n");

    expect(await runAnalyze(options())).toBe(EXIT_ERROR);
  });

  it("should exit 2 for a missing explicit config file", async () => {
    const code = await runAnalyze(options({ configPath: join(tempDir, "missing.yml") }));

    expect(code).toBe(EXIT_ERROR);
  });
});

describe("formatSummary()", () => {
  it("should print grade, verdict, counts and the report path", () => {
    const report: ScoredReport = {
      target: "contracts",
      generatedAt: "2024-05-01T12:30:45Z",
      summary: {
        total: 3,
        critical: 0,
        high: 1,
        medium: 1,
        low: 1,
        informational: 0,
        optimization: 0,
      },
      findings: [],
      riskScore: 33,
      grade: "C",
      verdict: "🟠 Moderate risk. Fix all Medium+ findings before deployment.",
    };

    const lines = formatSummary(report, "report.html").split("\n");

    expect(lines).toEqual([
      "",
      "─".repeat(60),
      "  Grade: C   Score: 33/100",
      "  🟠 Moderate risk. Fix all Medium+ findings before deployment.",
      "  Findings: 3 total (0 critical, 1 high, 1 medium, 1 low)",
      "  Report: report.html",
      "─".repeat(60),
      "",
    ]);
  });

  it("formatThresholdFailure() should lowercase the threshold", () => {
    expect(formatThresholdFailure(2, Severity.CRITICAL)).toBe(
      "FAIL: 2 finding(s) at critical severity or above"
    );
  });
});
