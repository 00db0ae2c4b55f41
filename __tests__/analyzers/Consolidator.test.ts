/**
 * Consolidator Tests
 *
 * Merge, dedup, sort and summary over a temp project.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, writeFile, rm, symlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  Consolidator,
  buildReport,
  createConsolidator,
  dedupKey,
  deduplicateFindings,
  formatTimestamp,
  type DetectorProgress,
} from "../../src/analyzers/Consolidator.js";
import { AccessControlDetector } from "../../src/detectors/accessControl.js";
import type { IDetector } from "../../src/detectors/IDetector.js";
import { TargetError } from "../../src/errors.js";
import { Severity, type Finding } from "../../src/types/index.js";

// ============================================================================
// Test Fixtures
// ============================================================================

const TOKEN_SOURCE = [
  "",
  "pragma solidity ^0.7.0;",
  "contract Token {",
  "    function mint() public {}",
  "}",
].join("\n");

const FIXED_NOW = (): Date => new Date("2024-05-01T12:30:45.123Z");

function createFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    id: "SLITHER-001",
    source: "slither",
    check: "external-check",
    title: "External Finding",
    description: "Reported upstream",
    severity: Severity.LOW,
    confidence: "Medium",
    file: "Token.sol",
    lines: [1],
    remediation: "Review",
    swcId: "SWC-999",
    references: [],
    ...overrides,
  };
}

function failingDetector(message: string): IDetector {
  return {
    id: "reentrancy",
    name: "Failing",
    description: "Always throws",
    rules: [],
    run: () => Promise.reject(new Error(message)),
    scanSource: () => [],
  };
}

describe("Consolidator", () => {
  let tempDir: string;
  let tokenPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "consolidator-test-"));
    tokenPath = join(tempDir, "Token.sol");
    await writeFile(tokenPath, TOKEN_SOURCE);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("consolidate()", () => {
    it("should merge external and heuristic findings in severity order", async () => {
      // Given: an unprotected mint and one external Low finding
      const external = createFinding({ file: tokenPath });

      // When: consolidating
      const { report, warnings } = await new Consolidator({ now: FIXED_NOW }).consolidate(
        tempDir,
        [external]
      );

      // Then: the Critical heuristic finding comes first
      expect(warnings).toEqual([]);
      expect(report.target).toBe(tempDir);
      expect(report.generatedAt).toBe("2024-05-01T12:30:45Z");
      expect(report.findings.map((f) => [f.source, f.severity])).toEqual([
        ["heuristic", Severity.CRITICAL],
        ["slither", Severity.LOW],
      ]);
      expect(report.findings[0]?.lines).toEqual([4]);
      expect(report.summary).toEqual({
        total: 2,
        critical: 1,
        high: 0,
        medium: 0,
        low: 1,
        informational: 0,
        optimization: 0,
      });
    });

    it("should keep the external finding when both report the same location", async () => {
      // Given: an external finding with the same SWC, file and first line
      const external = createFinding({
        file: tokenPath,
        swcId: "SWC-105",
        lines: [4],
        severity: Severity.HIGH,
      });

      // When: consolidating
      const { report } = await createConsolidator({ now: FIXED_NOW }).consolidate(tempDir, [
        external,
      ]);

      // Then: only the external one survives
      expect(report.findings).toHaveLength(1);
      expect(report.findings[0]?.source).toBe("slither");
      expect(report.summary.total).toBe(1);
      expect(report.summary.high).toBe(1);
    });

    it("should produce an empty report for a clean target", async () => {
      await writeFile(tokenPath, "pragma solidity ^0.8.0;\ncontract Clean {}\n");

      const { report } = await new Consolidator().consolidate(tempDir);

      expect(report.findings).toEqual([]);
      expect(report.summary.total).toBe(0);
    });

    it("should scan a source file reached through a symlink", async () => {
      // Given: src/V.sol links to a 0.7 library with unguarded addition
      const vendored = join(tempDir, "vendor", "V.sol");
      await mkdir(join(tempDir, "vendor"));
      await mkdir(join(tempDir, "src"));
      await writeFile(
        vendored,
        [
          "pragma solidity ^0.7.0;",
          "function add(uint256 a, uint256 b) internal returns (uint256) {",
          "    return a + b;",
          "}",
        ].join("\n")
      );
      await symlink(vendored, join(tempDir, "src", "V.sol"));

      // When: consolidating the linking directory
      const { report } = await new Consolidator().consolidate(join(tempDir, "src"));

      // Then: the overflow is reported against the link path
      expect(report.findings.map((f) => [f.check, f.file, f.lines])).toEqual([
        ["integer-overflow", join(tempDir, "src", "V.sol"), [3]],
      ]);
    });

    it("should skip disabled detectors", async () => {
      const { report, outcomes } = await new Consolidator({
        disabledDetectors: ["access-control"],
      }).consolidate(tempDir);

      expect(outcomes.map((o) => o.detectorId)).toEqual(["reentrancy", "integer-overflow"]);
      expect(report.summary.total).toBe(0);
    });

    it("should turn a failing detector into a warning and continue", async () => {
      // Given: a detector that throws, followed by a working one
      const consolidator = new Consolidator({
        detectors: [failingDetector("disk on fire"), new AccessControlDetector()],
      });

      // When: consolidating
      const { report, warnings, outcomes } = await consolidator.consolidate(tempDir);

      // Then: the failure is recorded and the other detector still reports
      expect(warnings).toEqual(["Detector 'reentrancy' failed: disk on fire"]);
      expect(outcomes[0]?.result.ok).toBe(false);
      expect(report.findings).toHaveLength(1);
      expect(report.findings[0]?.check).toBe("missing-access-control");
    });

    it("should report progress for each detector", async () => {
      // Given: a progress listener
      const events: DetectorProgress[] = [];
      const consolidator = new Consolidator({
        detectors: [failingDetector("boom"), new AccessControlDetector()],
      }).onProgress((progress) => events.push(progress));

      // When: consolidating
      await consolidator.consolidate(tempDir);

      // Then: start and end events in run order
      expect(events).toEqual([
        { detectorId: "reentrancy", status: "started" },
        { detectorId: "reentrancy", status: "failed", error: "boom" },
        { detectorId: "access-control", status: "started" },
        { detectorId: "access-control", status: "completed", findingCount: 1 },
      ]);
    });

    it("should not let a throwing progress callback stop the run", async () => {
      const consolidator = new Consolidator().onProgress(() => {
        throw new Error("listener failed");
      });

      const { report } = await consolidator.consolidate(tempDir);

      expect(report.summary.critical).toBe(1);
    });

    it("should throw TargetError for a missing target", async () => {
      const missing = join(tempDir, "missing");

      await expect(new Consolidator().consolidate(missing)).rejects.toBeInstanceOf(TargetError);
      await expect(new Consolidator().consolidate(missing)).rejects.toMatchObject({
        code: "NOT_FOUND",
        path: missing,
      });
    });

    it("should throw TargetError for a non-Solidity file", async () => {
      const notes = join(tempDir, "notes.txt");
      await writeFile(notes, "text");

      await expect(new Consolidator().consolidate(notes)).rejects.toMatchObject({
        code: "NOT_SOURCE",
      });
    });
  });

  describe("deduplication", () => {
    it("should build keys from SWC, file and first line", () => {
      expect(dedupKey(createFinding({ lines: [7, 9] }))).toBe("SWC-999|Token.sol|7");
      expect(dedupKey(createFinding({ lines: [] }))).toBe("SWC-999|Token.sol");
    });

    it("should keep the first occurrence of each key", () => {
      // Given: two findings on the same key and one elsewhere
      const first = createFinding({ id: "first" });
      const second = createFinding({ id: "second", title: "Different text" });
      const other = createFinding({ id: "other", lines: [2] });

      // When: deduplicating
      const unique = deduplicateFindings([first, second, other]);

      // Then: the first wins and order is kept
      expect(unique.map((f) => f.id)).toEqual(["first", "other"]);
    });

    it("should collapse findings without an SWC reference on the same line", () => {
      const a = createFinding({ id: "a", swcId: "", check: "one" });
      const b = createFinding({ id: "b", swcId: "", check: "two" });

      expect(deduplicateFindings([a, b]).map((f) => f.id)).toEqual(["a"]);
    });

    it("should be idempotent", () => {
      const findings = [
        createFinding({ id: "1" }),
        createFinding({ id: "2" }),
        createFinding({ id: "3", file: "Other.sol" }),
      ];

      const once = deduplicateFindings(findings);

      expect(deduplicateFindings(once)).toEqual(once);
    });
  });

  describe("buildReport()", () => {
    it("should keep the summary total equal to the finding count", () => {
      const findings = [
        createFinding({ severity: Severity.INFORMATIONAL, file: "B.sol" }),
        createFinding({ severity: Severity.MEDIUM, file: "A.sol" }),
      ];

      const report = buildReport("contracts", findings, FIXED_NOW());

      expect(report.summary.total).toBe(report.findings.length);
      expect(report.findings.map((f) => f.file)).toEqual(["A.sol", "B.sol"]);
      expect(Object.isFrozen(report)).toBe(true);
    });

    it("formatTimestamp() should drop milliseconds", () => {
      expect(formatTimestamp(new Date(Date.UTC(2023, 0, 2, 3, 4, 5, 678)))).toBe(
        "2023-01-02T03:04:05Z"
      );
    });
  });
});
