/**
 * Access Control Gap Detector Tests
 */

import { describe, it, expect } from "vitest";
import {
  AccessControlDetector,
  ACCESS_CONTROL_CHECK,
  declaresFunctionNamed,
  hasAccessModifier,
  hasRestrictedVisibility,
} from "../../src/detectors/accessControl.js";
import { Severity } from "../../src/types/index.js";

const IMPROPER = `
contract Improper {
    function mint(address to, uint256 amount) public {
        // missing onlyOwner!
    }

    function mint(address to, uint256 amount) internal {
        // internal is safe
    }

    function burn(uint256 amount) public onlyOwner {
        // has onlyOwner, safe
    }
}
`;

describe("AccessControlDetector", () => {
  const detector = new AccessControlDetector();

  describe("scanSource()", () => {
    it("should flag only the unprotected mint", () => {
      // Given: a public mint without a modifier, an internal mint, and a guarded burn
      // When: scanning
      const findings = detector.scanSource(IMPROPER, "Improper.sol");

      // Then: exactly one Critical finding on line 3
      expect(findings).toHaveLength(1);
      const [finding] = findings;
      expect(finding?.check).toBe(ACCESS_CONTROL_CHECK);
      expect(finding?.title).toBe("Missing Access Control on mint()");
      expect(finding?.severity).toBe(Severity.CRITICAL);
      expect(finding?.swcId).toBe("SWC-105");
      expect(finding?.lines).toEqual([3]);
      expect(finding?.id).toBe("HEUR-ACCESS-1");
      expect(finding?.description.startsWith("Improper.sol:3 - Function 'mint'")).toBe(true);
    });

    it("should use the catalog severity of each keyword", () => {
      // Given: unprotected withdraw (High) and upgradeTo (Critical)
      const source = [
        "function withdraw(uint256 amount) external {",
        "}",
        "function upgradeTo(address impl) external {",
        "}",
      ].join("\n");

      // When: scanning
      const findings = detector.scanSource(source, "Vault.sol");

      // Then: severities follow the catalog
      expect(findings.map((f) => [f.title, f.severity])).toEqual([
        ["Missing Access Control on withdraw()", Severity.HIGH],
        ["Missing Access Control on upgradeTo()", Severity.CRITICAL],
      ]);
    });

    it("should match camelCase extensions of a keyword", () => {
      // Given: mintTokens, which starts with the mint keyword
      const findings = detector.scanSource("function mintTokens(uint256 n) public {", "T.sol");

      // Then: reported under its full name
      expect(findings).toHaveLength(1);
      expect(findings[0]?.title).toBe("Missing Access Control on mintTokens()");
    });

    it("should evaluate keywords independently", () => {
      // Given: upgradeToAndCall also starts with upgradeTo
      const findings = detector.scanSource(
        "function upgradeToAndCall(address impl, bytes data) external payable {",
        "Proxy.sol"
      );

      // Then: both catalog entries fire on the same line
      expect(findings).toHaveLength(2);
      expect(findings.every((f) => f.lines[0] === 1)).toBe(true);
    });

    it("should skip private functions and comment lines", () => {
      const source = [
        "function _burn(uint256 amount) private {",
        "function pause() private {",
        "// function mint(address to) public {",
        " * function withdraw() external {",
      ].join("\n");

      expect(detector.scanSource(source, "Skip.sol")).toEqual([]);
    });

    it("should not match names that merely start with the keyword in lowercase", () => {
      // Given: minter and withdrawal are different functions
      const source = ["function minter() public view {", "function withdrawal() public {"].join(
        "\n"
      );

      expect(detector.scanSource(source, "Names.sol")).toEqual([]);
    });
  });

  describe("helpers", () => {
    it("declaresFunctionNamed() should compare case-insensitively", () => {
      expect(declaresFunctionNamed("function Mint(address to) public", "mint")).toBe(true);
      expect(declaresFunctionNamed("function transferOwnership(address o)", "transferOwnership")).toBe(
        true
      );
      expect(declaresFunctionNamed("function minted() public", "mint")).toBe(false);
    });

    it("hasAccessModifier() should accept known guards in any case", () => {
      expect(hasAccessModifier("function mint() public onlyRole(MINTER_ROLE) {")).toBe(true);
      expect(hasAccessModifier("function mint() public ONLYOWNER {")).toBe(true);
      expect(hasAccessModifier("function mint() public {")).toBe(false);
    });

    it("hasRestrictedVisibility() should require a whole keyword", () => {
      expect(hasRestrictedVisibility("function mint() internal {")).toBe(true);
      expect(hasRestrictedVisibility("function mint() private {")).toBe(true);
      expect(hasRestrictedVisibility("function mint(uint256 internalId) public {")).toBe(false);
    });
  });
});
