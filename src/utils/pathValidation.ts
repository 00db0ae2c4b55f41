/**
 * Path Validation Utilities
 *
 * Target validation and Solidity source enumeration shared by the detectors,
 * the consolidator and the CLI.
 */

import { resolve, extname, join } from "node:path";
import { access, readdir, stat } from "node:fs/promises";
import { constants } from "node:fs";
import { type Result, ok, err } from "../types/result.js";

// ============================================================================
// Types
// ============================================================================

export interface PathValidationError {
  code: "NOT_FOUND" | "NOT_SOURCE" | "ACCESS_DENIED";
  message: string;
  path: string;
}

export interface ValidatedTarget {
  /** Path as given by the caller */
  path: string;
  absolute: string;
  kind: "file" | "directory";
}

// ============================================================================
// Constants
// ============================================================================

export const SOURCE_EXTENSION = ".sol";

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Check that a target exists, is readable, and is either a `.sol` file or a
 * directory.
 *
 * @example
 * ```ts
 * const result = await validateTarget("./contracts");
 * if (!result.ok) {
 *   throw new TargetError(result.error);
 * }
 * ```
 */
export async function validateTarget(
  target: string
): Promise<Result<ValidatedTarget, PathValidationError>> {
  const absolute = resolve(target);

  let kind: ValidatedTarget["kind"];
  try {
    const stats = await stat(absolute);
    if (stats.isDirectory()) {
      kind = "directory";
    } else if (stats.isFile()) {
      kind = "file";
    } else {
      return err({
        code: "NOT_SOURCE",
        message: `Target must be a ${SOURCE_EXTENSION} file or a directory: ${target}`,
        path: target,
      });
    }
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return err({ code: "NOT_FOUND", message: `Target not found: ${target}`, path: target });
    }
    return err({ code: "ACCESS_DENIED", message: `Cannot access target: ${target}`, path: target });
  }

  if (kind === "file" && extname(absolute) !== SOURCE_EXTENSION) {
    return err({
      code: "NOT_SOURCE",
      message: `Target must be a ${SOURCE_EXTENSION} file or a directory, got: ${target}`,
      path: target,
    });
  }

  try {
    await access(absolute, constants.R_OK);
  } catch {
    return err({ code: "ACCESS_DENIED", message: `Cannot read target: ${target}`, path: target });
  }

  return ok({ path: target, absolute, kind });
}

/**
 * List the Solidity files under a target.
 *
 * A file target is returned as-is (whatever its extension). A directory is
 * walked recursively, in directory-listing order, keeping `.sol` files and
 * `.sol` symlinks that resolve to files. A dangling `.sol` link throws. Paths
 * keep the caller's prefix so findings point where the caller pointed.
 *
 * @throws On any filesystem error (missing path, permission denied)
 */
export async function listSourceFiles(target: string): Promise<string[]> {
  const stats = await stat(target);
  if (!stats.isDirectory()) {
    return [target];
  }

  const files: string[] = [];
  await walk(target, files);
  return files;
}

async function walk(dir: string, files: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(fullPath, files);
    } else if (extname(entry.name) !== SOURCE_EXTENSION) {
      continue;
    } else if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink() && (await stat(fullPath)).isFile()) {
      // Linked sources are scanned; linked directories are not descended into
      files.push(fullPath);
    }
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
