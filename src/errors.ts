/**
 * Error types that abort a run.
 *
 * Everything else (a failing detector, an unexpected source line) is reported
 * through Result values and warnings instead.
 */

import type { PathValidationError } from "./utils/pathValidation.js";

/**
 * The analysis target is missing, of the wrong kind, or unreadable.
 */
export class TargetError extends Error {
  readonly code: PathValidationError["code"];
  readonly path: string;

  constructor(details: PathValidationError) {
    super(details.message);
    this.name = "TargetError";
    this.code = details.code;
    this.path = details.path;
  }
}

/**
 * A configuration file could not be read or failed validation.
 */
export class ConfigError extends Error {
  readonly configPath: string;

  constructor(message: string, configPath: string) {
    super(message);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}
