/**
 * Error type definitions for godoc-extract
 *
 * Every error the CLI can surface carries:
 * - An actionable message with an optional recovery hint
 * - An exit code for programmatic handling
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: tells the user how to fix the problem
 * - code: lets scripts tell failures apart
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (bad TOML, out-of-range values).
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: godoc-extract config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when the document store cannot be read or written.
 *
 * Exit code 5: Store error
 */
export class StoreError extends CLIError {
  /** The underlying file-system error */
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(
      message,
      'Check that the output directory is writable',
      5
    );
    this.name = 'StoreError';
    this.originalError = originalError;
  }
}

/**
 * Thrown when package metadata (name, import path) is missing, so no
 * PackageRecord can be built. Scanning the text itself is unaffected.
 *
 * Exit code 6: Metadata unavailable
 */
export class MetadataUnavailableError extends CLIError {
  /** Metadata keys that were missing or empty */
  public readonly missing: string[];

  constructor(missing: string[], source?: string) {
    const where = source ? ` for ${source}` : '';
    super(
      `Package metadata unavailable${where}: missing ${missing.join(', ')}`,
      'Pass --name and --import-path, or add them to the manifest entry',
      6
    );
    this.name = 'MetadataUnavailableError';
    this.missing = missing;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level issues.
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
