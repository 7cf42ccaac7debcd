/**
 * LintError - Error hierarchy for graphlint
 *
 * All errors extend the native Error class so they can be thrown,
 * caught and collected like any other error.
 *
 * Error types:
 * - ConfigError: configuration parsing/validation errors (fatal)
 * - AssetLoadError: a program could not be materialized (error)
 * - DetectorError: a detector failed on one program (error)
 * - CorpusFormatError: a corpus document does not describe programs (fatal)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  programPath?: string;
  detector?: string;
  filePath?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of LintError
 */
export interface LintErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all graphlint errors.
 */
export abstract class LintError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): LintErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - unreadable values, wrong types
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends LintError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code = 'ERR_CONFIG_INVALID', context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Asset load error - program identifier could not be turned into graph data
 *
 * Severity: error
 * Codes: ERR_PROGRAM_LOAD
 */
export class AssetLoadError extends LintError {
  readonly code = 'ERR_PROGRAM_LOAD';
  readonly severity = 'error' as const;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
  }
}

/**
 * Detector error - unexpected failure inside a detector for one program.
 * Wraps the original error as `cause`.
 *
 * Severity: error
 * Codes: ERR_DETECTOR_FAILED
 */
export class DetectorError extends LintError {
  readonly code = 'ERR_DETECTOR_FAILED';
  readonly severity = 'error' as const;

  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, context);
    this.cause = cause;
  }
}

/**
 * Corpus format error - exported program data is malformed
 *
 * Severity: fatal
 * Codes: ERR_CORPUS_INVALID
 */
export class CorpusFormatError extends LintError {
  readonly code = 'ERR_CORPUS_INVALID';
  readonly severity = 'fatal' as const;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
  }
}
