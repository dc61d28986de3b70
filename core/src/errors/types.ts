/**
 * Shared error types for trackmark.
 *
 * - P (Parser): malformed marker files, timestamps and configuration
 * - R (Runtime): classification and merge invariants
 * - T (Tool): ffmpeg and duration lookup failures
 * - W (Warnings): conditions that are logged and then ignored
 */

/**
 * Error categories in trackmark.
 */
export type ErrorCategory = 'parser' | 'runtime' | 'tool';

/**
 * Severity level for issues.
 */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** File path where the error occurred */
  filePath?: string;
  /** Recording group key (the shared file name prefix) */
  groupKey?: string;
  /** Element context (e.g., "line 4: [0000:12.00]") */
  context?: string;
}

export interface TrackmarkErrorInit {
  code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  location?: ErrorLocation;
  suggestion?: string;
  cause?: unknown;
}

/**
 * Base class for every error raised by trackmark.
 */
export class TrackmarkError extends Error {
  /** Unique error code (e.g., 'P001', 'R010', 'T002') */
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly location?: ErrorLocation;
  /** Suggested fix (optional) */
  readonly suggestion?: string;

  constructor(message: string, init: TrackmarkErrorInit) {
    super(message, { cause: init.cause });
    this.name = 'TrackmarkError';
    this.code = init.code;
    this.category = init.category;
    this.severity = init.severity;
    this.location = init.location;
    this.suggestion = init.suggestion;
  }
}

/**
 * Type guard to check if an error is a TrackmarkError.
 */
export function isTrackmarkError(error: unknown): error is TrackmarkError {
  return error instanceof TrackmarkError;
}
