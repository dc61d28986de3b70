/**
 * Error creation helpers.
 *
 * Provides factory functions for creating structured errors with
 * consistent formatting across all error categories.
 */

import { TrackmarkError, type ErrorLocation } from './types.js';
import { getErrorCategory, getErrorSeverity } from './codes.js';

/**
 * Options for creating a trackmark error.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'P001', 'R010') */
  code: string;
  /** Error message */
  message: string;
  /** Location information */
  location?: ErrorLocation;
  /** Suggested fix */
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

interface ErrorDetails {
  filePath?: string;
  groupKey?: string;
  context?: string;
  suggestion?: string;
  cause?: unknown;
}

/**
 * Creates a TrackmarkError with the given options.
 *
 * The category and severity are inferred from the error code.
 */
export function createTrackmarkError(options: CreateErrorOptions): TrackmarkError {
  const { code, message, location, suggestion, cause } = options;
  return new TrackmarkError(message, {
    code,
    category: getErrorCategory(code),
    severity: getErrorSeverity(code),
    location,
    suggestion,
    cause,
  });
}

function fromDetails(code: string, message: string, details: ErrorDetails): TrackmarkError {
  return createTrackmarkError({
    code,
    message,
    location: {
      filePath: details.filePath,
      groupKey: details.groupKey,
      context: details.context,
    },
    suggestion: details.suggestion,
    cause: details.cause,
  });
}

/**
 * Creates a parser error (P-code). These are the format errors of the
 * recorder output and of configuration files.
 */
export function createParserError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): TrackmarkError {
  return fromDetails(code, message, details);
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): TrackmarkError {
  return fromDetails(code, message, details);
}

/**
 * Creates an external tool error (T-code).
 */
export function createToolError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): TrackmarkError {
  return fromDetails(code, message, details);
}

/**
 * Returns true for a Node.js file system error whose code is ENOENT.
 */
export function isMissingFileError(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}

/**
 * Returns true for a Node.js file system error whose code is EEXIST.
 */
export function isExistingFileError(error: unknown): boolean {
  return hasErrorCode(error, 'EEXIST');
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Formats a TrackmarkError for display.
 */
export function formatError(error: TrackmarkError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.location) {
    const loc = error.location;
    if (loc.groupKey) {
      parts.push(`  Group: ${loc.groupKey}`);
    }
    if (loc.filePath) {
      parts.push(`  File: ${loc.filePath}`);
    }
    if (loc.context) {
      parts.push(`  Context: ${loc.context}`);
    }
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}
