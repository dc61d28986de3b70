/**
 * Unified error code constants for trackmark.
 *
 * Code format: {Category}{Number}
 * - P: Parser errors (P001-P099), raised for malformed recorder output or config
 * - R: Runtime errors (R001-R099), raised by classification and merging
 * - T: External tool errors (T001-T099), raised around ffmpeg and duration lookups
 * - W: Warnings (W001-W099)
 */

// =============================================================================
// Parser Error Codes (P001-P099)
// =============================================================================

export const ParserErrorCode = {
  // P001-P009: Marker files
  INVALID_TRACK_MARK: 'P001',
  INVALID_MARKER_FILE: 'P002',
  NON_MONOTONIC_TRACK_MARKS: 'P003',

  // P010-P019: Configuration
  INVALID_CONFIG_FILE: 'P010',
} as const;

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  // R001-R009: Classification
  UNKNOWN_PATTERN: 'R001',
  WINDOW_OUT_OF_RANGE: 'R002',

  // R010-R019: Alignment & merge
  UNMATCHED_MARKER_FILE: 'R010',
  EMPTY_RECORDING_GROUP: 'R011',
  AMBIGUOUS_MERGED_RECORDING: 'R012',
} as const;

// =============================================================================
// External Tool Error Codes (T001-T099)
// =============================================================================

export const ToolErrorCode = {
  CONCATENATION_FAILED: 'T001',
  EXTRACTION_FAILED: 'T002',
  EXPORT_INCOMPLETE: 'T003',
  FFMPEG_NOT_FOUND: 'T004',
  DURATION_LOOKUP_FAILED: 'T005',
} as const;

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  CLEANUP_TARGET_MISSING: 'W001',
  UNTERMINATED_SPAN: 'W002',
} as const;


/**
 * Maps error code prefixes to their categories.
 */
const ERROR_CODE_CATEGORIES = {
  P: 'parser',
  R: 'runtime',
  T: 'tool',
  W: 'runtime',
} as const;

type ErrorCodePrefix = keyof typeof ERROR_CODE_CATEGORIES;

function isErrorCodePrefix(value: string): value is ErrorCodePrefix {
  return Object.prototype.hasOwnProperty.call(ERROR_CODE_CATEGORIES, value);
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): 'parser' | 'runtime' | 'tool' {
  const prefix = code.charAt(0);
  return isErrorCodePrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'runtime';
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}
