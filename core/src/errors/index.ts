/**
 * trackmark error system
 *
 * - P (Parser): malformed marker files, timestamps and configuration
 * - R (Runtime): classification and merge invariants
 * - T (Tool): ffmpeg and duration lookup failures
 * - W (Warnings): conditions that are logged and then ignored
 */

// Types
export type { ErrorCategory, ErrorLocation, ErrorSeverity, TrackmarkErrorInit } from './types.js';
export { TrackmarkError, isTrackmarkError } from './types.js';

// Error Codes
export {
  ParserErrorCode,
  RuntimeErrorCode,
  ToolErrorCode,
  WarningCode,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';

// Helpers
export type { CreateErrorOptions } from './helpers.js';
export {
  createTrackmarkError,
  createParserError,
  createRuntimeError,
  createToolError,
  isMissingFileError,
  isExistingFileError,
  formatError,
} from './helpers.js';
