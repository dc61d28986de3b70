import { createRuntimeError, RuntimeErrorCode } from './errors/index.js';

/**
 * Annotation kinds, in order of how many marker presses encode them.
 */
export const PATTERNS = [
  'SHORT_NOTE',
  'LONG_NOTE',
  'CONVERSATION',
  'CONFIDENTIAL',
  'PROJECT_IDEA',
] as const;

export type Pattern = (typeof PATTERNS)[number];

/** Patterns whose interval is computed backwards from their first mark. */
export type LookbackPattern = 'SHORT_NOTE' | 'LONG_NOTE' | 'PROJECT_IDEA';

/** Patterns whose interval is bounded by two marks of the run itself. */
export type SpanPattern = 'CONVERSATION' | 'CONFIDENTIAL';

export type PatternDefinition =
  | {
      kind: 'lookback';
      pattern: LookbackPattern;
      arity: number;
      lookbackSeconds: number;
      skipCount: number;
    }
  | {
      kind: 'span';
      pattern: SpanPattern;
      arity: number;
      /** Offsets (relative to the run start) of the marks bounding the span. */
      startMark: number;
      endMark: number;
      skipCount: number;
    };

export const PATTERN_TABLE: Record<Pattern, PatternDefinition> = {
  SHORT_NOTE: { kind: 'lookback', pattern: 'SHORT_NOTE', arity: 1, lookbackSeconds: 60, skipCount: 1 },
  LONG_NOTE: { kind: 'lookback', pattern: 'LONG_NOTE', arity: 2, lookbackSeconds: 120, skipCount: 2 },
  CONVERSATION: { kind: 'span', pattern: 'CONVERSATION', arity: 3, startMark: 2, endMark: 3, skipCount: 4 },
  CONFIDENTIAL: { kind: 'span', pattern: 'CONFIDENTIAL', arity: 4, startMark: 3, endMark: 4, skipCount: 5 },
  PROJECT_IDEA: { kind: 'lookback', pattern: 'PROJECT_IDEA', arity: 5, lookbackSeconds: 300, skipCount: 5 },
};

/** Longest run the classifier accumulates before forcing a boundary. */
export const MAX_ARITY = 5;

export function isPattern(value: string): value is Pattern {
  return PATTERNS.some((pattern) => pattern === value);
}

/**
 * Looks up the static definition of a pattern by name.
 */
export function lookupPattern(name: string): PatternDefinition {
  if (!isPattern(name)) {
    throw createRuntimeError(RuntimeErrorCode.UNKNOWN_PATTERN, `Unknown annotation pattern "${name}".`, {
      context: `known patterns: ${PATTERNS.join(', ')}`,
    });
  }
  return PATTERN_TABLE[name];
}

/**
 * Maps a run length to the pattern it encodes.
 */
export function patternForArity(arity: number): Pattern {
  const match = PATTERNS.find((pattern) => PATTERN_TABLE[pattern].arity === arity);
  if (!match) {
    throw createRuntimeError(
      RuntimeErrorCode.UNKNOWN_PATTERN,
      `No annotation pattern uses ${arity} track mark(s) in a row.`,
      { context: `arity must be between 1 and ${MAX_ARITY}` },
    );
  }
  return match;
}
