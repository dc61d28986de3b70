import { describe, expect, it } from 'vitest';
import { isTrackmarkError, RuntimeErrorCode } from './errors/index.js';
import { lookupPattern, MAX_ARITY, PATTERN_TABLE, PATTERNS, patternForArity } from './patterns.js';

function codeOf(action: () => unknown): string | undefined {
  try {
    action();
  } catch (error) {
    return isTrackmarkError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('pattern table', () => {
  it('maps every arity from one to the cap to exactly one pattern', () => {
    expect([1, 2, 3, 4, 5].map(patternForArity)).toEqual([
      'SHORT_NOTE',
      'LONG_NOTE',
      'CONVERSATION',
      'CONFIDENTIAL',
      'PROJECT_IDEA',
    ]);
    expect(MAX_ARITY).toBe(5);
  });

  it('skips the terminating mark of span patterns', () => {
    expect(PATTERNS.map((pattern) => PATTERN_TABLE[pattern].skipCount)).toEqual([1, 2, 4, 5, 5]);
  });

  it.each([0, 6, 1.5])('rejects arity %s', (arity) => {
    expect(codeOf(() => patternForArity(arity))).toBe(RuntimeErrorCode.UNKNOWN_PATTERN);
  });

  it('looks up definitions by name', () => {
    expect(lookupPattern('LONG_NOTE')).toEqual({
      kind: 'lookback',
      pattern: 'LONG_NOTE',
      arity: 2,
      lookbackSeconds: 120,
      skipCount: 2,
    });
    expect(codeOf(() => lookupPattern('DOODLE'))).toBe(RuntimeErrorCode.UNKNOWN_PATTERN);
  });
});
