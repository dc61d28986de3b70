/**
 * Decides which recording session a file belongs to from its name.
 *
 * Devices name split recordings differently; swap the matcher to support
 * another naming scheme without touching alignment or classification.
 */
export interface SegmentMatcher {
  readonly name: string;
  /** Returns the session key shared by all files of a recording, or null to ignore the file. */
  groupKeyOf(fileName: string): string | null;
}

const PREFIX_PATTERN = /^([^_]+)_+[^_]+_[^.]*\.[^.]+$/;

/**
 * Matches `<prefix>_<infix>_<suffix>.<ext>` and groups files by `<prefix>`.
 */
export function createPrefixMatcher(): SegmentMatcher {
  return {
    name: 'prefix',
    groupKeyOf(fileName: string): string | null {
      const match = PREFIX_PATTERN.exec(fileName);
      return match ? match[1] : null;
    },
  };
}

/**
 * Builds a matcher from a regular expression whose first capture group is the session key.
 */
export function createRegexMatcher(pattern: RegExp, name = `regex:${pattern.source}`): SegmentMatcher {
  return {
    name,
    groupKeyOf(fileName: string): string | null {
      const match = pattern.exec(fileName);
      return match?.[1] ?? null;
    },
  };
}
