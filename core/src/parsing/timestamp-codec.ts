import { createParserError, ParserErrorCode } from '../errors/index.js';

const TRACK_MARK_PATTERN = /^\[(\d{5}):(\d{2})\.(\d{2})\]$/;

const CENTISECONDS_PER_MINUTE = 6000;

/**
 * Parses a recorder timestamp such as `[00012:07.35]` into seconds.
 *
 * The value is assembled from whole centiseconds so that it is the same
 * double a literal like `727.35` produces.
 */
export function parseTrackMark(text: string): number {
  const match = TRACK_MARK_PATTERN.exec(text);
  if (!match) {
    throw createParserError(ParserErrorCode.INVALID_TRACK_MARK, `Invalid track mark "${text}".`, {
      suggestion: 'Track marks use the fixed-width form [MMMMM:SS.ss].',
    });
  }
  const [, minutes, seconds, hundredths] = match;
  const centiseconds =
    Number(minutes) * CENTISECONDS_PER_MINUTE + Number(seconds) * 100 + Number(hundredths);
  return centiseconds / 100;
}

/**
 * Formats seconds as a recorder timestamp, rounding to the nearest centisecond.
 */
export function formatTrackMark(offsetSeconds: number): string {
  if (!Number.isFinite(offsetSeconds) || offsetSeconds < 0) {
    throw createParserError(
      ParserErrorCode.INVALID_TRACK_MARK,
      `Cannot format ${offsetSeconds} as a track mark; offsets must be finite and non-negative.`,
    );
  }
  const centiseconds = Math.round(offsetSeconds * 100);
  const minutes = Math.floor(centiseconds / CENTISECONDS_PER_MINUTE);
  const remainder = centiseconds % CENTISECONDS_PER_MINUTE;
  const seconds = Math.floor(remainder / 100);
  const hundredths = remainder % 100;
  return `[${String(minutes).padStart(5, '0')}:${String(seconds).padStart(2, '0')}.${String(hundredths).padStart(2, '0')}]`;
}
