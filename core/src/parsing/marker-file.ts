import { readFile, writeFile } from 'node:fs/promises';
import { createParserError, isTrackmarkError, ParserErrorCode } from '../errors/index.js';
import type { MarkerSequence, TrackMark } from '../types.js';
import { formatTrackMark, parseTrackMark } from './timestamp-codec.js';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Parses the contents of a marker file, one `[MMMMM:SS.ss]` per line.
 *
 * Trailing blank lines are skipped. Any other line that does not parse
 * rejects the whole file, as do offsets that fail to increase.
 */
export function parseMarkerFile(contents: string, filePath?: string): MarkerSequence {
  const text = contents.startsWith(BYTE_ORDER_MARK) ? contents.slice(BYTE_ORDER_MARK.length) : contents;
  const lines = text.split('\n').map((line) => line.replace(/\r$/, ''));
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
    lines.pop();
  }

  const marks: TrackMark[] = [];
  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    let offsetSeconds: number;
    try {
      offsetSeconds = parseTrackMark(line.trim());
    } catch (error) {
      if (!isTrackmarkError(error)) {
        throw error;
      }
      throw createParserError(ParserErrorCode.INVALID_MARKER_FILE, `Marker file line ${lineNumber} is not a track mark.`, {
        filePath,
        context: `line ${lineNumber}: ${JSON.stringify(line)}`,
        suggestion: 'Fix or remove the line, then run again. Marker files are never partially imported.',
        cause: error,
      });
    }
    const previous = marks[marks.length - 1];
    if (previous && offsetSeconds <= previous.offsetSeconds) {
      throw createParserError(
        ParserErrorCode.NON_MONOTONIC_TRACK_MARKS,
        `Marker file line ${lineNumber} does not come after the previous track mark.`,
        {
          filePath,
          context: `line ${lineNumber}: ${JSON.stringify(line)} follows ${formatTrackMark(previous.offsetSeconds)}`,
        },
      );
    }
    marks.push({ offsetSeconds });
  });
  return marks;
}

export async function readMarkerFile(filePath: string): Promise<MarkerSequence> {
  const contents = await readFile(filePath, 'utf8');
  return parseMarkerFile(contents, filePath);
}

export function serializeMarkers(marks: MarkerSequence): string {
  return marks.map((mark) => `${formatTrackMark(mark.offsetSeconds)}\n`).join('');
}

export async function writeMarkerFile(filePath: string, marks: MarkerSequence): Promise<void> {
  await writeFile(filePath, serializeMarkers(marks), 'utf8');
}
