import type { ExtractionRequest } from '@trackmark/core';

const QUIET_ARGS = ['-hide_banner', '-loglevel', 'error'];

/**
 * Formats seconds as `H:MM:SS.ss`, the position syntax ffmpeg takes for
 * `-ss` and `-to`.
 */
export function formatToolTimestamp(seconds: number): string {
  const centiseconds = Math.round(Math.max(0, seconds) * 100);
  const hours = Math.floor(centiseconds / 360_000);
  const minutes = Math.floor((centiseconds % 360_000) / 6000);
  const wholeSeconds = Math.floor((centiseconds % 6000) / 100);
  const hundredths = centiseconds % 100;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(wholeSeconds).padStart(2, '0')}.${String(hundredths).padStart(2, '0')}`;
}

/**
 * Contents of a concat demuxer list file. Single quotes inside paths are
 * closed, escaped and reopened.
 */
export function buildConcatList(inputPaths: readonly string[]): string {
  return inputPaths.map((path) => `file '${path.replace(/'/g, "'\\''")}'\n`).join('');
}

/**
 * Joins the files named in `listPath` without re-encoding.
 */
export function buildConcatArgs(listPath: string, outputPath: string): string[] {
  return [...QUIET_ARGS, '-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-y', outputPath];
}

/**
 * Copies `[start, end]` of the input into its own file without re-encoding.
 */
export function buildExtractArgs(request: ExtractionRequest): string[] {
  return [
    ...QUIET_ARGS,
    '-i',
    request.inputPath,
    '-ss',
    formatToolTimestamp(request.start),
    '-to',
    formatToolTimestamp(request.end),
    '-c',
    'copy',
    '-y',
    request.outputPath,
  ];
}
