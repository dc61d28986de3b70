import { mkdir } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import type { Logger } from '../logger.js';
import { addSeconds, formatSessionDate, formatSessionTimestamp } from '../naming.js';
import type { Pattern } from '../patterns.js';
import type { AudioToolkit, MergedRecording, TimeInterval } from '../types.js';

export interface ExportDependencies {
  toolkit: AudioToolkit;
  outputRoot: string;
  logger?: Partial<Logger>;
}

export interface ExportedSpan {
  interval: TimeInterval;
  sequence: number;
  outputPath: string;
}

export interface FailedSpan {
  interval: TimeInterval;
  sequence: number;
  outputPath: string;
  error: unknown;
}

export interface ExportResult {
  exported: ExportedSpan[];
  failed: FailedSpan[];
  /** Confidential spans, which are never written. */
  withheld: TimeInterval[];
}

/**
 * `<root>/<PATTERN>/<YYYY-MM-DD>/<YYYY-MM-DD@HHhMMmSSs>_<PATTERN>_<n><ext>`
 */
export function exportPathFor(
  outputRoot: string,
  pattern: Pattern,
  startedAt: Date,
  sequence: number,
  extension: string,
): string {
  return join(
    outputRoot,
    pattern,
    formatSessionDate(startedAt),
    `${formatSessionTimestamp(startedAt)}_${pattern}_${sequence}${extension}`,
  );
}

/**
 * Writes every annotated span of a merged recording to its own file.
 *
 * A failed extraction does not stop the remaining spans; failures are
 * returned for the caller to report.
 */
export async function exportIntervals(
  recording: MergedRecording,
  intervals: readonly TimeInterval[],
  deps: ExportDependencies,
): Promise<ExportResult> {
  const logger = deps.logger ?? {};
  const extension = extname(recording.audioPath);
  const sequences = new Map<Pattern, number>();
  const result: ExportResult = { exported: [], failed: [], withheld: [] };

  for (const interval of intervals) {
    if (interval.pattern === 'CONFIDENTIAL') {
      result.withheld.push(interval);
      continue;
    }

    const sequence = (sequences.get(interval.pattern) ?? 0) + 1;
    sequences.set(interval.pattern, sequence);
    const startedAt = addSeconds(recording.baseCreationTime, interval.start);
    const outputPath = exportPathFor(deps.outputRoot, interval.pattern, startedAt, sequence, extension);

    try {
      await mkdir(dirname(outputPath), { recursive: true });
      await deps.toolkit.extract({
        inputPath: recording.audioPath,
        start: interval.start,
        end: interval.end,
        outputPath,
      });
      result.exported.push({ interval, sequence, outputPath });
      logger.info?.(`Exported ${interval.pattern} ${sequence} of ${recording.name}`);
      logger.debug?.('export.span', { recording: recording.name, outputPath, start: interval.start, end: interval.end });
    } catch (error) {
      result.failed.push({ interval, sequence, outputPath, error });
      logger.error?.(
        `Failed to export ${interval.pattern} ${sequence} of ${recording.name}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return result;
}
