import { resolve } from 'node:path';
import {
  classifyMarkers,
  formatTrackMark,
  readMarkerFile,
  type Logger,
  type TimeInterval,
  type TrackmarkConfig,
} from '@trackmark/core';

export interface ClassifyCommandOptions {
  markerPath: string;
  config: TrackmarkConfig;
  logger: Logger;
}

/**
 * Prints the annotated spans one marker file encodes. Spans left open at the
 * end of the file end at their opening mark.
 */
export async function runClassify(options: ClassifyCommandOptions): Promise<TimeInterval[]> {
  const marks = await readMarkerFile(resolve(options.markerPath));
  const intervals = classifyMarkers(marks, options.config, { logger: options.logger });
  if (intervals.length === 0) {
    options.logger.info('No track marks.');
  }
  for (const interval of intervals) {
    options.logger.info(formatInterval(interval));
  }
  return intervals;
}

export function formatInterval(interval: TimeInterval): string {
  return `${interval.pattern.padEnd(12)} ${formatTrackMark(interval.start)} -> ${formatTrackMark(interval.end)}`;
}
