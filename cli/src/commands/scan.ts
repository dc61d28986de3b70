import { resolve } from 'node:path';
import {
  formatSessionTimestamp,
  scanRecordingGroups,
  type Logger,
  type RecordingGroup,
  type TrackmarkConfig,
} from '@trackmark/core';
import { assertDirectory } from './process.js';

export interface ScanCommandOptions {
  directory: string;
  config: TrackmarkConfig;
  logger: Logger;
}

/**
 * Lists the recording groups of a directory without touching any file.
 */
export async function runScan(options: ScanCommandOptions): Promise<RecordingGroup[]> {
  const directory = resolve(options.directory);
  await assertDirectory(directory);
  const groups = await scanRecordingGroups(directory, {
    audioExtension: options.config.audioExtension,
    markerExtension: options.config.markerExtension,
  });

  if (groups.length === 0) {
    options.logger.info(`No recording groups in ${directory}`);
    return groups;
  }
  for (const group of groups) {
    options.logger.info(formatGroupHeading(group));
    for (const segment of group.audioSegments) {
      options.logger.info(`  audio   ${segment.name}  ${formatSessionTimestamp(segment.creationTime)}`);
    }
    for (const markers of group.markerFiles) {
      options.logger.info(`  markers ${markers.name}  ${formatSessionTimestamp(markers.creationTime)}`);
    }
  }
  return groups;
}

export function formatGroupHeading(group: RecordingGroup): string {
  const segments = group.audioSegments.length;
  const markerFiles = group.markerFiles.length;
  const origin = group.merged ? ' (merged earlier)' : '';
  return `${group.key}${origin}: ${segments} audio segment${segments === 1 ? '' : 's'}, ${markerFiles} marker file${markerFiles === 1 ? '' : 's'}`;
}
