import pLimit from 'p-limit';
import { classifyMarkers } from './classification/index.js';
import type { TrackmarkConfig } from './config.js';
import { DurationCache } from './duration-cache.js';
import { createToolError, ToolErrorCode } from './errors/index.js';
import { exportIntervals, type ExportResult } from './export/index.js';
import { scanRecordingGroups, type SegmentMatcher } from './grouping/index.js';
import type { Logger } from './logger.js';
import { mergeRecordingGroup, removeQuietly } from './merge/index.js';
import type { AudioToolkit, DurationProbe, MergedRecording, RecordingGroup, TimeInterval } from './types.js';

export interface PipelineContext {
  config: TrackmarkConfig;
  toolkit: AudioToolkit;
  durations: DurationCache;
  /** Directory receiving merged recordings. */
  workDirectory: string;
  outputRoot: string;
  logger?: Partial<Logger>;
}

export interface GroupResult {
  groupKey: string;
  status: 'succeeded' | 'failed';
  recording?: MergedRecording;
  intervals: TimeInterval[];
  export?: ExportResult;
  error?: unknown;
}

export interface DirectoryRunOptions {
  config: TrackmarkConfig;
  toolkit: AudioToolkit;
  probe: DurationProbe;
  matcher?: SegmentMatcher;
  logger?: Partial<Logger>;
}

export interface DirectoryRunResult {
  directory: string;
  outputRoot: string;
  groups: GroupResult[];
  status: 'succeeded' | 'failed';
}

/**
 * Runs one recording group through align, merge, classify, export and
 * cleanup, strictly in that order.
 *
 * Failures are rethrown; the merged files stay in place when any span
 * could not be exported so the group can be processed again.
 */
export async function processRecordingGroup(
  group: RecordingGroup,
  context: PipelineContext,
): Promise<Omit<GroupResult, 'status' | 'error'>> {
  const logger = context.logger ?? {};
  const recording = await mergeRecordingGroup(group, {
    toolkit: context.toolkit,
    durationOf: context.durations.lookup,
    outputDirectory: context.workDirectory,
    markerExtension: context.config.markerExtension,
    logger,
  });

  const { annotations } = recording;
  if (annotations.kind === 'none') {
    logger.info?.(`${recording.name} has no track marks; nothing to export.`);
    return { groupKey: group.key, recording, intervals: [] };
  }

  const intervals = classifyMarkers(annotations.marks, context.config, {
    timelineEnd: recording.durationSeconds,
    logger,
  });
  logger.info?.(`${recording.name}: ${intervals.length} annotated span(s)`);

  const exported = await exportIntervals(recording, intervals, {
    toolkit: context.toolkit,
    outputRoot: context.outputRoot,
    logger,
  });

  if (exported.failed.length > 0) {
    throw createToolError(
      ToolErrorCode.EXPORT_INCOMPLETE,
      `${exported.failed.length} of ${intervals.length - exported.withheld.length} span(s) of ${recording.name} could not be exported.`,
      {
        groupKey: group.key,
        filePath: recording.audioPath,
        context: exported.failed.map((failure) => failure.outputPath).join(', '),
        suggestion: 'The merged recording was kept; fix the cause and run again on it.',
        cause: exported.failed[0].error,
      },
    );
  }

  if (!context.config.retainMerged) {
    await removeQuietly(recording.audioPath, logger);
    await removeQuietly(annotations.markerPath, logger);
  }

  return { groupKey: group.key, recording, intervals, export: exported };
}

/**
 * Scans a directory and processes every recording group found in it.
 *
 * Groups share nothing but the duration cache and run on a worker pool of
 * `config.concurrency`; one failing group does not stop the others.
 */
export async function processDirectory(directory: string, options: DirectoryRunOptions): Promise<DirectoryRunResult> {
  const { config, toolkit, logger = {} } = options;
  const outputRoot = config.outputRoot ?? directory;
  const groups = await scanRecordingGroups(directory, {
    matcher: options.matcher,
    audioExtension: config.audioExtension,
    markerExtension: config.markerExtension,
  });
  logger.info?.(`Found ${groups.length} recording group(s) in ${directory}`);

  const context: PipelineContext = {
    config,
    toolkit,
    durations: new DurationCache(options.probe),
    workDirectory: directory,
    outputRoot,
    logger,
  };
  const limit = pLimit(config.concurrency);

  const results = await Promise.all(
    groups.map((group) =>
      limit(async (): Promise<GroupResult> => {
        try {
          const outcome = await processRecordingGroup(group, context);
          return { ...outcome, status: 'succeeded' };
        } catch (error) {
          logger.error?.(`Recording group ${group.key} failed: ${error instanceof Error ? error.message : String(error)}`);
          return { groupKey: group.key, status: 'failed', intervals: [], error };
        }
      }),
    ),
  );

  return {
    directory,
    outputRoot,
    groups: results,
    status: results.every((result) => result.status === 'succeeded') ? 'succeeded' : 'failed',
  };
}
