import { open, rename, rm } from 'node:fs/promises';
import { extname, join } from 'node:path';
import {
  createRuntimeError,
  isExistingFileError,
  isMissingFileError,
  RuntimeErrorCode,
  WarningCode,
} from '../errors/index.js';
import type { Logger } from '../logger.js';
import { mergedRecordingName, parseMergedRecordingName } from '../naming.js';
import { readMarkerFile, writeMarkerFile } from '../parsing/marker-file.js';
import type {
  AlignedSegment,
  AudioToolkit,
  DurationLookup,
  MarkerSequence,
  MergedAnnotations,
  MergedRecording,
  RecordingGroup,
  TrackMark,
} from '../types.js';
import { alignSegments } from './segment-aligner.js';

export interface MergeDependencies {
  toolkit: AudioToolkit;
  durationOf: DurationLookup;
  /** Directory receiving the merged audio and marker files. */
  outputDirectory: string;
  markerExtension: string;
  logger?: Partial<Logger>;
}

interface LoadedSegment {
  aligned: AlignedSegment;
  durationSeconds: number;
  marks: MarkerSequence | null;
}

interface MergedPaths {
  name: string;
  audioPath: string;
  markerPath: string;
}

/**
 * Reassembles a recording group into one recording with one timeline.
 *
 * Every marker file is parsed before any file is touched, so a rejected
 * marker file leaves the group as it was. The merged name is claimed on disk
 * before anything is written to it; a name already in use gets the next
 * `_<n>` suffix.
 */
export async function mergeRecordingGroup(
  group: RecordingGroup,
  deps: MergeDependencies,
): Promise<MergedRecording> {
  const logger = deps.logger ?? {};
  if (group.audioSegments.length === 0) {
    throw createRuntimeError(
      RuntimeErrorCode.EMPTY_RECORDING_GROUP,
      `Recording group ${group.key} has marker files but no audio.`,
      { groupKey: group.key, context: group.markerFiles.map((file) => file.name).join(', ') },
    );
  }
  if (group.merged) {
    return adoptMergedRecording(group, deps, logger);
  }

  const aligned = await alignSegments(group, deps.durationOf, logger);
  const loaded: LoadedSegment[] = [];
  for (const entry of aligned) {
    loaded.push({
      aligned: entry,
      durationSeconds: await deps.durationOf(entry.segment),
      marks: entry.markers ? await readMarkerFile(entry.markers.path) : null,
    });
  }

  const baseCreationTime = earliestCreationTime(group);
  const durationSeconds = loaded.reduce((total, entry) => total + entry.durationSeconds, 0);
  const marks = shiftMarks(loaded);
  const single = loaded.length === 1 ? loaded[0] : undefined;

  const target = await reserveMergedPaths(
    deps.outputDirectory,
    baseCreationTime,
    extname(group.audioSegments[0].path),
    deps.markerExtension,
  );

  let audioInPlace = false;
  try {
    if (single) {
      await rename(single.aligned.segment.path, target.audioPath);
      logger.info?.(`Adopted ${single.aligned.segment.name} as ${target.name}`);
    } else {
      logger.info?.(`Concatenating ${loaded.length} segments of ${group.key} into ${target.name}`);
      logger.debug?.('merge.concat.start', { group: group.key, segments: loaded.map((entry) => entry.aligned.segment.name) });
      await deps.toolkit.concatenate(
        loaded.map((entry) => entry.aligned.segment.path),
        target.audioPath,
      );
    }
    audioInPlace = true;

    if (marks.length === 0) {
      await rm(target.markerPath, { force: true });
    } else if (single?.aligned.markers) {
      await rename(single.aligned.markers.path, target.markerPath);
    } else {
      await writeMarkerFile(target.markerPath, marks);
    }
  } catch (error) {
    // A renamed single segment is the only copy of the audio and stays.
    if (!audioInPlace || !single) {
      await rm(target.audioPath, { force: true });
    }
    await rm(target.markerPath, { force: true });
    throw error;
  }

  for (const entry of loaded) {
    if (!single) {
      await removeQuietly(entry.aligned.segment.path, logger);
    }
    if (entry.aligned.markers && (!single || marks.length === 0)) {
      await removeQuietly(entry.aligned.markers.path, logger);
    }
  }

  const annotations: MergedAnnotations =
    marks.length > 0 ? { kind: 'markers', markerPath: target.markerPath, marks } : { kind: 'none' };

  return {
    groupKey: group.key,
    name: target.name,
    audioPath: target.audioPath,
    baseCreationTime,
    durationSeconds,
    annotations,
  };
}

/**
 * Picks up a recording merged by an earlier run where it lies. Its start
 * time is read back from its name.
 */
async function adoptMergedRecording(
  group: RecordingGroup,
  deps: MergeDependencies,
  logger: Partial<Logger>,
): Promise<MergedRecording> {
  if (group.audioSegments.length !== 1 || group.markerFiles.length > 1) {
    throw createRuntimeError(
      RuntimeErrorCode.AMBIGUOUS_MERGED_RECORDING,
      `Merged recording ${group.key} exists in more than one copy.`,
      {
        groupKey: group.key,
        context: [...group.audioSegments, ...group.markerFiles].map((file) => file.name).join(', '),
        suggestion: 'Keep one audio file and at most one marker file under this name.',
      },
    );
  }

  const [audio] = group.audioSegments;
  const markerFile = group.markerFiles.at(0);
  const marks = markerFile ? await readMarkerFile(markerFile.path) : [];
  const durationSeconds = await deps.durationOf(audio);
  logger.info?.(`Resuming ${group.key} left by an earlier run`);

  return {
    groupKey: group.key,
    name: group.key,
    audioPath: audio.path,
    baseCreationTime: parseMergedRecordingName(group.key) ?? audio.creationTime,
    durationSeconds,
    annotations:
      markerFile && marks.length > 0 ? { kind: 'markers', markerPath: markerFile.path, marks } : { kind: 'none' },
  };
}

/**
 * Lays every segment's marks onto the merged timeline. Placeholders
 * contribute no marks but still push later segments back by their duration.
 */
export function shiftMarks(
  segments: ReadonlyArray<{ durationSeconds: number; marks: MarkerSequence | null }>,
): TrackMark[] {
  const merged: TrackMark[] = [];
  let totalOffset = 0;
  for (const segment of segments) {
    if (segment.marks) {
      for (const mark of segment.marks) {
        merged.push({ offsetSeconds: mark.offsetSeconds + totalOffset });
      }
    }
    totalOffset += segment.durationSeconds;
  }
  return merged;
}

function earliestCreationTime(group: RecordingGroup): Date {
  return group.audioSegments.reduce(
    (earliest, segment) => (segment.creationTime.getTime() < earliest.getTime() ? segment.creationTime : earliest),
    group.audioSegments[0].creationTime,
  );
}

/**
 * Claims the first merged name whose audio and marker paths are both free by
 * creating empty files under them. The audio path is claimed first, so
 * groups merged concurrently never share a name.
 */
async function reserveMergedPaths(
  directory: string,
  baseCreationTime: Date,
  audioExtension: string,
  markerExtension: string,
): Promise<MergedPaths> {
  for (let ordinal = 1; ; ordinal += 1) {
    const name = mergedRecordingName(baseCreationTime, ordinal);
    const audioPath = join(directory, `${name}${audioExtension}`);
    const markerPath = join(directory, `${name}${markerExtension}`);
    if (!(await claimPath(audioPath))) {
      continue;
    }
    if (await claimPath(markerPath)) {
      return { name, audioPath, markerPath };
    }
    await rm(audioPath, { force: true });
  }
}

async function claimPath(filePath: string): Promise<boolean> {
  try {
    const handle = await open(filePath, 'wx');
    await handle.close();
    return true;
  } catch (error) {
    if (isExistingFileError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Deletes a file, treating an already missing file as done.
 */
export async function removeQuietly(filePath: string, logger: Partial<Logger> = {}): Promise<void> {
  try {
    await rm(filePath);
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
    logger.warn?.(`[${WarningCode.CLEANUP_TARGET_MISSING}] ${filePath} was already gone.`);
  }
}
