import { readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { Stats } from 'node:fs';
import { parseMergedRecordingName } from '../naming.js';
import type { AudioSegmentFile, MarkerFileSource, RecordingGroup } from '../types.js';
import { createPrefixMatcher, type SegmentMatcher } from './segment-matcher.js';

export interface ScanOptions {
  matcher?: SegmentMatcher;
  audioExtension: string;
  markerExtension: string;
}

/**
 * Lists the recording groups found directly inside a directory.
 *
 * Groups are sorted by key, their files by name; the device's names follow
 * recording order within one session. Recordings merged by an earlier run
 * form groups of their own, keyed by the merged name, whatever the matcher.
 */
export async function scanRecordingGroups(directory: string, options: ScanOptions): Promise<RecordingGroup[]> {
  const matcher = options.matcher ?? createPrefixMatcher();
  const audioExtension = options.audioExtension.toLowerCase();
  const markerExtension = options.markerExtension.toLowerCase();
  const entries = await readdir(directory, { withFileTypes: true });
  const groups = new Map<string, RecordingGroup>();

  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    const extension = extname(entry.name).toLowerCase();
    if (extension !== audioExtension && extension !== markerExtension) {
      continue;
    }
    const stem = entry.name.slice(0, entry.name.length - extension.length);
    const merged = parseMergedRecordingName(stem) !== null;
    const key = merged ? stem : matcher.groupKeyOf(entry.name);
    if (key === null) {
      continue;
    }

    const path = join(directory, entry.name);
    const file: AudioSegmentFile | MarkerFileSource = {
      path,
      name: entry.name,
      creationTime: creationTimeOf(await stat(path)),
    };

    let group = groups.get(key);
    if (!group) {
      group = { key, audioSegments: [], markerFiles: [], merged };
      groups.set(key, group);
    }
    if (extension === audioExtension) {
      group.audioSegments.push(file);
    } else {
      group.markerFiles.push(file);
    }
  }

  return [...groups.values()]
    .map((group) => ({
      ...group,
      audioSegments: [...group.audioSegments].sort(byName),
      markerFiles: [...group.markerFiles].sort(byName),
    }))
    .sort((a, b) => compareNames(a.key, b.key));
}

/**
 * Birth time where the file system records one, modification time otherwise.
 */
export function creationTimeOf(stats: Pick<Stats, 'birthtimeMs' | 'birthtime' | 'mtime'>): Date {
  return stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;
}

function byName(a: { name: string }, b: { name: string }): number {
  return compareNames(a.name, b.name);
}

function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
