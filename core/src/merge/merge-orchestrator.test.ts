import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ParserErrorCode, RuntimeErrorCode } from '../errors/index.js';
import { createFakeToolkit } from '../testing/fakes.js';
import type { AudioSegmentFile, MarkerFileSource, RecordingGroup } from '../types.js';
import { mergeRecordingGroup, removeQuietly, shiftMarks } from './merge-orchestrator.js';

const tmpDirs: string[] = [];

afterEach(async () => {
  while (tmpDirs.length) {
    const dir = tmpDirs.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
});

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'trackmark-merge-test-'));
  tmpDirs.push(dir);
  return dir;
}

const t0 = new Date(2024, 2, 5, 9, 3, 7).getTime();
const at = (seconds: number) => new Date(t0 + seconds * 1000);
const MERGED = '2024-03-05@09h03m07s_merged';

interface FileSpec {
  name: string;
  createdAt: number;
  contents: string;
}

async function writeGroup(
  dir: string,
  audio: FileSpec[],
  markers: FileSpec[],
  key = 'sessA',
): Promise<RecordingGroup> {
  const audioSegments: AudioSegmentFile[] = [];
  const markerFiles: MarkerFileSource[] = [];
  for (const spec of audio) {
    await writeFile(join(dir, spec.name), spec.contents, 'utf8');
    audioSegments.push({ path: join(dir, spec.name), name: spec.name, creationTime: at(spec.createdAt) });
  }
  for (const spec of markers) {
    await writeFile(join(dir, spec.name), spec.contents, 'utf8');
    markerFiles.push({ path: join(dir, spec.name), name: spec.name, creationTime: at(spec.createdAt) });
  }
  return { key, audioSegments, markerFiles };
}

const durations: Record<string, number> = {
  'sessA_1_x.mp3': 100,
  'sessA_2_x.mp3': 50,
  'sessB_1_x.mp3': 40,
  [`${MERGED}.mp3`]: 150,
};
const durationOf = async (segment: AudioSegmentFile) => durations[segment.name];

describe('mergeRecordingGroup', () => {
  it('adopts a single segment and its marker file without shifting marks', async () => {
    const dir = await createTempDir();
    const markerText = '[00000:05.00]\n[00001:45.25]\n';
    const group = await writeGroup(
      dir,
      [{ name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' }],
      [{ name: 'sessA_1_x.tmk', createdAt: 10, contents: markerText }],
    );
    const toolkit = createFakeToolkit();

    const merged = await mergeRecordingGroup(group, {
      toolkit,
      durationOf,
      outputDirectory: dir,
      markerExtension: '.tmk',
    });

    expect(merged).toEqual({
      groupKey: 'sessA',
      name: MERGED,
      audioPath: join(dir, `${MERGED}.mp3`),
      baseCreationTime: at(0),
      durationSeconds: 100,
      annotations: {
        kind: 'markers',
        markerPath: join(dir, `${MERGED}.tmk`),
        marks: [{ offsetSeconds: 5 }, { offsetSeconds: 105.25 }],
      },
    });
    expect(toolkit.concatenations).toEqual([]);
    expect((await readdir(dir)).sort()).toEqual([`${MERGED}.mp3`, `${MERGED}.tmk`]);
    expect(await readFile(join(dir, `${MERGED}.tmk`), 'utf8')).toBe(markerText);
  });

  it('concatenates segments and shifts later marks by the preceding durations', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [
        { name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' },
        { name: 'sessA_2_x.mp3', createdAt: 100, contents: 'AUDIO2' },
      ],
      [
        { name: 'sessA_1_x.tmk', createdAt: 10, contents: '[00000:10.00]\n' },
        { name: 'sessA_2_x.tmk', createdAt: 120, contents: '[00000:05.00]\n' },
      ],
    );
    const toolkit = createFakeToolkit();

    const merged = await mergeRecordingGroup(group, {
      toolkit,
      durationOf,
      outputDirectory: dir,
      markerExtension: '.tmk',
    });

    expect(merged.durationSeconds).toBe(150);
    expect(merged.annotations).toEqual({
      kind: 'markers',
      markerPath: join(dir, `${MERGED}.tmk`),
      marks: [{ offsetSeconds: 10 }, { offsetSeconds: 105 }],
    });
    expect(toolkit.concatenations).toEqual([
      {
        inputPaths: [join(dir, 'sessA_1_x.mp3'), join(dir, 'sessA_2_x.mp3')],
        outputPath: join(dir, `${MERGED}.mp3`),
      },
    ]);
    expect(await readFile(join(dir, `${MERGED}.mp3`), 'utf8')).toBe('AUDIO1AUDIO2');
    expect(await readFile(join(dir, `${MERGED}.tmk`), 'utf8')).toBe('[00000:10.00]\n[00001:45.00]\n');
    expect((await readdir(dir)).sort()).toEqual([`${MERGED}.mp3`, `${MERGED}.tmk`]);
  });

  it('shifts marks past a placeholder segment', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [
        { name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' },
        { name: 'sessA_2_x.mp3', createdAt: 100, contents: 'AUDIO2' },
      ],
      [{ name: 'sessA_2_x.tmk', createdAt: 120, contents: '[00000:05.00]\n' }],
    );

    const merged = await mergeRecordingGroup(group, {
      toolkit: createFakeToolkit(),
      durationOf,
      outputDirectory: dir,
      markerExtension: '.tmk',
    });

    expect(merged.annotations).toMatchObject({ kind: 'markers', marks: [{ offsetSeconds: 105 }] });
  });

  it('marks a group without marker files as having no annotations', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [
        { name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' },
        { name: 'sessA_2_x.mp3', createdAt: 100, contents: 'AUDIO2' },
      ],
      [],
    );

    const merged = await mergeRecordingGroup(group, {
      toolkit: createFakeToolkit(),
      durationOf,
      outputDirectory: dir,
      markerExtension: '.tmk',
    });

    expect(merged.annotations).toEqual({ kind: 'none' });
    expect(await readdir(dir)).toEqual([`${MERGED}.mp3`]);
  });

  it('leaves every file in place when a marker file is malformed', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [
        { name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' },
        { name: 'sessA_2_x.mp3', createdAt: 100, contents: 'AUDIO2' },
      ],
      [{ name: 'sessA_1_x.tmk', createdAt: 10, contents: '[00000:10.00]\nnot a mark\n' }],
    );
    const toolkit = createFakeToolkit();

    await expect(
      mergeRecordingGroup(group, { toolkit, durationOf, outputDirectory: dir, markerExtension: '.tmk' }),
    ).rejects.toMatchObject({ code: ParserErrorCode.INVALID_MARKER_FILE, location: { filePath: join(dir, 'sessA_1_x.tmk') } });
    expect(toolkit.concatenations).toEqual([]);
    expect((await readdir(dir)).sort()).toEqual(['sessA_1_x.mp3', 'sessA_1_x.tmk', 'sessA_2_x.mp3']);
  });

  it('rejects a group that has marker files but no audio', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(dir, [], [{ name: 'sessA_1_x.tmk', createdAt: 10, contents: '' }]);

    await expect(
      mergeRecordingGroup(group, {
        toolkit: createFakeToolkit(),
        durationOf,
        outputDirectory: dir,
        markerExtension: '.tmk',
      }),
    ).rejects.toMatchObject({ code: RuntimeErrorCode.EMPTY_RECORDING_GROUP, location: { groupKey: 'sessA' } });
  });
});

describe('mergeRecordingGroup naming', () => {
  const deps = (dir: string) => ({
    toolkit: createFakeToolkit(),
    durationOf,
    outputDirectory: dir,
    markerExtension: '.tmk',
  });

  it('gives groups started in the same second distinct merged names', async () => {
    const dir = await createTempDir();
    const first = await writeGroup(dir, [{ name: 'sessA_1_x.mp3', createdAt: 0, contents: 'FIRST' }], []);
    const second = await writeGroup(dir, [{ name: 'sessB_1_x.mp3', createdAt: 0, contents: 'SECOND' }], [], 'sessB');

    const mergedFirst = await mergeRecordingGroup(first, deps(dir));
    const mergedSecond = await mergeRecordingGroup(second, deps(dir));

    expect(mergedFirst.name).toBe(MERGED);
    expect(mergedSecond.name).toBe(`${MERGED}_2`);
    expect((await readdir(dir)).sort()).toEqual([`${MERGED}.mp3`, `${MERGED}_2.mp3`]);
    expect(await readFile(join(dir, `${MERGED}.mp3`), 'utf8')).toBe('FIRST');
    expect(await readFile(join(dir, `${MERGED}_2.mp3`), 'utf8')).toBe('SECOND');
  });

  it('never hands the same name to groups merged concurrently', async () => {
    const dir = await createTempDir();
    const first = await writeGroup(dir, [{ name: 'sessA_1_x.mp3', createdAt: 0, contents: 'FIRST' }], []);
    const second = await writeGroup(dir, [{ name: 'sessB_1_x.mp3', createdAt: 0, contents: 'SECOND' }], [], 'sessB');

    const merged = await Promise.all([mergeRecordingGroup(first, deps(dir)), mergeRecordingGroup(second, deps(dir))]);

    expect(merged.map((recording) => recording.name).sort()).toEqual([MERGED, `${MERGED}_2`]);
    const contents = await Promise.all(merged.map((recording) => readFile(recording.audioPath, 'utf8')));
    expect(contents.sort()).toEqual(['FIRST', 'SECOND']);
  });

  it('skips a merged name already left in the directory', async () => {
    const dir = await createTempDir();
    await writeFile(join(dir, `${MERGED}.tmk`), '[00000:01.00]\n', 'utf8');
    const group = await writeGroup(
      dir,
      [{ name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' }],
      [{ name: 'sessA_1_x.tmk', createdAt: 10, contents: '[00000:05.00]\n' }],
    );

    const merged = await mergeRecordingGroup(group, deps(dir));

    expect(merged.name).toBe(`${MERGED}_2`);
    expect(await readFile(join(dir, `${MERGED}.tmk`), 'utf8')).toBe('[00000:01.00]\n');
    expect(await readFile(join(dir, `${MERGED}_2.tmk`), 'utf8')).toBe('[00000:05.00]\n');
    expect((await readdir(dir)).sort()).toEqual([`${MERGED}.tmk`, `${MERGED}_2.mp3`, `${MERGED}_2.tmk`]);
  });

  it('releases the claimed name when concatenation fails', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [
        { name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' },
        { name: 'sessA_2_x.mp3', createdAt: 100, contents: 'AUDIO2' },
      ],
      [{ name: 'sessA_1_x.tmk', createdAt: 10, contents: '[00000:10.00]\n' }],
    );
    const failure = new Error('concat failed');
    const toolkit = {
      ...createFakeToolkit(),
      concatenate: async () => {
        throw failure;
      },
    };

    await expect(
      mergeRecordingGroup(group, { toolkit, durationOf, outputDirectory: dir, markerExtension: '.tmk' }),
    ).rejects.toBe(failure);
    expect((await readdir(dir)).sort()).toEqual(['sessA_1_x.mp3', 'sessA_1_x.tmk', 'sessA_2_x.mp3']);
  });
});

describe('mergeRecordingGroup with empty marker files', () => {
  it('treats a single segment with an empty marker file as unannotated', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [{ name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' }],
      [{ name: 'sessA_1_x.tmk', createdAt: 10, contents: '' }],
    );

    const merged = await mergeRecordingGroup(group, {
      toolkit: createFakeToolkit(),
      durationOf,
      outputDirectory: dir,
      markerExtension: '.tmk',
    });

    expect(merged.annotations).toEqual({ kind: 'none' });
    expect(await readdir(dir)).toEqual([`${MERGED}.mp3`]);
  });

  it('writes no marker file when every segment marker file is empty', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [
        { name: 'sessA_1_x.mp3', createdAt: 0, contents: 'AUDIO1' },
        { name: 'sessA_2_x.mp3', createdAt: 100, contents: 'AUDIO2' },
      ],
      [
        { name: 'sessA_1_x.tmk', createdAt: 10, contents: '' },
        { name: 'sessA_2_x.tmk', createdAt: 120, contents: '' },
      ],
    );

    const merged = await mergeRecordingGroup(group, {
      toolkit: createFakeToolkit(),
      durationOf,
      outputDirectory: dir,
      markerExtension: '.tmk',
    });

    expect(merged.annotations).toEqual({ kind: 'none' });
    expect(await readdir(dir)).toEqual([`${MERGED}.mp3`]);
  });
});

describe('mergeRecordingGroup on a recording merged earlier', () => {
  it('picks the merged files up in place', async () => {
    const dir = await createTempDir();
    const group = await writeGroup(
      dir,
      [{ name: `${MERGED}.mp3`, createdAt: 500, contents: 'AUDIO1AUDIO2' }],
      [{ name: `${MERGED}.tmk`, createdAt: 500, contents: '[00000:10.00]\n[00001:45.00]\n' }],
      MERGED,
    );
    const toolkit = createFakeToolkit();

    const merged = await mergeRecordingGroup(
      { ...group, merged: true },
      { toolkit, durationOf, outputDirectory: dir, markerExtension: '.tmk' },
    );

    expect(merged).toEqual({
      groupKey: MERGED,
      name: MERGED,
      audioPath: join(dir, `${MERGED}.mp3`),
      baseCreationTime: at(0),
      durationSeconds: 150,
      annotations: {
        kind: 'markers',
        markerPath: join(dir, `${MERGED}.tmk`),
        marks: [{ offsetSeconds: 10 }, { offsetSeconds: 105 }],
      },
    });
    expect(toolkit.concatenations).toEqual([]);
    expect((await readdir(dir)).sort()).toEqual([`${MERGED}.mp3`, `${MERGED}.tmk`]);
  });

  it('rejects a merged name carried by more than one audio file', async () => {
    const dir = await createTempDir();
    const group: RecordingGroup = {
      key: MERGED,
      merged: true,
      audioSegments: [
        { path: join(dir, `${MERGED}.mp3`), name: `${MERGED}.mp3`, creationTime: at(500) },
        { path: join(dir, `${MERGED}.wav.mp3`), name: `${MERGED}.wav.mp3`, creationTime: at(500) },
      ],
      markerFiles: [],
    };

    await expect(
      mergeRecordingGroup(group, {
        toolkit: createFakeToolkit(),
        durationOf,
        outputDirectory: dir,
        markerExtension: '.tmk',
      }),
    ).rejects.toMatchObject({ code: RuntimeErrorCode.AMBIGUOUS_MERGED_RECORDING, location: { groupKey: MERGED } });
  });
});

describe('shiftMarks', () => {
  it('adds the running duration of every preceding segment', () => {
    expect(
      shiftMarks([
        { durationSeconds: 100, marks: [{ offsetSeconds: 1 }] },
        { durationSeconds: 30, marks: null },
        { durationSeconds: 50, marks: [{ offsetSeconds: 5 }, { offsetSeconds: 6 }] },
      ]),
    ).toEqual([{ offsetSeconds: 1 }, { offsetSeconds: 135 }, { offsetSeconds: 136 }]);
  });
});

describe('removeQuietly', () => {
  it('treats a missing file as removed and warns', async () => {
    const dir = await createTempDir();
    const warn = vi.fn();
    const target = join(dir, 'gone.mp3');

    await removeQuietly(target, { warn });

    expect(warn).toHaveBeenCalledWith(`[W001] ${target} was already gone.`);
  });
});
