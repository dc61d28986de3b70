import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import chalk from 'chalk';
import {
  createToolError,
  formatError,
  isMissingFileError,
  isTrackmarkError,
  processDirectory,
  ToolErrorCode,
  type AudioToolkit,
  type DirectoryRunResult,
  type DurationProbe,
  type GroupResult,
  type Logger,
  type TrackmarkConfig,
} from '@trackmark/core';
import {
  checkFfmpegAvailability,
  createFfmpegAudioToolkit,
  createMediabunnyDurationProbe,
} from '@trackmark/providers';

export interface ProcessOptions {
  directory: string;
  config: TrackmarkConfig;
  logger: Logger;
  /** Defaults to the ffmpeg toolkit at `config.ffmpegPath`. */
  toolkit?: AudioToolkit;
  /** Defaults to reading container metadata with mediabunny. */
  probe?: DurationProbe;
}

export async function runProcess(options: ProcessOptions): Promise<DirectoryRunResult> {
  const { config, logger } = options;
  const directory = resolve(options.directory);
  await assertDirectory(directory);

  const toolkit = options.toolkit ?? (await createCheckedToolkit(config, logger));
  const result = await processDirectory(directory, {
    config,
    toolkit,
    probe: options.probe ?? createMediabunnyDurationProbe(),
    logger,
  });

  printProcessSummary(logger, result);
  return result;
}

async function createCheckedToolkit(config: TrackmarkConfig, logger: Logger): Promise<AudioToolkit> {
  if (!(await checkFfmpegAvailability(config.ffmpegPath))) {
    throw createToolError(ToolErrorCode.FFMPEG_NOT_FOUND, `ffmpeg could not be started from "${config.ffmpegPath}".`, {
      suggestion: 'Install ffmpeg or set ffmpegPath in the config file. See: https://ffmpeg.org/download.html',
    });
  }
  return createFfmpegAudioToolkit({ ffmpegPath: config.ffmpegPath, logger });
}

export async function assertDirectory(directory: string): Promise<void> {
  try {
    const stats = await stat(directory);
    if (!stats.isDirectory()) {
      throw new Error(`${directory} is not a directory.`);
    }
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new Error(`Directory not found: ${directory}`);
    }
    throw error;
  }
}

export function printProcessSummary(logger: Logger, result: DirectoryRunResult): void {
  const colorizeStatus = result.status === 'succeeded' ? chalk.green : chalk.red;
  const failures = result.groups.filter((group) => group.status === 'failed').length;

  logger.info('');
  logger.info(
    `${colorizeStatus(result.status === 'succeeded' ? 'Processed' : 'Finished with failures')}: ` +
      `${result.groups.length} group${result.groups.length === 1 ? '' : 's'}` +
      (failures > 0 ? `, ${failures} failed` : ''),
  );
  logger.info(`  Output: ${result.outputRoot}`);

  for (const group of result.groups) {
    logger.info(`  ${describeGroup(group)}`);
    if (group.status === 'failed') {
      const detail = isTrackmarkError(group.error)
        ? formatError(group.error)
        : group.error instanceof Error
          ? group.error.message
          : String(group.error);
      for (const line of detail.split('\n')) {
        logger.error(`    ${line}`);
      }
    }
  }
}

export function describeGroup(group: GroupResult): string {
  if (group.status === 'failed') {
    return `${group.groupKey}: failed`;
  }
  const name = group.recording?.name ?? group.groupKey;
  const exported = group.export?.exported.length ?? 0;
  const withheld = group.export?.withheld.length ?? 0;
  return `${group.groupKey} -> ${name}: ${exported} exported` + (withheld > 0 ? `, ${withheld} confidential withheld` : '');
}
