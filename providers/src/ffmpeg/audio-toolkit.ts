import { randomUUID } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createToolError,
  isTrackmarkError,
  ToolErrorCode,
  type AudioToolkit,
  type Logger,
} from '@trackmark/core';
import { buildConcatArgs, buildConcatList, buildExtractArgs } from './command-builder.js';
import { runFfmpegCommand, type FfmpegRunner } from './runner.js';

export interface FfmpegToolkitOptions {
  ffmpegPath?: string;
  logger?: Partial<Logger>;
  /** Replaces the process runner, mainly for tests. */
  run?: FfmpegRunner;
}

/**
 * Audio operations backed by the ffmpeg executable. Both operations copy the
 * encoded stream, so no quality is lost.
 */
export function createFfmpegAudioToolkit(options: FfmpegToolkitOptions = {}): AudioToolkit {
  const ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
  const logger = options.logger ?? {};
  const run = options.run ?? runFfmpegCommand;

  return {
    async concatenate(inputPaths, outputPath) {
      const tempDir = join(tmpdir(), `trackmark-concat-${randomUUID()}`);
      try {
        await mkdir(tempDir, { recursive: true });
        const listPath = join(tempDir, 'segments.txt');
        await writeFile(listPath, buildConcatList(inputPaths), 'utf8');
        const args = buildConcatArgs(listPath, outputPath);
        logger.debug?.('ffmpeg.concat', { args });
        await run(ffmpegPath, args);
      } catch (error) {
        throw wrapToolError(error, ToolErrorCode.CONCATENATION_FAILED, `ffmpeg could not join ${inputPaths.length} segment(s).`, outputPath);
      } finally {
        await rm(tempDir, { recursive: true, force: true }).catch((error: unknown) => {
          logger.warn?.(`Could not remove ${tempDir}: ${error instanceof Error ? error.message : String(error)}`);
        });
      }
    },

    async extract(request) {
      const args = buildExtractArgs(request);
      logger.debug?.('ffmpeg.extract', { args });
      try {
        await run(ffmpegPath, args);
      } catch (error) {
        throw wrapToolError(
          error,
          ToolErrorCode.EXTRACTION_FAILED,
          `ffmpeg could not extract ${request.start}s-${request.end}s of ${request.inputPath}.`,
          request.outputPath,
        );
      }
    },
  };
}

function wrapToolError(error: unknown, code: string, message: string, filePath: string): Error {
  if (isTrackmarkError(error) && error.code === ToolErrorCode.FFMPEG_NOT_FOUND) {
    return error;
  }
  return createToolError(code, message, {
    filePath,
    context: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}
