import { Buffer } from 'node:buffer';
import { spawn } from 'node:child_process';
import { createToolError, ToolErrorCode } from '@trackmark/core';

export type FfmpegRunner = (ffmpegPath: string, args: string[]) => Promise<void>;

/**
 * Runs ffmpeg to completion. Rejects with the collected stderr on a non-zero
 * exit, and with T004 when the executable cannot be started at all.
 */
export const runFfmpegCommand: FfmpegRunner = (ffmpegPath, args) =>
  new Promise((resolve, reject) => {
    const errorChunks: Buffer[] = [];

    const ffmpeg = spawn(ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      errorChunks.push(chunk);
    });

    ffmpeg.on('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        const stderr = Buffer.concat(errorChunks).toString('utf8').trim();
        reject(new Error(`ffmpeg exited with code ${code}: ${stderr}`));
      }
    });

    ffmpeg.on('error', (error) => {
      reject(
        createToolError(ToolErrorCode.FFMPEG_NOT_FOUND, `Failed to spawn ${ffmpegPath}: ${error.message}`, {
          suggestion: 'Install ffmpeg or point ffmpegPath at its executable. See: https://ffmpeg.org/download.html',
          cause: error,
        }),
      );
    });
  });

// Cache for ffmpeg availability checks, keyed by executable path
const availabilityCache = new Map<string, Promise<boolean>>();

/**
 * Check if ffmpeg can be started. The result is cached for the lifetime of
 * the process.
 */
export function checkFfmpegAvailability(
  ffmpegPath = 'ffmpeg',
  run: FfmpegRunner = runFfmpegCommand,
): Promise<boolean> {
  let cached = availabilityCache.get(ffmpegPath);
  if (!cached) {
    cached = run(ffmpegPath, ['-version']).then(
      () => true,
      () => false,
    );
    availabilityCache.set(ffmpegPath, cached);
  }
  return cached;
}

/**
 * Reset the availability cache (for testing).
 */
export function resetFfmpegCache(): void {
  availabilityCache.clear();
}
