import { ALL_FORMATS, FilePathSource, Input } from 'mediabunny';
import { createToolError, ToolErrorCode, type DurationProbe } from '@trackmark/core';

/**
 * Reads durations from the container metadata of audio files on disk.
 */
export function createMediabunnyDurationProbe(): DurationProbe {
  return { probe: readAudioDuration };
}

export async function readAudioDuration(filePath: string): Promise<number> {
  let input: Input<FilePathSource> | undefined;

  try {
    input = new Input({
      formats: ALL_FORMATS,
      source: new FilePathSource(filePath),
    });
    const duration = await input.computeDuration();
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new Error('File reported a non-positive duration.');
    }
    return duration;
  } catch (error) {
    throw createToolError(ToolErrorCode.DURATION_LOOKUP_FAILED, `Failed to read the duration of ${filePath}.`, {
      filePath,
      context: error instanceof Error ? error.message : String(error),
      cause: error,
    });
  } finally {
    input?.dispose();
  }
}
