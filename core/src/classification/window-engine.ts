import { DEFAULT_GAP_THRESHOLD_SECONDS } from '../config.js';
import { MAX_ARITY, PATTERN_TABLE, patternForArity } from '../patterns.js';
import type { MarkerSequence, Window } from '../types.js';

export interface WindowEngineOptions {
  gapThresholdSeconds: number;
}

/**
 * Partitions a marker sequence into classified runs of closely spaced marks.
 *
 * Runs grow while the accumulated gap between their marks stays within the
 * threshold, up to MAX_ARITY marks. The mark that pushes a run over the
 * threshold opens the next run, except after three or four marks: spans
 * keep that mark as their terminating mark.
 *
 * Offsets are assumed to increase; nothing is sorted here.
 */
export function detectWindows(
  marks: MarkerSequence,
  options: WindowEngineOptions = { gapThresholdSeconds: DEFAULT_GAP_THRESHOLD_SECONDS },
): Window[] {
  const windows: Window[] = [];
  const { gapThresholdSeconds } = options;

  let index = 0;
  let runLength = 0;
  let accumulatedGap = 0;
  let atRunStart = true;

  const reset = (): void => {
    runLength = 0;
    accumulatedGap = 0;
    atRunStart = true;
  };

  while (index < marks.length) {
    if (runLength < MAX_ARITY) {
      if (atRunStart) {
        atRunStart = false;
      } else {
        accumulatedGap += marks[index].offsetSeconds - marks[index - 1].offsetSeconds;
      }
      index += 1;
    }

    if (runLength >= MAX_ARITY) {
      windows.push({ pattern: patternForArity(MAX_ARITY), startIndex: index - MAX_ARITY });
      reset();
    } else if (accumulatedGap > gapThresholdSeconds) {
      // The mark just consumed lies beyond the threshold.
      const pattern = patternForArity(runLength);
      windows.push({ pattern, startIndex: index - runLength - 1 });
      if (PATTERN_TABLE[pattern].kind !== 'span') {
        index -= 1;
      }
      reset();
    } else {
      runLength += 1;
    }
  }

  if (runLength > 0) {
    windows.push({ pattern: patternForArity(runLength), startIndex: index - runLength });
  }

  return windows;
}
