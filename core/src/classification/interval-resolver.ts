import { DEFAULT_LOOKBACK_SECONDS, type LookbackSeconds } from '../config.js';
import { createRuntimeError, RuntimeErrorCode, WarningCode } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { lookupPattern } from '../patterns.js';
import type { MarkerSequence, TimeInterval, Window } from '../types.js';

export interface IntervalResolverOptions {
  lookbackSeconds: LookbackSeconds;
  /**
   * End of the recording's timeline. A span whose terminating mark was never
   * pressed ends here; without it the span collapses onto its start mark.
   */
  timelineEnd?: number;
  logger?: Partial<Logger>;
}

/**
 * Maps classified windows to time intervals on the recording's timeline.
 *
 * Walks the marks with its own cursor, advancing by each pattern's skip
 * count. No interval starts before the last mark consumed by the window
 * preceding it, so a lookback never reaches back across a resolved span.
 */
export function resolveIntervals(
  windows: readonly Window[],
  marks: MarkerSequence,
  options: IntervalResolverOptions = { lookbackSeconds: DEFAULT_LOOKBACK_SECONDS },
): TimeInterval[] {
  const intervals: TimeInterval[] = [];
  const logger = options.logger ?? {};
  let index = 0;

  for (const window of windows) {
    const definition = lookupPattern(window.pattern);
    const minimum = index > 0 ? offsetAt(marks, index - 1, window) : 0;

    if (definition.kind === 'lookback') {
      const anchor = offsetAt(marks, index, window);
      const lookback = options.lookbackSeconds[definition.pattern];
      intervals.push({ start: Math.max(minimum, anchor - lookback), end: anchor, pattern: definition.pattern });
    } else {
      const start = offsetAt(marks, index + definition.startMark, window);
      const endIndex = index + definition.endMark;
      let end: number;
      if (endIndex < marks.length) {
        end = marks[endIndex].offsetSeconds;
      } else {
        end = Math.max(start, options.timelineEnd ?? start);
        logger.warn?.(
          `[${WarningCode.UNTERMINATED_SPAN}] ${definition.pattern} starting at mark ${window.startIndex + 1} has no terminating mark; it ends at ${end}s.`,
        );
      }
      intervals.push({ start, end, pattern: definition.pattern });
    }

    logger.debug?.('classify.interval', {
      pattern: window.pattern,
      startIndex: window.startIndex,
      cursor: index,
      interval: intervals[intervals.length - 1],
    });
    index += definition.skipCount;
  }

  return intervals;
}

function offsetAt(marks: MarkerSequence, index: number, window: Window): number {
  if (index < 0 || index >= marks.length) {
    throw createRuntimeError(
      RuntimeErrorCode.WINDOW_OUT_OF_RANGE,
      `${window.pattern} window starting at mark ${window.startIndex + 1} refers to mark ${index + 1}, but the sequence has ${marks.length}.`,
      { context: 'windows do not belong to this marker sequence' },
    );
  }
  return marks[index].offsetSeconds;
}
