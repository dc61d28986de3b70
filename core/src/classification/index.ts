import { DEFAULT_CLASSIFIER_CONFIG, type ClassifierConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { MarkerSequence, TimeInterval } from '../types.js';
import { resolveIntervals } from './interval-resolver.js';
import { detectWindows } from './window-engine.js';

export { detectWindows, type WindowEngineOptions } from './window-engine.js';
export { resolveIntervals, type IntervalResolverOptions } from './interval-resolver.js';

export interface ClassifyOptions {
  timelineEnd?: number;
  logger?: Partial<Logger>;
}

/**
 * Classifies a marker sequence into annotated time intervals.
 */
export function classifyMarkers(
  marks: MarkerSequence,
  config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG,
  options: ClassifyOptions = {},
): TimeInterval[] {
  const windows = detectWindows(marks, { gapThresholdSeconds: config.gapThresholdSeconds });
  return resolveIntervals(windows, marks, {
    lookbackSeconds: config.lookbackSeconds,
    timelineEnd: options.timelineEnd,
    logger: options.logger,
  });
}
