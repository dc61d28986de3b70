import type { LookbackPattern } from './patterns.js';
import { PATTERN_TABLE } from './patterns.js';

export type LookbackSeconds = Record<LookbackPattern, number>;

export interface ClassifierConfig {
  /** Largest accumulated gap (seconds) a run of marks may span. */
  gapThresholdSeconds: number;
  lookbackSeconds: LookbackSeconds;
}

export interface TrackmarkConfig extends ClassifierConfig {
  audioExtension: string;
  markerExtension: string;
  /** Root directory of exported spans; defaults to the scanned directory. */
  outputRoot?: string;
  concurrency: number;
  /** Keep the merged recording after its spans were exported. */
  retainMerged: boolean;
  ffmpegPath: string;
}

export interface TrackmarkConfigOverrides extends Partial<Omit<TrackmarkConfig, 'lookbackSeconds'>> {
  lookbackSeconds?: Partial<LookbackSeconds>;
}

export const DEFAULT_GAP_THRESHOLD_SECONDS = 30;

function defaultLookback(pattern: LookbackPattern): number {
  const definition = PATTERN_TABLE[pattern];
  return definition.kind === 'lookback' ? definition.lookbackSeconds : 0;
}

export const DEFAULT_LOOKBACK_SECONDS: LookbackSeconds = {
  SHORT_NOTE: defaultLookback('SHORT_NOTE'),
  LONG_NOTE: defaultLookback('LONG_NOTE'),
  PROJECT_IDEA: defaultLookback('PROJECT_IDEA'),
};

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  gapThresholdSeconds: DEFAULT_GAP_THRESHOLD_SECONDS,
  lookbackSeconds: DEFAULT_LOOKBACK_SECONDS,
};

export const DEFAULT_CONFIG: TrackmarkConfig = {
  ...DEFAULT_CLASSIFIER_CONFIG,
  audioExtension: '.mp3',
  markerExtension: '.tmk',
  concurrency: 1,
  retainMerged: false,
  ffmpegPath: 'ffmpeg',
};

/**
 * Layers overrides on top of the defaults. Later overrides win; fields left
 * undefined keep the value beneath them.
 */
export function resolveConfig(...overrides: TrackmarkConfigOverrides[]): TrackmarkConfig {
  let resolved: TrackmarkConfig = { ...DEFAULT_CONFIG, lookbackSeconds: { ...DEFAULT_LOOKBACK_SECONDS } };
  for (const override of overrides) {
    const lookback = override.lookbackSeconds ?? {};
    resolved = {
      gapThresholdSeconds: override.gapThresholdSeconds ?? resolved.gapThresholdSeconds,
      lookbackSeconds: {
        SHORT_NOTE: lookback.SHORT_NOTE ?? resolved.lookbackSeconds.SHORT_NOTE,
        LONG_NOTE: lookback.LONG_NOTE ?? resolved.lookbackSeconds.LONG_NOTE,
        PROJECT_IDEA: lookback.PROJECT_IDEA ?? resolved.lookbackSeconds.PROJECT_IDEA,
      },
      audioExtension: override.audioExtension ?? resolved.audioExtension,
      markerExtension: override.markerExtension ?? resolved.markerExtension,
      outputRoot: override.outputRoot ?? resolved.outputRoot,
      concurrency: override.concurrency ?? resolved.concurrency,
      retainMerged: override.retainMerged ?? resolved.retainMerged,
      ffmpegPath: override.ffmpegPath ?? resolved.ffmpegPath,
    };
  }
  return resolved;
}
