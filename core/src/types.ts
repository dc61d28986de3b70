import type { Pattern } from './patterns.js';

/** One press of the recorder's marker button. */
export interface TrackMark {
  readonly offsetSeconds: number;
}

/** Track marks of one audio segment, in recording order. */
export type MarkerSequence = readonly TrackMark[];

/** A classified run of consecutive track marks. */
export interface Window {
  pattern: Pattern;
  /** Index of the run's first mark in the owning sequence. */
  startIndex: number;
}

export interface TimeInterval {
  start: number;
  end: number;
  pattern: Pattern;
}

/** One physical audio file written by the recorder. */
export interface AudioSegmentFile {
  path: string;
  name: string;
  creationTime: Date;
}

/** One physical marker file written by the recorder. */
export interface MarkerFileSource {
  path: string;
  name: string;
  creationTime: Date;
}

/**
 * Files of one recording session that the device split into several
 * segments. Both lists are sorted by file name.
 */
export interface RecordingGroup {
  key: string;
  audioSegments: AudioSegmentFile[];
  markerFiles: MarkerFileSource[];
  /**
   * Set for a recording merged by an earlier run and left in place (kept on
   * request, without annotations, or after a failed export). Its key is the
   * merged name.
   */
  merged?: boolean;
}

/** An audio segment paired with its marker file, or with a placeholder (`null`). */
export interface AlignedSegment {
  segment: AudioSegmentFile;
  markers: MarkerFileSource | null;
}

export type MergedAnnotations =
  | { kind: 'none' }
  | { kind: 'markers'; markerPath: string; marks: MarkerSequence };

/** A fully reassembled session with one continuous timeline. */
export interface MergedRecording {
  groupKey: string;
  /** Canonical name, `YYYY-MM-DD@HHhMMmSSs_merged[_<n>]`. */
  name: string;
  audioPath: string;
  baseCreationTime: Date;
  durationSeconds: number;
  annotations: MergedAnnotations;
}

export interface ExtractionRequest {
  inputPath: string;
  start: number;
  end: number;
  outputPath: string;
}

/** External audio tool: stream concatenation and sub-range extraction. */
export interface AudioToolkit {
  concatenate(inputPaths: string[], outputPath: string): Promise<void>;
  extract(request: ExtractionRequest): Promise<void>;
}

/** External tag reader returning the duration of an audio file in seconds. */
export interface DurationProbe {
  probe(filePath: string): Promise<number>;
}

export type DurationLookup = (segment: AudioSegmentFile) => Promise<number>;
