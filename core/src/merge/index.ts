export { alignSegments } from './segment-aligner.js';
export { mergeRecordingGroup, shiftMarks, removeQuietly, type MergeDependencies } from './merge-orchestrator.js';
