export * from './types.js';
export * from './logger.js';
export * from './errors/index.js';
export * from './patterns.js';
export * from './config.js';
export * from './naming.js';
export { parseTrackMark, formatTrackMark } from './parsing/timestamp-codec.js';
export { parseMarkerFile, readMarkerFile, serializeMarkers, writeMarkerFile } from './parsing/marker-file.js';
export * from './classification/index.js';
export * from './grouping/index.js';
export * from './merge/index.js';
export * from './export/index.js';
export { DurationCache } from './duration-cache.js';
export {
  processRecordingGroup,
  processDirectory,
  type PipelineContext,
  type GroupResult,
  type DirectoryRunOptions,
  type DirectoryRunResult,
} from './pipeline.js';
