export { createPrefixMatcher, createRegexMatcher, type SegmentMatcher } from './segment-matcher.js';
export { scanRecordingGroups, creationTimeOf, type ScanOptions } from './scan.js';
