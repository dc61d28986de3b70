export {
  exportIntervals,
  exportPathFor,
  type ExportDependencies,
  type ExportedSpan,
  type FailedSpan,
  type ExportResult,
} from './export-step.js';
