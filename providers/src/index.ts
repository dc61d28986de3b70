export { createFfmpegAudioToolkit, type FfmpegToolkitOptions } from './ffmpeg/audio-toolkit.js';
export {
  buildConcatArgs,
  buildConcatList,
  buildExtractArgs,
  formatToolTimestamp,
} from './ffmpeg/command-builder.js';
export {
  checkFfmpegAvailability,
  resetFfmpegCache,
  runFfmpegCommand,
  type FfmpegRunner,
} from './ffmpeg/runner.js';
export { createMediabunnyDurationProbe, readAudioDuration } from './duration/mediabunny-probe.js';
