/**
 * @vidshift/processing
 *
 * Conversion layer.
 *
 * RULES:
 * - Always try a stream copy before re-encoding
 * - The output path never equals the source path
 * - One file at a time; a file's failure never stops the batch
 */

// FFmpeg wrapper
export {
  FFmpeg,
  type FFmpegOptions,
  type FFmpegRunResult,
  type TranscodeRunner,
} from './ffmpeg.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  buildRemuxCommand,
  buildEncodeCommand,
  selectEncodeParameters,
  escapeFilterPath,
  type StreamMapping,
} from './commandBuilder.js';

// Output paths
export {
  cleanStem,
  outputBaseDir,
  nominalOutputPath,
  computeOutputPath,
  resolveOutputPath,
  COLLISION_SUFFIX,
} from './outputPath.js';

// Engine
export {
  ConversionEngine,
  toSourceFile,
  hasUnsupportedSubtitleMarker,
  type ConversionEngineDeps,
  type MediaProbe,
} from './conversionEngine.js';

// Batch
export {
  BatchOrchestrator,
  planOutput,
  needsConversion,
  type BatchPosition,
  type BatchRunOptions,
  type BatchEventName,
  type BatchFileError,
} from './batch.js';

// Discovery
export { scanForVideos } from './scanner.js';
