/**
 * @vidshift/media
 *
 * Media probing layer.
 *
 * Responsibilities:
 * - Query ffprobe for audio presence, video height and subtitle tracks
 * - Resolve probe failures to fail-closed defaults
 * - Full metadata dump for the `probe` command
 */

// Probing
export { FFProbe, type FFProbeOptions } from './probes/ffprobe.js';

// Types
export type {
  SubtitleTrack,
  FourKOptions,
  FFProbeResult,
  FFProbeStream,
} from './types.js';
