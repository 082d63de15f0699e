/**
 * ffmpeg and ffprobe wrappers for one session
 */

import { FFProbe } from '@vidshift/media';
import { FFmpeg } from '@vidshift/processing';
import type { Settings } from '../config/index.js';

export interface SessionTools {
  ffmpeg: FFmpeg;
  ffprobe: FFProbe;
}

export function createTools(settings: Settings): SessionTools {
  const timeout = settings.profile.toolTimeoutMs;
  return {
    ffmpeg: new FFmpeg(settings.binaries.ffmpeg.resolvedPath, { timeout }),
    ffprobe: new FFProbe(settings.binaries.ffprobe.resolvedPath),
  };
}
