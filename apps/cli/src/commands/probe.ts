/**
 * Probe Command
 *
 * Show what the conversion engine would learn about a single file.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { formatDuration, pathExists } from '@vidshift/utils';
import { ProbeError } from '@vidshift/core';
import type { FFProbeResult } from '@vidshift/media';
import { loadSettings, type ProfileFlags, type Settings } from '../config/index.js';
import { createTools } from '../lib/tools.js';
import {
  exitWithError,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printTracks,
  printWarning,
} from '../lib/output.js';

export interface ProbeOptions extends Pick<ProfileFlags, 'config' | 'highQuality4k'> {
  json?: boolean;
}

export async function probeCommand(file: string, options: ProbeOptions): Promise<void> {
  let settings: Settings;
  try {
    settings = loadSettings(options);
  } catch (error) {
    exitWithError(error);
  }

  const filePath = resolve(file);
  if (!(await pathExists(filePath))) {
    printError(`File not found: ${filePath}`);
    process.exit(1);
  }

  const { profile } = settings;
  const { ffprobe } = createTools(settings);
  const spinner = ora({ text: 'Probing...', isSilent: options.json ?? false }).start();

  const hasAudio = await ffprobe.hasAudioStream(filePath);
  const height = await ffprobe.videoHeight(filePath);
  const fourK = height !== null && height >= profile.fourKHeightThreshold;
  const subtitles = await ffprobe.listSubtitleTracks(filePath);

  let info: FFProbeResult | null = null;
  try {
    info = await ffprobe.probe(filePath);
  } catch (error) {
    if (!(error instanceof ProbeError)) throw error;
    spinner.stop();
    printWarning(error.message);
  }
  spinner.stop();

  if (options.json) {
    printJson({ path: filePath, hasAudio, height, fourK, subtitles, format: info?.format ?? null });
    return;
  }

  printHeader(filePath);
  if (info) {
    const seconds = Number(info.format.duration);
    printKeyValue('Container', info.format.format_long_name ?? info.format.format_name);
    printKeyValue('Duration', Number.isFinite(seconds) ? formatDuration(Math.round(seconds * 1000)) : chalk.gray('unknown'));
    printKeyValue('Streams', info.streams.map((s) => s.codec_type ?? 'unknown').join(', '));
  }
  printKeyValue('Audio', hasAudio ? chalk.green('yes') : chalk.red('no'));
  printKeyValue('Height', height ?? chalk.gray('unknown'));
  printKeyValue('4K', fourK ? 'yes' : 'no');
  if (fourK && !profile.highQuality4k) {
    console.log(`  ${chalk.gray('4K encode settings are off; enable with --high-quality-4k')}`);
  }
  printKeyValue('Subtitles', subtitles.length);
  printTracks(subtitles);
}
