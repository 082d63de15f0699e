/**
 * Plan Command
 *
 * Show what a conversion run would do, file by file, without running ffmpeg.
 */

import ora from 'ora';
import chalk from 'chalk';
import { planOutput, scanForVideos } from '@vidshift/processing';
import type { SubtitleTrack } from '@vidshift/media';
import type { OutputPlan } from '@vidshift/core';
import { loadSettings, type ProfileFlags, type Settings } from '../config/index.js';
import { createTools } from '../lib/tools.js';
import { exitWithError, printHeader, printInfo, printJson, printTracks } from '../lib/output.js';

export interface PlanOptions extends ProfileFlags {
  json?: boolean;
}

export interface PlanEntry {
  path: string;
  needsConversion: boolean;
  reason?: string;
  outputPath: string;
  subtitles: SubtitleTrack[];
}

export async function planCommand(options: PlanOptions): Promise<void> {
  let settings: Settings;
  try {
    settings = loadSettings(options);
  } catch (error) {
    exitWithError(error);
  }

  const { profile } = settings;
  const { ffprobe } = createTools(settings);
  const spinner = ora({ text: 'Scanning...', isSilent: options.json ?? false }).start();

  const files = await scanForVideos(profile.inputRoot, profile.extensions);
  const entries: PlanEntry[] = [];
  for (const [i, path] of files.entries()) {
    spinner.text = `Inspecting ${i + 1}/${files.length}`;
    const plan: OutputPlan = await planOutput(path, profile);
    entries.push({
      path,
      needsConversion: plan.needsConversion,
      reason: plan.reason,
      outputPath: plan.outputPath,
      subtitles: await ffprobe.listSubtitleTracks(path),
    });
  }
  spinner.stop();

  if (options.json) {
    printJson(entries);
    return;
  }

  printHeader(`Conversion plan for ${profile.inputRoot}`);
  if (entries.length === 0) {
    printInfo('No matching files found');
    return;
  }

  for (const entry of entries) {
    const marker = entry.needsConversion ? chalk.green('convert') : chalk.gray(`skip (${entry.reason ?? 'up to date'})`);
    console.log(`  ${marker} ${entry.path}`);
    if (entry.needsConversion) {
      console.log(`    ${chalk.gray('->')} ${entry.outputPath}`);
    }
    printTracks(entry.subtitles);
  }

  const pending = entries.filter((entry) => entry.needsConversion).length;
  console.log();
  printInfo(`${pending} of ${entries.length} file(s) would be converted`);
}
