/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { ValidationError, type SessionSummary } from '@vidshift/core';
import type { SubtitleTrack } from '@vidshift/media';

export const EXIT_CONFIG_ERROR = 1;
export const EXIT_FILES_FAILED = 2;

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function formatTrack(track: SubtitleTrack): string {
  const title = track.title ? ` "${track.title}"` : '';
  return `#${track.index} ${track.codec || 'unknown'} [${track.language}]${title}`;
}

export function printTracks(tracks: readonly SubtitleTrack[]): void {
  if (tracks.length === 0) {
    console.log(`    ${chalk.gray('no subtitle tracks')}`);
    return;
  }
  for (const track of tracks) {
    console.log(`    ${chalk.gray('-')} ${formatTrack(track)}`);
  }
}

export function printSummaryCounts(summary: SessionSummary): void {
  printHeader(summary.mode === 'DRY_RUN' ? 'Dry Run Summary' : 'Conversion Summary');
  printKeyValue('Total', summary.totalFiles);
  printKeyValue('Converted', chalk.green(summary.converted));
  printKeyValue('Skipped', summary.skipped);
  printKeyValue('Failed', summary.failed > 0 ? chalk.red(summary.failed) : summary.failed);
  if (summary.failures['audio-validation'] > 0) {
    printKeyValue('  Audio validation', summary.failures['audio-validation']);
  }
  if (summary.failures['retry-exhausted'] > 0) {
    printKeyValue('  After retries', summary.failures['retry-exhausted']);
  }
  if (summary.wouldConvert.length > 0) {
    printKeyValue('Would convert', summary.wouldConvert.length);
  }
  console.log();
}

/**
 * Report a command error and exit. Configuration problems exit 1.
 */
export function exitWithError(error: unknown): never {
  if (error instanceof ValidationError) {
    printError(`Configuration error: ${error.message}`);
  } else {
    printError(error instanceof Error ? error.message : 'Unknown error');
  }
  process.exit(EXIT_CONFIG_ERROR);
}
