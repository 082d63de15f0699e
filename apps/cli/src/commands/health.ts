/**
 * Health Command
 *
 * Check that the external tools are installed and answer.
 */

import ora from 'ora';
import chalk from 'chalk';
import { isBinaryAvailable, type BinaryConfig } from '@vidshift/core';
import { loadSettings, type Settings } from '../config/index.js';
import { exitWithError, printError, printHeader, printSuccess } from '../lib/output.js';

const statusIcons = {
  ok: '[OK]',
  missing: '[ERR]',
} as const;

export async function healthCommand(): Promise<void> {
  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    exitWithError(error);
  }

  const spinner = ora('Checking tools...').start();
  const binaries = [settings.binaries.ffmpeg, settings.binaries.ffprobe];
  const results = await Promise.all(
    binaries.map(async (binary) => ({ binary, available: await isBinaryAvailable(binary.resolvedPath) }))
  );
  spinner.stop();

  printHeader('Tool Health');
  for (const { binary, available } of results) {
    displayBinary(binary, available);
  }
  console.log();

  if (results.every((result) => result.available)) {
    printSuccess('All tools available');
  } else {
    printError('Some tools are missing');
    process.exit(1);
  }
}

function displayBinary(binary: BinaryConfig, available: boolean): void {
  const icon = available ? statusIcons.ok : statusIcons.missing;
  const color = available ? chalk.green : chalk.red;
  console.log(
    `  ${icon} ${binary.name.padEnd(10)} ${color((available ? 'available' : 'missing').padEnd(10))} ` +
    chalk.gray(`${binary.resolvedPath} (${binary.source})`)
  );
  if (!available) {
    console.log(`     ${chalk.gray(`Install it or set ${binary.envVar}`)}`);
  }
}
