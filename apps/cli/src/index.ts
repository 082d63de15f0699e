#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for vidshift.
 * Commands only wire settings to the processing packages and print results.
 */

import './env.js';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';

// Commands
import { convertCommand } from './commands/convert.js';
import { planCommand } from './commands/plan.js';
import { probeCommand } from './commands/probe.js';
import { healthCommand } from './commands/health.js';

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

/**
 * Options shared by every command that builds a conversion profile
 */
function withProfileOptions(command: Command): Command {
  return command
    .option('-i, --input <dir>', 'Input directory to scan')
    .option('-o, --output <dir>', 'Output root (mirrored tree)')
    .option('-w, --work-dir <dir>', 'Work directory (summary, failed files)')
    .option('-c, --config <file>', 'JSON config file')
    .option('--same-dir-output', 'Write each output next to its source')
    .option('--overwrite', 'Convert even when the output already exists')
    .option('--rename <patterns...>', 'Substrings to strip from output names')
    .option('--profile <name>', 'Extension profile (plex-friendly, archival)')
    .option('--subtitles <mode>', 'Subtitle handling on encode (none, keep, burn-in)')
    .option('--high-quality-4k', 'Use 4K encode settings for 2160p sources');
}

const program = new Command();

program
  .name('vidshift')
  .description('Batch video conversion: remux first, encode as fallback')
  .version('1.0.0');

// ============================================
// CONVERSION COMMANDS
// ============================================

withProfileOptions(
  program
    .command('convert')
    .description('Convert every file under the input directory that needs it')
)
  .option('--delete-original', 'Delete the source after a successful conversion')
  .option('-r, --max-retries <count>', 'Extra passes after the first attempt', parseCount)
  .option('--skip-audio-validation', 'Do not require an audio stream in the output')
  .option('--timeout <ms>', 'Kill ffmpeg after this many milliseconds (0 = never)', parseCount)
  .option('-n, --dry-run', 'Report what would be converted without running ffmpeg')
  .option('--no-notify', 'Do not send the webhook notification')
  .option('--json', 'Print the session summary as JSON')
  .option('--strict', 'Exit with code 2 when any file failed')
  .action(convertCommand);

withProfileOptions(
  program
    .command('plan')
    .description('List discovered files, their output paths and subtitle tracks')
)
  .option('--json', 'Output in JSON format')
  .action(planCommand);

// ============================================
// SYSTEM COMMANDS
// ============================================

program
  .command('probe <file>')
  .description('Show audio presence, height, 4K flag and subtitle tracks of a file')
  .option('-c, --config <file>', 'JSON config file')
  .option('--high-quality-4k', 'Report as the 4K encode path would see it')
  .option('--json', 'Output in JSON format')
  .action(probeCommand);

program
  .command('health')
  .description('Check that ffmpeg and ffprobe are available')
  .action(healthCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('vidshift --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
