/**
 * Convert Command
 *
 * Scan the input tree and convert every file that needs it.
 */

import ora from 'ora';
import chalk from 'chalk';
import type { BatchFileError, BatchPosition } from '@vidshift/processing';
import { BatchOrchestrator, ConversionEngine, scanForVideos } from '@vidshift/processing';
import type { ConversionOutcome, OutputPlan, SessionSummary } from '@vidshift/core';
import { createLogger } from '@vidshift/utils';
import { loadSettings, type ProfileFlags, type Settings } from '../config/index.js';
import { createTools } from '../lib/tools.js';
import { saveSummary } from '../lib/report.js';
import { DiscordNotifier } from '../lib/notifier.js';
import {
  EXIT_CONFIG_ERROR,
  EXIT_FILES_FAILED,
  exitWithError,
  printError,
  printInfo,
  printJson,
  printSummaryCounts,
  printSuccess,
  printWarning,
} from '../lib/output.js';

const logger = createLogger({ module: 'cli:convert' });

export interface ConvertOptions extends ProfileFlags {
  dryRun?: boolean;
  notify?: boolean;
  json?: boolean;
  strict?: boolean;
}

function progress(position: BatchPosition): string {
  return chalk.gray(`[${position.index}/${position.total}]`);
}

function isOutcome(result: ConversionOutcome | BatchFileError): result is ConversionOutcome {
  return 'status' in result;
}

export async function convertCommand(options: ConvertOptions): Promise<void> {
  let settings: Settings;
  try {
    settings = loadSettings(options);
  } catch (error) {
    exitWithError(error);
  }

  const { profile } = settings;
  const dryRun = options.dryRun ?? false;
  const quiet = options.json ?? false;
  const tools = createTools(settings);

  if (!dryRun) {
    const checks = [
      { binary: settings.binaries.ffmpeg, available: await tools.ffmpeg.isAvailable() },
      { binary: settings.binaries.ffprobe, available: await tools.ffprobe.isAvailable() },
    ];
    const missing = checks.filter((check) => !check.available);
    for (const { binary } of missing) {
      printError(`${binary.name} not found (${binary.resolvedPath})`);
      console.log(chalk.gray(`Install ${binary.name} or set ${binary.envVar}`));
    }
    if (missing.length > 0) {
      process.exit(EXIT_CONFIG_ERROR);
    }
  }

  const files = await scanForVideos(profile.inputRoot, profile.extensions);
  if (!quiet) {
    printInfo(`Found ${files.length} file(s) in ${profile.inputRoot}`);
  }

  const engine = new ConversionEngine({
    ffmpeg: tools.ffmpeg,
    prober: tools.ffprobe,
    profile,
  });
  const orchestrator = new BatchOrchestrator(engine, profile);
  const spinner = ora({ isSilent: quiet });

  orchestrator.on('file:start', (path: string, position: BatchPosition) => {
    spinner.start(`${progress(position)} Converting ${path}`);
  });
  orchestrator.on('file:converted', (outcome: ConversionOutcome, position: BatchPosition) => {
    spinner.succeed(`${progress(position)} ${outcome.outputPath} ${chalk.gray(`(${outcome.strategy ?? 'remux'})`)}`);
  });
  orchestrator.on('file:failed', (result: ConversionOutcome | BatchFileError, position: BatchPosition) => {
    if (isOutcome(result)) {
      const where = result.movedTo ? chalk.gray(` moved to ${result.movedTo}`) : '';
      spinner.fail(`${progress(position)} ${result.source.path} (${result.failureReason ?? 'generic'})${where}`);
    } else {
      spinner.fail(`${progress(position)} ${result.path}: ${result.error}`);
    }
  });
  orchestrator.on('file:planned', (plan: OutputPlan) => {
    if (!quiet) console.log(`[DRY RUN] Would convert: ${plan.source.path}`);
  });
  orchestrator.on('file:skipped', (plan: OutputPlan) => {
    if (quiet) return;
    if (dryRun) {
      console.log(`[DRY RUN] Skip (no conversion needed): ${plan.source.path}`);
    } else {
      console.log(chalk.gray(`Skip (${plan.reason ?? 'no conversion needed'}): ${plan.source.path}`));
    }
  });
  orchestrator.on('batch:cancelled', () => {
    printWarning('Batch cancelled; remaining files were not processed');
  });

  // First Ctrl+C lets the current file finish
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (!quiet) {
      spinner.clear();
      printWarning('Interrupted, stopping after the current file');
    }
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let summary: SessionSummary;
  try {
    const report = await orchestrator.run(files, { dryRun, signal: controller.signal });
    summary = report.toSummary();
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    spinner.stop();
  }

  try {
    const path = await saveSummary(summary, profile.workDir);
    if (!quiet) printSuccess(`Summary written to ${path}`);
  } catch (error) {
    logger.error({ err: error }, 'Failed to save summary');
    printWarning(`Could not write summary: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (quiet) {
    printJson(summary);
  } else {
    printSummaryCounts(summary);
  }

  if (settings.webhookUrl && options.notify !== false) {
    const delivered = await new DiscordNotifier({ webhookUrl: settings.webhookUrl }).sendSummary(summary);
    if (!delivered && !quiet) {
      printWarning('Webhook notification failed; see log for details');
    }
  }

  if (options.strict && summary.failed > 0) {
    process.exitCode = EXIT_FILES_FAILED;
  }
}
