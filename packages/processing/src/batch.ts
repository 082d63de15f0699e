/**
 * Batch Orchestrator
 *
 * Runs the conversion engine over discovered files, one at a time and in
 * discovery order, and accumulates the session report. A single file's
 * failure never stops the batch. Cancellation is honoured between files only.
 */

import { EventEmitter } from 'node:events';
import { createLogger, pathExists } from '@vidshift/utils';
import {
  SessionReport,
  type ConversionOutcome,
  type ConversionProfile,
  type OutputPlan,
} from '@vidshift/core';
import { toSourceFile, type ConversionEngine } from './conversionEngine.js';
import { computeOutputPath, nominalOutputPath } from './outputPath.js';

const logger = createLogger({ module: 'batch' });

export interface BatchPosition {
  index: number; // 1-based
  total: number;
}

export interface BatchRunOptions {
  signal?: AbortSignal;
  dryRun?: boolean;
  now?: () => Date;
}

/**
 * Events emitted while a batch runs:
 * - 'file:start'     (path, position)
 * - 'file:skipped'   (plan, position)
 * - 'file:planned'   (plan, position)    dry runs only
 * - 'file:converted' (outcome, position)
 * - 'file:failed'    (outcome | { path, error }, position)
 * - 'batch:cancelled' (position of the first file not started)
 */
export type BatchEventName =
  | 'file:start'
  | 'file:skipped'
  | 'file:planned'
  | 'file:converted'
  | 'file:failed'
  | 'batch:cancelled';

export interface BatchFileError {
  path: string;
  error: string;
}

type FileResult =
  | { kind: 'skipped'; plan: OutputPlan }
  | { kind: 'planned'; plan: OutputPlan }
  | { kind: 'outcome'; outcome: ConversionOutcome }
  | { kind: 'error'; failure: BatchFileError };

/**
 * Decide whether a path should be converted, and where it would go
 */
export async function planOutput(
  path: string,
  profile: ConversionProfile
): Promise<OutputPlan> {
  const source = toSourceFile(path);

  // Decided on the name alone; the file itself is never touched
  if (!profile.extensions.includes(source.extension)) {
    return {
      source,
      outputPath: nominalOutputPath(path, profile),
      needsConversion: false,
      reason: 'unsupported-extension',
    };
  }

  const outputPath = await computeOutputPath(path, profile);

  if (!profile.overwriteExisting && (await pathExists(outputPath))) {
    return { source, outputPath, needsConversion: false, reason: 'output-exists' };
  }

  return { source, outputPath, needsConversion: true };
}

export async function needsConversion(
  path: string,
  profile: ConversionProfile
): Promise<boolean> {
  return (await planOutput(path, profile)).needsConversion;
}

export class BatchOrchestrator extends EventEmitter {
  private readonly engine: ConversionEngine;
  private readonly profile: ConversionProfile;

  constructor(engine: ConversionEngine, profile: ConversionProfile) {
    super();
    this.engine = engine;
    this.profile = profile;
  }

  async run(files: readonly string[], options: BatchRunOptions = {}): Promise<SessionReport> {
    const report = new SessionReport({
      mode: options.dryRun ? 'DRY_RUN' : 'NORMAL',
      now: options.now,
    });
    report.totalFiles = files.length;

    logger.info({ total: files.length, dryRun: options.dryRun ?? false }, 'Batch started');

    for (const [i, path] of files.entries()) {
      const position: BatchPosition = { index: i + 1, total: files.length };

      if (options.signal?.aborted) {
        logger.warn({ remaining: files.length - i }, 'Batch cancelled before next file');
        report.markCancelled();
        this.emit('batch:cancelled', position);
        break;
      }

      const result = await this.processFile(path, position, options.dryRun ?? false);

      switch (result.kind) {
        case 'skipped':
          report.addSkipped(path, result.plan.reason ?? 'output-exists');
          logger.info({ file: path, reason: result.plan.reason }, 'Skipping file');
          this.emit('file:skipped', result.plan, position);
          break;
        case 'planned':
          report.addPlanned(path);
          this.emit('file:planned', result.plan, position);
          break;
        case 'outcome':
          if (result.outcome.status === 'converted') {
            report.addConverted();
            this.emit('file:converted', result.outcome, position);
          } else {
            report.addFailure(path, result.outcome.failureReason ?? 'generic', result.outcome.error);
            this.emit('file:failed', result.outcome, position);
          }
          break;
        case 'error':
          report.addFailure(path, 'generic', result.failure.error);
          this.emit('file:failed', result.failure, position);
          break;
      }
    }

    report.finalize();
    logger.info(
      {
        converted: report.converted,
        skipped: report.skipped,
        failed: report.failed,
        cancelled: report.cancelled,
      },
      'Batch finished'
    );
    return report;
  }

  private async processFile(
    path: string,
    position: BatchPosition,
    dryRun: boolean
  ): Promise<FileResult> {
    try {
      const plan = await planOutput(path, this.profile);
      if (!plan.needsConversion) {
        return { kind: 'skipped', plan };
      }
      if (dryRun) {
        return { kind: 'planned', plan };
      }

      logger.info({ file: path, index: position.index, total: position.total }, 'Processing file');
      this.emit('file:start', path, position);
      return { kind: 'outcome', outcome: await this.engine.convert(plan.source) };
    } catch (error) {
      logger.error({ file: path, err: error }, 'Unexpected error while processing file');
      return {
        kind: 'error',
        failure: { path, error: error instanceof Error ? error.message : String(error) },
      };
    }
  }
}
