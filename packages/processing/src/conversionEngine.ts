/**
 * Conversion Engine
 *
 * Converts one file: remux first, re-encode as the in-attempt fallback,
 * validate audio on the result, retry, and on exhaustion park the source in
 * the failed-items directory. Every pass starts with a remux again.
 *
 * convert() never throws; every problem ends up in the returned outcome.
 */

import { basename, extname, join } from 'node:path';
import {
  createLogger,
  moveFile,
  pathExists,
  removeFile,
  getExtension,
} from '@vidshift/utils';
import {
  ConversionStateMachine,
  FileOperationError,
  type ConversionAttempt,
  type ConversionOutcome,
  type ConversionProfile,
  type ConversionStrategy,
  type FailureReason,
  type SourceFile,
} from '@vidshift/core';
import type { FFProbe } from '@vidshift/media';
import { buildEncodeCommand, buildRemuxCommand } from './commandBuilder.js';
import type { TranscodeRunner } from './ffmpeg.js';
import { resolveOutputPath } from './outputPath.js';

const logger = createLogger({ module: 'conversion-engine' });

// stderr fragments ffmpeg prints when a subtitle stream cannot go into the target container
const SUBTITLE_UNSUPPORTED_MARKERS = [
  'Subtitle codec not supported',
  'Subtitle encoding currently only possible from text to text or bitmap to bitmap',
  'codec not currently supported in container',
];

/**
 * The probe queries the engine relies on
 */
export type MediaProbe = Pick<FFProbe, 'hasAudioStream' | 'isFourK'>;

export interface ConversionEngineDeps {
  ffmpeg: TranscodeRunner;
  prober: MediaProbe;
  profile: ConversionProfile;
}

export function toSourceFile(path: string): SourceFile {
  return { path, extension: getExtension(path) };
}

export function hasUnsupportedSubtitleMarker(stderr: string): boolean {
  return SUBTITLE_UNSUPPORTED_MARKERS.some((marker) => stderr.includes(marker));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConversionEngine {
  private readonly ffmpeg: TranscodeRunner;
  private readonly prober: MediaProbe;
  private readonly profile: ConversionProfile;

  constructor(deps: ConversionEngineDeps) {
    this.ffmpeg = deps.ffmpeg;
    this.prober = deps.prober;
    this.profile = deps.profile;
  }

  async convert(source: SourceFile): Promise<ConversionOutcome> {
    const machine = new ConversionStateMachine(source.path);
    const attempts: ConversionAttempt[] = [];

    let outputPath: string;
    try {
      outputPath = await resolveOutputPath(source.path, this.profile);
    } catch (error) {
      // Without a writable destination nothing else can proceed
      logger.error({ file: source.path, err: error }, 'Cannot prepare output location');
      machine.fail(errorMessage(error));
      return {
        source,
        outputPath: '',
        status: 'failed',
        attempts,
        failureReason: 'generic',
        error: errorMessage(error),
        sourceDeleted: false,
        history: machine.getHistory(),
      };
    }

    try {
      return await this.runAttempts(source, outputPath, machine, attempts);
    } catch (error) {
      logger.error({ file: source.path, err: error }, 'Conversion aborted');
      if (!machine.isTerminal()) {
        machine.fail(errorMessage(error));
      }
      await this.discardOutput(outputPath);
      return {
        source,
        outputPath,
        status: 'failed',
        attempts,
        failureReason: 'generic',
        error: errorMessage(error),
        sourceDeleted: false,
        history: machine.getHistory(),
      };
    }
  }

  private async runAttempts(
    source: SourceFile,
    outputPath: string,
    machine: ConversionStateMachine,
    attempts: ConversionAttempt[]
  ): Promise<ConversionOutcome> {
    const name = basename(source.path);

    for (let attempt = 1; ; attempt++) {
      machine.transitionTo('REMUX_ATTEMPT', `attempt ${attempt}`);

      let strategy: ConversionStrategy = 'remux';
      let fourK = false;
      let run = await this.ffmpeg.run(buildRemuxCommand(source.path, outputPath, this.profile.remux));

      if (run.success) {
        logger.info({ file: name, attempt }, 'Copy mode succeeded');
      } else {
        logger.info({ file: name, attempt, exitCode: run.exitCode }, 'Copy mode failed, retrying with encode mode');
        if (hasUnsupportedSubtitleMarker(run.stderr)) {
          logger.info({ file: name }, 'Remux failed on an unsupported subtitle format');
        }
        await this.discardOutput(outputPath);

        machine.transitionTo('ENCODE_ATTEMPT');
        strategy = 'encode';
        fourK = await this.prober.isFourK(source.path, this.profile);
        if (fourK) {
          logger.info({ file: name }, 'Using 4K encode settings');
        }
        run = await this.ffmpeg.run(buildEncodeCommand(source.path, outputPath, this.profile, fourK));
        if (!run.success) {
          logger.warn({ file: name, attempt, exitCode: run.exitCode }, 'Encoding failed');
        }
      }

      let audioValidated = false;
      if (run.success) {
        machine.transitionTo('AUDIO_CHECK');
        audioValidated = await this.prober.hasAudioStream(outputPath, this.profile.validateAudio);
        if (!audioValidated) {
          logger.warn({ file: name, attempt }, 'Audio validation failed (no audio streams detected)');
        }
      }

      attempts.push({ attempt, strategy, toolSucceeded: run.success, audioValidated, fourK });

      if (run.success && audioValidated) {
        machine.transitionTo('SUCCESS', strategy);
        logger.info({ file: name, states: machine.trace() }, 'Conversion succeeded');
        return this.succeed(source, outputPath, strategy, attempts, machine);
      }

      // A half-written or audio-less file must not look like a finished conversion
      await this.discardOutput(outputPath);

      if (attempt > this.profile.maxRetries) {
        const reason: FailureReason = run.success ? 'audio-validation' : 'retry-exhausted';
        machine.fail(reason);
        logger.warn({ file: name, reason, states: machine.trace() }, 'Giving up after retries');
        return this.exhaust(source, outputPath, attempts, reason, machine);
      }

      machine.transitionTo('RETRY', run.success ? 'audio validation failed' : 'encode failed');
    }
  }

  private async succeed(
    source: SourceFile,
    outputPath: string,
    strategy: ConversionStrategy,
    attempts: ConversionAttempt[],
    machine: ConversionStateMachine
  ): Promise<ConversionOutcome> {
    let sourceDeleted = false;

    if (this.profile.deleteAfterSuccess) {
      try {
        await removeFile(source.path);
        sourceDeleted = true;
        logger.info({ file: source.path }, 'Deleted original file');
      } catch (error) {
        // The conversion itself stands
        logger.error({ err: new FileOperationError('delete', source.path, error) }, 'Failed to delete original file');
      }
    }

    return {
      source,
      outputPath,
      status: 'converted',
      strategy,
      attempts,
      sourceDeleted,
      history: machine.getHistory(),
    };
  }

  private async exhaust(
    source: SourceFile,
    outputPath: string,
    attempts: ConversionAttempt[],
    reason: FailureReason,
    machine: ConversionStateMachine
  ): Promise<ConversionOutcome> {
    let movedTo: string | undefined;
    let error: string | undefined;

    try {
      const target = await this.failedTarget(source.path);
      await moveFile(source.path, target);
      movedTo = target;
      logger.info({ file: source.path, target }, 'Moved failed file');
    } catch (moveError) {
      const wrapped = new FileOperationError('move', source.path, moveError);
      error = wrapped.message;
      logger.error({ err: wrapped }, 'Failed to move file after retries');
    }

    return {
      source,
      outputPath,
      status: 'failed',
      attempts,
      failureReason: reason,
      error,
      movedTo,
      sourceDeleted: false,
      history: machine.getHistory(),
    };
  }

  /**
   * First free name for the source inside the failed-items directory
   */
  private async failedTarget(sourcePath: string): Promise<string> {
    const name = basename(sourcePath);
    let target = join(this.profile.failedDir, name);
    const ext = extname(name);
    const stem = basename(name, ext);
    for (let n = 1; await pathExists(target); n++) {
      target = join(this.profile.failedDir, `${stem}_${n}${ext}`);
    }
    return target;
  }

  private async discardOutput(outputPath: string): Promise<void> {
    try {
      await removeFile(outputPath);
    } catch (error) {
      logger.warn({ file: outputPath, err: error }, 'Could not remove partial output');
    }
  }
}
