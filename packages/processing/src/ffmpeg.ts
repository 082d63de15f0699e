/**
 * FFmpeg Wrapper
 *
 * Runs ffmpeg with a prepared argument list. A launch error or a nonzero exit
 * both come back as an unsuccessful result; nothing is thrown.
 */

import { executeCommand, runTool, createLogger, type CommandRunner } from '@vidshift/utils';

const logger = createLogger({ module: 'ffmpeg' });

export interface FFmpegRunResult {
  success: boolean;
  exitCode: number;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface FFmpegOptions {
  runner?: CommandRunner;
  timeout?: number; // milliseconds, 0 = no limit
}

/**
 * The part of the ffmpeg wrapper the conversion engine depends on
 */
export interface TranscodeRunner {
  run(args: string[]): Promise<FFmpegRunResult>;
}

export class FFmpeg implements TranscodeRunner {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;
  private readonly timeout: number;

  constructor(ffmpegPath: string = 'ffmpeg', options: FFmpegOptions = {}) {
    this.ffmpegPath = ffmpegPath;
    this.runner = options.runner ?? executeCommand;
    this.timeout = options.timeout ?? 0;
  }

  /**
   * Execute an ffmpeg command. The output is always overwritten (-y);
   * whether overwriting is allowed is decided before we get here.
   */
  async run(args: string[]): Promise<FFmpegRunResult> {
    const fullArgs = ['-hide_banner', '-nostdin', '-y', ...args];
    logger.debug({ command: `${this.ffmpegPath} ${fullArgs.join(' ')}` }, 'FFmpeg command');

    const result = await runTool(this.runner, this.ffmpegPath, fullArgs, {
      timeout: this.timeout,
    });

    if (result.timedOut) {
      logger.warn({ timeoutMs: this.timeout }, 'FFmpeg timed out');
    }

    return {
      success: result.exitCode === 0 && !result.timedOut,
      exitCode: result.exitCode,
      stderr: result.stderr,
      duration: result.duration,
      timedOut: result.timedOut,
    };
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    const result = await runTool(this.runner, this.ffmpegPath, ['-version'], {
      timeout: 5000,
    });
    return result.exitCode === 0;
  }
}
