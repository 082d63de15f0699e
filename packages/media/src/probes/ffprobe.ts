/**
 * FFProbe Wrapper
 *
 * Point-in-time stream queries against a file. The boolean and list queries
 * never throw: a crash, a missing binary or empty output resolves to the
 * pessimistic answer. Nothing is cached, since a file can be rewritten
 * between calls.
 */

import {
  executeCommand,
  runTool,
  createLogger,
  isObject,
  isNumber,
  isString,
  type CommandRunner,
  type CommandResult,
} from '@vidshift/utils';
import { ProbeError } from '@vidshift/core';
import type { FFProbeResult, FFProbeStream, FourKOptions, SubtitleTrack } from '../types.js';

const logger = createLogger({ module: 'ffprobe' });

export interface FFProbeOptions {
  runner?: CommandRunner;
  timeout?: number;
}

function parseStreams(stdout: string): unknown[] {
  const data: unknown = JSON.parse(stdout);
  if (!isObject(data) || !Array.isArray(data['streams'])) {
    return [];
  }
  return data['streams'];
}

function toSubtitleTrack(stream: unknown): SubtitleTrack | null {
  if (!isObject(stream) || !isNumber(stream['index'])) {
    return null;
  }
  const tags = isObject(stream['tags']) ? stream['tags'] : {};
  const language = tags['language'];
  const title = tags['title'];
  return {
    index: stream['index'],
    codec: isString(stream['codec_name']) ? stream['codec_name'] : '',
    language: isString(language) && language ? language : 'und',
    title: isString(title) ? title : '',
  };
}

export class FFProbe {
  private readonly ffprobePath: string;
  private readonly runner: CommandRunner;
  private readonly timeout: number;

  constructor(ffprobePath: string = 'ffprobe', options: FFProbeOptions = {}) {
    this.ffprobePath = ffprobePath;
    this.runner = options.runner ?? executeCommand;
    this.timeout = options.timeout ?? 60000;
  }

  private async run(args: string[], filePath: string): Promise<CommandResult> {
    const result = await runTool(this.runner, this.ffprobePath, [...args, filePath], {
      timeout: this.timeout,
    });
    if (result.exitCode !== 0) {
      logger.debug(
        { file: filePath, exitCode: result.exitCode, stderr: result.stderr.trim() },
        'ffprobe query failed'
      );
    }
    return result;
  }

  /**
   * True iff ffprobe reports at least one audio stream.
   * With `validate` off the check is bypassed and reports true.
   */
  async hasAudioStream(filePath: string, validate: boolean = true): Promise<boolean> {
    if (!validate) {
      return true;
    }

    const result = await this.run(
      [
        '-v', 'error',
        '-select_streams', 'a',
        '-show_entries', 'stream=index',
        '-of', 'default=nokey=1:noprint_wrappers=1',
      ],
      filePath
    );
    if (result.exitCode !== 0) {
      return false;
    }
    return result.stdout.trim().length > 0;
  }

  /**
   * Height of the first video stream, or null when it cannot be determined
   */
  async videoHeight(filePath: string): Promise<number | null> {
    const result = await this.run(
      [
        '-v', 'error',
        '-select_streams', 'v:0',
        '-show_entries', 'stream=height',
        '-of', 'csv=p=0',
      ],
      filePath
    );
    if (result.exitCode !== 0) {
      return null;
    }

    const firstLine = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    if (!firstLine || !/^\d+$/.test(firstLine)) {
      return null;
    }

    const height = parseInt(firstLine, 10);
    return height > 0 ? height : null;
  }

  /**
   * Whether the 4K encode parameter set applies. Unknown height is not 4K.
   */
  async isFourK(filePath: string, options: FourKOptions): Promise<boolean> {
    if (!options.highQuality4k) {
      return false;
    }
    const height = await this.videoHeight(filePath);
    return height !== null && height >= options.fourKHeightThreshold;
  }

  /**
   * Subtitle tracks in stream order; empty on any probe failure
   */
  async listSubtitleTracks(filePath: string): Promise<SubtitleTrack[]> {
    const result = await this.run(
      [
        '-v', 'error',
        '-select_streams', 's',
        '-show_entries', 'stream=index,codec_name,codec_type:stream_tags=language,title',
        '-of', 'json',
      ],
      filePath
    );
    if (result.exitCode !== 0 || !result.stdout.trim()) {
      return [];
    }

    try {
      return parseStreams(result.stdout)
        .map(toSubtitleTrack)
        .filter((track): track is SubtitleTrack => track !== null);
    } catch (error) {
      logger.debug({ file: filePath, err: error }, 'Unparseable subtitle probe output');
      return [];
    }
  }

  /**
   * Probe a media file and return format and stream metadata
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const result = await this.run(
      [
        '-v', 'quiet',
        '-print_format', 'json',
        '-show_format',
        '-show_streams',
        '-show_error',
      ],
      filePath
    );

    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, result.stderr.trim() || `exit code ${result.exitCode}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(result.stdout);
    } catch {
      throw new ProbeError(filePath, `unparseable output: ${result.stdout.substring(0, 200)}`);
    }

    if (!isObject(data) || !isObject(data['format']) || !Array.isArray(data['streams'])) {
      throw new ProbeError(filePath, 'output has no format or streams');
    }

    const format = data['format'];
    const streams = data['streams'].filter(
      (stream): stream is FFProbeStream => isObject(stream) && isNumber(stream['index'])
    );

    return {
      format: {
        filename: isString(format['filename']) ? format['filename'] : filePath,
        nb_streams: isNumber(format['nb_streams']) ? format['nb_streams'] : streams.length,
        format_name: isString(format['format_name']) ? format['format_name'] : 'unknown',
        format_long_name: isString(format['format_long_name']) ? format['format_long_name'] : undefined,
        duration: isString(format['duration']) ? format['duration'] : undefined,
        size: isString(format['size']) ? format['size'] : undefined,
        bit_rate: isString(format['bit_rate']) ? format['bit_rate'] : undefined,
      },
      streams,
    };
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    const result = await runTool(this.runner, this.ffprobePath, ['-version'], {
      timeout: 5000,
    });
    return result.exitCode === 0;
  }
}
