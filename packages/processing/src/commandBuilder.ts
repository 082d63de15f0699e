/**
 * FFmpeg Command Builder
 *
 * Fluent API for assembling ffmpeg argument lists, plus the two candidate
 * invocations the conversion engine chooses between.
 *
 * Pure: nothing here touches the filesystem or spawns a process.
 */

import { logger } from '@vidshift/utils';
import type {
  AudioCodecOptions,
  ConversionProfile,
  EncodeParameterSet,
  RemuxTemplate,
  VideoCodecOptions,
} from '@vidshift/core';

export interface StreamMapping {
  inputIndex: number;
  streamSpec?: string; // e.g., 'v', 'a:1', 's'; omitted maps every stream
  optional?: boolean; // Add ? for optional
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private allCodec: 'copy' | null = null;
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private subtitleCodec: string | null = null;
  private dropSubtitles = false;
  private videoFilters: string[] = [];
  private outputArgs: string[] = [];
  private outputFile: string = '';

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec?: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Map every stream of an input
   */
  mapAll(inputIndex: number = 0): this {
    return this.map(inputIndex);
  }

  mapVideo(inputIndex: number = 0, optional: boolean = false): this {
    return this.map(inputIndex, 'v', optional);
  }

  mapAudio(inputIndex: number = 0, optional: boolean = true): this {
    return this.map(inputIndex, 'a', optional);
  }

  mapSubtitles(inputIndex: number = 0, optional: boolean = true): this {
    return this.map(inputIndex, 's', optional);
  }

  /**
   * Copy every stream without re-encoding
   */
  copyAll(): this {
    this.allCodec = 'copy';
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  setSubtitleCodec(codec: string): this {
    this.subtitleCodec = codec;
    return this;
  }

  /**
   * Drop all subtitle streams from the output
   */
  noSubtitles(): this {
    this.dropSubtitles = true;
    return this;
  }

  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  addOutputArgs(...args: string[]): this {
    this.outputArgs.push(...args);
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array (without the ffmpeg binary itself)
   */
  build(): string[] {
    const args: string[] = [];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    for (const mapping of this.mappings) {
      const spec = mapping.streamSpec ? `${mapping.inputIndex}:${mapping.streamSpec}` : `${mapping.inputIndex}`;
      args.push('-map', mapping.optional ? `${spec}?` : spec);
    }

    if (this.allCodec) {
      args.push('-c', this.allCodec);
    }

    if (this.videoCodec) {
      const v = this.videoCodec;
      args.push('-c:v', v.codec);
      if (v.preset) args.push('-preset', v.preset);
      if (v.crf !== undefined) args.push('-crf', v.crf.toString());
      if (v.bitrate) args.push('-b:v', v.bitrate);
      if (v.maxrate) args.push('-maxrate', v.maxrate);
      if (v.bufsize) args.push('-bufsize', v.bufsize);
      if (v.profile) args.push('-profile:v', v.profile);
      if (v.level) args.push('-level', v.level);
      if (v.tune) args.push('-tune', v.tune);
      if (v.pixFmt) args.push('-pix_fmt', v.pixFmt);
      if (v.extraArgs) args.push(...v.extraArgs);
    }

    if (this.videoFilters.length > 0) {
      if (this.allCodec === 'copy') {
        logger.warn('Video filters specified but streams are copied - filters will be ignored');
      } else {
        args.push('-vf', this.videoFilters.join(','));
      }
    }

    if (this.audioCodec) {
      const a = this.audioCodec;
      args.push('-c:a', a.codec);
      if (a.bitrate) args.push('-b:a', a.bitrate);
      if (a.sampleRate) args.push('-ar', a.sampleRate.toString());
      if (a.channels) args.push('-ac', a.channels.toString());
      if (a.extraArgs) args.push(...a.extraArgs);
    }

    if (this.dropSubtitles) {
      args.push('-sn');
    } else if (this.subtitleCodec) {
      args.push('-c:s', this.subtitleCodec);
    }

    args.push(...this.outputArgs);

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

/**
 * Escape a path for use as a filter option inside a filtergraph.
 * ffmpeg unescapes twice: once for the graph, then once for the filter's options.
 */
export function escapeFilterPath(path: string): string {
  const optionLevel = path.replace(/[\\':]/g, '\\$&');
  return optionLevel.replace(/[\\'[\],;]/g, '\\$&');
}

/**
 * Stream-copy every input stream into the target container.
 * Subtitles are converted to a codec the container accepts.
 */
export function buildRemuxCommand(
  inputFile: string,
  outputFile: string,
  remux: RemuxTemplate = { subtitleCodec: 'mov_text', extraArgs: [] }
): string[] {
  return new FFmpegCommandBuilder()
    .addInput(inputFile)
    .mapAll(0)
    .copyAll()
    .setSubtitleCodec(remux.subtitleCodec)
    .addOutputArgs(...remux.extraArgs)
    .setOutput(outputFile)
    .build();
}

/**
 * Pick the encode parameter set for a source
 */
export function selectEncodeParameters(
  profile: Pick<ConversionProfile, 'encode'>,
  is4k: boolean
): EncodeParameterSet {
  return is4k ? profile.encode.fourK : profile.encode.standard;
}

/**
 * Full re-encode. Video is mapped explicitly, audio only if present, and the
 * profile's subtitle policy decides what happens to subtitle tracks.
 */
export function buildEncodeCommand(
  inputFile: string,
  outputFile: string,
  profile: Pick<ConversionProfile, 'encode' | 'subtitleMode' | 'remux'>,
  is4k: boolean
): string[] {
  const params = selectEncodeParameters(profile, is4k);

  const builder = new FFmpegCommandBuilder()
    .addInput(inputFile)
    .mapVideo(0)
    .mapAudio(0, true);

  switch (profile.subtitleMode) {
    case 'burn-in':
      // Rasterized into the picture; no subtitle streams in the output
      builder.addVideoFilter(`subtitles=${escapeFilterPath(inputFile)}`).noSubtitles();
      break;
    case 'keep':
      builder.mapSubtitles(0, true).setSubtitleCodec(profile.remux.subtitleCodec);
      break;
    case 'none':
      builder.noSubtitles();
      break;
  }

  return builder
    .setVideoCodec(params.video)
    .setAudioCodec(params.audio)
    .setOutput(outputFile)
    .build();
}
