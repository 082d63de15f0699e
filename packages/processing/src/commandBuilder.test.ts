import { describe, it, expect } from 'vitest';
import { createProfile } from '@vidshift/core';
import {
  FFmpegCommandBuilder,
  buildEncodeCommand,
  buildRemuxCommand,
  escapeFilterPath,
  selectEncodeParameters,
} from './commandBuilder.js';

describe('buildRemuxCommand', () => {
  it('copies every stream and converts subtitles for the container', () => {
    expect(buildRemuxCommand('/in/a.mkv', '/out/a.mp4')).toEqual([
      '-i', '/in/a.mkv',
      '-map', '0',
      '-c', 'copy',
      '-c:s', 'mov_text',
      '/out/a.mp4',
    ]);
  });

  it('appends extra template arguments before the output', () => {
    const args = buildRemuxCommand('/in/a.mkv', '/out/a.mp4', {
      subtitleCodec: 'mov_text',
      extraArgs: ['-movflags', '+faststart'],
    });
    expect(args.slice(-3)).toEqual(['-movflags', '+faststart', '/out/a.mp4']);
  });
});

describe('buildEncodeCommand', () => {
  it('uses the standard set and drops subtitles by default', () => {
    const profile = createProfile({}, '/srv');
    expect(buildEncodeCommand('/in/a.mkv', '/out/a.mp4', profile, false)).toEqual([
      '-i', '/in/a.mkv',
      '-map', '0:v',
      '-map', '0:a?',
      '-c:v', 'libx264',
      '-preset', 'slow',
      '-crf', '18',
      '-c:a', 'aac',
      '-sn',
      '/out/a.mp4',
    ]);
  });

  it('uses the 4K set for a 4K source', () => {
    const profile = createProfile({ highQuality4k: true }, '/srv');
    expect(buildEncodeCommand('/in/a.mkv', '/out/a.mp4', profile, true)).toEqual([
      '-i', '/in/a.mkv',
      '-map', '0:v',
      '-map', '0:a?',
      '-c:v', 'libx264',
      '-preset', 'slow',
      '-crf', '16',
      '-c:a', 'aac',
      '-b:a', '640k',
      '-sn',
      '/out/a.mp4',
    ]);
  });

  it('re-multiplexes subtitle tracks in keep mode', () => {
    const profile = createProfile({ subtitleMode: 'keep' }, '/srv');
    expect(buildEncodeCommand('/in/a.mkv', '/out/a.mp4', profile, false)).toEqual([
      '-i', '/in/a.mkv',
      '-map', '0:v',
      '-map', '0:a?',
      '-map', '0:s?',
      '-c:v', 'libx264',
      '-preset', 'slow',
      '-crf', '18',
      '-c:a', 'aac',
      '-c:s', 'mov_text',
      '/out/a.mp4',
    ]);
  });

  it('burns subtitles into the picture and drops the tracks', () => {
    const profile = createProfile({ subtitleMode: 'burn-in' }, '/srv');
    const args = buildEncodeCommand('/in/Movie: Part 1.mkv', '/out/a.mp4', profile, false);

    expect(args).toContain('-sn');
    expect(args).not.toContain('0:s?');
    expect(args[args.indexOf('-vf') + 1]).toBe('subtitles=/in/Movie\\\\: Part 1.mkv');
  });
});

describe('selectEncodeParameters', () => {
  it('switches on the 4K flag', () => {
    const profile = createProfile({}, '/srv');
    expect(selectEncodeParameters(profile, false).video.crf).toBe(18);
    expect(selectEncodeParameters(profile, true).video.crf).toBe(16);
  });
});

describe('escapeFilterPath', () => {
  it('escapes a colon for both the option and the graph level', () => {
    expect(escapeFilterPath('/in/Movie: Part 2.mkv')).toBe(String.raw`/in/Movie\\: Part 2.mkv`);
  });

  it('escapes quotes and backslashes twice and graph separators once', () => {
    expect(escapeFilterPath("C:\\films\\it's[1],x;y")).toBe(
      String.raw`C\\:\\\\films\\\\it\\\'s\[1\]\,x\;y`
    );
  });

  it('leaves plain paths untouched', () => {
    expect(escapeFilterPath('/in/Show/S01E01.mkv')).toBe('/in/Show/S01E01.mkv');
  });
});

describe('FFmpegCommandBuilder', () => {
  it('requires an output file', () => {
    expect(() => new FFmpegCommandBuilder().addInput('/in/a.mkv').build()).toThrow('Output file not specified');
  });
});
