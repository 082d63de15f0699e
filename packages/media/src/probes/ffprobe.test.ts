import { describe, it, expect, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@vidshift/utils';
import { ProbeError } from '@vidshift/core';
import { FFProbe } from './ffprobe.js';

function result(stdout: string, exitCode = 0): CommandResult {
  return { exitCode, stdout, stderr: exitCode === 0 ? '' : 'probe error', duration: 1, timedOut: false };
}

function fakeRunner(...results: CommandResult[]) {
  const runner = vi.fn<CommandRunner>();
  for (const r of results) {
    runner.mockResolvedValueOnce(r);
  }
  return runner;
}

describe('FFProbe', () => {
  describe('hasAudioStream', () => {
    it('is true when an audio stream index is reported', async () => {
      const runner = fakeRunner(result('1\n'));
      const probe = new FFProbe('ffprobe', { runner });

      expect(await probe.hasAudioStream('/out/a.mp4')).toBe(true);
      expect(runner).toHaveBeenCalledWith(
        'ffprobe',
        [
          '-v', 'error',
          '-select_streams', 'a',
          '-show_entries', 'stream=index',
          '-of', 'default=nokey=1:noprint_wrappers=1',
          '/out/a.mp4',
        ],
        { timeout: 60000 }
      );
    });

    it('fails closed on empty output', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('  \n')) });
      expect(await probe.hasAudioStream('/out/a.mp4')).toBe(false);
    });

    it('fails closed on a nonzero exit', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('1', 1)) });
      expect(await probe.hasAudioStream('/out/a.mp4')).toBe(false);
    });

    it('fails closed when ffprobe cannot be launched', async () => {
      const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ffprobe ENOENT'));
      const probe = new FFProbe('ffprobe', { runner });
      expect(await probe.hasAudioStream('/out/a.mp4')).toBe(false);
    });

    it('skips the probe when validation is off', async () => {
      const runner = fakeRunner();
      const probe = new FFProbe('ffprobe', { runner });

      expect(await probe.hasAudioStream('/out/a.mp4', false)).toBe(true);
      expect(runner).not.toHaveBeenCalled();
    });
  });

  describe('videoHeight', () => {
    it('reads the first non-empty line', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('\n2160\n')) });
      expect(await probe.videoHeight('/in/a.mkv')).toBe(2160);
    });

    it('is null for non-numeric output', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('N/A\n')) });
      expect(await probe.videoHeight('/in/a.mkv')).toBeNull();
    });

    it('is null for zero', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('0')) });
      expect(await probe.videoHeight('/in/a.mkv')).toBeNull();
    });
  });

  describe('isFourK', () => {
    it('does not probe when the 4K path is off', async () => {
      const runner = fakeRunner();
      const probe = new FFProbe('ffprobe', { runner });

      expect(await probe.isFourK('/in/a.mkv', { highQuality4k: false, fourKHeightThreshold: 2160 })).toBe(false);
      expect(runner).not.toHaveBeenCalled();
    });

    it('compares the height against the threshold', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('2160'), result('1080')) });
      const options = { highQuality4k: true, fourKHeightThreshold: 2160 };

      expect(await probe.isFourK('/in/a.mkv', options)).toBe(true);
      expect(await probe.isFourK('/in/b.mkv', options)).toBe(false);
    });

    it('treats an unknown height as not 4K', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('', 1)) });
      expect(await probe.isFourK('/in/a.mkv', { highQuality4k: true, fourKHeightThreshold: 2160 })).toBe(false);
    });
  });

  describe('listSubtitleTracks', () => {
    it('fills untagged language and title with defaults', async () => {
      const stdout = JSON.stringify({
        streams: [
          { index: 2, codec_name: 'subrip', codec_type: 'subtitle', tags: { language: 'eng', title: 'Full' } },
          { index: 3, codec_name: 'hdmv_pgs_subtitle', codec_type: 'subtitle' },
        ],
      });
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result(stdout)) });

      expect(await probe.listSubtitleTracks('/in/a.mkv')).toEqual([
        { index: 2, codec: 'subrip', language: 'eng', title: 'Full' },
        { index: 3, codec: 'hdmv_pgs_subtitle', language: 'und', title: '' },
      ]);
    });

    it('is empty on unparseable output', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('{not json')) });
      expect(await probe.listSubtitleTracks('/in/a.mkv')).toEqual([]);
    });
  });

  describe('probe', () => {
    it('throws ProbeError on failure', async () => {
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result('', 1)) });
      await expect(probe.probe('/in/a.mkv')).rejects.toBeInstanceOf(ProbeError);
    });

    it('keeps indexed streams', async () => {
      const stdout = JSON.stringify({
        format: { filename: '/in/a.mkv', nb_streams: 2, format_name: 'matroska,webm', duration: '60.0' },
        streams: [{ index: 0, codec_type: 'video', height: 1080 }, { codec_type: 'data' }],
      });
      const probe = new FFProbe('ffprobe', { runner: fakeRunner(result(stdout)) });

      const info = await probe.probe('/in/a.mkv');
      expect(info.format.format_name).toBe('matroska,webm');
      expect(info.format.duration).toBe('60.0');
      expect(info.streams).toHaveLength(1);
      expect(info.streams[0]?.height).toBe(1080);
    });
  });

  describe('isAvailable', () => {
    it('runs -version and checks the exit code', async () => {
      const runner = fakeRunner(result('ffprobe version 6.1'));
      const probe = new FFProbe('/opt/ffprobe', { runner });

      expect(await probe.isAvailable()).toBe(true);
      expect(runner).toHaveBeenCalledWith('/opt/ffprobe', ['-version'], { timeout: 5000 });
    });

    it('is false when the binary cannot be launched', async () => {
      const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ffprobe ENOENT'));
      expect(await new FFProbe('ffprobe', { runner }).isAvailable()).toBe(false);
    });
  });
});
