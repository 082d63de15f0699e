import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { ValidationError } from '@vidshift/core';
import { loadSettings } from './index.js';

describe('loadSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'vidshift-config-')));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('uses defaults relative to the working directory', () => {
    const settings = loadSettings({}, { env: {}, cwd: dir });

    expect(settings.profile.inputRoot).toBe(path.join(dir, 'input'));
    expect(settings.profile.maxRetries).toBe(1);
    expect(settings.binaries.ffmpeg.resolvedPath).toBe(process.platform === 'win32' ? 'ffmpeg.exe' : 'ffmpeg');
    expect(settings.webhookUrl).toBeUndefined();
  });

  it('layers file < env < flags', async () => {
    await fs.writeFile(
      path.join(dir, 'vidshift.json'),
      JSON.stringify({ inputRoot: 'from-file', outputRoot: 'out-file', maxRetries: 4, subtitleMode: 'keep' })
    );

    const settings = loadSettings(
      { config: 'vidshift.json', input: 'from-flag' },
      { env: { VIDSHIFT_INPUT_DIR: 'from-env', VIDSHIFT_OUTPUT_DIR: 'out-env' }, cwd: dir }
    );

    expect(settings.profile.inputRoot).toBe(path.join(dir, 'from-flag'));
    expect(settings.profile.outputRoot).toBe(path.join(dir, 'out-env'));
    expect(settings.profile.maxRetries).toBe(4);
    expect(settings.profile.subtitleMode).toBe('keep');
    expect(settings.configFile).toBe(path.join(dir, 'vidshift.json'));
  });

  it('maps boolean flags onto the profile', () => {
    const settings = loadSettings(
      {
        sameDirOutput: true,
        skipAudioValidation: true,
        highQuality4k: true,
        deleteOriginal: true,
        rename: ['1080p'],
        maxRetries: 0,
      },
      { env: {}, cwd: dir }
    );

    expect(settings.profile.outputPlacement).toBe('same-dir');
    expect(settings.profile.validateAudio).toBe(false);
    expect(settings.profile.highQuality4k).toBe(true);
    expect(settings.profile.deleteAfterSuccess).toBe(true);
    expect(settings.profile.renamePatterns).toEqual(['1080p']);
    expect(settings.profile.maxRetries).toBe(0);
  });

  it('reads the config path and webhook from the environment', async () => {
    await fs.writeFile(path.join(dir, 'env.json'), JSON.stringify({ highQuality4k: true }));

    const settings = loadSettings({}, {
      env: { VIDSHIFT_CONFIG: 'env.json', VIDSHIFT_WEBHOOK_URL: 'https://discord.example/api/webhooks/1/test-secret' },
      cwd: dir,
    });

    expect(settings.profile.highQuality4k).toBe(true);
    expect(settings.webhookUrl).toBe('https://discord.example/api/webhooks/1/test-secret');
  });

  it('rejects a missing config file', () => {
    expect(() => loadSettings({ config: 'nope.json' }, { env: {}, cwd: dir })).toThrow(ValidationError);
  });

  it('rejects a config file that is not an object', async () => {
    await fs.writeFile(path.join(dir, 'list.json'), '[1, 2]');
    expect(() => loadSettings({ config: 'list.json' }, { env: {}, cwd: dir })).toThrow(/must contain a JSON object/);
  });

  it('rejects an invalid profile value from the file', async () => {
    await fs.writeFile(path.join(dir, 'bad.json'), JSON.stringify({ maxRetries: 'many' }));
    expect(() => loadSettings({ config: 'bad.json' }, { env: {}, cwd: dir })).toThrow(/maxRetries/);
  });

  it('rejects an unknown extension profile in the environment', () => {
    expect(() => loadSettings({}, { env: { VIDSHIFT_PROFILE: 'everything' }, cwd: dir })).toThrow(ValidationError);
  });
});
