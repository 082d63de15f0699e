import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import type { SessionSummary } from '@vidshift/core';
import { DiscordNotifier, FALLBACK_MESSAGE, buildSummaryEmbed } from './notifier.js';

const ORIGIN = 'https://discord.example';
const HOOK_PATH = '/api/webhooks/1/test-secret';

function summary(failedCount = 0): SessionSummary {
  const failedFiles = Array.from({ length: failedCount }, (_, i) => ({
    path: `/in/file${i + 1}.mkv`,
    reason: 'retry-exhausted' as const,
  }));
  return {
    mode: 'NORMAL',
    startTime: '2024-01-01T10:00:00.000Z',
    endTime: '2024-01-01T10:00:05.000Z',
    durationMs: 5000,
    totalFiles: failedCount + 2,
    converted: 2,
    skipped: 0,
    failed: failedCount,
    failures: { generic: 0, 'audio-validation': 0, 'retry-exhausted': failedCount },
    cancelled: false,
    failedFiles,
    skippedFiles: [],
    wouldConvert: [],
  };
}

describe('buildSummaryEmbed', () => {
  it('lists counts only when nothing failed', () => {
    const embed = buildSummaryEmbed(summary());
    expect(embed.title).toBe('Media Conversion Summary');
    expect(embed.color).toBe(0x2ecc71);
    expect(embed.fields.map((f) => f.name)).toEqual(['Mode', 'Total Files', 'Converted', 'Skipped', 'Failed']);
  });

  it('truncates the failed list after ten entries', () => {
    const embed = buildSummaryEmbed(summary(12));
    const failed = embed.fields.find((f) => f.name === 'Failed Files');
    const lines = failed?.value.split('\n') ?? [];

    expect(embed.fields.find((f) => f.name === 'Retry Failures')?.value).toBe('12');
    expect(lines).toHaveLength(11);
    expect(lines[9]).toBe('- /in/file10.mkv');
    expect(lines[10]).toBe('... (more omitted)');
    expect(failed?.inline).toBe(false);
  });
});

describe('DiscordNotifier', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const notifier = () =>
    new DiscordNotifier({
      webhookUrl: `${ORIGIN}${HOOK_PATH}`,
      dispatcher: agent,
      retry: { maxAttempts: 2, initialDelay: 0 },
    });

  it('posts the embed', async () => {
    let body = '';
    agent.get(ORIGIN).intercept({ path: HOOK_PATH, method: 'POST' }).reply(204, (opts) => {
      body = String(opts.body);
      return '';
    });

    expect(await notifier().sendSummary(summary(1))).toBe(true);
    const payload: unknown = JSON.parse(body);
    expect(payload).toMatchObject({ embeds: [{ title: 'Media Conversion Summary' }] });
  });

  it('retries a server error', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: HOOK_PATH, method: 'POST' }).reply(502, 'bad gateway');
    pool.intercept({ path: HOOK_PATH, method: 'POST' }).reply(204, '');

    expect(await notifier().sendMessage('done')).toBe(true);
  });

  it('falls back to the plain message when the embed is rejected', async () => {
    const pool = agent.get(ORIGIN);
    let fallback = '';
    pool.intercept({ path: HOOK_PATH, method: 'POST' }).reply(400, 'invalid embed');
    pool.intercept({ path: HOOK_PATH, method: 'POST' }).reply(204, (opts) => {
      fallback = String(opts.body);
      return '';
    });

    expect(await notifier().sendSummary(summary())).toBe(true);
    expect(JSON.parse(fallback)).toEqual({ content: FALLBACK_MESSAGE });
  });

  it('reports failure without throwing', async () => {
    agent.get(ORIGIN).intercept({ path: HOOK_PATH, method: 'POST' }).reply(403, 'forbidden').times(2);

    expect(await notifier().sendSummary(summary())).toBe(false);
  });
});
