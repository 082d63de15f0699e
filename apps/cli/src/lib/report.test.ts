import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import type { SessionSummary } from '@vidshift/core';
import { formatSummaryText, saveSummary } from './report.js';

function summary(overrides: Partial<SessionSummary> = {}): SessionSummary {
  return {
    mode: 'NORMAL',
    startTime: '2024-01-01T10:00:00.000Z',
    endTime: '2024-01-01T10:01:30.000Z',
    durationMs: 90_000,
    totalFiles: 4,
    converted: 2,
    skipped: 1,
    failed: 1,
    failures: { generic: 0, 'audio-validation': 0, 'retry-exhausted': 1 },
    cancelled: false,
    failedFiles: [{ path: '/in/b.mkv', reason: 'retry-exhausted' }],
    skippedFiles: [{ path: '/in/c.mp4', reason: 'output-exists' }],
    wouldConvert: [],
    ...overrides,
  };
}

describe('formatSummaryText', () => {
  it('renders counts and the failed files', () => {
    expect(formatSummaryText(summary()).split('\n')).toEqual([
      '='.repeat(60),
      'VIDEO CONVERSION SUMMARY',
      '='.repeat(60),
      'Mode:       NORMAL',
      'Start Time: 2024-01-01T10:00:00.000Z',
      'End Time:   2024-01-01T10:01:30.000Z',
      'Duration:   1m 30s',
      '-'.repeat(60),
      'Total Files Found:        4',
      'Converted Successfully:   2',
      'Skipped (no conversion):  1',
      'Failed (total):           1',
      '  └ Failures after retries:    1',
      '-'.repeat(60),
      'Failed Files:',
      '  - /in/b.mkv (retry-exhausted)',
    ]);
  });

  it('omits bucket lines that are zero', () => {
    const text = formatSummaryText(summary({
      failed: 0,
      failures: { generic: 0, 'audio-validation': 0, 'retry-exhausted': 0 },
      failedFiles: [],
    }));
    expect(text.includes('└')).toBe(false);
    expect(text.includes('Failed Files:')).toBe(false);
  });

  it('shows the audio bucket when set', () => {
    const text = formatSummaryText(summary({
      failures: { generic: 0, 'audio-validation': 1, 'retry-exhausted': 0 },
      failedFiles: [{ path: '/in/b.mkv', reason: 'audio-validation' }],
    }));
    expect(text.split('\n')[12]).toBe('  └ Audio validation failures: 1');
  });

  it('lists planned files for a dry run', () => {
    const lines = formatSummaryText(summary({ mode: 'DRY_RUN', wouldConvert: ['/in/a.mkv'] })).split('\n');
    expect(lines.slice(-2)).toEqual(['Would Convert:', '  - /in/a.mkv']);
  });
});

describe('saveSummary', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vidshift-report-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes summary.txt into the work directory', async () => {
    const workDir = path.join(dir, 'temp');
    const target = await saveSummary(summary(), workDir);

    expect(target).toBe(path.join(workDir, 'summary.txt'));
    expect(await fs.readFile(target, 'utf8')).toBe(`${formatSummaryText(summary())}\n`);
  });
});
