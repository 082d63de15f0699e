/**
 * Session summary text and persistence
 */

import { join } from 'node:path';
import type { SessionSummary } from '@vidshift/core';
import { createLogger, formatDuration, safeWriteFile } from '@vidshift/utils';

const logger = createLogger({ module: 'report' });

export const SUMMARY_FILENAME = 'summary.txt';

const RULE = '='.repeat(60);
const DIVIDER = '-'.repeat(60);

export function formatSummaryText(summary: SessionSummary): string {
  const lines = [
    RULE,
    'VIDEO CONVERSION SUMMARY',
    RULE,
    `Mode:       ${summary.mode}`,
    `Start Time: ${summary.startTime}`,
    `End Time:   ${summary.endTime ?? '-'}`,
    `Duration:   ${formatDuration(summary.durationMs)}`,
    DIVIDER,
    `Total Files Found:        ${summary.totalFiles}`,
    `Converted Successfully:   ${summary.converted}`,
    `Skipped (no conversion):  ${summary.skipped}`,
    `Failed (total):           ${summary.failed}`,
  ];

  if (summary.failures['audio-validation'] > 0) {
    lines.push(`  └ Audio validation failures: ${summary.failures['audio-validation']}`);
  }
  if (summary.failures['retry-exhausted'] > 0) {
    lines.push(`  └ Failures after retries:    ${summary.failures['retry-exhausted']}`);
  }
  if (summary.cancelled) {
    lines.push('Batch cancelled before all files were processed');
  }

  lines.push(DIVIDER);

  if (summary.failedFiles.length > 0) {
    lines.push('Failed Files:');
    for (const file of summary.failedFiles) {
      lines.push(`  - ${file.path} (${file.reason})`);
    }
  }

  if (summary.wouldConvert.length > 0) {
    lines.push('Would Convert:');
    for (const path of summary.wouldConvert) {
      lines.push(`  - ${path}`);
    }
  }

  return lines.join('\n');
}

/**
 * Write the summary into the work directory and return its path
 */
export async function saveSummary(summary: SessionSummary, workDir: string): Promise<string> {
  const target = join(workDir, SUMMARY_FILENAME);
  await safeWriteFile(target, `${formatSummaryText(summary)}\n`);
  logger.info({ path: target }, 'Summary saved');
  return target;
}
