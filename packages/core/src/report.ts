/**
 * Session Report
 *
 * Mutable accumulator for one batch run. Only the batch orchestrator
 * writes to it, and only between files.
 */

import type { FailureReason, SkipReason } from './types/conversion.js';

export type ReportMode = 'NORMAL' | 'DRY_RUN';

export interface FailedFile {
  path: string;
  reason: FailureReason;
  error?: string;
}

export interface SessionSummary {
  mode: ReportMode;
  startTime: string;
  endTime: string | null;
  durationMs: number;
  totalFiles: number;
  converted: number;
  skipped: number;
  failed: number;
  failures: Record<FailureReason, number>;
  cancelled: boolean;
  failedFiles: FailedFile[];
  skippedFiles: Array<{ path: string; reason: SkipReason }>;
  wouldConvert: string[];
}

export interface SessionReportOptions {
  mode?: ReportMode;
  now?: () => Date;
}

export class SessionReport {
  readonly mode: ReportMode;
  readonly startTime: Date;
  private endTimeValue: Date | null = null;
  private readonly now: () => Date;

  totalFiles = 0;
  converted = 0;
  skipped = 0;
  cancelled = false;

  private readonly failureCounts: Record<FailureReason, number> = {
    generic: 0,
    'audio-validation': 0,
    'retry-exhausted': 0,
  };
  private readonly failedFileList: FailedFile[] = [];
  private readonly skippedFiles = new Map<string, SkipReason>();
  private readonly plannedFiles: string[] = [];

  constructor(options: SessionReportOptions = {}) {
    this.mode = options.mode ?? 'NORMAL';
    this.now = options.now ?? (() => new Date());
    this.startTime = this.now();
  }

  get endTime(): Date | null {
    return this.endTimeValue;
  }

  get failed(): number {
    return this.failedFileList.length;
  }

  get failures(): Readonly<Record<FailureReason, number>> {
    return { ...this.failureCounts };
  }

  get failedFiles(): ReadonlyArray<FailedFile> {
    return [...this.failedFileList];
  }

  get wouldConvert(): ReadonlyArray<string> {
    return [...this.plannedFiles];
  }

  get isFinalized(): boolean {
    return this.endTimeValue !== null;
  }

  addConverted(): void {
    this.assertOpen();
    this.converted += 1;
  }

  addSkipped(path: string, reason: SkipReason): void {
    this.assertOpen();
    this.skipped += 1;
    this.skippedFiles.set(path, reason);
  }

  /**
   * Dry runs list what a real run would convert
   */
  addPlanned(path: string): void {
    this.assertOpen();
    this.plannedFiles.push(path);
  }

  /**
   * Count a failure once, in exactly one bucket
   */
  addFailure(path: string, reason: FailureReason, error?: string): void {
    this.assertOpen();
    this.failureCounts[reason] += 1;
    this.failedFileList.push({ path, reason, error });
  }

  markCancelled(): void {
    this.assertOpen();
    this.cancelled = true;
  }

  /**
   * Stamp the end time. Later calls are no-ops.
   */
  finalize(): this {
    if (!this.endTimeValue) {
      this.endTimeValue = this.now();
    }
    return this;
  }

  durationMs(): number {
    if (!this.endTimeValue) return 0;
    return this.endTimeValue.getTime() - this.startTime.getTime();
  }

  toSummary(): SessionSummary {
    return {
      mode: this.mode,
      startTime: this.startTime.toISOString(),
      endTime: this.endTimeValue?.toISOString() ?? null,
      durationMs: this.durationMs(),
      totalFiles: this.totalFiles,
      converted: this.converted,
      skipped: this.skipped,
      failed: this.failed,
      failures: this.failures,
      cancelled: this.cancelled,
      failedFiles: [...this.failedFileList],
      skippedFiles: Array.from(this.skippedFiles, ([path, reason]) => ({ path, reason })),
      wouldConvert: [...this.plannedFiles],
    };
  }

  private assertOpen(): void {
    if (this.endTimeValue) {
      throw new Error('Session report is already finalized');
    }
  }
}
