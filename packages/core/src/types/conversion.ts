/**
 * Conversion Types
 */

import type { ConversionStateTransition } from '../stateMachine.js';

export type ConversionStrategy = 'remux' | 'encode';

export type FailureReason = 'generic' | 'audio-validation' | 'retry-exhausted';

export type SkipReason = 'unsupported-extension' | 'output-exists';

export interface SourceFile {
  readonly path: string;
  readonly extension: string;
}

export interface OutputPlan {
  source: SourceFile;
  outputPath: string;
  needsConversion: boolean;
  reason?: SkipReason;
}

export interface ConversionAttempt {
  attempt: number; // 1-based
  strategy: ConversionStrategy;
  toolSucceeded: boolean;
  audioValidated: boolean;
  fourK: boolean;
}

export interface ConversionOutcome {
  source: SourceFile;
  outputPath: string;
  status: 'converted' | 'failed';
  strategy?: ConversionStrategy;
  attempts: ConversionAttempt[];
  failureReason?: FailureReason;
  error?: string;
  movedTo?: string;
  sourceDeleted: boolean;
  history: ReadonlyArray<ConversionStateTransition>;
}
