/**
 * Custom Error Classes
 */

import type { ConversionState } from '../stateMachine.js';

/**
 * Base error class for all vidshift errors
 */
export class VidshiftError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VidshiftError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid configuration
 */
export class ValidationError extends VidshiftError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends VidshiftError {
  constructor(
    file: string,
    fromState: ConversionState,
    toState: ConversionState
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { file, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * The output directory could not be created. Fatal for the file being processed.
 */
export class OutputDirectoryError extends VidshiftError {
  constructor(directory: string, cause: unknown) {
    super(
      `Cannot create output directory ${directory}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'OUTPUT_DIRECTORY_ERROR',
      { directory },
      { cause }
    );
    this.name = 'OutputDirectoryError';
  }
}

/**
 * A file could not be moved or deleted
 */
export class FileOperationError extends VidshiftError {
  constructor(operation: 'move' | 'delete', path: string, cause: unknown) {
    super(
      `Failed to ${operation} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'FILE_OPERATION_ERROR',
      { operation, path },
      { cause }
    );
    this.name = 'FileOperationError';
  }
}

/**
 * ffprobe could not produce usable metadata
 */
export class ProbeError extends VidshiftError {
  constructor(path: string, message: string) {
    super(
      `Probe failed for ${path}: ${message}`,
      'PROBE_ERROR',
      { path }
    );
    this.name = 'ProbeError';
  }
}
