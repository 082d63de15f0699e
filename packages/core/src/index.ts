/**
 * @vidshift/core
 *
 * Core package containing:
 * - Conversion profile (validated, immutable settings)
 * - Per-file conversion state machine
 * - Session report accumulator
 * - Error handling
 * - Shared types
 */

// State machine
export {
  CONVERSION_STATES,
  ConversionStateMachine,
  isValidTransition,
  type ConversionState,
  type ConversionStateTransition,
} from './stateMachine.js';

// Types
export type {
  ConversionStrategy,
  FailureReason,
  SkipReason,
  SourceFile,
  OutputPlan,
  ConversionAttempt,
  ConversionOutcome,
} from './types/conversion.js';

// Report
export {
  SessionReport,
  type ReportMode,
  type FailedFile,
  type SessionSummary,
  type SessionReportOptions,
} from './report.js';

// Profile
export {
  createProfile,
  profileInputSchema,
  EXTENSION_PROFILES,
  SUBTITLE_MODES,
  OUTPUT_PLACEMENTS,
  STANDARD_ENCODE,
  FOUR_K_ENCODE,
  type ConversionProfile,
  type ConversionProfileInput,
  type ExtensionProfileName,
  type SubtitleMode,
  type OutputPlacement,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type EncodeParameterSet,
  type RemuxTemplate,
  type ContainerTarget,
} from './config/profile.js';

// Errors
export {
  VidshiftError,
  ValidationError,
  StateTransitionError,
  OutputDirectoryError,
  FileOperationError,
  ProbeError,
} from './errors/index.js';

// Binary Configuration
export {
  getBinariesConfig,
  isBinaryAvailable,
  type BinaryConfig,
  type BinariesConfig,
  type BinaryName,
} from './config/binaries.js';
