/**
 * Conversion State Machine
 *
 * Strict per-file state machine for the conversion engine.
 *
 * State Flow:
 * PENDING → REMUX_ATTEMPT → AUDIO_CHECK → SUCCESS
 *                        ↘ ENCODE_ATTEMPT → AUDIO_CHECK → SUCCESS | RETRY | FAILED
 * RETRY → REMUX_ATTEMPT (remux always leads a new pass)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 */

import { StateTransitionError } from './errors/index.js';

export const CONVERSION_STATES = [
  'PENDING',
  'REMUX_ATTEMPT',
  'ENCODE_ATTEMPT',
  'AUDIO_CHECK',
  'RETRY',
  'SUCCESS',
  'FAILED',
] as const;

export type ConversionState = (typeof CONVERSION_STATES)[number];

export interface ConversionStateTransition {
  from: ConversionState;
  to: ConversionState;
  timestamp: Date;
  reason?: string;
}

const validTransitions: Record<ConversionState, ReadonlySet<ConversionState>> = {
  PENDING: new Set<ConversionState>(['REMUX_ATTEMPT', 'FAILED']),
  REMUX_ATTEMPT: new Set<ConversionState>([
    'AUDIO_CHECK',
    'ENCODE_ATTEMPT',
    'FAILED',
  ]),
  ENCODE_ATTEMPT: new Set<ConversionState>([
    'AUDIO_CHECK',
    'RETRY',
    'FAILED',
  ]),
  AUDIO_CHECK: new Set<ConversionState>(['SUCCESS', 'RETRY', 'FAILED']),
  RETRY: new Set<ConversionState>(['REMUX_ATTEMPT', 'FAILED']),
  SUCCESS: new Set<ConversionState>([]), // Terminal state
  FAILED: new Set<ConversionState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: ConversionState, to: ConversionState): boolean {
  return validTransitions[from].has(to);
}

export class ConversionStateMachine {
  private currentState: ConversionState;
  private history: ConversionStateTransition[] = [];
  private readonly file: string;

  constructor(file: string, initialState: ConversionState = 'PENDING') {
    this.file = file;
    this.currentState = initialState;
  }

  getState(): ConversionState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<ConversionStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: ConversionState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: ConversionState, reason?: string): ConversionStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.file, this.currentState, targetState);
    }

    const transition: ConversionStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'SUCCESS' || this.currentState === 'FAILED';
  }

  /**
   * Fail from any non-terminal state
   */
  fail(reason: string): ConversionStateTransition {
    return this.transitionTo('FAILED', reason);
  }

  /**
   * Compact path of visited states, e.g. PENDING>REMUX_ATTEMPT>AUDIO_CHECK>SUCCESS
   */
  trace(): string {
    const first = this.history[0];
    const start = first ? first.from : this.currentState;
    return [start, ...this.history.map((t) => t.to)].join('>');
  }
}
