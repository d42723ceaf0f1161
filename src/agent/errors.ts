/**
 * Agent Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';
import type { TurnState } from './types.js';

/**
 * The caller aborted the turn. Thrown by specialists and the synthesizer
 * so partial evidence is discarded.
 */
export class TurnAbortedError extends CLIError {
  constructor() {
    super('The request was cancelled', undefined, 130);
    this.name = 'TurnAbortedError';
  }
}

/**
 * The generator failed, timed out or produced no text.
 */
export class SynthesisFailureError extends CLIError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Check that the generation model is running', 7, cause);
    this.name = 'SynthesisFailureError';
  }
}

export type TurnFailureCode =
  | 'CLASSIFICATION_FAILED'
  | 'EVIDENCE_FAILED'
  | 'SYNTHESIS_FAILED'
  | 'HISTORY_READ_FAILED'
  | 'HISTORY_CONFLICT'
  | 'HISTORY_WRITE_FAILED'
  | 'ABORTED';

const FAILURE_MESSAGES: Record<TurnFailureCode, string> = {
  CLASSIFICATION_FAILED: 'Could not understand the question. Please try again.',
  EVIDENCE_FAILED: 'Could not look anything up for this question. Please try again.',
  SYNTHESIS_FAILED: 'Could not put together an answer right now. Please try again.',
  HISTORY_READ_FAILED: 'Could not load this conversation. Please try again.',
  HISTORY_CONFLICT: 'This conversation changed while answering. Please ask again.',
  HISTORY_WRITE_FAILED: 'The answer could not be saved. Please try again.',
  ABORTED: 'The request was cancelled.',
};

/**
 * A turn ended in the Failed state. The message is safe to show to end
 * users; the underlying error is kept as `cause`.
 */
export class TurnFailedError extends CLIError {
  /** Failing again is unlikely to be the caller's fault */
  public readonly retryable: boolean;

  constructor(
    public readonly failureCode: TurnFailureCode,
    public readonly stage: TurnState,
    cause?: unknown
  ) {
    super(FAILURE_MESSAGES[failureCode], undefined, failureCode === 'ABORTED' ? 130 : 1, cause);
    this.name = 'TurnFailedError';
    this.retryable = failureCode !== 'ABORTED';
  }
}
