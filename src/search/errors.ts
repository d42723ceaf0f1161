/**
 * Search Module Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';

/** Why a source could not answer. */
export type UnavailableReason = 'timeout' | 'error';

/**
 * A retrieval source was unreachable or timed out.
 *
 * Distinct from an empty result set: the orchestrator falls back on this,
 * while an empty healthy result is answered with "no evidence found".
 * Never thrown across the specialist boundary; carried inside an
 * `unavailable` RetrievalOutcome.
 *
 * Exit code 6: Search error
 */
export class SourceUnavailableError extends CLIError {
  public readonly sourceName: string;
  public readonly reason: UnavailableReason;

  constructor(sourceName: string, reason: UnavailableReason, cause?: unknown) {
    super(
      reason === 'timeout'
        ? `Retrieval source "${sourceName}" timed out`
        : `Retrieval source "${sourceName}" is unavailable`,
      'Check that the embedding service and data files are reachable',
      6,
      cause
    );
    this.name = 'SourceUnavailableError';
    this.sourceName = sourceName;
    this.reason = reason;
  }
}
