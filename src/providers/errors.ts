/**
 * Provider Errors
 */

import { CLIError } from '../errors/index.js';

export type ProviderService = 'ollama' | 'serpapi';

/**
 * Thrown when a capability backend can't be reached or answers with
 * something we can't use.
 *
 * Exit code 6: External service error
 */
export class ProviderError extends CLIError {
  constructor(
    public readonly service: ProviderService,
    message: string,
    hint?: string,
    cause?: unknown,
    /** HTTP status, when the service answered */
    public readonly status?: number
  ) {
    super(message, hint, 6, cause);
    this.name = 'ProviderError';
  }
}
