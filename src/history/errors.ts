/**
 * History Errors
 */

import { CLIError } from '../errors/index.js';

/**
 * A turn was appended by someone else between read and append.
 */
export class HistoryConflictError extends CLIError {
  constructor(
    public readonly sessionId: string,
    public readonly expectedLength: number,
    public readonly actualLength: number
  ) {
    super(
      `Session "${sessionId}" has ${actualLength} turns, expected ${expectedLength}`,
      'Another request for this session finished first; retry the question',
      5
    );
    this.name = 'HistoryConflictError';
  }
}
