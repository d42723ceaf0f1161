/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Logging
export { type Logger, consoleLogger, silentLogger } from './logger.js';

// Deadlines and cancellation
export {
  runWithTimeout,
  isAbortError,
  OperationTimeoutError,
  OperationAbortedError,
  type TimeoutOptions,
} from './abort.js';
