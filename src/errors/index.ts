/**
 * Error handling module for dermaroute
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: derma config list');
 */

// Error types
export {
  CLIError,
  ConfigError,
  FileNotFoundError,
  DatabaseError,
  ValidationError,
} from './types.js';

// Error handling utilities
export {
  GENERIC_ERROR_MESSAGE,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
