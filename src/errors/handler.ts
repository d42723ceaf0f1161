/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode for debugging with stack traces
 *
 * Only CLIError messages are shown as-is. Anything else is internal and is
 * replaced by a generic message unless --verbose is set.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/** Message shown in place of unexpected internal errors */
export const GENERIC_ERROR_MESSAGE = 'Something went wrong while answering. Please try again.';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces and internal error text */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Format an error for display.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }
    if (verbose && error.stack) {
      lines.push('', chalk.dim('Stack trace:'), chalk.dim(error.stack));
    }
    return lines.join('\n');
  }

  const message = verbose ? describeUnknown(error) : GENERIC_ERROR_MESSAGE;

  if (json) {
    const output: ErrorOutput = {
      error: message,
      code: 1,
      stack: verbose && error instanceof Error ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + message];
  if (verbose && error instanceof Error && error.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(error.stack));
  } else if (!verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }
  return lines.join('\n');
}

function describeUnknown(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Handle an error by formatting it to stderr and exiting.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a global error handler for process events.
 *
 * ```typescript
 * const handler = createGlobalErrorHandler({ verbose: true });
 * process.on('uncaughtException', handler);
 * process.on('unhandledRejection', handler);
 * ```
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
