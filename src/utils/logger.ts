/**
 * Logger Interface for Library Code
 *
 * The orchestration engine never writes to the console on its own. It
 * accepts a Logger through its options; the CLI passes its CommandContext
 * (which satisfies this interface) and tests pass silentLogger or a mock.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console-backed logger used when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
