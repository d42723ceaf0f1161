/**
 * Centralized Path Definitions
 *
 * Single source of truth for dermaroute's directory paths.
 *
 * Directory structure:
 * ~/.dermaroute/
 * ├── history.db      (SQLite conversation history)
 * └── config.toml     (User configuration)
 *
 * DERMAROUTE_HOME overrides the directory (used by tests and containers).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the dermaroute directory path (~/.dermaroute)
 */
export function getAppDir(): string {
  return process.env['DERMAROUTE_HOME'] ?? join(homedir(), '.dermaroute');
}

/**
 * Get the default history database path (~/.dermaroute/history.db)
 */
export function getDbPath(): string {
  return join(getAppDir(), 'history.db');
}

/**
 * Get the config file path (~/.dermaroute/config.toml)
 */
export function getConfigPath(): string {
  return join(getAppDir(), 'config.toml');
}
