/**
 * Database Connection Module
 *
 * Opens SQLite connections using better-sqlite3. The CLI keeps a single
 * connection to ~/.dermaroute/history.db; tests open ':memory:' databases.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { getDbPath } from '../config/paths.js';
import { DatabaseError } from '../errors/index.js';

export type Db = Database.Database;

/** In-memory database name understood by SQLite */
export const MEMORY_DB = ':memory:';

// One shared connection per path
const connections = new Map<string, Db>();
let exitHookRegistered = false;

/**
 * Open a database, creating the parent directory when needed.
 *
 * @throws DatabaseError if the file can't be opened
 *
 * @example
 * ```ts
 * const db = openDatabase(':memory:');
 * runMigrations(db);
 * ```
 */
export function openDatabase(path: string): Db {
  try {
    if (path !== MEMORY_DB) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    const connection = new Database(path);

    // Enable foreign keys (OFF by default in SQLite!)
    connection.pragma('foreign_keys = ON');

    if (path !== MEMORY_DB) {
      // WAL mode for better concurrent read performance
      connection.pragma('journal_mode = WAL');
    }

    return connection;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatabaseError(`Failed to open history database at ${path}: ${message}`, error);
  }
}

/**
 * Get the shared connection for `path` (default ~/.dermaroute/history.db),
 * opening it on first use. Each path has its own connection.
 */
export function getDb(path: string = getDbPath()): Db {
  const existing = connections.get(path);
  if (existing) {
    return existing;
  }

  const connection = openDatabase(path);
  connections.set(path, connection);

  if (!exitHookRegistered) {
    process.on('exit', () => closeDb());
    exitHookRegistered = true;
  }

  return connection;
}

/**
 * Close the shared connection for `path`, or every shared connection when
 * no path is given. Safe to call when nothing is open.
 */
export function closeDb(path?: string): void {
  const paths = path === undefined ? [...connections.keys()] : [path];
  for (const key of paths) {
    connections.get(key)?.close();
    connections.delete(key);
  }
}
