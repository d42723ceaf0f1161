/**
 * Database Module
 *
 * SQLite plumbing for the conversation history store.
 *
 * @example
 * ```ts
 * import { getDb, runMigrations } from './database/index.js';
 *
 * const db = getDb();
 * runMigrations(db);
 * ```
 */

// Connection management
export { MEMORY_DB, openDatabase, getDb, closeDb, type Db } from './connection.js';

// Migration utilities
export {
  runMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Validation schemas and utilities
export {
  ConstraintPredicateSchema,
  ConstraintsSchema,
  EvidenceItemSchema,
  EvidenceBundleSchema,
  CitationsSchema,
  SessionRowSchema,
  TurnRowSchema,
  MigrationRowSchema,
  type SessionRow,
  type TurnRow,
  SchemaValidationError,
  validateRow,
  validateRows,
  parseJsonColumn,
} from './validation.js';
