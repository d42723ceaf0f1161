/**
 * SQLite Conversation Store
 *
 * Durable history in a better-sqlite3 database. Appends run inside a
 * transaction that re-checks the session length, so the expected-length
 * guard holds across processes sharing the file.
 */

import type { Turn } from '../agent/types.js';
import { getDb, type Db } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';
import {
  CitationsSchema,
  ConstraintsSchema,
  EvidenceBundleSchema,
  SessionRowSchema,
  TurnRowSchema,
  parseJsonColumn,
  validateRow,
  validateRows,
  type SessionRow,
  type TurnRow,
} from '../database/validation.js';
import { CLIError, DatabaseError } from '../errors/index.js';
import { HistoryConflictError } from './errors.js';
import type { AppendOptions, ConversationStore, SessionSummary } from './types.js';
import { sessionTitle } from './types.js';

const CountRowSchema = SessionRowSchema.pick({ turn_count: true });

function toTurn(row: TurnRow): Turn {
  const context = `turns(${row.session_id}, ${row.seq})`;
  const evidence = parseJsonColumn(EvidenceBundleSchema, row.evidence, `${context}.evidence`);

  return Object.freeze({
    query: row.query,
    intent: row.intent,
    constraints: Object.freeze(parseJsonColumn(ConstraintsSchema, row.constraints, `${context}.constraints`)),
    evidence: Object.freeze({
      ...evidence,
      items: Object.freeze(evidence.items),
      unavailableSources: Object.freeze(evidence.unavailableSources),
      notes: Object.freeze(evidence.notes),
    }),
    answer: row.answer,
    citations: Object.freeze(parseJsonColumn(CitationsSchema, row.citations, `${context}.citations`)),
    agentUsed: row.agent_used,
    timestamp: row.timestamp,
  });
}

function toSummary(row: SessionRow): SessionSummary {
  return {
    sessionId: row.id,
    title: row.title,
    turnCount: row.turn_count,
    createdAt: row.created_at,
    lastActiveAt: row.last_active_at,
  };
}

/** Wrap driver errors; our own errors pass through. */
function wrap<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof CLIError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new DatabaseError(`Failed to ${action}: ${message}`, error);
  }
}

export class SqliteConversationStore implements ConversationStore {
  /**
   * @param db - An open connection; migrations are applied on construction
   * @throws DatabaseError if a migration fails
   */
  constructor(private readonly db: Db) {
    const result = runMigrations(db);
    const failure = result.failed[0];
    if (failure) {
      throw new DatabaseError(`History migration ${failure.name} failed: ${failure.error}`);
    }
  }

  async read(sessionId: string, limit?: number): Promise<Turn[]> {
    return wrap('read conversation history', () => {
      const rows =
        limit === undefined
          ? this.db.prepare('SELECT * FROM turns WHERE session_id = ? ORDER BY seq').all(sessionId)
          : this.db
              .prepare(
                `SELECT * FROM (
                   SELECT * FROM turns WHERE session_id = ? ORDER BY seq DESC LIMIT ?
                 ) ORDER BY seq`
              )
              .all(sessionId, Math.max(0, limit));

      return validateRows(TurnRowSchema, rows, `turns(${sessionId})`).map(toTurn);
    });
  }

  async append(
    sessionId: string,
    turn: Turn,
    expectedLength: number,
    options: AppendOptions = {}
  ): Promise<void> {
    wrap('save the turn', () => {
      this.db.transaction(() => {
        const actual = this.countTurns(sessionId);
        if (actual !== expectedLength) {
          throw new HistoryConflictError(sessionId, expectedLength, actual);
        }

        this.db
          .prepare(
            `INSERT INTO sessions (id, title, created_at, last_active_at, turn_count)
             VALUES (?, ?, ?, ?, 0)
             ON CONFLICT(id) DO NOTHING`
          )
          .run(sessionId, sessionTitle(turn.query), turn.timestamp, turn.timestamp);

        this.db
          .prepare(
            `INSERT INTO turns (session_id, seq, query, intent, constraints, evidence,
                                answer, citations, agent_used, timestamp, trace_id)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            sessionId,
            actual,
            turn.query,
            turn.intent,
            JSON.stringify(turn.constraints),
            JSON.stringify(turn.evidence),
            turn.answer,
            JSON.stringify(turn.citations),
            turn.agentUsed,
            turn.timestamp,
            options.traceId ?? null
          );

        this.db
          .prepare('UPDATE sessions SET turn_count = turn_count + 1, last_active_at = ? WHERE id = ?')
          .run(turn.timestamp, sessionId);
      }).immediate();
    });
  }

  async length(sessionId: string): Promise<number> {
    return wrap('read conversation history', () => this.countTurns(sessionId));
  }

  async listSessions(limit?: number): Promise<SessionSummary[]> {
    return wrap('list sessions', () => {
      const rows = this.db
        .prepare('SELECT * FROM sessions ORDER BY last_active_at DESC, id LIMIT ?')
        .all(limit ?? -1);
      return validateRows(SessionRowSchema, rows, 'sessions').map(toSummary);
    });
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return wrap('delete the session', () => {
      const result = this.db.prepare('DELETE FROM sessions WHERE id = ?').run(sessionId);
      return result.changes > 0;
    });
  }

  private countTurns(sessionId: string): number {
    const row = this.db.prepare('SELECT turn_count FROM sessions WHERE id = ?').get(sessionId);
    return row ? validateRow(CountRowSchema, row, `sessions.id=${sessionId}`).turn_count : 0;
  }
}

/**
 * Open the shared history database at `path` and return a store over it.
 */
export function openConversationStore(path: string): SqliteConversationStore {
  return new SqliteConversationStore(getDb(path));
}
