/**
 * Conversation History Types
 */

import type { Turn } from '../agent/types.js';

/** Listing entry for a stored session. */
export interface SessionSummary {
  sessionId: string;
  /** First question of the session, shortened */
  title: string;
  turnCount: number;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601 */
  lastActiveAt: string;
}

/** Extra data stored with a turn. */
export interface AppendOptions {
  /** Langfuse trace that produced the turn */
  traceId?: string;
}

/**
 * Append-only turn log per session.
 *
 * `append` is the serialization point for a session: it succeeds only when
 * the session still has `expectedLength` turns, so two concurrent turns
 * that read the same history can't both land.
 */
export interface ConversationStore {
  /** The last `limit` turns (all when omitted), oldest first */
  read(sessionId: string, limit?: number): Promise<Turn[]>;
  /** @throws HistoryConflictError when the session length is not `expectedLength` */
  append(sessionId: string, turn: Turn, expectedLength: number, options?: AppendOptions): Promise<void>;
  /** Number of turns stored for the session (0 for unknown sessions) */
  length(sessionId: string): Promise<number>;
  /** Most recently active first */
  listSessions(limit?: number): Promise<SessionSummary[]>;
  /** @returns whether the session existed */
  deleteSession(sessionId: string): Promise<boolean>;
}

/** Maximum title length derived from the first question */
export const SESSION_TITLE_LENGTH = 50;

/**
 * Session title from its first question.
 *
 * @example
 * ```ts
 * sessionTitle('  Recommend a moisturizer   for oily skin ') // 'Recommend a moisturizer for oily skin'
 * ```
 */
export function sessionTitle(query: string): string {
  const text = query.trim().replace(/\s+/g, ' ');
  return text.length > SESSION_TITLE_LENGTH ? `${text.slice(0, SESSION_TITLE_LENGTH - 3)}...` : text;
}
