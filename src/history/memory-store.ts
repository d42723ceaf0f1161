/**
 * In-Memory Conversation Store
 *
 * Process-local history used by tests and one-shot CLI runs. Nothing
 * survives the process.
 */

import type { Turn } from '../agent/types.js';
import { HistoryConflictError } from './errors.js';
import type { AppendOptions, ConversationStore, SessionSummary } from './types.js';
import { sessionTitle } from './types.js';

interface SessionEntry {
  turns: Turn[];
  createdAt: string;
  lastActiveAt: string;
}

export class InMemoryConversationStore implements ConversationStore {
  private readonly sessions = new Map<string, SessionEntry>();

  async read(sessionId: string, limit?: number): Promise<Turn[]> {
    const turns = this.sessions.get(sessionId)?.turns ?? [];
    return limit === undefined ? [...turns] : turns.slice(Math.max(0, turns.length - limit));
  }

  async append(
    sessionId: string,
    turn: Turn,
    expectedLength: number,
    _options?: AppendOptions
  ): Promise<void> {
    const entry = this.sessions.get(sessionId);
    const actual = entry?.turns.length ?? 0;
    if (actual !== expectedLength) {
      throw new HistoryConflictError(sessionId, expectedLength, actual);
    }

    if (entry) {
      entry.turns.push(turn);
      entry.lastActiveAt = turn.timestamp;
    } else {
      this.sessions.set(sessionId, {
        turns: [turn],
        createdAt: turn.timestamp,
        lastActiveAt: turn.timestamp,
      });
    }
  }

  async length(sessionId: string): Promise<number> {
    return this.sessions.get(sessionId)?.turns.length ?? 0;
  }

  async listSessions(limit?: number): Promise<SessionSummary[]> {
    const summaries = [...this.sessions.entries()].map(([sessionId, entry]) => ({
      sessionId,
      title: sessionTitle(entry.turns[0]?.query ?? ''),
      turnCount: entry.turns.length,
      createdAt: entry.createdAt,
      lastActiveAt: entry.lastActiveAt,
    }));
    summaries.sort((a, b) => b.lastActiveAt.localeCompare(a.lastActiveAt));
    return limit === undefined ? summaries : summaries.slice(0, limit);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }
}
