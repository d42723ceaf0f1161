/**
 * Conversation Store Tests
 *
 * The same contract runs against the in-memory store and the SQLite store
 * (on an in-memory database); SQLite-specific behaviour follows.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InMemoryConversationStore } from '../memory-store.js';
import { openConversationStore, SqliteConversationStore } from '../sqlite-store.js';
import { HistoryConflictError } from '../errors.js';
import { sessionTitle } from '../types.js';
import type { ConversationStore } from '../types.js';
import type { Turn } from '../../agent/types.js';
import { createBundle } from '../../agent/specialists.js';
import { closeDb, MEMORY_DB, openDatabase, type Db } from '../../database/connection.js';
import { getAppliedMigrations } from '../../database/migrate.js';
import { SchemaValidationError } from '../../database/validation.js';

// ============================================================================
// Test Helpers
// ============================================================================

function createTurn(query: string, timestamp: string): Turn {
  return {
    query,
    intent: 'catalog-lookup',
    constraints: { price: { kind: 'range', max: 1200 } },
    evidence: createBundle('catalog', {
      items: [
        {
          sourceId: 'p-800',
          sourceKind: 'catalog',
          score: 0.97,
          excerpt: 'Product: Oil-Free Gel Moisturizer',
          metadata: { name: 'Oil-Free Gel Moisturizer', price: 800 },
        },
      ],
      notes: ['relaxed once'],
    }),
    answer: 'Try the gel [1].',
    citations: ['p-800'],
    agentUsed: 'catalog',
    timestamp,
  };
}

const T1 = createTurn('Recommend a moisturizer under 1200 for oily skin', '2025-03-01T10:00:00.000Z');
const T2 = createTurn('what about for dry skin?', '2025-03-01T10:01:00.000Z');
const T3 = createTurn('and a cheaper one?', '2025-03-01T10:02:00.000Z');

// ============================================================================
// Shared contract
// ============================================================================

const factories: Array<[string, () => { store: ConversationStore; close: () => void }]> = [
  ['InMemoryConversationStore', () => ({ store: new InMemoryConversationStore(), close: () => {} })],
  [
    'SqliteConversationStore',
    () => {
      const db = openDatabase(MEMORY_DB);
      return { store: new SqliteConversationStore(db), close: () => db.close() };
    },
  ],
];

describe.each(factories)('%s', (_name, create) => {
  let store: ConversationStore;
  let close: () => void;

  beforeEach(() => {
    ({ store, close } = create());
  });

  afterEach(() => {
    close();
  });

  it('should start empty', async () => {
    expect(await store.length('s-1')).toBe(0);
    expect(await store.read('s-1')).toEqual([]);
    expect(await store.listSessions()).toEqual([]);
  });

  it('should append turns in order', async () => {
    await store.append('s-1', T1, 0);
    await store.append('s-1', T2, 1);

    expect(await store.length('s-1')).toBe(2);
    expect(await store.read('s-1')).toEqual([T1, T2]);
  });

  it('should read the most recent turns oldest first', async () => {
    await store.append('s-1', T1, 0);
    await store.append('s-1', T2, 1);
    await store.append('s-1', T3, 2);

    expect(await store.read('s-1', 2)).toEqual([T2, T3]);
    expect(await store.read('s-1', 0)).toEqual([]);
  });

  it('should reject an append when the session length changed', async () => {
    await store.append('s-1', T1, 0);

    await expect(store.append('s-1', T2, 0)).rejects.toThrow(
      new HistoryConflictError('s-1', 0, 1)
    );
    expect(await store.read('s-1')).toEqual([T1]);
  });

  it('should keep sessions apart', async () => {
    await store.append('s-1', T1, 0);
    await store.append('s-2', T2, 0);

    expect(await store.read('s-1')).toEqual([T1]);
    expect(await store.read('s-2')).toEqual([T2]);
  });

  it('should list sessions by last activity', async () => {
    await store.append('s-1', T1, 0);
    await store.append('s-2', T2, 0);
    await store.append('s-1', T3, 1);

    expect(await store.listSessions()).toEqual([
      {
        sessionId: 's-1',
        title: 'Recommend a moisturizer under 1200 for oily skin',
        turnCount: 2,
        createdAt: T1.timestamp,
        lastActiveAt: T3.timestamp,
      },
      {
        sessionId: 's-2',
        title: 'what about for dry skin?',
        turnCount: 1,
        createdAt: T2.timestamp,
        lastActiveAt: T2.timestamp,
      },
    ]);
    expect((await store.listSessions(1)).map((s) => s.sessionId)).toEqual(['s-1']);
  });

  it('should delete a session and its turns', async () => {
    await store.append('s-1', T1, 0);

    expect(await store.deleteSession('s-1')).toBe(true);
    expect(await store.deleteSession('s-1')).toBe(false);
    expect(await store.read('s-1')).toEqual([]);
    expect(await store.length('s-1')).toBe(0);
  });
});

// ============================================================================
// SQLite specifics
// ============================================================================

describe('SqliteConversationStore', () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(MEMORY_DB);
  });

  afterEach(() => {
    db.close();
  });

  it('should apply migrations once', () => {
    new SqliteConversationStore(db);
    new SqliteConversationStore(db);

    expect(getAppliedMigrations(db).map((m) => m.name)).toEqual([
      '001-initial.sql',
      '002-add-trace-id.sql',
    ]);
  });

  it('should share turns between stores on the same database', async () => {
    await new SqliteConversationStore(db).append('s-1', T1, 0);

    expect(await new SqliteConversationStore(db).read('s-1')).toEqual([T1]);
  });

  it('should store the trace id', async () => {
    const store = new SqliteConversationStore(db);

    await store.append('s-1', T1, 0, { traceId: 'trace-123' });

    expect(db.prepare('SELECT trace_id FROM turns WHERE session_id = ?').get('s-1')).toEqual({
      trace_id: 'trace-123',
    });
  });

  it('should return frozen turns', async () => {
    const store = new SqliteConversationStore(db);
    await store.append('s-1', T1, 0);

    const [turn] = await store.read('s-1');

    expect(Object.isFrozen(turn)).toBe(true);
    expect(Object.isFrozen(turn?.evidence.items)).toBe(true);
  });

  it('should reject rows whose JSON columns are corrupted', async () => {
    const store = new SqliteConversationStore(db);
    await store.append('s-1', T1, 0);
    db.prepare("UPDATE turns SET evidence = '{not json' WHERE session_id = 's-1'").run();

    await expect(store.read('s-1')).rejects.toBeInstanceOf(SchemaValidationError);
  });
});

describe('openConversationStore', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'dermaroute-history-'));
  });

  afterEach(() => {
    closeDb();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should keep each history file separate', async () => {
    const work = openConversationStore(join(testDir, 'work.db'));
    const home = openConversationStore(join(testDir, 'home.db'));

    await work.append('s-1', T1, 0);

    expect(await work.length('s-1')).toBe(1);
    expect(await home.length('s-1')).toBe(0);
  });

  it('should share turns between stores opened on the same file', async () => {
    await openConversationStore(join(testDir, 'history.db')).append('s-1', T1, 0);

    expect(await openConversationStore(join(testDir, 'history.db')).read('s-1')).toEqual([T1]);
  });
});

describe('sessionTitle', () => {
  it('should collapse whitespace', () => {
    expect(sessionTitle('  Recommend a moisturizer   for oily skin ')).toBe(
      'Recommend a moisturizer for oily skin'
    );
  });

  it('should shorten long questions to 50 characters', () => {
    const title = sessionTitle('a'.repeat(80));

    expect(title).toBe(`${'a'.repeat(47)}...`);
    expect(title).toHaveLength(50);
  });
});
