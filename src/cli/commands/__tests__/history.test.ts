/**
 * Tests for history command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createHistoryCommand, formatTimestamp, type HistoryDependencies } from '../history.js';
import type { CommandContext } from '../../types.js';
import type { Turn } from '../../../agent/types.js';
import { createBundle } from '../../../agent/specialists.js';
import { buildDefaultConfig } from '../../../config/defaults.js';
import { InMemoryConversationStore } from '../../../history/memory-store.js';

function createMockContext(json = false) {
  const logs: string[] = [];
  const ctx = {
    options: { verbose: false, json },
    log: vi.fn((message: string) => {
      logs.push(message);
    }),
    debug: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  } satisfies CommandContext;
  return { ctx, logs };
}

function createTurn(query: string, timestamp: string): Turn {
  return {
    query,
    intent: 'document-lookup',
    constraints: {},
    evidence: createBundle('document'),
    answer: 'Acne forms when pores clog [1].',
    citations: [],
    agentUsed: 'document',
    timestamp,
  };
}

describe('formatTimestamp', () => {
  it('drops seconds and the zone marker', () => {
    expect(formatTimestamp('2025-03-01T10:02:59.000Z')).toBe('2025-03-01 10:02');
  });
});

describe('createHistoryCommand', () => {
  let store: InMemoryConversationStore;
  let deps: HistoryDependencies;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    store = new InMemoryConversationStore();
    await store.append('s-1', createTurn('What causes acne?', '2025-03-01T10:00:00.000Z'), 0);
    await store.append('s-1', createTurn('and blackheads?', '2025-03-01T10:02:00.000Z'), 1);
    await store.append('s-2', createTurn('How do retinoids work?', '2025-03-01T09:00:00.000Z'), 0);
    deps = { getConfig: buildDefaultConfig, openStore: () => store };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  async function run(args: string[], json = false) {
    const { ctx, logs } = createMockContext(json);
    await createHistoryCommand(() => ctx, deps).parseAsync(args, { from: 'user' });
    return { ctx, logs };
  }

  it('lists sessions, most recent first', async () => {
    const { logs } = await run([]);

    expect(logs).toHaveLength(3);
    expect(logs[1]).toContain('s-1');
    expect(logs[1]).toContain('What causes acne?');
    expect(logs[1]).toContain('2 turns, last active 2025-03-01 10:02');
    expect(logs[2]).toContain('1 turn, last active 2025-03-01 09:00');
  });

  it('honours --limit', async () => {
    await run(['--limit', '1'], true);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.sessions.map((s: { sessionId: string }) => s.sessionId)).toEqual(['s-1']);
  });

  it('rejects an invalid --limit', async () => {
    await expect(run(['--limit', 'zero'])).rejects.toThrow('Invalid --limit value: "zero"');
  });

  it('explains when there are no sessions', async () => {
    store = new InMemoryConversationStore();

    const { logs } = await run([]);

    expect(logs[0]).toContain('No conversations yet.');
  });

  it('shows the turns of a session', async () => {
    const { logs } = await run(['s-1']);

    const output = logs.join('\n');
    expect(output).toContain('Session s-1');
    expect(output).toContain('What causes acne?');
    expect(output).toContain('and blackheads?');
    expect(output).toContain('#2 2025-03-01 10:02');
  });

  it('prints the turns as JSON', async () => {
    await run(['s-2'], true);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.sessionId).toBe('s-2');
    expect(output.turns).toHaveLength(1);
    expect(output.turns[0].query).toBe('How do retinoids work?');
  });

  it('fails for an unknown session', async () => {
    await expect(run(['nope'])).rejects.toThrow('Session not found: nope');
  });

  it('deletes a session', async () => {
    const { logs } = await run(['s-2', '--delete']);

    expect(logs[0]).toContain('Deleted session');
    expect(await store.length('s-2')).toBe(0);
  });

  it('fails to delete an unknown session', async () => {
    await expect(run(['nope', '--delete'])).rejects.toThrow('Session not found: nope');
  });

  it('needs a session id to delete', async () => {
    await expect(run(['--delete'])).rejects.toThrow('--delete needs a session id');
  });
});
