/**
 * Turn tracing as the orchestrator drives it: one trace per turn, a stage
 * span per classification and dispatch, a generation around synthesis, and
 * the outcome recorded before the trace closes.
 */

import { describe, it, expect, vi } from 'vitest';

import { createOrchestrator } from '../../agent/orchestrator.js';
import { createIntentClassifier } from '../../agent/intent-classifier.js';
import { createSynthesizer } from '../../agent/synthesizer.js';
import { SynthesisFailureError, TurnFailedError } from '../../agent/errors.js';
import type { GenerateFn } from '../../agent/types.js';
import { InMemoryConversationStore } from '../../history/memory-store.js';
import { createTestAgents, failingEmbed, type TestAgentOptions } from '../../__tests__/fixtures.js';
import type { StageName, StageSpan, TurnStart, TurnTrace } from '../types.js';

interface SpyCall {
  method: string;
  args: unknown[];
}

/** Records every tracer call in order. */
function createSpyTracer() {
  const calls: SpyCall[] = [];
  const record = (method: string, ...args: unknown[]): void => {
    calls.push({ method, args });
  };

  const spanFor = (kind: 'stage' | 'generation'): StageSpan => ({
    end: (result) => record(`${kind}.end`, result),
    fail: (error) => record(`${kind}.fail`, error),
  });

  const trace: TurnTrace = {
    traceId: 'trace-123',
    stage: (name: StageName, input: unknown) => {
      record('trace.stage', name, input);
      return spanFor('stage');
    },
    generation: (model, input) => {
      record('trace.generation', model, input);
      return spanFor('generation');
    },
    complete: (summary) => record('trace.complete', summary),
    fail: (failure) => record('trace.fail', failure),
    end: () => record('trace.end'),
  };

  const tracer = {
    startTurn: vi.fn((start: TurnStart) => {
      record('tracer.startTurn', start);
      return trace;
    }),
    flush: vi.fn(async () => {}),
    shutdown: vi.fn(async () => {}),
    isRemote: false,
  };

  return { tracer, calls };
}

// ============================================================================
// Harness
// ============================================================================

const QUESTION = 'Recommend a moisturizer under 1200 for oily skin';
const ANSWER = 'The gel [1] is light; the lotion [2] too.';

function createTracedOrchestrator(
  options: TestAgentOptions & { generate?: GenerateFn; sampleRate?: number } = {}
) {
  const { tracer, calls } = createSpyTracer();
  const store = new InMemoryConversationStore();
  const orchestrator = createOrchestrator({
    classifier: createIntentClassifier(),
    agents: createTestAgents(options),
    synthesizer: createSynthesizer({ generate: options.generate ?? (async () => ANSWER) }),
    store,
    tracer,
    sampleRate: options.sampleRate,
    generationModel: 'ollama/llama3.1',
  });
  return { orchestrator, tracer, calls, store };
}

function methodsOf(calls: SpyCall[]): string[] {
  return calls.map((call) => call.method);
}

function argsOf(calls: SpyCall[], method: string): unknown[][] {
  return calls.filter((call) => call.method === method).map((call) => call.args);
}

// ============================================================================
// Tests
// ============================================================================

describe('Turn Instrumentation', () => {
  it('should trace each stage of a completed turn in order', async () => {
    const { orchestrator, calls } = createTracedOrchestrator();

    await orchestrator.runTurn({ sessionId: 's-1', query: QUESTION });

    expect(methodsOf(calls)).toEqual([
      'tracer.startTurn',
      'trace.stage',
      'stage.end',
      'trace.stage',
      'stage.end',
      'trace.generation',
      'generation.end',
      'trace.complete',
      'trace.end',
    ]);
  });

  it('should open the trace with the question and session', async () => {
    const { orchestrator, calls } = createTracedOrchestrator();

    await orchestrator.runTurn({ sessionId: 's-1', query: QUESTION });

    expect(argsOf(calls, 'tracer.startTurn')).toEqual([[{ sessionId: 's-1', query: QUESTION }]]);
  });

  it('should record classification, retrieval and synthesis details', async () => {
    const { orchestrator, calls } = createTracedOrchestrator();

    await orchestrator.runTurn({ sessionId: 's-1', query: QUESTION });

    expect(argsOf(calls, 'trace.stage')).toEqual([
      ['classify', { query: QUESTION, historyTurns: 0 }],
      ['retrieve-catalog', { query: QUESTION }],
    ]);
    expect(argsOf(calls, 'stage.end')).toEqual([
      [
        {
          output: {
            intent: 'catalog-lookup',
            confidence: 0.95,
            method: 'keyword',
            constraints: {
              price: { kind: 'range', max: 1200 },
              skin_type: { kind: 'contains', values: ['oily'] },
            },
          },
        },
      ],
      [
        {
          output: { items: ['p-800', 'p-1100'] },
          metadata: { degraded: false, relaxation: 'none', unavailableSources: [] },
        },
      ],
    ]);
    expect(argsOf(calls, 'trace.generation')).toEqual([
      ['ollama/llama3.1', { query: QUESTION, sources: ['p-800', 'p-1100'] }],
    ]);
    expect(argsOf(calls, 'generation.end')).toEqual([
      [{ output: ANSWER, metadata: { citations: ['p-800', 'p-1100'] } }],
    ]);
    expect(argsOf(calls, 'trace.complete')).toEqual([
      [
        {
          answer: ANSWER,
          intent: 'catalog-lookup',
          agentUsed: 'catalog',
          dispatches: ['catalog'],
          citations: 2,
        },
      ],
    ]);
  });

  it('should open a stage per dispatch on fallback', async () => {
    const { orchestrator, calls } = createTracedOrchestrator({ catalogEmbed: failingEmbed });

    await orchestrator.runTurn({ sessionId: 's-1', query: QUESTION });

    expect(argsOf(calls, 'trace.stage').map(([name]) => name)).toEqual([
      'classify',
      'retrieve-catalog',
      'retrieve-general-knowledge',
    ]);
  });

  it('should store the trace id with the turn and return it', async () => {
    const { orchestrator, store } = createTracedOrchestrator();
    const append = vi.spyOn(store, 'append');

    const result = await orchestrator.runTurn({ sessionId: 's-1', query: QUESTION });

    expect(result.traceId).toBe('trace-123');
    expect(append).toHaveBeenCalledWith('s-1', result.turn, 0, { traceId: 'trace-123' });
  });

  it('should fail the generation and the trace with the failure code and stage', async () => {
    const { orchestrator, calls } = createTracedOrchestrator({
      generate: async () => {
        throw new Error('model not found');
      },
    });

    await expect(orchestrator.runTurn({ sessionId: 's-1', query: QUESTION })).rejects.toBeInstanceOf(
      TurnFailedError
    );

    expect(methodsOf(calls).slice(-4)).toEqual([
      'trace.generation',
      'generation.fail',
      'trace.fail',
      'trace.end',
    ]);
    expect(argsOf(calls, 'generation.fail')[0]?.[0]).toBeInstanceOf(SynthesisFailureError);
    expect(argsOf(calls, 'trace.fail')).toEqual([[{ code: 'SYNTHESIS_FAILED', stage: 'EvidenceCollected' }]]);
    expect(argsOf(calls, 'trace.complete')).toEqual([]);
  });

  it('should not trace an unsampled turn', async () => {
    const { orchestrator, tracer } = createTracedOrchestrator({ sampleRate: 0 });

    const result = await orchestrator.runTurn({ sessionId: 's-1', query: QUESTION });

    expect(tracer.startTurn).not.toHaveBeenCalled();
    expect(result.traceId).toBeUndefined();
  });
});
