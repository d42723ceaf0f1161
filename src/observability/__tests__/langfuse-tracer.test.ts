import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => {
  const child = { update: vi.fn(), end: vi.fn() };
  const root = {
    traceId: 'trace-abc',
    update: vi.fn(),
    updateTrace: vi.fn(),
    end: vi.fn(),
    startObservation: vi.fn((_name: string, _attributes: unknown, _options?: unknown) => child),
  };
  return {
    child,
    root,
    startObservation: vi.fn((_name: string, _attributes: unknown) => root),
    sdkStart: vi.fn(),
    sdkShutdown: vi.fn(async () => {}),
    forceFlush: vi.fn(async () => {}),
    NodeSDK: vi.fn(),
    LangfuseSpanProcessor: vi.fn(),
  };
});

vi.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: mocks.NodeSDK.mockImplementation(function (_config: unknown) {
    return { start: mocks.sdkStart, shutdown: mocks.sdkShutdown };
  }),
}));

vi.mock('@langfuse/otel', () => ({
  LangfuseSpanProcessor: mocks.LangfuseSpanProcessor.mockImplementation(function (_config: unknown) {
    return { forceFlush: mocks.forceFlush };
  }),
}));

vi.mock('@langfuse/tracing', () => ({ startObservation: mocks.startObservation }));

import { createLangfuseTracer } from '../langfuse-tracer.js';

const CONFIG = {
  publicKey: 'test-public',
  secretKey: 'test-secret',
  baseUrl: 'https://langfuse.example.test',
};

function startTurn() {
  return createLangfuseTracer(CONFIG).startTurn({ sessionId: 's-1', query: 'spf for oily skin?' });
}

describe('createLangfuseTracer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('starts the SDK with a Langfuse span processor', () => {
    const tracer = createLangfuseTracer(CONFIG);

    expect(mocks.LangfuseSpanProcessor).toHaveBeenCalledWith(CONFIG);
    expect(mocks.NodeSDK).toHaveBeenCalledTimes(1);
    expect(mocks.sdkStart).toHaveBeenCalledTimes(1);
    expect(tracer.isRemote).toBe(true);
  });

  it('opens the turn trace with the question and session', () => {
    const trace = startTurn();

    expect(trace.traceId).toBe('trace-abc');
    expect(mocks.startObservation).toHaveBeenCalledWith('dermaroute-turn', { input: 'spf for oily skin?' });
    expect(mocks.root.updateTrace).toHaveBeenCalledWith({ name: 'dermaroute-turn', sessionId: 's-1' });
  });

  it('records a stage output when it ends', () => {
    const span = startTurn().stage('retrieve-catalog', { query: 'spf' });
    span.end({ output: { items: ['p-1'] }, metadata: { degraded: false } });

    expect(mocks.root.startObservation).toHaveBeenCalledWith('retrieve-catalog', { input: { query: 'spf' } });
    expect(mocks.child.update).toHaveBeenCalledWith({ output: { items: ['p-1'] }, metadata: { degraded: false } });
    expect(mocks.child.end).toHaveBeenCalledTimes(1);
  });

  it('ends a stage without an update when there is nothing to record', () => {
    startTurn().stage('classify', { query: 'spf' }).end();

    expect(mocks.child.update).not.toHaveBeenCalled();
    expect(mocks.child.end).toHaveBeenCalledTimes(1);
  });

  it('marks a failed stage as an error and ends it only once', () => {
    const span = startTurn().stage('classify', { query: 'spf' });
    span.fail(new TypeError('fetch failed'));
    span.end({ output: 'late' });
    span.fail(new Error('again'));

    expect(mocks.child.update).toHaveBeenCalledTimes(1);
    expect(mocks.child.update).toHaveBeenCalledWith({ level: 'ERROR', statusMessage: 'TypeError: fetch failed' });
    expect(mocks.child.end).toHaveBeenCalledTimes(1);
  });

  it('opens synthesis as a generation with the model', () => {
    startTurn().generation('ollama/llama3.1', { sources: ['p-1'] });

    expect(mocks.root.startObservation).toHaveBeenCalledWith(
      'synthesis',
      { input: { sources: ['p-1'] }, model: 'ollama/llama3.1' },
      { asType: 'generation' }
    );
  });

  it('leaves the model out when unknown', () => {
    startTurn().generation(undefined, { sources: [] });

    expect(mocks.root.startObservation).toHaveBeenCalledWith(
      'synthesis',
      { input: { sources: [] } },
      { asType: 'generation' }
    );
  });

  it('records the answer and routing on a completed turn', () => {
    const trace = startTurn();
    trace.complete({
      answer: 'Use SPF 30 [1].',
      intent: 'catalog-lookup',
      agentUsed: 'catalog',
      dispatches: ['catalog'],
      citations: 1,
    });
    trace.end();

    expect(mocks.root.update).toHaveBeenCalledWith({
      output: 'Use SPF 30 [1].',
      metadata: { intent: 'catalog-lookup', agentUsed: 'catalog', dispatches: ['catalog'], citations: 1 },
    });
    expect(mocks.root.end).toHaveBeenCalledTimes(1);
  });

  it('records the failure code and stage on a failed turn', () => {
    startTurn().fail({ code: 'SYNTHESIS_FAILED', stage: 'EvidenceCollected' });

    expect(mocks.root.update).toHaveBeenCalledWith({
      level: 'ERROR',
      statusMessage: 'SYNTHESIS_FAILED at EvidenceCollected',
      metadata: { failureCode: 'SYNTHESIS_FAILED', stage: 'EvidenceCollected' },
    });
  });

  it('flushes through the processor and shuts down the SDK', async () => {
    const tracer = createLangfuseTracer(CONFIG);

    await tracer.flush();
    await tracer.shutdown();

    expect(mocks.forceFlush).toHaveBeenCalledTimes(1);
    expect(mocks.sdkShutdown).toHaveBeenCalledTimes(1);
  });
});
