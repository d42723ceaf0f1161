/**
 * Turn Orchestrator
 *
 * Drives one question through classification, retrieval and synthesis,
 * then records the finished Turn. Every step is a transition in an
 * explicit state machine:
 *
 * ```
 * Received ─► Classified ─► Dispatched ─► EvidenceCollected ─► Synthesized ─► Completed
 *     │            │             │                │                  │
 *     └────────────┴─────────────┴────────────────┴──────────────────┴──► Failed
 * ```
 *
 * A specialist whose source is unavailable and that found nothing gets
 * exactly one fallback hop to the general-knowledge agent. Nothing is
 * written to history unless the turn completes.
 *
 * @example
 * ```typescript
 * const orchestrator = createOrchestrator({ classifier, agents, synthesizer, store });
 * const result = await orchestrator.runTurn({ sessionId: 's-1', query: 'Best toner for dry skin?' });
 * console.log(result.agentUsed, result.citations);
 * ```
 */

import { ValidationError } from '../errors/index.js';
import { HistoryConflictError } from '../history/errors.js';
import type { ConversationStore } from '../history/types.js';
import { createNoopTracer } from '../observability/noop-tracer.js';
import { sampleTurns } from '../observability/sampling.js';
import type { TurnTrace, TurnTracer } from '../observability/types.js';
import { describeConstraints } from '../search/constraints.js';
import { isAbortError } from '../utils/abort.js';
import type { Logger } from '../utils/logger.js';
import { TurnAbortedError, TurnFailedError, type TurnFailureCode } from './errors.js';
import { createBundle } from './specialists.js';
import {
  AGENT_FOR_INTENT,
  FALLBACK_AGENT_LABEL,
  type AgentKind,
  type Classification,
  type EvidenceBundle,
  type IntentClassifier,
  type SpecialistAgent,
  type SynthesisResult,
  type Synthesizer,
  type Turn,
  type TurnRequest,
  type TurnResult,
  type TurnState,
} from './types.js';

// ============================================================================
// State machine
// ============================================================================

/** Legal transitions. Completed and Failed are terminal. */
export const TRANSITIONS: Readonly<Record<TurnState, readonly TurnState[]>> = {
  Received: ['Classified', 'Failed'],
  Classified: ['Dispatched', 'Failed'],
  Dispatched: ['EvidenceCollected', 'Failed'],
  EvidenceCollected: ['Synthesized', 'Failed'],
  Synthesized: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

/** A transition outside TRANSITIONS. Always a bug in the orchestrator. */
export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: TurnState,
    public readonly to: TurnState
  ) {
    super(`Illegal turn transition: ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * State of a single turn, with the path it took.
 */
export class TurnMachine {
  private readonly visited: TurnState[] = ['Received'];

  get state(): TurnState {
    return this.visited[this.visited.length - 1] ?? 'Received';
  }

  get history(): TurnState[] {
    return [...this.visited];
  }

  /** @throws IllegalTransitionError */
  transition(to: TurnState): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new IllegalTransitionError(this.state, to);
    }
    this.visited.push(to);
  }

  /**
   * Move to Failed and build the error to throw, tagged with the stage
   * that failed.
   */
  fail(code: TurnFailureCode, cause: unknown): TurnFailedError {
    const stage = this.state;
    this.transition('Failed');
    return new TurnFailedError(code, stage, cause);
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

export const DEFAULT_HISTORY_WINDOW = 3;

export interface OrchestratorConfig {
  classifier: IntentClassifier;
  /** One specialist per agent kind */
  agents: Readonly<Record<AgentKind, SpecialistAgent>>;
  synthesizer: Synthesizer;
  store: ConversationStore;
  /** Previous turns handed to the classifier (default: 3) */
  historyWindow?: number;
  tracer?: TurnTracer;
  /** Fraction of turns traced (default: 1) */
  sampleRate?: number;
  /** Model name recorded on the synthesis generation */
  generationModel?: string;
  logger?: Logger;
  /** Clock for turn timestamps */
  now?: () => Date;
}

export class TurnOrchestrator {
  private readonly classifier: IntentClassifier;
  private readonly agents: Readonly<Record<AgentKind, SpecialistAgent>>;
  private readonly synthesizer: Synthesizer;
  private readonly store: ConversationStore;
  private readonly historyWindow: number;
  private readonly tracer: TurnTracer;
  private readonly generationModel?: string;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(config: OrchestratorConfig) {
    this.classifier = config.classifier;
    this.agents = config.agents;
    this.synthesizer = config.synthesizer;
    this.store = config.store;
    this.historyWindow = config.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    this.tracer = sampleTurns(config.tracer ?? createNoopTracer(), config.sampleRate ?? 1);
    this.generationModel = config.generationModel;
    this.logger = config.logger;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Answer one question in a session.
   *
   * @throws ValidationError for an empty question (before the turn starts)
   * @throws TurnFailedError when any stage fails or the caller aborts
   */
  async runTurn(request: TurnRequest): Promise<TurnResult> {
    const query = request.query.trim();
    if (!query) {
      throw new ValidationError('Question must not be empty', ['query: expected non-empty text']);
    }
    if (!request.sessionId.trim()) {
      throw new ValidationError('Session id must not be empty', ['sessionId: expected non-empty text']);
    }

    const { sessionId, signal } = request;
    const machine = new TurnMachine();
    const trace = this.tracer.startTurn({ sessionId, query });

    try {
      const result = await this.execute(machine, trace, sessionId, query, signal);
      trace.complete({
        answer: result.answer,
        intent: result.classification.intent,
        agentUsed: result.agentUsed,
        dispatches: result.dispatches,
        citations: result.citations.length,
      });
      return result;
    } catch (error) {
      if (error instanceof TurnFailedError) {
        trace.fail({ code: error.failureCode, stage: error.stage });
        this.logger?.debug?.(`Turn failed at ${error.stage}: ${error.failureCode}`);
      }
      throw error;
    } finally {
      trace.end();
    }
  }

  private async execute(
    machine: TurnMachine,
    trace: TurnTrace,
    sessionId: string,
    query: string,
    signal: AbortSignal | undefined
  ): Promise<TurnResult> {
    /** Run one stage, converting its failure into a Failed transition. */
    const step = async <T>(
      code: TurnFailureCode | ((error: unknown) => TurnFailureCode),
      fn: () => Promise<T>
    ): Promise<T> => {
      try {
        if (signal?.aborted) throw new TurnAbortedError();
        return await fn();
      } catch (error) {
        const aborted =
          signal?.aborted || error instanceof TurnAbortedError || isAbortError(error);
        const failure = typeof code === 'function' ? code(error) : code;
        throw machine.fail(aborted ? 'ABORTED' : failure, error);
      }
    };

    // Received: load explicit context
    const { expectedLength, history } = await step('HISTORY_READ_FAILED', async () => ({
      expectedLength: await this.store.length(sessionId),
      history: await this.store.read(sessionId, this.historyWindow),
    }));

    // Received → Classified
    const classification = await step('CLASSIFICATION_FAILED', () =>
      this.classify(trace, query, history, signal)
    );
    machine.transition('Classified');

    // Classified → Dispatched
    const primary = AGENT_FOR_INTENT[classification.intent];
    machine.transition('Dispatched');

    // Dispatched → EvidenceCollected (specialist failures become degraded bundles)
    const { bundle, agentUsed, dispatches } = await step('EVIDENCE_FAILED', () =>
      this.collectEvidence(trace, primary, query, classification, signal)
    );
    machine.transition('EvidenceCollected');

    // EvidenceCollected → Synthesized
    const synthesis = await step('SYNTHESIS_FAILED', () =>
      this.synthesize(trace, query, bundle, signal)
    );
    machine.transition('Synthesized');

    // Synthesized → Completed
    const turn: Turn = Object.freeze({
      query,
      intent: classification.intent,
      constraints: classification.constraints,
      evidence: bundle,
      answer: synthesis.answer,
      citations: Object.freeze([...synthesis.citations]),
      agentUsed,
      timestamp: this.now().toISOString(),
    });

    await step(
      (error) => (error instanceof HistoryConflictError ? 'HISTORY_CONFLICT' : 'HISTORY_WRITE_FAILED'),
      () => this.store.append(sessionId, turn, expectedLength, { traceId: trace.traceId })
    );
    machine.transition('Completed');

    return {
      turn,
      answer: synthesis.answer,
      citations: synthesis.citations,
      agentUsed,
      classification,
      dispatches,
      states: machine.history,
      notices: synthesis.notices,
      ...(trace.traceId ? { traceId: trace.traceId } : {}),
    };
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async classify(
    trace: TurnTrace,
    query: string,
    history: readonly Turn[],
    signal: AbortSignal | undefined
  ): Promise<Classification> {
    const span = trace.stage('classify', { query, historyTurns: history.length });
    try {
      const classification = await this.classifier.classify(query, history, { signal });
      span.end({
        output: {
          intent: classification.intent,
          confidence: classification.confidence,
          method: classification.method,
          constraints: classification.constraints,
        },
      });
      this.logger?.debug?.(
        `Classified as ${classification.intent} (${classification.confidence}, ${classification.method}); ` +
          `constraints: ${describeConstraints(classification.constraints)}`
      );
      return classification;
    } catch (error) {
      span.fail(error);
      throw error;
    }
  }

  private async collectEvidence(
    trace: TurnTrace,
    primary: AgentKind,
    query: string,
    classification: Classification,
    signal: AbortSignal | undefined
  ): Promise<{ bundle: EvidenceBundle; agentUsed: string; dispatches: AgentKind[] }> {
    const dispatches: AgentKind[] = [primary];
    const first = await this.dispatch(trace, primary, query, classification, signal);

    if (!first.degraded || first.items.length > 0 || primary === 'general-knowledge') {
      return { bundle: first, agentUsed: primary, dispatches };
    }

    this.logger?.warn(
      `${primary} agent found nothing (${first.unavailableSources.join(', ')} unavailable); ` +
        'falling back to general-knowledge'
    );
    dispatches.push('general-knowledge');
    const second = await this.dispatch(trace, 'general-knowledge', query, classification, signal);

    const bundle: EvidenceBundle = Object.freeze({
      ...second,
      degraded: true,
      fallback: true,
      unavailableSources: Object.freeze([...first.unavailableSources, ...second.unavailableSources]),
      notes: Object.freeze([...first.notes, ...second.notes]),
    });
    return { bundle, agentUsed: FALLBACK_AGENT_LABEL, dispatches };
  }

  private async dispatch(
    trace: TurnTrace,
    kind: AgentKind,
    query: string,
    classification: Classification,
    signal: AbortSignal | undefined
  ): Promise<EvidenceBundle> {
    const span = trace.stage(`retrieve-${kind}`, { query });
    try {
      const bundle = await this.runAgent(kind, query, classification, signal);
      span.end({
        output: { items: bundle.items.map((item) => item.sourceId) },
        metadata: {
          degraded: bundle.degraded,
          relaxation: bundle.relaxation,
          unavailableSources: bundle.unavailableSources,
        },
      });
      return bundle;
    } catch (error) {
      span.fail(error);
      throw error;
    }
  }

  /** Specialists don't throw; one that does anyway counts as unavailable. */
  private async runAgent(
    kind: AgentKind,
    query: string,
    classification: Classification,
    signal: AbortSignal | undefined
  ): Promise<EvidenceBundle> {
    try {
      return await this.agents[kind].handle(query, classification.constraints, { signal });
    } catch (error) {
      if (signal?.aborted || error instanceof TurnAbortedError || isAbortError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`${kind} agent failed: ${message}`);
      return createBundle(kind, { degraded: true, unavailableSources: [kind], notes: [message] });
    }
  }

  private async synthesize(
    trace: TurnTrace,
    query: string,
    bundle: EvidenceBundle,
    signal: AbortSignal | undefined
  ): Promise<SynthesisResult> {
    const generation = trace.generation(this.generationModel, {
      query,
      sources: bundle.items.map((item) => item.sourceId),
    });
    try {
      const result = await this.synthesizer.synthesize(query, bundle, { signal });
      generation.end({ output: result.answer, metadata: { citations: result.citations } });
      return result;
    } catch (error) {
      generation.fail(error);
      throw error;
    }
  }
}

export function createOrchestrator(config: OrchestratorConfig): TurnOrchestrator {
  return new TurnOrchestrator(config);
}
