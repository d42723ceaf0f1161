/**
 * Turn Tracing Types
 *
 * One trace per turn. The orchestrator opens it with the question, opens a
 * stage span around classification and each retrieval dispatch and a
 * generation around synthesis, then closes it as completed or failed.
 *
 * Maps to Langfuse v4:
 *   startTurn()      → startObservation('dermaroute-turn') + updateTrace({ sessionId })
 *   stage()          → parent.startObservation(name)
 *   generation()     → parent.startObservation('synthesis', …, { asType: 'generation' })
 *   span.fail()      → update({ level: 'ERROR', statusMessage })
 *   complete()/fail() on the turn → root update()
 */

import type { TurnFailureCode } from '../agent/errors.js';
import type { AgentKind, Intent, TurnState } from '../agent/types.js';

/** Name of every turn trace. */
export const TURN_TRACE_NAME = 'dermaroute-turn';

/** Name of the generation around answer synthesis. */
export const SYNTHESIS_GENERATION_NAME = 'synthesis';

/** Spans the orchestrator opens, in the order it opens them. */
export type StageName = 'classify' | `retrieve-${AgentKind}`;

export interface TurnStart {
  sessionId: string;
  query: string;
}

export interface StageResult {
  output?: unknown;
  metadata?: Record<string, unknown>;
}

/**
 * An open stage. Ends exactly once: later end() or fail() calls are
 * ignored.
 */
export interface StageSpan {
  end(result?: StageResult): void;
  /** End the span marked as an error */
  fail(error: unknown): void;
}

/** Recorded on the trace of a completed turn. */
export interface TurnSummary {
  answer: string;
  intent: Intent;
  agentUsed: string;
  dispatches: readonly AgentKind[];
  citations: number;
}

/** Recorded on the trace of a failed turn. */
export interface TurnFailure {
  code: TurnFailureCode;
  stage: TurnState;
}

export interface TurnTrace {
  /** Langfuse trace id; undefined when not traced */
  readonly traceId?: string;
  stage(name: StageName, input: unknown): StageSpan;
  generation(model: string | undefined, input: unknown): StageSpan;
  complete(summary: TurnSummary): void;
  fail(failure: TurnFailure): void;
  /** Close the trace. Call once, after complete() or fail(). */
  end(): void;
}

export interface TurnTracer {
  startTurn(start: TurnStart): TurnTrace;
  flush(): Promise<void>;
  /** Flush and stop sending */
  shutdown(): Promise<void>;
  readonly isRemote: boolean;
}
