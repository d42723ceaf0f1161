/**
 * Langfuse Turn Tracer
 *
 * Exports turn traces to Langfuse (cloud or self-hosted) through an
 * OpenTelemetry NodeSDK with a LangfuseSpanProcessor. Uses the handle-based
 * startObservation() API, since stages open and close across awaits in
 * the orchestrator rather than inside one callback.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { startObservation } from '@langfuse/tracing';

import {
  SYNTHESIS_GENERATION_NAME,
  TURN_TRACE_NAME,
  type StageResult,
  type StageSpan,
  type TurnStart,
  type TurnTrace,
  type TurnTracer,
} from './types.js';

export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

/** The part of a Langfuse observation a stage span drives. */
interface Observation {
  update(attributes: {
    output?: unknown;
    metadata?: Record<string, unknown>;
    level?: 'ERROR';
    statusMessage?: string;
  }): unknown;
  end(): void;
}

function describe(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

function wrapStage(observation: Observation): StageSpan {
  let open = true;
  return {
    end(result: StageResult = {}): void {
      if (!open) return;
      open = false;
      if (result.output !== undefined || result.metadata !== undefined) {
        observation.update({ output: result.output, metadata: result.metadata });
      }
      observation.end();
    },
    fail(error: unknown): void {
      if (!open) return;
      open = false;
      observation.update({ level: 'ERROR', statusMessage: describe(error) });
      observation.end();
    },
  };
}

function startTurnTrace(start: TurnStart): TurnTrace {
  const root = startObservation(TURN_TRACE_NAME, { input: start.query });
  // sessionId is a trace-level attribute in Langfuse v4
  root.updateTrace({ name: TURN_TRACE_NAME, sessionId: start.sessionId });

  return {
    traceId: root.traceId,
    stage: (name, input) => wrapStage(root.startObservation(name, { input })),
    generation: (model, input) =>
      wrapStage(
        root.startObservation(
          SYNTHESIS_GENERATION_NAME,
          { input, ...(model !== undefined && { model }) },
          { asType: 'generation' }
        )
      ),
    complete(summary): void {
      root.update({
        output: summary.answer,
        metadata: {
          intent: summary.intent,
          agentUsed: summary.agentUsed,
          dispatches: summary.dispatches,
          citations: summary.citations,
        },
      });
    },
    fail(failure): void {
      root.update({
        level: 'ERROR',
        statusMessage: `${failure.code} at ${failure.stage}`,
        metadata: { failureCode: failure.code, stage: failure.stage },
      });
    },
    end(): void {
      root.end();
    },
  };
}

/**
 * Create a tracer that exports every turn to Langfuse. Starts the SDK
 * immediately; call shutdown() before the process exits.
 */
export function createLangfuseTracer(config: LangfuseTracerConfig): TurnTracer {
  const processor = new LangfuseSpanProcessor({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });
  const sdk = new NodeSDK({ spanProcessors: [processor] });
  sdk.start();

  return {
    startTurn: startTurnTrace,
    flush: () => processor.forceFlush(),
    shutdown: () => sdk.shutdown(),
    isRemote: true,
  };
}
