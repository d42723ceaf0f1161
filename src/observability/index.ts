/**
 * Observability Module
 *
 * Turn tracing for Langfuse v4 (OpenTelemetry-based). The engine builds a
 * tracer with createTracer(config) and the orchestrator opens one trace
 * per turn.
 */

export {
  TURN_TRACE_NAME,
  SYNTHESIS_GENERATION_NAME,
  type StageName,
  type StageResult,
  type StageSpan,
  type TurnFailure,
  type TurnStart,
  type TurnSummary,
  type TurnTrace,
  type TurnTracer,
} from './types.js';

export { createTracer, DEFAULT_LANGFUSE_HOST } from './factory.js';
export { createNoopTracer, NOOP_TURN_TRACE } from './noop-tracer.js';
export { createLangfuseTracer, type LangfuseTracerConfig } from './langfuse-tracer.js';
export { shouldRecord, sampleTurns } from './sampling.js';
