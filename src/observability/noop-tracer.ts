/**
 * Tracer used when observability is off, unconfigured, or a turn is not
 * sampled. Every turn shares the same frozen handles.
 */

import type { StageSpan, TurnTrace, TurnTracer } from './types.js';

const NOOP_STAGE: StageSpan = Object.freeze({
  end(): void {},
  fail(): void {},
});

export const NOOP_TURN_TRACE: TurnTrace = Object.freeze({
  stage: (): StageSpan => NOOP_STAGE,
  generation: (): StageSpan => NOOP_STAGE,
  complete(): void {},
  fail(): void {},
  end(): void {},
});

export function createNoopTracer(): TurnTracer {
  return {
    startTurn: () => NOOP_TURN_TRACE,
    flush: async () => {},
    shutdown: async () => {},
    isRemote: false,
  };
}
