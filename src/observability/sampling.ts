/**
 * Turn Sampling
 *
 * Decided once per turn, so a turn is traced completely or not at all.
 */

import { NOOP_TURN_TRACE } from './noop-tracer.js';
import type { TurnTracer } from './types.js';

/**
 * Whether to trace the next turn.
 *
 * @param sampleRate - 0 never, 1 always
 */
export function shouldRecord(sampleRate: number, random: () => number = Math.random): boolean {
  if (sampleRate >= 1) return true;
  if (sampleRate <= 0) return false;
  return random() < sampleRate;
}

/**
 * Wrap a tracer so only a fraction of turns reach it. Unsampled turns get
 * the no-op trace and no trace id.
 */
export function sampleTurns(
  tracer: TurnTracer,
  sampleRate: number,
  random: () => number = Math.random
): TurnTracer {
  if (sampleRate >= 1) return tracer;
  return {
    startTurn: (start) => (shouldRecord(sampleRate, random) ? tracer.startTurn(start) : NOOP_TURN_TRACE),
    flush: () => tracer.flush(),
    shutdown: () => tracer.shutdown(),
    isRemote: tracer.isRemote,
  };
}
