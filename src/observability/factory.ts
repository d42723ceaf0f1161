/**
 * Picks the turn tracer for a configuration: Langfuse when observability is
 * enabled and both keys are known, the no-op tracer otherwise.
 *
 * LANGFUSE_PUBLIC_KEY, LANGFUSE_SECRET_KEY and LANGFUSE_BASE_URL override
 * the [observability] section of config.toml.
 */

import type { Config } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import { createLangfuseTracer } from './langfuse-tracer.js';
import { createNoopTracer } from './noop-tracer.js';
import type { TurnTracer } from './types.js';

export const DEFAULT_LANGFUSE_HOST = 'https://cloud.langfuse.com';

export function createTracer(config: Pick<Config, 'observability'>): TurnTracer {
  const { observability } = config;
  if (!observability.enabled) return createNoopTracer();

  const publicKey = getEnv('LANGFUSE_PUBLIC_KEY') ?? observability.langfuse_public_key;
  const secretKey = getEnv('LANGFUSE_SECRET_KEY') ?? observability.langfuse_secret_key;
  if (!publicKey || !secretKey) return createNoopTracer();

  return createLangfuseTracer({
    publicKey,
    secretKey,
    baseUrl: getEnv('LANGFUSE_BASE_URL') ?? observability.langfuse_host ?? DEFAULT_LANGFUSE_HOST,
  });
}
