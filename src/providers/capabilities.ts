/**
 * Capability Factory
 *
 * Central entry point for building the embed, generate and web search
 * capabilities from configuration. Dispatches on the configured provider
 * type so another backend is a new case, not a new call site.
 *
 * USAGE:
 * ```typescript
 * import { loadConfig } from '../config/index.js';
 * import { createCapabilities } from '../providers/index.js';
 *
 * const { embed, generate, webSearch } = createCapabilities(loadConfig());
 * ```
 */

import type { Config } from '../config/schema.js';
import type { GenerateFn } from '../agent/types.js';
import type { EmbedFn, WebSearchFn } from '../search/types.js';
import { createOllamaEmbedder, createOllamaGenerator } from './ollama.js';
import { createSerpApiSearch } from './serpapi.js';

export type ProviderType = Config['generation']['provider'];

export interface Capabilities {
  embed: EmbedFn;
  generate: GenerateFn;
  webSearch: WebSearchFn;
  /** e.g. "ollama/llama3.1", for traces and --verbose output */
  generationModel: string;
}

export interface CapabilityOverrides {
  /** Overrides OLLAMA_HOST */
  ollamaHost?: string;
  /** Overrides SERPAPI_API_KEY */
  serpApiKey?: string;
}

export function createEmbedder(config: Config['embedding'], overrides: CapabilityOverrides = {}): EmbedFn {
  switch (config.provider) {
    case 'ollama':
      return createOllamaEmbedder({ model: config.model, host: overrides.ollamaHost });
  }
}

export function createGenerator(
  config: Config['generation'],
  overrides: CapabilityOverrides = {}
): GenerateFn {
  switch (config.provider) {
    case 'ollama':
      return createOllamaGenerator({ model: config.model, host: overrides.ollamaHost });
  }
}

/**
 * Build every external capability the engine needs.
 *
 * @throws ProviderError if a configured host is invalid
 */
export function createCapabilities(
  config: Pick<Config, 'embedding' | 'generation'>,
  overrides: CapabilityOverrides = {}
): Capabilities {
  return {
    embed: createEmbedder(config.embedding, overrides),
    generate: createGenerator(config.generation, overrides),
    webSearch: createSerpApiSearch({ apiKey: overrides.serpApiKey }),
    generationModel: `${config.generation.provider}/${config.generation.model}`,
  };
}
