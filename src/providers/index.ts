/**
 * Providers Module
 *
 * Clients for the external capabilities: embeddings and generation (Ollama)
 * and web search (SerpAPI). This module bridges the config system with the
 * engine's EmbedFn / GenerateFn / WebSearchFn contracts.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createCapabilities } from './providers/index.js';
 * const { embed, generate, webSearch } = createCapabilities(config);
 * ```
 */

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export {
  validateOllamaHostUrl,
  validateSerpApiKey,
  parseProviderResponse,
  OllamaHostSchema,
  SerpApiKeySchema,
  type ValidationResult,
} from './validation.js';

export { ProviderError, type ProviderService } from './errors.js';

// ============================================================================
// CAPABILITIES
// ============================================================================

// Main factory - builds every capability from config
export {
  createCapabilities,
  createEmbedder,
  createGenerator,
  type Capabilities,
  type CapabilityOverrides,
  type ProviderType,
} from './capabilities.js';

// Individual clients - for direct use when needed
export {
  createOllamaEmbedder,
  createOllamaGenerator,
  OllamaEmbeddingResponseSchema,
  OllamaGenerateResponseSchema,
  DEFAULT_OLLAMA_EMBEDDING_MODEL,
  DEFAULT_OLLAMA_GENERATION_MODEL,
  type OllamaClientOptions,
} from './ollama.js';

export {
  createSerpApiSearch,
  toWebResults,
  SerpApiResponseSchema,
  SERPAPI_ENDPOINT,
  DEFAULT_SERPAPI_RESULTS,
  type SerpApiResponse,
  type SerpApiSearchOptions,
} from './serpapi.js';
