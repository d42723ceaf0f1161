/**
 * dermaroute - Library Entry Point
 *
 * Intent routing and grounded retrieval for skincare questions. The CLI
 * (`derma`) covers everyday use:
 * ```bash
 * derma ask "Recommend a moisturizer under 1200 for oily skin"
 * derma classify "latest acne research 2025"
 * derma history
 * ```
 *
 * ## Library Exports
 *
 * Everything the CLI is built from, for embedding the engine in another
 * service or swapping a capability:
 * - The orchestrator, classifier, specialists and synthesizer
 * - Retrieval sources and the in-memory vector index
 * - Conversation stores (in-memory and SQLite)
 * - Capability clients (Ollama, SerpAPI) and the tracer
 *
 * @example Wiring your own capabilities
 * ```typescript
 * import {
 *   createOrchestrator, createIntentClassifier, createSynthesizer, createAgents,
 *   InMemoryConversationStore, InMemoryVectorIndex,
 * } from 'dermaroute';
 *
 * const agents = createAgents(config, { capabilities: { embed, webSearch }, catalogIndex, articleIndex });
 * const orchestrator = createOrchestrator({
 *   classifier: createIntentClassifier(),
 *   agents,
 *   synthesizer: createSynthesizer({ generate }),
 *   store: new InMemoryConversationStore(),
 * });
 * const { answer, citations, agentUsed } = await orchestrator.runTurn({ sessionId: 'demo', query });
 * ```
 *
 * @packageDocumentation
 */

// Re-export types for library consumers
export type { GlobalOptions, CommandContext } from './cli/types.js';

// Orchestration, classification, specialists, synthesis
export * from './agent/index.js';

// Retrieval
export * from './search/index.js';

// History
export * from './history/index.js';

// Capabilities
export {
  createCapabilities,
  createOllamaEmbedder,
  createOllamaGenerator,
  createSerpApiSearch,
  ProviderError,
  type Capabilities,
  type CapabilityOverrides,
} from './providers/index.js';

// Configuration
export {
  loadConfig,
  ConfigSchema,
  DEFAULT_CONFIG,
  buildDefaultConfig,
  type Config,
} from './config/index.js';

// Observability
export {
  TURN_TRACE_NAME,
  createTracer,
  createNoopTracer,
  sampleTurns,
  type TurnTracer,
  type TurnTrace,
} from './observability/index.js';

// Errors and logging
export {
  CLIError,
  ConfigError,
  DatabaseError,
  FileNotFoundError,
  ValidationError,
  formatError,
} from './errors/index.js';
export { SchemaValidationError } from './database/validation.js';
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
export {
  runWithTimeout,
  OperationTimeoutError,
  OperationAbortedError,
  isAbortError,
} from './utils/abort.js';
