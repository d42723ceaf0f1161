/**
 * Engine Assembly
 *
 * Wires configuration into a ready TurnOrchestrator:
 *
 * ```
 * config.toml ──► capabilities (Ollama embed/generate, SerpAPI search)
 *             ──► catalog.json / articles.json ──► in-memory vector indexes
 *             ──► sources ──► specialist agents ─┐
 *             ──► classifier, synthesizer ───────┼──► TurnOrchestrator
 *             ──► SQLite history, tracer ────────┘
 * ```
 *
 * Loading embeds every product and article chunk once, so it dominates
 * start-up time; callers show progress through `onProgress`.
 *
 * @example
 * ```typescript
 * const engine = await createEngine(loadConfig(), { logger: ctx });
 * const result = await engine.orchestrator.runTurn({ sessionId, query });
 * await engine.close();
 * ```
 */

import type { Config } from '../config/schema.js';
import { openConversationStore } from '../history/sqlite-store.js';
import type { ConversationStore } from '../history/types.js';
import { createTracer } from '../observability/factory.js';
import type { TurnTracer } from '../observability/types.js';
import { createCapabilities, type Capabilities } from '../providers/capabilities.js';
import { createCatalogSource } from '../search/catalog.js';
import { createDocumentSource } from '../search/documents.js';
import {
  buildArticleIndex,
  buildCatalogIndex,
  loadArticles,
  loadCatalog,
  type IndexBuildProgress,
} from '../search/loaders.js';
import type { VectorIndex } from '../search/types.js';
import { createWebSource } from '../search/web-source.js';
import type { Logger } from '../utils/logger.js';
import { createIntentClassifier } from './intent-classifier.js';
import { createOrchestrator, type TurnOrchestrator } from './orchestrator.js';
import { CatalogAgent, DocumentAgent, GeneralKnowledgeAgent } from './specialists.js';
import { createSynthesizer } from './synthesizer.js';
import type { AgentKind, SpecialistAgent } from './types.js';

export type EngineLoadStage = 'catalog' | 'documents';

export interface EngineOptions {
  logger?: Logger;
  /** Overrides the configured capabilities (tests, custom backends) */
  capabilities?: Capabilities;
  /** Overrides the SQLite store built from `history.database` */
  store?: ConversationStore;
  tracer?: TurnTracer;
  onProgress?: (stage: EngineLoadStage, progress: IndexBuildProgress) => void;
  signal?: AbortSignal;
}

export interface Engine {
  orchestrator: TurnOrchestrator;
  store: ConversationStore;
  tracer: TurnTracer;
  /** Products and article chunks indexed */
  counts: { products: number; articleChunks: number };
  /** Flush and stop the tracer */
  close(): Promise<void>;
}

/**
 * Build the specialist for each agent kind from already-loaded indexes.
 */
export function createAgents(
  config: Pick<Config, 'retrieval' | 'catalog' | 'web'>,
  parts: {
    capabilities: Pick<Capabilities, 'embed' | 'webSearch'>;
    catalogIndex: VectorIndex;
    articleIndex: VectorIndex;
    logger?: Logger;
  }
): Record<AgentKind, SpecialistAgent> {
  const { capabilities, logger } = parts;
  const retrieval = {
    embed: capabilities.embed,
    overfetchFactor: config.retrieval.overfetch_factor,
    timeoutMs: config.retrieval.timeout_ms,
    logger,
  };

  const catalogSource = createCatalogSource({ ...retrieval, index: parts.catalogIndex });
  const documentSource = createDocumentSource({ ...retrieval, index: parts.articleIndex });
  const webSource = createWebSource({
    webSearch: capabilities.webSearch,
    querySuffix: config.web.query_suffix,
    timeoutMs: config.retrieval.timeout_ms,
    logger,
  });

  return {
    catalog: new CatalogAgent(catalogSource, {
      topK: config.retrieval.top_k,
      minResults: config.catalog.min_results,
      logger,
    }),
    document: new DocumentAgent(documentSource, { topK: config.retrieval.top_k, logger }),
    'general-knowledge': new GeneralKnowledgeAgent(webSource, { results: config.web.results }),
  };
}

/**
 * Load the data files, build the indexes and assemble the orchestrator.
 *
 * @throws FileNotFoundError / ValidationError for missing or invalid data files
 * @throws ProviderError when a capability host is misconfigured or embedding fails
 */
export async function createEngine(config: Config, options: EngineOptions = {}): Promise<Engine> {
  const { logger, onProgress, signal } = options;
  const capabilities = options.capabilities ?? createCapabilities(config);

  const products = loadCatalog(config.catalog.data_path);
  const chunks = loadArticles(config.documents.data_path);

  const catalogIndex = await buildCatalogIndex(products, capabilities.embed, {
    signal,
    onProgress: (progress) => onProgress?.('catalog', progress),
  });
  const articleIndex = await buildArticleIndex(chunks, capabilities.embed, {
    signal,
    onProgress: (progress) => onProgress?.('documents', progress),
  });
  logger?.debug?.(`Indexed ${catalogIndex.size} products and ${articleIndex.size} article chunks`);

  const agents = createAgents(config, { capabilities, catalogIndex, articleIndex, logger });

  const classifier = createIntentClassifier({
    confidenceThreshold: config.classifier.confidence_threshold,
    affordablePriceCeiling: config.classifier.affordable_price_ceiling,
    useLLM: config.classifier.use_llm,
    generate: capabilities.generate,
    llm: { logger },
  });

  const synthesizer = createSynthesizer({
    generate: capabilities.generate,
    timeoutMs: config.generation.timeout_ms,
    temperature: config.generation.temperature,
    logger,
  });

  const store = options.store ?? openConversationStore(config.history.database);
  const tracer = options.tracer ?? createTracer(config);

  const orchestrator = createOrchestrator({
    classifier,
    agents,
    synthesizer,
    store,
    historyWindow: config.classifier.history_window,
    tracer,
    sampleRate: config.observability.sample_rate,
    generationModel: capabilities.generationModel,
    logger,
  });

  return {
    orchestrator,
    store,
    tracer,
    counts: { products: products.length, articleChunks: chunks.length },
    close: () => tracer.shutdown(),
  };
}
