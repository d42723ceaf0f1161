/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import { join } from 'node:path';

import { getAppDir } from './paths.js';
import type { Config } from './schema.js';

/**
 * Default configuration. Paths are resolved against the app directory
 * when the defaults are built.
 */
export function buildDefaultConfig(): Config {
  const appDir = getAppDir();
  return {
    retrieval: {
      top_k: 5,
      overfetch_factor: 4,
      timeout_ms: 4000,
    },
    classifier: {
      confidence_threshold: 0.55,
      history_window: 3,
      use_llm: false,
      affordable_price_ceiling: 1000,
    },
    catalog: {
      min_results: 1,
      data_path: join(appDir, 'catalog.json'),
    },
    documents: {
      data_path: join(appDir, 'articles.json'),
    },
    web: {
      results: 3,
      query_suffix: 'skincare dermatology',
    },
    generation: {
      provider: 'ollama',
      model: 'llama3.1',
      timeout_ms: 8000,
      temperature: 0,
    },
    embedding: {
      provider: 'ollama',
      model: 'nomic-embed-text',
    },
    history: {
      database: join(appDir, 'history.db'),
    },
    observability: {
      enabled: false,
      sample_rate: 1.0,
      langfuse_host: 'https://cloud.langfuse.com',
    },
  };
}

export const DEFAULT_CONFIG: Config = buildDefaultConfig();

/**
 * Config file template (TOML format)
 * Written to ~/.dermaroute/config.toml on first run
 */
export function buildConfigTemplate(defaults: Config = buildDefaultConfig()): string {
  return `# dermaroute configuration
# Location: ~/.dermaroute/config.toml

# Retrieval (catalog and article search)
[retrieval]
top_k = ${defaults.retrieval.top_k}
overfetch_factor = ${defaults.retrieval.overfetch_factor}   # candidates = top_k x factor when filtering after ranking
timeout_ms = ${defaults.retrieval.timeout_ms}

# Intent classification
[classifier]
confidence_threshold = ${defaults.classifier.confidence_threshold}
history_window = ${defaults.classifier.history_window}
use_llm = ${defaults.classifier.use_llm}                # ask the generation model about ambiguous questions
affordable_price_ceiling = ${defaults.classifier.affordable_price_ceiling}

# Product catalog (JSON array of products)
[catalog]
min_results = ${defaults.catalog.min_results}
data_path = ${JSON.stringify(defaults.catalog.data_path)}

# Skincare articles (JSON array of article chunks)
[documents]
data_path = ${JSON.stringify(defaults.documents.data_path)}

# Web search (SerpAPI; set SERPAPI_API_KEY)
[web]
results = ${defaults.web.results}
query_suffix = "${defaults.web.query_suffix}"

# Answer generation (Ollama; set OLLAMA_HOST for a remote server)
[generation]
provider = "${defaults.generation.provider}"
model = "${defaults.generation.model}"
timeout_ms = ${defaults.generation.timeout_ms}
temperature = ${defaults.generation.temperature}

[embedding]
provider = "${defaults.embedding.provider}"
model = "${defaults.embedding.model}"

# Conversation history
[history]
database = ${JSON.stringify(defaults.history.database)}

# Observability (Langfuse tracing is opt-in)
[observability]
enabled = ${defaults.observability.enabled}
sample_rate = ${defaults.observability.sample_rate}
langfuse_host = "${defaults.observability.langfuse_host ?? ''}"
# langfuse_public_key = "pk-lf-..."  # or set LANGFUSE_PUBLIC_KEY env var
# langfuse_secret_key = "sk-lf-..."  # or set LANGFUSE_SECRET_KEY env var
`;
}

export const CONFIG_TEMPLATE = buildConfigTemplate(DEFAULT_CONFIG);
