/**
 * Configuration Schema
 *
 * Defines the shape of ~/.dermaroute/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Retrieval adapter settings shared by the catalog and document sources
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Evidence items per specialist'),
  overfetch_factor: z
    .number()
    .int()
    .min(1)
    .max(20)
    .describe('Candidate multiplier when the index cannot filter'),
  timeout_ms: z.number().int().min(100).max(120000).describe('Deadline per retrieval call'),
});

/**
 * Intent classifier settings
 */
export const ClassifierConfigSchema = z.object({
  confidence_threshold: z
    .number()
    .min(0)
    .max(1)
    .describe('Winning confidence below this resolves to general-knowledge'),
  history_window: z.number().int().min(0).max(20).describe('Previous turns used as context'),
  use_llm: z.boolean().describe('Ask the generation model about ambiguous questions'),
  affordable_price_ceiling: z
    .number()
    .positive()
    .describe('Price ceiling that "cheap"/"affordable" maps to'),
});

export const CatalogConfigSchema = z.object({
  min_results: z.number().int().min(1).describe('Fewer matches than this relaxes the filters'),
  data_path: z.string().describe('JSON array of catalog products'),
});

export const DocumentsConfigSchema = z.object({
  data_path: z.string().describe('JSON array of article chunks'),
});

export const WebConfigSchema = z.object({
  results: z.number().int().min(1).max(10).describe('Web results per question'),
  query_suffix: z.string().describe('Appended to every web query'),
});

/**
 * Capability provider type (used by generation and embedding)
 */
export const ProviderTypeSchema = z.enum(['ollama']);

export const GenerationConfigSchema = z.object({
  provider: ProviderTypeSchema.describe('Generation provider'),
  model: z.string().min(1).describe('Generation model name'),
  timeout_ms: z.number().int().min(1000).max(600000).describe('Deadline per generation call'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
});

export const EmbeddingConfigSchema = z.object({
  provider: ProviderTypeSchema.describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
});

export const HistoryConfigSchema = z.object({
  database: z.string().describe('SQLite file for conversation history'),
});

/**
 * Observability configuration (Langfuse tracing)
 */
export const ObservabilityConfigSchema = z.object({
  enabled: z.boolean().describe('Enable tracing'),
  sample_rate: z.number().min(0).max(1).describe('Fraction of turns traced'),
  langfuse_host: z.string().url().optional().describe('Langfuse host URL'),
  langfuse_public_key: z.string().optional().describe('Or set LANGFUSE_PUBLIC_KEY'),
  langfuse_secret_key: z.string().optional().describe('Or set LANGFUSE_SECRET_KEY'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  retrieval: RetrievalConfigSchema,
  classifier: ClassifierConfigSchema,
  catalog: CatalogConfigSchema,
  documents: DocumentsConfigSchema,
  web: WebConfigSchema,
  generation: GenerationConfigSchema,
  embedding: EmbeddingConfigSchema,
  history: HistoryConfigSchema,
  observability: ObservabilityConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
