/**
 * Search Module Types
 *
 * Shared shapes for the retrieval layer: constraints, evidence items, the
 * capability contracts the adapters consume (embed, vector index, web search)
 * and the uniform RetrievalSource contract the specialists call.
 */

import type { SourceUnavailableError } from './errors.js';

// ============================================================================
// Constraints
// ============================================================================

/**
 * Predicate over a single attribute.
 *
 * - range: numeric bounds, both inclusive (`price <= 1200` is `{ max: 1200 }`)
 * - oneOf: the record's scalar value is one of `values`
 * - contains: the record's set shares at least one element with `values`
 */
export type ConstraintPredicate =
  | { kind: 'range'; min?: number; max?: number }
  | { kind: 'oneOf'; values: string[] }
  | { kind: 'contains'; values: string[] };

/** Attribute name → predicate. Entries are AND-combined. */
export type Constraints = Readonly<Record<string, ConstraintPredicate>>;

/** Value type of a filterable attribute. */
export type AttributeType = 'number' | 'enum' | 'string' | 'set';

/**
 * Filterable attributes a source understands. Constraints on attributes
 * outside the schema are dropped before search.
 */
export type SourceSchema = Readonly<Record<string, AttributeType>>;

// ============================================================================
// Evidence
// ============================================================================

/** Closed set of backing stores. */
export type SourceKind = 'catalog' | 'document' | 'web';

/**
 * One retrieved piece of evidence.
 *
 * `score` is only meaningful relative to other items of the same source.
 */
export interface EvidenceItem {
  /** Source-native identifier (product id, chunk id, URL) */
  readonly sourceId: string;
  readonly sourceKind: SourceKind;
  readonly score: number;
  /** Human-readable excerpt handed to the generator */
  readonly excerpt: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Capabilities
// ============================================================================

/** Options every capability call accepts. */
export interface CapabilityCallOptions {
  signal?: AbortSignal;
}

/** embed(text) → fixed-length vector */
export type EmbedFn = (text: string, options?: CapabilityCallOptions) => Promise<number[]>;

/** A single web search hit. */
export interface WebResult {
  title: string;
  snippet: string;
  url: string;
}

/** web_search(query) → ordered results */
export type WebSearchFn = (
  query: string,
  options?: CapabilityCallOptions & { limit?: number }
) => Promise<WebResult[]>;

/** A match returned by a vector index. */
export interface IndexMatch {
  id: string;
  score: number;
  content: string;
  metadata: Record<string, unknown>;
}

/** Query sent to a vector index. */
export interface IndexQuery {
  vector: number[];
  topK: number;
  /** Only honoured when the index reports `supportsFilters` */
  filter?: Constraints;
  signal?: AbortSignal;
}

/**
 * The storage engine behind the catalog and document adapters.
 */
export interface VectorIndex {
  /** Whether the index can apply constraints before ranking */
  readonly supportsFilters: boolean;
  query(request: IndexQuery): Promise<IndexMatch[]>;
}

// ============================================================================
// Retrieval Source contract
// ============================================================================

export interface SearchOptions {
  signal?: AbortSignal;
}

/**
 * Result of a source search. An empty `ok` outcome is a legitimate
 * "nothing matched"; `unavailable` means the source could not be asked.
 */
export type RetrievalOutcome =
  | { status: 'ok'; items: EvidenceItem[] }
  | { status: 'unavailable'; items: []; error: SourceUnavailableError };

/**
 * Uniform contract over one backing store.
 */
export interface RetrievalSource {
  readonly kind: SourceKind;
  readonly name: string;
  readonly schema: SourceSchema;
  search(
    queryText: string,
    constraints: Constraints,
    k: number,
    options?: SearchOptions
  ): Promise<RetrievalOutcome>;
}
