/**
 * Search Module
 *
 * Retrieval sources behind one contract: `search(query, constraints, k)`.
 *
 * - Catalog: structured products, semantic search plus attribute filters
 * - Documents: chunked articles, collapsed to one chunk per article
 * - Web: open web search narrowed to the skincare domain
 *
 * @example
 * ```typescript
 * import { createCatalogSource, loadCatalog, buildCatalogIndex } from './search/index.js';
 *
 * const index = await buildCatalogIndex(loadCatalog('catalog.json'), embed);
 * const catalog = createCatalogSource({ embed, index });
 * const outcome = await catalog.search('moisturizer', {
 *   price: { kind: 'range', max: 1200 },
 * }, 5);
 * ```
 *
 * @packageDocumentation
 */

// Contracts
export type {
  AttributeType,
  CapabilityCallOptions,
  ConstraintPredicate,
  Constraints,
  EmbedFn,
  EvidenceItem,
  IndexMatch,
  IndexQuery,
  RetrievalOutcome,
  RetrievalSource,
  SearchOptions,
  SourceKind,
  SourceSchema,
  VectorIndex,
  WebResult,
  WebSearchFn,
} from './types.js';

// Constraint semantics
export {
  validateConstraints,
  matchesConstraints,
  isUnconstrained,
  describeConstraints,
  compareIds,
  type InvalidConstraint,
  type ConstraintValidation,
} from './constraints.js';

// Index
export {
  InMemoryVectorIndex,
  cosineSimilarity,
  type IndexRecord,
  type InMemoryVectorIndexOptions,
} from './in-memory-index.js';

// Sources
export {
  VectorRetrievalSource,
  compareEvidence,
  DEFAULT_OVERFETCH_FACTOR,
  DEFAULT_RETRIEVAL_TIMEOUT_MS,
  type VectorSourceOptions,
} from './vector-source.js';
export {
  createCatalogSource,
  CatalogRecordSchema,
  CATALOG_SCHEMA,
  formatProduct,
  type CatalogRecord,
  type CatalogSourceOptions,
} from './catalog.js';
export {
  createDocumentSource,
  ArticleChunkSchema,
  DOCUMENT_SCHEMA,
  dedupeByTitle,
  type ArticleChunk,
  type DocumentSourceOptions,
} from './documents.js';
export {
  createWebSource,
  WebRetrievalSource,
  DEFAULT_QUERY_SUFFIX,
  type WebSourceOptions,
} from './web-source.js';

// Loading
export {
  loadCatalog,
  loadArticles,
  buildCatalogIndex,
  buildArticleIndex,
  type BuildIndexOptions,
  type IndexBuildProgress,
} from './loaders.js';

// Result formatting
export {
  formatEvidence,
  formatEvidenceList,
  formatEvidenceJSON,
  formatScore,
  truncateSnippet,
  type FormatOptions,
  type FormattedEvidenceJSON,
} from './formatter.js';

// Errors
export { SourceUnavailableError, type UnavailableReason } from './errors.js';
