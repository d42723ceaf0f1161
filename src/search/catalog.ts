/**
 * Product Catalog Source
 *
 * Structured product records searched by semantic similarity with
 * price / category / skin type / ingredient / brand / rating filters.
 */

import { z } from 'zod';

import type { Logger } from '../utils/logger.js';
import { VectorRetrievalSource } from './vector-source.js';
import type { EmbedFn, EvidenceItem, IndexMatch, SourceSchema, VectorIndex } from './types.js';
import type { IndexRecord } from './in-memory-index.js';

// ============================================================================
// Record Schema
// ============================================================================

const lowercaseList = z
  .array(z.string().trim().min(1))
  .default([])
  .transform((values) => values.map((v) => v.toLowerCase()));

/**
 * A catalog product as stored in the data file.
 *
 * Ids may be numeric in exported data; they are normalized to strings.
 */
export const CatalogRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  name: z.string().min(1),
  brand: z.string().optional(),
  price: z.number().nonnegative(),
  category: z.string().min(1).transform((c) => c.toLowerCase()),
  skin_type: lowercaseList,
  key_ingredients: lowercaseList,
  rating: z.number().min(0).max(5).optional(),
  rating_count: z.number().int().nonnegative().optional(),
  url: z.string().url().optional(),
  description: z.string().optional(),
});

export type CatalogRecord = z.infer<typeof CatalogRecordSchema>;

/** Filterable catalog attributes */
export const CATALOG_SCHEMA: SourceSchema = {
  price: 'number',
  category: 'enum',
  skin_type: 'set',
  key_ingredients: 'set',
  brand: 'string',
  rating: 'number',
};

// ============================================================================
// Formatting
// ============================================================================

/**
 * Render a product as the excerpt handed to the generator.
 *
 * @example
 * ```
 * Product: Oil-Free Gel Moisturizer
 * Brand: Dewlab
 * Price: ₹800.00
 * Rating: 4.3/5 (120 reviews)
 * Category: moisturizer
 * Skin types: oily, combination
 * ```
 */
export function formatProduct(metadata: Readonly<Record<string, unknown>>): string {
  const name = typeof metadata.name === 'string' ? metadata.name : 'Unknown Product';
  const brand = typeof metadata.brand === 'string' ? metadata.brand : 'Unknown Brand';
  const price = typeof metadata.price === 'number' ? metadata.price : 0;

  const lines = [`Product: ${name}`, `Brand: ${brand}`, `Price: ₹${price.toFixed(2)}`];

  if (typeof metadata.rating === 'number' && metadata.rating > 0) {
    const count = typeof metadata.rating_count === 'number' ? metadata.rating_count : 0;
    lines.push(`Rating: ${metadata.rating.toFixed(1)}/5 (${count} reviews)`);
  }
  if (typeof metadata.category === 'string' && metadata.category) {
    lines.push(`Category: ${metadata.category}`);
  }

  const skinTypes = stringList(metadata.skin_type);
  if (skinTypes.length > 0) lines.push(`Skin types: ${skinTypes.join(', ')}`);

  const ingredients = stringList(metadata.key_ingredients);
  if (ingredients.length > 0) lines.push(`Key ingredients: ${ingredients.join(', ')}`);

  if (typeof metadata.url === 'string' && metadata.url) {
    lines.push(`URL: ${metadata.url}`);
  }

  return lines.join('\n');
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** Text embedded for a product. */
export function productSearchText(record: CatalogRecord): string {
  return [
    record.name,
    record.brand,
    record.category,
    record.skin_type.length > 0 ? `for ${record.skin_type.join(', ')} skin` : undefined,
    record.key_ingredients.join(', '),
    record.description,
  ]
    .filter((part): part is string => Boolean(part))
    .join('. ');
}

/** Convert a validated record into an index record (vector supplied by caller). */
export function toCatalogIndexRecord(record: CatalogRecord, vector: number[]): IndexRecord {
  const { id, ...attributes } = record;
  return {
    id,
    vector,
    content: productSearchText(record),
    metadata: { ...attributes },
  };
}

function toProductEvidence(match: IndexMatch): EvidenceItem {
  return {
    sourceId: match.id,
    sourceKind: 'catalog',
    score: match.score,
    excerpt: formatProduct(match.metadata),
    metadata: match.metadata,
  };
}

// ============================================================================
// Factory
// ============================================================================

export interface CatalogSourceOptions {
  embed: EmbedFn;
  index: VectorIndex;
  overfetchFactor?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Create the catalog retrieval source.
 *
 * @example
 * ```typescript
 * const catalog = createCatalogSource({ embed, index });
 * const outcome = await catalog.search('gel moisturizer', {
 *   price: { kind: 'range', max: 1200 },
 * }, 5);
 * ```
 */
export function createCatalogSource(options: CatalogSourceOptions): VectorRetrievalSource {
  return new VectorRetrievalSource({
    kind: 'catalog',
    name: 'catalog',
    schema: CATALOG_SCHEMA,
    toEvidence: toProductEvidence,
    ...options,
  });
}
