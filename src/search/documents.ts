/**
 * Article Source
 *
 * Long-form skincare articles, stored as chunks. Several chunks of one
 * article can match a query; results are collapsed to the best chunk per
 * article title.
 */

import { z } from 'zod';

import type { Logger } from '../utils/logger.js';
import { VectorRetrievalSource } from './vector-source.js';
import type { EmbedFn, EvidenceItem, IndexMatch, SourceSchema, VectorIndex } from './types.js';
import type { IndexRecord } from './in-memory-index.js';

export const ArticleChunkSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  author: z.string().optional(),
  date: z.string().optional(),
  tags: z
    .array(z.string().trim().min(1))
    .default([])
    .transform((tags) => tags.map((t) => t.toLowerCase())),
  url: z.string().url().optional(),
  chunk_index: z.number().int().nonnegative().default(0),
  total_chunks: z.number().int().positive().default(1),
  content: z.string().min(1),
});

export type ArticleChunk = z.infer<typeof ArticleChunkSchema>;

/** Filterable article attributes */
export const DOCUMENT_SCHEMA: SourceSchema = {
  tags: 'set',
  author: 'string',
};

/** Render a chunk as the excerpt handed to the generator. */
export function formatArticle(metadata: Readonly<Record<string, unknown>>, content: string): string {
  const title = typeof metadata.title === 'string' ? metadata.title : 'Untitled';
  const lines = [`Article: ${title}`];

  if (typeof metadata.author === 'string' && metadata.author) {
    lines.push(`Author: ${metadata.author}`);
  }
  if (typeof metadata.date === 'string' && metadata.date) {
    lines.push(`Published: ${metadata.date}`);
  }
  if (Array.isArray(metadata.tags) && metadata.tags.length > 0) {
    lines.push(`Tags: ${metadata.tags.join(', ')}`);
  }
  if (typeof metadata.url === 'string' && metadata.url) {
    lines.push(`URL: ${metadata.url}`);
  }

  lines.push('', content);
  return lines.join('\n');
}

/**
 * Keep the best-scoring chunk per article title. Input must already be
 * ranked; chunks without a title are kept as-is.
 */
export function dedupeByTitle(items: EvidenceItem[]): EvidenceItem[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const title = item.metadata.title;
    if (typeof title !== 'string' || !title) return true;
    if (seen.has(title)) return false;
    seen.add(title);
    return true;
  });
}

export function toArticleIndexRecord(chunk: ArticleChunk, vector: number[]): IndexRecord {
  const { id, content, ...attributes } = chunk;
  return { id, vector, content, metadata: { ...attributes } };
}

function toArticleEvidence(match: IndexMatch): EvidenceItem {
  return {
    sourceId: match.id,
    sourceKind: 'document',
    score: match.score,
    excerpt: formatArticle(match.metadata, match.content),
    metadata: match.metadata,
  };
}

export interface DocumentSourceOptions {
  embed: EmbedFn;
  index: VectorIndex;
  overfetchFactor?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/** Create the article retrieval source. */
export function createDocumentSource(options: DocumentSourceOptions): VectorRetrievalSource {
  return new VectorRetrievalSource({
    kind: 'document',
    name: 'documents',
    schema: DOCUMENT_SCHEMA,
    toEvidence: toArticleEvidence,
    collapse: dedupeByTitle,
    ...options,
  });
}
