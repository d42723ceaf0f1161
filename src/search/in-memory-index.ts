/**
 * In-process vector index.
 *
 * Brute-force cosine similarity over stored vectors. Used by the CLI for
 * small catalogs loaded from JSON and by tests as a stand-in for a hosted
 * index. `supportsFilters` selects whether constraints are applied inside
 * the index or left to the adapter's post-filter.
 */

import { compareIds, matchesConstraints } from './constraints.js';
import type { IndexMatch, IndexQuery, VectorIndex } from './types.js';

/** A record stored in the index. */
export interface IndexRecord {
  id: string;
  vector: number[];
  content: string;
  metadata: Record<string, unknown>;
}

export interface InMemoryVectorIndexOptions {
  /** Apply `filter` before ranking (default: true) */
  supportsFilters?: boolean;
}

/**
 * Cosine similarity of two vectors. Returns 0 when either has zero norm or
 * the lengths differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorIndex implements VectorIndex {
  readonly supportsFilters: boolean;
  private readonly records = new Map<string, IndexRecord>();

  constructor(options: InMemoryVectorIndexOptions = {}) {
    this.supportsFilters = options.supportsFilters ?? true;
  }

  /** Insert or replace records by id. */
  add(records: IndexRecord[]): void {
    for (const record of records) {
      this.records.set(record.id, record);
    }
  }

  get size(): number {
    return this.records.size;
  }

  async query(request: IndexQuery): Promise<IndexMatch[]> {
    if (request.signal?.aborted) {
      throw new DOMException('Index query aborted', 'AbortError');
    }

    const filter = this.supportsFilters ? request.filter : undefined;
    const matches: IndexMatch[] = [];

    for (const record of this.records.values()) {
      if (filter && !matchesConstraints(record.metadata, filter)) continue;
      matches.push({
        id: record.id,
        score: cosineSimilarity(request.vector, record.vector),
        content: record.content,
        metadata: record.metadata,
      });
    }

    matches.sort((a, b) => b.score - a.score || compareIds(a.id, b.id));
    return matches.slice(0, Math.max(0, request.topK));
  }
}
