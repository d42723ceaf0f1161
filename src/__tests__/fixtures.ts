/**
 * Shared test fixtures: a small catalog and article set with hand-picked
 * vectors, a constant query embedding and recording fakes for the
 * capabilities.
 */

import { vi } from 'vitest';

import { CatalogAgent, DocumentAgent, GeneralKnowledgeAgent } from '../agent/specialists.js';
import type { AgentKind, SpecialistAgent } from '../agent/types.js';
import {
  CatalogRecordSchema,
  createCatalogSource,
  toCatalogIndexRecord,
} from '../search/catalog.js';
import {
  ArticleChunkSchema,
  createDocumentSource,
  toArticleIndexRecord,
} from '../search/documents.js';
import { InMemoryVectorIndex } from '../search/in-memory-index.js';
import { createWebSource } from '../search/web-source.js';
import type { EmbedFn, WebResult, WebSearchFn } from '../search/types.js';
import type { Logger } from '../utils/logger.js';

/** Every query embeds to this vector; ranking comes from the stored vectors. */
export const QUERY_VECTOR = [1, 0, 0];

export const fixedEmbed: EmbedFn = async () => QUERY_VECTOR;

/** Embedding function that always rejects. */
export const failingEmbed: EmbedFn = async () => {
  throw new Error('embedding service refused connection');
};

/** Embedding function that only settles when its signal aborts. */
export const hangingEmbed: EmbedFn = (_text, options) =>
  new Promise((_, reject) => {
    options?.signal?.addEventListener('abort', () => {
      reject(new DOMException('aborted', 'AbortError'));
    });
  });

export const PRODUCTS = [
  {
    record: {
      id: 'p-800',
      name: 'Oil-Free Gel Moisturizer',
      brand: 'Dewlab',
      price: 800,
      category: 'moisturizer',
      skin_type: ['oily', 'combination'],
      key_ingredients: ['niacinamide'],
      rating: 4.3,
      rating_count: 120,
    },
    vector: [0.8, 0.2, 0],
  },
  {
    record: {
      id: 'p-1500',
      name: 'Mattifying Water Cream',
      brand: 'Dewlab',
      price: 1500,
      category: 'moisturizer',
      skin_type: ['oily'],
      key_ingredients: ['hyaluronic acid'],
    },
    vector: [1, 0, 0],
  },
  {
    record: {
      id: 'p-1100',
      name: 'Balancing Lotion',
      brand: 'Calmskin',
      price: 1100,
      category: 'moisturizer',
      skin_type: ['Oily'],
      key_ingredients: ['salicylic acid'],
    },
    vector: [0.5, 0.5, 0],
  },
  {
    record: {
      id: 'p-900',
      name: 'Rich Barrier Cream',
      brand: 'Calmskin',
      price: 900,
      category: 'moisturizer',
      skin_type: ['dry'],
      key_ingredients: ['ceramides'],
    },
    vector: [0.9, 0.1, 0],
  },
] as const;

export const ARTICLES = [
  {
    chunk: {
      id: 'a-1#0',
      title: 'Building a Routine for Oily Skin',
      author: 'Dr. Mehta',
      tags: ['oily', 'routine'],
      chunk_index: 0,
      total_chunks: 2,
      content: 'Start with a gentle foaming cleanser.',
    },
    vector: [0.9, 0.1, 0],
  },
  {
    chunk: {
      id: 'a-1#1',
      title: 'Building a Routine for Oily Skin',
      author: 'Dr. Mehta',
      tags: ['oily', 'routine'],
      chunk_index: 1,
      total_chunks: 2,
      content: 'Follow with a light gel moisturizer.',
    },
    vector: [1, 0, 0],
  },
  {
    chunk: {
      id: 'a-2#0',
      title: 'What Causes Acne',
      tags: ['acne'],
      chunk_index: 0,
      total_chunks: 1,
      content: 'Acne forms when pores clog with oil and dead skin.',
    },
    vector: [0.6, 0.4, 0],
  },
] as const;

export function createCatalogIndex(supportsFilters = true): InMemoryVectorIndex {
  const index = new InMemoryVectorIndex({ supportsFilters });
  index.add(
    PRODUCTS.map(({ record, vector }) =>
      toCatalogIndexRecord(CatalogRecordSchema.parse(record), [...vector])
    )
  );
  return index;
}

export function createArticleIndex(supportsFilters = true): InMemoryVectorIndex {
  const index = new InMemoryVectorIndex({ supportsFilters });
  index.add(
    ARTICLES.map(({ chunk, vector }) =>
      toArticleIndexRecord(ArticleChunkSchema.parse(chunk), [...vector])
    )
  );
  return index;
}

export const WEB_RESULTS: WebResult[] = [
  {
    title: 'New findings on acne and diet',
    snippet: 'A 2025 review looked at glycemic load.',
    url: 'https://example.org/acne-diet',
  },
  {
    title: 'Topical retinoids explained',
    snippet: 'How retinoids speed up cell turnover.',
    url: 'https://example.org/retinoids',
  },
];

/** A web search fake that records its calls. */
export function createFakeWebSearch(results: WebResult[] = WEB_RESULTS) {
  return vi.fn<WebSearchFn>(async (_query, options) =>
    results.slice(0, options?.limit ?? results.length)
  );
}

/** Logger whose calls can be asserted. */
export function createRecordingLogger() {
  return {
    warn: vi.fn<(message: string) => void>(),
    debug: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

export interface TestAgentOptions {
  /** Embedding used by the catalog source */
  catalogEmbed?: EmbedFn;
  /** Embedding used by the article source */
  documentEmbed?: EmbedFn;
  webSearch?: WebSearchFn;
}

/** The three specialists over the fixture indexes. */
export function createTestAgents(
  options: TestAgentOptions = {}
): Record<AgentKind, SpecialistAgent> {
  const catalog = createCatalogSource({
    embed: options.catalogEmbed ?? fixedEmbed,
    index: createCatalogIndex(),
  });
  const documents = createDocumentSource({
    embed: options.documentEmbed ?? fixedEmbed,
    index: createArticleIndex(),
  });
  const web = createWebSource({ webSearch: options.webSearch ?? createFakeWebSearch() });

  return {
    catalog: new CatalogAgent(catalog),
    document: new DocumentAgent(documents),
    'general-knowledge': new GeneralKnowledgeAgent(web, { results: 2 }),
  };
}
