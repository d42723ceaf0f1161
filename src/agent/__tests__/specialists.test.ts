/**
 * Specialist Agent Tests
 *
 * Catalog relaxation, document tag fallback, web results and the
 * never-throw contract, over the in-memory fixtures.
 */

import { describe, it, expect, vi } from 'vitest';

import {
  CatalogAgent,
  DocumentAgent,
  GeneralKnowledgeAgent,
  createBundle,
  mostImportantConstraint,
} from '../specialists.js';
import { TurnAbortedError } from '../errors.js';
import { createCatalogSource } from '../../search/catalog.js';
import { createDocumentSource } from '../../search/documents.js';
import { CATALOG_SCHEMA } from '../../search/catalog.js';
import { createWebSource } from '../../search/web-source.js';
import type { ConstraintPredicate, EvidenceItem, RetrievalSource, WebSearchFn } from '../../search/types.js';
import {
  createArticleIndex,
  createCatalogIndex,
  createFakeWebSearch,
  failingEmbed,
  fixedEmbed,
} from '../../__tests__/fixtures.js';

function ids(items: readonly EvidenceItem[]): string[] {
  return items.map((item) => item.sourceId);
}

function catalogAgent(embed = fixedEmbed) {
  return new CatalogAgent(createCatalogSource({ embed, index: createCatalogIndex() }));
}

function documentAgent(embed = fixedEmbed) {
  return new DocumentAgent(createDocumentSource({ embed, index: createArticleIndex() }));
}

// ============================================================================
// Catalog agent
// ============================================================================

describe('CatalogAgent', () => {
  it('should return matches for the full constraint set without relaxing', async () => {
    const bundle = await catalogAgent().handle('moisturizer', {
      price: { kind: 'range', max: 1200 },
      skin_type: { kind: 'contains', values: ['oily'] },
    });

    expect(ids(bundle.items)).toEqual(['p-800', 'p-1100']);
    expect(bundle.agent).toBe('catalog');
    expect(bundle.relaxation).toBe('none');
    expect(bundle.degraded).toBe(false);
    expect(bundle.notes).toEqual([]);
  });

  it('should relax to the most important constraint first', async () => {
    const bundle = await catalogAgent().handle('moisturizer', {
      price: { kind: 'range', max: 1000 },
      brand: { kind: 'oneOf', values: ['Nobrand'] },
    });

    expect(ids(bundle.items)).toEqual(['p-900', 'p-800']);
    expect(bundle.relaxation).toBe('single');
    expect(bundle.notes).toEqual([
      'Only 0 catalog matches for price <= 1000, brand in Nobrand; relaxing to price <= 1000',
    ]);
  });

  it('should drop every constraint as a last resort', async () => {
    const bundle = await catalogAgent().handle('moisturizer', {
      price: { kind: 'range', max: 700 },
      skin_type: { kind: 'contains', values: ['oily'] },
    });

    expect(ids(bundle.items)).toEqual(['p-1500', 'p-900', 'p-800', 'p-1100']);
    expect(bundle.relaxation).toBe('unconstrained');
    expect(bundle.notes).toEqual([
      'Only 0 catalog matches for price <= 700, skin_type has oily; relaxing to price <= 700',
      'Only 0 catalog matches for price <= 700; relaxing to none',
    ]);
  });

  it('should ignore constraints the catalog does not understand', async () => {
    const bundle = await catalogAgent().handle('moisturizer', {
      tags: { kind: 'contains', values: ['acne'] },
    });

    expect(bundle.items).toHaveLength(4);
    expect(bundle.relaxation).toBe('none');
  });

  it('should drop constraints named like built-in object properties', async () => {
    const bundle = await catalogAgent().handle('moisturizer', {
      constructor: { kind: 'range', max: 5 } satisfies ConstraintPredicate,
      toString: { kind: 'oneOf', values: ['x'] } satisfies ConstraintPredicate,
    });

    expect(bundle.items).toHaveLength(4);
    expect(bundle.relaxation).toBe('none');
    expect(bundle.degraded).toBe(false);
  });

  it('should report an unreachable source as a degraded bundle', async () => {
    const bundle = await catalogAgent(failingEmbed).handle('moisturizer', {
      price: { kind: 'range', max: 1200 },
    });

    expect(bundle.items).toEqual([]);
    expect(bundle.degraded).toBe(true);
    expect(bundle.unavailableSources).toEqual(['catalog']);
    expect(bundle.notes).toEqual(['Retrieval source "catalog" is unavailable']);
  });

  it('should treat a source that throws as unavailable', async () => {
    const source: RetrievalSource = {
      kind: 'catalog',
      name: 'stub',
      schema: CATALOG_SCHEMA,
      search: vi.fn(async () => {
        throw new Error('socket hang up');
      }),
    };

    const bundle = await new CatalogAgent(source).handle('moisturizer', {});

    expect(bundle.degraded).toBe(true);
    expect(bundle.notes).toEqual(['Retrieval source "stub" is unavailable']);
  });

  it('should throw TurnAbortedError when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      catalogAgent().handle('moisturizer', {}, { signal: controller.signal })
    ).rejects.toBeInstanceOf(TurnAbortedError);
  });
});

// ============================================================================
// Document agent
// ============================================================================

describe('DocumentAgent', () => {
  it('should keep only tag and author filters and collapse chunks per article', async () => {
    const bundle = await documentAgent().handle('oily skin routine', {
      tags: { kind: 'contains', values: ['routine'] },
      price: { kind: 'range', max: 100 },
    });

    expect(ids(bundle.items)).toEqual(['a-1#1']);
    expect(bundle.relaxation).toBe('none');
  });

  it('should search all articles once when the tags match nothing', async () => {
    const bundle = await documentAgent().handle('eczema care', {
      tags: { kind: 'contains', values: ['eczema'] },
    });

    expect(ids(bundle.items)).toEqual(['a-1#1', 'a-2#0']);
    expect(bundle.relaxation).toBe('unconstrained');
    expect(bundle.notes).toEqual(['No articles for tags has eczema; searching all articles']);
  });

  it('should report an unreachable source as a degraded bundle', async () => {
    const bundle = await documentAgent(failingEmbed).handle('acne', {});

    expect(bundle.degraded).toBe(true);
    expect(bundle.unavailableSources).toEqual(['documents']);
    expect(bundle.notes).toEqual(['Retrieval source "documents" is unavailable']);
  });
});

// ============================================================================
// General-knowledge agent
// ============================================================================

describe('GeneralKnowledgeAgent', () => {
  it('should search the web for the configured number of results', async () => {
    const webSearch = createFakeWebSearch();
    const agent = new GeneralKnowledgeAgent(createWebSource({ webSearch }), { results: 1 });

    const bundle = await agent.handle('latest acne research 2025', {
      price: { kind: 'range', max: 1200 },
    });

    expect(ids(bundle.items)).toEqual(['https://example.org/acne-diet']);
    expect(webSearch).toHaveBeenCalledWith('latest acne research 2025 skincare dermatology', {
      signal: expect.any(AbortSignal),
      limit: 1,
    });
  });

  it('should report a failing search as a degraded bundle', async () => {
    const webSearch = vi.fn<WebSearchFn>(async () => {
      throw new Error('quota exceeded');
    });
    const agent = new GeneralKnowledgeAgent(createWebSource({ webSearch }));

    const bundle = await agent.handle('latest acne research', {});

    expect(bundle.degraded).toBe(true);
    expect(bundle.unavailableSources).toEqual(['web']);
  });
});

// ============================================================================
// Helpers
// ============================================================================

describe('mostImportantConstraint', () => {
  it('should follow the attribute priority', () => {
    expect(
      mostImportantConstraint({
        rating: { kind: 'range', min: 4 },
        skin_type: { kind: 'contains', values: ['dry'] },
      })
    ).toEqual({ skin_type: { kind: 'contains', values: ['dry'] } });
    expect(mostImportantConstraint({})).toBeUndefined();
  });
});

describe('createBundle', () => {
  it('should build a frozen bundle with defaults', () => {
    const bundle = createBundle('document');

    expect(bundle).toEqual({
      agent: 'document',
      items: [],
      degraded: false,
      fallback: false,
      relaxation: 'none',
      unavailableSources: [],
      notes: [],
    });
    expect(Object.isFrozen(bundle)).toBe(true);
    expect(Object.isFrozen(bundle.items)).toBe(true);
  });
});
