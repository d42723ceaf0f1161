/**
 * Citations
 *
 * Resolves the `[n]` markers in a generated answer to the evidence they
 * point at, and formats the resulting citations for the terminal and JSON.
 *
 * @example
 * ```typescript
 * import { extractCitations, resolveCitations, formatCitations } from './citations.js';
 *
 * const ids = extractCitations('Try the gel [2], or the lotion [1][2].', items);
 * // ['p-1100', 'p-800']   (items[1], items[0])
 *
 * formatCitations(resolveCitations(ids, items));
 * // "[2] Balancing Lotion (0.71)
 * //  [1] Oil-Free Gel Moisturizer (0.97)"
 * ```
 *
 * @packageDocumentation
 */

import { z } from 'zod';

import { formatScore } from '../search/formatter.js';
import type { EvidenceItem, SourceKind } from '../search/types.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

/**
 * A cited evidence item.
 */
export interface Citation {
  /** 1-based position in the evidence bundle, as used in the answer */
  index: number;
  sourceId: string;
  sourceKind: SourceKind;
  /** Product name, article title or page title */
  label: string;
  url?: string;
  score: number;
}

/**
 * Citation display style for CLI output.
 *
 * - 'compact': "[1] Oil-Free Gel Moisturizer (0.97)"
 * - 'detailed': adds a line with kind, id and URL
 * - 'minimal': "[1] Oil-Free Gel Moisturizer"
 */
export type CitationStyle = 'compact' | 'detailed' | 'minimal';

export interface CitationFormatOptions {
  /** Citation display style (default: 'compact') */
  style?: CitationStyle;
  /** Show relevance scores (default: true except for minimal) */
  showScores?: boolean;
  /** Maximum number of citations to display (default: unlimited) */
  limit?: number;
  /** Show "...and N more" when truncated (default: true) */
  showTruncationHint?: boolean;
}

/** JSON output format for a single citation. */
export interface CitationJSON {
  index: number;
  sourceId: string;
  sourceKind: SourceKind;
  label: string;
  url: string | null;
  score: number;
}

export interface CitationsOutputJSON {
  count: number;
  citations: CitationJSON[];
}

export interface CitationFormatter {
  format(citations: Citation[]): string;
  formatJSON(citations: Citation[]): CitationsOutputJSON;
  formatOne(citation: Citation): string;
}

// ============================================================================
// VALIDATION SCHEMA
// ============================================================================

export const CitationStyleSchema = z.enum(['compact', 'detailed', 'minimal']);

export const CitationFormatOptionsSchema = z.object({
  style: CitationStyleSchema.optional(),
  showScores: z.boolean().optional(),
  limit: z.number().int().min(0).optional(),
  showTruncationHint: z.boolean().optional(),
});

export const DEFAULT_CITATION_CONFIG = {
  style: 'compact' as CitationStyle,
  limit: 0, // 0 = no limit
  showTruncationHint: true,
};

// ============================================================================
// EXTRACTION
// ============================================================================

/** `[1]`, `[1, 3]` and `[1][2]` all count. */
const MARKER_RE = /\[(\d+(?:\s*,\s*\d+)*)\]/g;

/**
 * sourceIds cited in an answer, unique, in order of first appearance.
 * Markers outside 1..items.length are ignored.
 */
export function extractCitations(answer: string, items: readonly EvidenceItem[]): string[] {
  const cited: string[] = [];

  for (const match of answer.matchAll(MARKER_RE)) {
    for (const part of (match[1] ?? '').split(',')) {
      const n = Number.parseInt(part.trim(), 10);
      const item = n >= 1 ? items[n - 1] : undefined;
      if (item && !cited.includes(item.sourceId)) {
        cited.push(item.sourceId);
      }
    }
  }

  return cited;
}

function labelOf(item: EvidenceItem): string {
  for (const key of ['name', 'title']) {
    const value = item.metadata[key];
    if (typeof value === 'string' && value) return value;
  }
  return item.sourceId;
}

/**
 * Attach display data to cited sourceIds. Ids not in `items` are skipped.
 */
export function resolveCitations(
  sourceIds: readonly string[],
  items: readonly EvidenceItem[]
): Citation[] {
  const citations: Citation[] = [];
  for (const sourceId of sourceIds) {
    const position = items.findIndex((item) => item.sourceId === sourceId);
    const item = items[position];
    if (!item) continue;

    const url = item.metadata.url;
    citations.push({
      index: position + 1,
      sourceId,
      sourceKind: item.sourceKind,
      label: labelOf(item),
      ...(typeof url === 'string' && url ? { url } : {}),
      score: item.score,
    });
  }
  return citations;
}

// ============================================================================
// CORE FORMATTING FUNCTIONS
// ============================================================================

/**
 * Format a single citation for CLI display.
 *
 * @example
 * ```typescript
 * formatCitation(citation, { style: 'detailed' })
 * // "[1] Oil-Free Gel Moisturizer
 * //     catalog p-800 | score: 0.97"
 * ```
 */
export function formatCitation(citation: Citation, options: CitationFormatOptions = {}): string {
  const style = options.style ?? DEFAULT_CITATION_CONFIG.style;
  const showScores = options.showScores ?? style !== 'minimal';

  switch (style) {
    case 'minimal':
      return `[${citation.index}] ${citation.label}`;

    case 'detailed': {
      const parts = [`${citation.sourceKind} ${citation.sourceId}`];
      if (citation.url && citation.url !== citation.sourceId) {
        parts.push(citation.url);
      }
      if (showScores) {
        parts.push(`score: ${formatScore(citation.score)}`);
      }
      return `[${citation.index}] ${citation.label}\n    ${parts.join(' | ')}`;
    }

    case 'compact':
    default: {
      const scorePart = showScores ? ` (${formatScore(citation.score)})` : '';
      return `[${citation.index}] ${citation.label}${scorePart}`;
    }
  }
}

/**
 * Format multiple citations, one per line, with an optional truncation hint.
 */
export function formatCitations(citations: Citation[], options: CitationFormatOptions = {}): string {
  if (citations.length === 0) {
    return '';
  }

  const config = { ...DEFAULT_CITATION_CONFIG, ...options };
  const limit = config.limit > 0 ? config.limit : citations.length;
  const shown = citations.slice(0, limit);
  const truncatedCount = citations.length - shown.length;

  const lines = shown.map((citation) => formatCitation(citation, config));
  if (truncatedCount > 0 && config.showTruncationHint) {
    lines.push(`...and ${truncatedCount} more`);
  }

  return lines.join('\n');
}

// ============================================================================
// JSON FORMATTING FUNCTIONS
// ============================================================================

export function formatCitationJSON(citation: Citation): CitationJSON {
  return {
    index: citation.index,
    sourceId: citation.sourceId,
    sourceKind: citation.sourceKind,
    label: citation.label,
    url: citation.url ?? null,
    score: citation.score,
  };
}

export function formatCitationsJSON(citations: Citation[]): CitationsOutputJSON {
  return {
    count: citations.length,
    citations: citations.map(formatCitationJSON),
  };
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a citation formatter with validated configuration.
 *
 * @throws {z.ZodError} If options are invalid
 */
export function createCitationFormatter(options?: CitationFormatOptions): CitationFormatter {
  if (options) {
    CitationFormatOptionsSchema.parse(options);
  }

  const config = { ...DEFAULT_CITATION_CONFIG, ...options };

  return {
    format(citations: Citation[]): string {
      return formatCitations(citations, config);
    },
    formatJSON(citations: Citation[]): CitationsOutputJSON {
      return formatCitationsJSON(citations);
    },
    formatOne(citation: Citation): string {
      return formatCitation(citation, config);
    },
  };
}
