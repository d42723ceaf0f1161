/**
 * Evidence Formatter
 *
 * Utilities for formatting evidence items for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * import { formatEvidence, formatEvidenceJSON } from './formatter.js';
 *
 * const text = formatEvidence(item);
 * // [0.92] catalog p-101
 * //   Product: Oil-Free Gel Moisturizer Brand: Dewlab Price: ₹800.00 ...
 * ```
 *
 * @packageDocumentation
 */

import type { EvidenceItem, SourceKind } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

export interface FormatOptions {
  /** Maximum snippet length (default: 200) */
  snippetLength?: number;
  /** Show the score prefix (default: true) */
  showScore?: boolean;
}

export interface FormattedEvidenceJSON {
  sourceId: string;
  sourceKind: SourceKind;
  score: number;
  excerpt: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a similarity score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Truncate content to a maximum length with ellipsis.
 *
 * Collapses whitespace (including newlines) to single spaces first.
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

// ============================================================================
// Text Formatting
// ============================================================================

/**
 * Format a single evidence item:
 * ```
 * [0.92] catalog p-101
 *   Product: Oil-Free Gel Moisturizer ...
 * ```
 */
export function formatEvidence(item: EvidenceItem, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;

  const header = [
    showScore ? `[${formatScore(item.score)}]` : undefined,
    item.sourceKind,
    item.sourceId,
  ]
    .filter((part): part is string => part !== undefined)
    .join(' ');

  return `${header}\n${SNIPPET_INDENT}${truncateSnippet(item.excerpt, snippetLength)}`;
}

/** Format several items separated by blank lines. */
export function formatEvidenceList(items: readonly EvidenceItem[], options: FormatOptions = {}): string {
  return items.map((item) => formatEvidence(item, options)).join('\n\n');
}

// ============================================================================
// JSON Formatting
// ============================================================================

export function formatEvidenceJSON(item: EvidenceItem): FormattedEvidenceJSON {
  return {
    sourceId: item.sourceId,
    sourceKind: item.sourceKind,
    score: item.score,
    excerpt: item.excerpt,
  };
}
