/**
 * Vector-backed Retrieval Source
 *
 * Shared adapter behind the catalog and document sources:
 * 1. Drops constraints the source schema doesn't understand
 * 2. Embeds the query and queries the index under one deadline
 * 3. Filters inside the index when it supports filters, otherwise
 *    over-fetches and post-filters with the same predicate semantics
 * 4. Returns at most k items ordered by score, ties by sourceId
 */

import { runWithTimeout, OperationAbortedError, OperationTimeoutError } from '../utils/abort.js';
import type { Logger } from '../utils/logger.js';
import {
  compareIds,
  isUnconstrained,
  matchesConstraints,
  validateConstraints,
} from './constraints.js';
import { SourceUnavailableError } from './errors.js';
import type {
  Constraints,
  EmbedFn,
  EvidenceItem,
  IndexMatch,
  RetrievalOutcome,
  RetrievalSource,
  SearchOptions,
  SourceKind,
  SourceSchema,
  VectorIndex,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Candidates fetched per requested result on the post-filter path */
export const DEFAULT_OVERFETCH_FACTOR = 4;

/** Deadline for embed + index query */
export const DEFAULT_RETRIEVAL_TIMEOUT_MS = 4000;

// ============================================================================
// Types
// ============================================================================

export interface VectorSourceOptions {
  kind: Exclude<SourceKind, 'web'>;
  name: string;
  schema: SourceSchema;
  embed: EmbedFn;
  index: VectorIndex;
  /** Map an index match to evidence */
  toEvidence: (match: IndexMatch) => EvidenceItem;
  /**
   * Reshape the ranked candidates before truncation (e.g. dedup).
   * When set, candidates are over-fetched on both paths.
   */
  collapse?: (items: EvidenceItem[]) => EvidenceItem[];
  overfetchFactor?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/** Score descending, then sourceId ascending. */
export function compareEvidence(a: EvidenceItem, b: EvidenceItem): number {
  return b.score - a.score || compareIds(a.sourceId, b.sourceId);
}

// ============================================================================
// Adapter
// ============================================================================

export class VectorRetrievalSource implements RetrievalSource {
  readonly kind: Exclude<SourceKind, 'web'>;
  readonly name: string;
  readonly schema: SourceSchema;

  private readonly embed: EmbedFn;
  private readonly index: VectorIndex;
  private readonly toEvidence: (match: IndexMatch) => EvidenceItem;
  private readonly collapse?: (items: EvidenceItem[]) => EvidenceItem[];
  private readonly overfetchFactor: number;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: VectorSourceOptions) {
    this.kind = options.kind;
    this.name = options.name;
    this.schema = options.schema;
    this.embed = options.embed;
    this.index = options.index;
    this.toEvidence = options.toEvidence;
    this.collapse = options.collapse;
    this.overfetchFactor = Math.max(1, options.overfetchFactor ?? DEFAULT_OVERFETCH_FACTOR);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RETRIEVAL_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async search(
    queryText: string,
    constraints: Constraints,
    k: number,
    options: SearchOptions = {}
  ): Promise<RetrievalOutcome> {
    if (k <= 0) return { status: 'ok', items: [] };

    const { valid } = validateConstraints(constraints, this.schema, this.logger);
    const filtered = !isUnconstrained(valid);
    const serverSide = filtered && this.index.supportsFilters;
    const postFilter = filtered && !serverSide;
    const topK = postFilter || this.collapse ? k * this.overfetchFactor : k;
    const label = `${this.name} search`;

    let matches: IndexMatch[];
    try {
      matches = await runWithTimeout(
        async (signal) => {
          const vector = await this.embed(queryText, { signal });
          return this.index.query({
            vector,
            topK,
            filter: serverSide ? valid : undefined,
            signal,
          });
        },
        { timeoutMs: this.timeoutMs, signal: options.signal, label }
      );
    } catch (error) {
      if (options.signal?.aborted || error instanceof OperationAbortedError) {
        throw new OperationAbortedError(label);
      }
      const reason = error instanceof OperationTimeoutError ? 'timeout' : 'error';
      this.logger?.warn(`${this.name} unavailable (${reason}): ${errorMessage(error)}`);
      return {
        status: 'unavailable',
        items: [],
        error: new SourceUnavailableError(this.name, reason, error),
      };
    }

    let items = matches
      .filter((match) => !postFilter || matchesConstraints(match.metadata, valid))
      .map((match) => this.toEvidence(match))
      .sort(compareEvidence);

    if (this.collapse) {
      items = this.collapse(items);
    }

    this.logger?.debug?.(
      `${this.name}: ${matches.length} candidates, ${items.length} kept (${
        serverSide ? 'index filter' : postFilter ? 'post-filter' : 'unfiltered'
      })`
    );

    return { status: 'ok', items: items.slice(0, k) };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
