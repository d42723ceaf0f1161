/**
 * Open Web Source
 *
 * Wraps a web search capability. The query is narrowed to the skincare
 * domain with a fixed suffix; constraints are ignored. Scores are derived
 * from rank, so only the order of results carries meaning.
 */

import { runWithTimeout, OperationAbortedError, OperationTimeoutError } from '../utils/abort.js';
import type { Logger } from '../utils/logger.js';
import { SourceUnavailableError } from './errors.js';
import type {
  Constraints,
  EvidenceItem,
  RetrievalOutcome,
  RetrievalSource,
  SearchOptions,
  SourceSchema,
  WebResult,
  WebSearchFn,
} from './types.js';
import { DEFAULT_RETRIEVAL_TIMEOUT_MS } from './vector-source.js';

export const DEFAULT_QUERY_SUFFIX = 'skincare dermatology';

export interface WebSourceOptions {
  webSearch: WebSearchFn;
  /** Appended to every query (default: "skincare dermatology") */
  querySuffix?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export class WebRetrievalSource implements RetrievalSource {
  readonly kind = 'web' as const;
  readonly name = 'web';
  readonly schema: SourceSchema = {};

  private readonly webSearch: WebSearchFn;
  private readonly querySuffix: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: WebSourceOptions) {
    this.webSearch = options.webSearch;
    this.querySuffix = (options.querySuffix ?? DEFAULT_QUERY_SUFFIX).trim();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RETRIEVAL_TIMEOUT_MS;
    this.logger = options.logger;
  }

  /** The query actually sent to the search capability. */
  buildQuery(queryText: string): string {
    const query = queryText.trim();
    return this.querySuffix ? `${query} ${this.querySuffix}` : query;
  }

  async search(
    queryText: string,
    _constraints: Constraints,
    k: number,
    options: SearchOptions = {}
  ): Promise<RetrievalOutcome> {
    if (k <= 0) return { status: 'ok', items: [] };

    const query = this.buildQuery(queryText);
    const label = 'web search';

    let results: WebResult[];
    try {
      results = await runWithTimeout(
        (signal) => this.webSearch(query, { signal, limit: k }),
        { timeoutMs: this.timeoutMs, signal: options.signal, label }
      );
    } catch (error) {
      if (options.signal?.aborted || error instanceof OperationAbortedError) {
        throw new OperationAbortedError(label);
      }
      const reason = error instanceof OperationTimeoutError ? 'timeout' : 'error';
      this.logger?.warn(
        `web unavailable (${reason}): ${error instanceof Error ? error.message : String(error)}`
      );
      return {
        status: 'unavailable',
        items: [],
        error: new SourceUnavailableError(this.name, reason, error),
      };
    }

    // Results with no URL can't be cited; the same URL is only kept once.
    const seen = new Set<string>();
    const items: EvidenceItem[] = [];
    for (const result of results) {
      if (!result.url || seen.has(result.url)) continue;
      seen.add(result.url);
      items.push({
        sourceId: result.url,
        sourceKind: 'web',
        score: 1 / (items.length + 1),
        excerpt: `Title: ${result.title}\nSnippet: ${result.snippet}\nURL: ${result.url}`,
        metadata: { title: result.title, url: result.url, rank: items.length + 1 },
      });
      if (items.length >= k) break;
    }

    return { status: 'ok', items };
  }
}

export function createWebSource(options: WebSourceOptions): WebRetrievalSource {
  return new WebRetrievalSource(options);
}
