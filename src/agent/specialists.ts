/**
 * Specialist Agents
 *
 * One agent per retrieval source. Each turns (query, constraints) into an
 * EvidenceBundle and never throws, except TurnAbortedError when the caller
 * aborts. A source that can't be asked yields a degraded bundle.
 */

import type { Logger } from '../utils/logger.js';
import { isAbortError } from '../utils/abort.js';
import {
  describeConstraints,
  isUnconstrained,
  validateConstraints,
} from '../search/constraints.js';
import { SourceUnavailableError } from '../search/errors.js';
import type {
  ConstraintPredicate,
  Constraints,
  EvidenceItem,
  RetrievalOutcome,
  RetrievalSource,
} from '../search/types.js';
import { TurnAbortedError } from './errors.js';
import type {
  AgentKind,
  CallOptions,
  EvidenceBundle,
  RelaxationLevel,
  SpecialistAgent,
} from './types.js';

// ============================================================================
// Helpers
// ============================================================================

/** Catalog attributes in the order they survive relaxation */
export const CONSTRAINT_PRIORITY = [
  'price',
  'category',
  'skin_type',
  'key_ingredients',
  'brand',
  'rating',
] as const;

export const DEFAULT_TOP_K = 5;
export const DEFAULT_MIN_RESULTS = 1;
export const DEFAULT_WEB_RESULTS = 3;

interface BundleParts {
  items?: readonly EvidenceItem[];
  degraded?: boolean;
  relaxation?: RelaxationLevel;
  unavailableSources?: readonly string[];
  notes?: readonly string[];
}

export function createBundle(agent: AgentKind, parts: BundleParts = {}): EvidenceBundle {
  return Object.freeze({
    agent,
    items: Object.freeze([...(parts.items ?? [])]),
    degraded: parts.degraded ?? false,
    fallback: false,
    relaxation: parts.relaxation ?? 'none',
    unavailableSources: Object.freeze([...(parts.unavailableSources ?? [])]),
    notes: Object.freeze([...(parts.notes ?? [])]),
  });
}

/** Search, turning a caller abort into TurnAbortedError. */
async function searchSource(
  source: RetrievalSource,
  queryText: string,
  constraints: Constraints,
  k: number,
  options: CallOptions
): Promise<RetrievalOutcome> {
  try {
    return await source.search(queryText, constraints, k, { signal: options.signal });
  } catch (error) {
    if (options.signal?.aborted || isAbortError(error)) {
      throw new TurnAbortedError();
    }
    // Adapters report failures as outcomes; a source that throws anyway
    // is treated as unavailable.
    return {
      status: 'unavailable',
      items: [],
      error: new SourceUnavailableError(source.name, 'error', error),
    };
  }
}

/**
 * The single most important constraint, by CONSTRAINT_PRIORITY.
 */
export function mostImportantConstraint(constraints: Constraints): Constraints | undefined {
  for (const attribute of CONSTRAINT_PRIORITY) {
    const predicate: ConstraintPredicate | undefined = constraints[attribute];
    if (predicate) return { [attribute]: predicate };
  }
  return undefined;
}

// ============================================================================
// Catalog agent
// ============================================================================

export interface CatalogAgentConfig {
  topK?: number;
  /** Fewer results than this triggers relaxation (default: 1) */
  minResults?: number;
  logger?: Logger;
}

/**
 * Product search with progressive relaxation:
 * all constraints → the most important one → none.
 */
export class CatalogAgent implements SpecialistAgent {
  readonly kind = 'catalog' as const;

  private readonly topK: number;
  private readonly minResults: number;
  private readonly logger?: Logger;

  constructor(
    private readonly source: RetrievalSource,
    config: CatalogAgentConfig = {}
  ) {
    this.topK = config.topK ?? DEFAULT_TOP_K;
    this.minResults = config.minResults ?? DEFAULT_MIN_RESULTS;
    this.logger = config.logger;
  }

  async handle(
    queryText: string,
    constraints: Constraints,
    options: CallOptions = {}
  ): Promise<EvidenceBundle> {
    const { valid } = validateConstraints(constraints, this.source.schema, this.logger);

    const attempts: Array<{ level: RelaxationLevel; constraints: Constraints }> = [
      { level: 'none', constraints: valid },
    ];
    if (!isUnconstrained(valid)) {
      const single = mostImportantConstraint(valid);
      if (single && Object.keys(valid).length > 1) {
        attempts.push({ level: 'single', constraints: single });
      }
      attempts.push({ level: 'unconstrained', constraints: {} });
    }

    const notes: string[] = [];
    let items: EvidenceItem[] = [];
    let level: RelaxationLevel = 'none';

    for (const [i, attempt] of attempts.entries()) {
      level = attempt.level;
      const outcome = await searchSource(this.source, queryText, attempt.constraints, this.topK, options);

      if (outcome.status === 'unavailable') {
        return createBundle(this.kind, {
          items,
          degraded: true,
          relaxation: level,
          unavailableSources: [this.source.name],
          notes: [...notes, outcome.error.message],
        });
      }

      items = outcome.items;
      const isLast = i === attempts.length - 1;
      if (items.length >= this.minResults || isLast) break;

      const next = attempts[i + 1];
      const message = `Only ${items.length} catalog matches for ${describeConstraints(
        attempt.constraints
      )}; relaxing to ${next ? describeConstraints(next.constraints) : 'none'}`;
      notes.push(message);
      this.logger?.debug?.(message);
    }

    return createBundle(this.kind, { items, relaxation: level, notes });
  }
}

// ============================================================================
// Document agent
// ============================================================================

export interface DocumentAgentConfig {
  topK?: number;
  logger?: Logger;
}

/** Attributes the document agent keeps */
const DOCUMENT_ATTRIBUTES = ['tags', 'author'] as const;

/**
 * Article search. Keeps only tag/author filters and retries once without
 * them when nothing matches.
 */
export class DocumentAgent implements SpecialistAgent {
  readonly kind = 'document' as const;

  private readonly topK: number;
  private readonly logger?: Logger;

  constructor(
    private readonly source: RetrievalSource,
    config: DocumentAgentConfig = {}
  ) {
    this.topK = config.topK ?? DEFAULT_TOP_K;
    this.logger = config.logger;
  }

  async handle(
    queryText: string,
    constraints: Constraints,
    options: CallOptions = {}
  ): Promise<EvidenceBundle> {
    const kept: Record<string, ConstraintPredicate> = {};
    for (const attribute of DOCUMENT_ATTRIBUTES) {
      const predicate = constraints[attribute];
      if (predicate) kept[attribute] = predicate;
    }

    const first = await searchSource(this.source, queryText, kept, this.topK, options);
    if (first.status === 'unavailable') {
      return this.degraded(first.error.message);
    }
    if (first.items.length > 0 || isUnconstrained(kept)) {
      return createBundle(this.kind, { items: first.items });
    }

    const note = `No articles for ${describeConstraints(kept)}; searching all articles`;
    this.logger?.debug?.(note);

    const second = await searchSource(this.source, queryText, {}, this.topK, options);
    if (second.status === 'unavailable') {
      return this.degraded(second.error.message, [note]);
    }
    return createBundle(this.kind, { items: second.items, relaxation: 'unconstrained', notes: [note] });
  }

  private degraded(message: string, notes: string[] = []): EvidenceBundle {
    return createBundle(this.kind, {
      degraded: true,
      unavailableSources: [this.source.name],
      notes: [...notes, message],
    });
  }
}

// ============================================================================
// General-knowledge agent
// ============================================================================

export interface GeneralKnowledgeAgentConfig {
  /** Web results to collect (default: 3) */
  results?: number;
}

/**
 * Open web search. Constraints are ignored.
 */
export class GeneralKnowledgeAgent implements SpecialistAgent {
  readonly kind = 'general-knowledge' as const;

  private readonly results: number;

  constructor(
    private readonly source: RetrievalSource,
    config: GeneralKnowledgeAgentConfig = {}
  ) {
    this.results = config.results ?? DEFAULT_WEB_RESULTS;
  }

  async handle(
    queryText: string,
    _constraints: Constraints,
    options: CallOptions = {}
  ): Promise<EvidenceBundle> {
    const outcome = await searchSource(this.source, queryText, {}, this.results, options);
    if (outcome.status === 'unavailable') {
      return createBundle(this.kind, {
        degraded: true,
        unavailableSources: [this.source.name],
        notes: [outcome.error.message],
      });
    }
    return createBundle(this.kind, { items: outcome.items });
  }
}
