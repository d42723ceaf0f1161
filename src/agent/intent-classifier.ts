/**
 * Intent Classifier
 *
 * Maps a query plus recent history to exactly one intent.
 *
 * Architecture:
 * 1. KeywordIntentClassifier - weighted signal scoring (zero model calls)
 * 2. LLMIntentClassifier - asks the model only when the keyword result is
 *    ambiguous, and falls back to it on any failure
 *
 * DESIGN PRINCIPLE: classification is total. Every query resolves to one
 * intent; with no usable signal that intent is general-knowledge.
 *
 * @example
 * ```typescript
 * const classifier = new KeywordIntentClassifier();
 *
 * await classifier.classify('Recommend a moisturizer under 1200 for oily skin', []);
 * // { intent: 'catalog-lookup', confidence: 0.95, method: 'keyword', ... }
 *
 * await classifier.classify('What causes acne?', []);
 * // { intent: 'document-lookup', confidence: 0.7, method: 'keyword', ... }
 * ```
 */

import { z } from 'zod';

import { runWithTimeout, isAbortError, OperationAbortedError } from '../utils/abort.js';
import type { Logger } from '../utils/logger.js';
import type { Constraints } from '../search/types.js';
import {
  extractConstraints,
  mergeConstraints,
  PRODUCT_NOUN_PATTERN,
  type ExtractionOptions,
} from './constraint-extractor.js';
import {
  IntentSchema,
  INTENTS,
  type CallOptions,
  type Classification,
  type GenerateFn,
  type Intent,
  type IntentClassifier,
  type Turn,
} from './types.js';

// ============================================================================
// SIGNALS
// ============================================================================

interface Signal {
  pattern: RegExp;
  weight: number;
  label: string;
}

const CATALOG_SIGNALS: readonly Signal[] = [
  { pattern: /\b(?:recommend|suggest)(?:ed|ation|ations)?\b/, weight: 2, label: 'recommend' },
  { pattern: /\b(?:buy|purchase|shop|order)\b/, weight: 2, label: 'buy' },
  { pattern: /\bbest\b/, weight: 1, label: 'best' },
  { pattern: /\b(?:price|cost|costs|priced|worth it)\b/, weight: 1, label: 'price' },
  { pattern: /(?:₹|\brs\.?\s*\d|\binr\b|\brupees\b|\$\s*\d)/, weight: 1, label: 'currency' },
  { pattern: /\b(?:looking for|need a|want a|which one|options? for)\b/, weight: 1, label: 'looking for' },
  { pattern: /\b(?:brand|brands)\b/, weight: 1, label: 'brand' },
  { pattern: PRODUCT_NOUN_PATTERN, weight: 1, label: 'product noun' },
];

const DOCUMENT_SIGNALS: readonly Signal[] = [
  { pattern: /\bhow (?:to|do|does|should|can|often)\b/, weight: 2, label: 'how to' },
  { pattern: /\bwhat (?:is|are|does|do)\b/, weight: 2, label: 'what is' },
  { pattern: /\bwhy\b/, weight: 1, label: 'why' },
  { pattern: /\bexplain\b|\btell me about\b/, weight: 2, label: 'explain' },
  { pattern: /\b(?:causes? of|what causes)\b/, weight: 2, label: 'causes' },
  { pattern: /\bdifference between\b|\bvs\.?\b|\bversus\b/, weight: 2, label: 'comparison' },
  { pattern: /\broutine\b/, weight: 1, label: 'routine' },
  { pattern: /\b(?:guide|tips|steps|benefits? of|side effects?)\b/, weight: 1, label: 'guide' },
  { pattern: /\b(?:can i|should i|is it safe)\b/, weight: 1, label: 'advice' },
];

const GENERAL_SIGNALS: readonly Signal[] = [
  { pattern: /\b(?:latest|recent|new|newest|upcoming)\b/, weight: 1, label: 'recency' },
  { pattern: /\b(?:research|study|studies|trial|trials|paper)\b/, weight: 1, label: 'research' },
  { pattern: /\b(?:news|trend|trends|trending)\b/, weight: 1, label: 'news' },
  { pattern: /\b20\d{2}\b/, weight: 1, label: 'year' },
];

const FOLLOW_UP_CUE =
  /\b(?:cheaper|another|other options?|what about|how about|instead|it|its|those|these|them|that one|similar|alternatives?|more like)\b/;

/** Queries longer than this never count as follow-ups */
const FOLLOW_UP_MAX_WORDS = 8;

/** A side whose own confidence reaches this ignores follow-up cues */
const STRONG_SIGNAL_CONFIDENCE = 0.7;

export const FOLLOW_UP_CONFIDENCE = 0.6;
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.55;
const MAX_KEYWORD_CONFIDENCE = 0.95;

// ============================================================================
// KeywordIntentClassifier
// ============================================================================

export interface KeywordIntentClassifierConfig extends ExtractionOptions {
  /** Winning confidence below this resolves to general-knowledge (default: 0.55) */
  confidenceThreshold?: number;
}

/** Per-intent score with the labels that contributed. */
export interface IntentScores {
  scores: Record<Intent, number>;
  matched: Record<Intent, string[]>;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Deterministic decision layer.
 *
 * Scores each intent from fixed weighted signals (plus the constraints the
 * extractor found) and picks the winner with confidence
 * `0.5 + 0.1 × margin`, capped at 0.95.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  private readonly confidenceThreshold: number;
  private readonly extraction: ExtractionOptions;

  constructor(config: KeywordIntentClassifierConfig = {}) {
    this.confidenceThreshold = config.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.extraction = { affordablePriceCeiling: config.affordablePriceCeiling };
  }

  async classify(queryText: string, recentHistory: readonly Turn[]): Promise<Classification> {
    return this.classifySync(queryText, recentHistory);
  }

  /** Same as classify(), without the promise. */
  classifySync(queryText: string, recentHistory: readonly Turn[]): Classification {
    const normalized = queryText.trim().toLowerCase();
    const constraints = extractConstraints(queryText, this.extraction);
    const { scores, matched } = this.score(normalized, constraints);

    const ranked = [...INTENTS].sort((a, b) => scores[b] - scores[a]);
    const [first, second] = ranked;
    const top = first ?? 'general-knowledge';
    const margin = scores[top] - (second ? scores[second] : 0);
    const confidence = round2(Math.min(MAX_KEYWORD_CONFIDENCE, 0.5 + 0.1 * margin));
    const summary = describeMatches(matched);

    const followUp = this.asFollowUp(normalized, constraints, confidence, recentHistory);
    if (followUp) return followUp;

    if (margin <= 0 || confidence < this.confidenceThreshold) {
      return {
        intent: 'general-knowledge',
        constraints,
        confidence: margin <= 0 ? 0.5 : confidence,
        method: 'default',
        ambiguous: true,
        reason: `No clear intent (${summary})`,
      };
    }

    return {
      intent: top,
      constraints,
      confidence,
      method: 'keyword',
      ambiguous: false,
      reason: summary,
    };
  }

  /**
   * Score every intent. Extracted catalog-only constraints count as
   * catalog signals.
   */
  score(normalizedQuery: string, constraints: Constraints): IntentScores {
    const scores: Record<Intent, number> = {
      'catalog-lookup': 0,
      'document-lookup': 0,
      'general-knowledge': 0,
    };
    const matched: Record<Intent, string[]> = {
      'catalog-lookup': [],
      'document-lookup': [],
      'general-knowledge': [],
    };

    const apply = (intent: Intent, signals: readonly Signal[]) => {
      for (const signal of signals) {
        if (signal.pattern.test(normalizedQuery)) {
          scores[intent] += signal.weight;
          matched[intent].push(signal.label);
        }
      }
    };

    apply('catalog-lookup', CATALOG_SIGNALS);
    apply('document-lookup', DOCUMENT_SIGNALS);
    apply('general-knowledge', GENERAL_SIGNALS);

    const constraintWeights: Record<string, number> = {
      price: 2,
      skin_type: 1,
      category: 1,
      rating: 1,
      brand: 1,
    };
    for (const [attribute, weight] of Object.entries(constraintWeights)) {
      if (constraints[attribute]) {
        scores['catalog-lookup'] += weight;
        matched['catalog-lookup'].push(`${attribute} filter`);
      }
    }

    return { scores, matched };
  }

  private asFollowUp(
    normalizedQuery: string,
    constraints: Constraints,
    ownConfidence: number,
    recentHistory: readonly Turn[]
  ): Classification | undefined {
    const previous = recentHistory[recentHistory.length - 1];
    if (!previous) return undefined;

    const wordCount = normalizedQuery.split(/\s+/).filter(Boolean).length;
    if (wordCount > FOLLOW_UP_MAX_WORDS) return undefined;
    if (!FOLLOW_UP_CUE.test(normalizedQuery)) return undefined;
    if (ownConfidence >= STRONG_SIGNAL_CONFIDENCE) return undefined;

    return {
      intent: previous.intent,
      constraints: mergeConstraints(previous.constraints, constraints),
      confidence: FOLLOW_UP_CONFIDENCE,
      method: 'follow-up',
      ambiguous: false,
      reason: `Follow-up to previous ${previous.intent} turn`,
    };
  }
}

function describeMatches(matched: Record<Intent, string[]>): string {
  const part = (label: string, values: string[]) =>
    `${label}: ${values.length > 0 ? values.join(', ') : 'none'}`;
  return [
    part('catalog', matched['catalog-lookup']),
    part('document', matched['document-lookup']),
    part('general', matched['general-knowledge']),
  ].join('; ');
}

// ============================================================================
// LLMIntentClassifier
// ============================================================================

/**
 * Model reply schema. The model returns this JSON to name the intent.
 */
export const LLMClassificationResponseSchema = z.object({
  intent: IntentSchema,
  confidence: z.number().min(0).max(1),
  reasoning: z.string().optional(),
});

export type LLMClassificationResponse = z.infer<typeof LLMClassificationResponseSchema>;

export interface LLMIntentClassifierConfig {
  /** Minimum model confidence to override the keyword result (default: 0.7) */
  confidenceThreshold?: number;
  /** Timeout for the model call in ms (default: 5000) */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_LLM_CONFIDENCE_THRESHOLD = 0.7;
const DEFAULT_LLM_TIMEOUT = 5000;

const CLASSIFIER_SYSTEM_PROMPT = `You route questions for a skincare assistant.

Pick exactly one intent:
- catalog-lookup: the user wants products picked from a shop catalog (recommendations, prices, filters)
- document-lookup: the user wants an explanation covered by skincare articles (how-to, causes, routines, ingredients)
- general-knowledge: anything else, including news, recent research and general questions

Respond with JSON only (no markdown):
{"intent": "<intent>", "confidence": <0.0-1.0>, "reasoning": "<brief explanation>"}`;

/**
 * Keyword classification with a model tie-breaker.
 *
 * Routing pipeline:
 * 1. Keyword classification (instant, free)
 * 2. Model classification when the keyword result is ambiguous
 * 3. Keyword result whenever the model fails, times out or is unsure
 *
 * Constraints always come from the deterministic extractor.
 */
export class LLMIntentClassifier implements IntentClassifier {
  private readonly keyword: KeywordIntentClassifier;
  private readonly generate: GenerateFn;
  private readonly confidenceThreshold: number;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(
    keyword: KeywordIntentClassifier,
    generate: GenerateFn,
    config: LLMIntentClassifierConfig = {}
  ) {
    this.keyword = keyword;
    this.generate = generate;
    this.confidenceThreshold = config.confidenceThreshold ?? DEFAULT_LLM_CONFIDENCE_THRESHOLD;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_LLM_TIMEOUT;
    this.logger = config.logger;
  }

  async classify(
    queryText: string,
    recentHistory: readonly Turn[],
    options: CallOptions = {}
  ): Promise<Classification> {
    const base = this.keyword.classifySync(queryText, recentHistory);
    if (!base.ambiguous) return base;

    let reply: LLMClassificationResponse;
    try {
      reply = await this.classifyWithLLM(queryText, options.signal);
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error)) {
        throw new OperationAbortedError('intent classification');
      }
      this.logger?.debug?.(
        `Model classification failed, keeping keyword result: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      return base;
    }

    if (reply.confidence < this.confidenceThreshold) {
      this.logger?.debug?.(
        `Model confidence ${reply.confidence.toFixed(2)} below threshold ${this.confidenceThreshold}`
      );
      return base;
    }

    return {
      intent: reply.intent,
      constraints: base.constraints,
      confidence: reply.confidence,
      method: 'llm',
      ambiguous: false,
      reason: reply.reasoning ?? 'Model classification',
    };
  }

  private async classifyWithLLM(
    queryText: string,
    signal: AbortSignal | undefined
  ): Promise<LLMClassificationResponse> {
    const response = await runWithTimeout(
      (innerSignal) =>
        this.generate(`Question: ${queryText}`, [], {
          signal: innerSignal,
          system: CLASSIFIER_SYSTEM_PROMPT,
          temperature: 0,
        }),
      { timeoutMs: this.timeoutMs, signal, label: 'intent classification' }
    );
    return parseClassificationResponse(response);
  }
}

/**
 * Parse a model reply, tolerating markdown fences around the JSON.
 *
 * @throws Error when no valid JSON object is present
 */
export function parseClassificationResponse(response: string): LLMClassificationResponse {
  const jsonMatch = response.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error('No JSON found in model response');
  }
  const parsed: unknown = JSON.parse(jsonMatch[0]);
  return LLMClassificationResponseSchema.parse(parsed);
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export interface IntentClassifierOptions extends KeywordIntentClassifierConfig {
  /** Consult the model on ambiguous queries (requires `generate`) */
  useLLM?: boolean;
  generate?: GenerateFn;
  llm?: LLMIntentClassifierConfig;
}

/**
 * Create the classifier the orchestrator uses: keyword-only, or keyword
 * with a model tie-breaker when `useLLM` is set and a generator is given.
 */
export function createIntentClassifier(options: IntentClassifierOptions = {}): IntentClassifier {
  const keyword = new KeywordIntentClassifier(options);
  if (options.useLLM && options.generate) {
    return new LLMIntentClassifier(keyword, options.generate, options.llm);
  }
  return keyword;
}
