/**
 * Agent Types
 *
 * Shapes shared by the classifier, the specialist agents, the synthesizer
 * and the orchestrator that drives a turn through them.
 */

import { z } from 'zod';

import type { Constraints, EvidenceItem } from '../search/types.js';

// ============================================================================
// Intents and agents
// ============================================================================

export const INTENTS = ['catalog-lookup', 'document-lookup', 'general-knowledge'] as const;

export const IntentSchema = z.enum(INTENTS);

/**
 * What the user is after.
 *
 * - catalog-lookup: a product pick, usually with price or skin-type filters
 * - document-lookup: an explanation that articles cover
 * - general-knowledge: everything else, answered from the open web
 */
export type Intent = z.infer<typeof IntentSchema>;

/** The specialist that handles an intent. */
export type AgentKind = 'catalog' | 'document' | 'general-knowledge';

export const AGENT_FOR_INTENT: Readonly<Record<Intent, AgentKind>> = {
  'catalog-lookup': 'catalog',
  'document-lookup': 'document',
  'general-knowledge': 'general-knowledge',
};

/** Label recorded when the general-knowledge agent answers for a failed one. */
export const FALLBACK_AGENT_LABEL = 'general-knowledge (fallback)';

// ============================================================================
// Classification
// ============================================================================

/**
 * How a classification was reached.
 *
 * - keyword: deterministic signal scoring
 * - follow-up: inherited from the previous turn
 * - llm: model decision on an ambiguous query
 * - default: no usable signal; general-knowledge
 */
export type ClassificationMethod = 'keyword' | 'follow-up' | 'llm' | 'default';

export interface Classification {
  intent: Intent;
  constraints: Constraints;
  /** 0-1 */
  confidence: number;
  method: ClassificationMethod;
  /** No side won clearly; the intent is the general-knowledge default */
  ambiguous: boolean;
  /** Human-readable explanation */
  reason: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Maps a query plus recent history to exactly one intent.
 */
export interface IntentClassifier {
  classify(
    queryText: string,
    recentHistory: readonly Turn[],
    options?: CallOptions
  ): Promise<Classification>;
}

// ============================================================================
// Evidence
// ============================================================================

/**
 * How far the catalog agent loosened the constraints before it found
 * enough results.
 */
export type RelaxationLevel = 'none' | 'single' | 'unconstrained';

/**
 * Everything a specialist gathered for one turn.
 */
export interface EvidenceBundle {
  /** Agent that produced the items */
  readonly agent: AgentKind;
  readonly items: readonly EvidenceItem[];
  /** A source failed while gathering */
  readonly degraded: boolean;
  /** Produced by the fallback hop */
  readonly fallback: boolean;
  readonly relaxation: RelaxationLevel;
  /** Names of the sources that could not be asked */
  readonly unavailableSources: readonly string[];
  readonly notes: readonly string[];
}

/**
 * A retrieval specialist. Never throws except on caller abort.
 */
export interface SpecialistAgent {
  readonly kind: AgentKind;
  handle(queryText: string, constraints: Constraints, options?: CallOptions): Promise<EvidenceBundle>;
}

// ============================================================================
// Generation
// ============================================================================

export interface GenerateOptions extends CallOptions {
  /** System instruction */
  system?: string;
  temperature?: number;
}

/**
 * generate(prompt, contextItems) → text
 *
 * `contextItems` are the evidence the prompt refers to; implementations may
 * ignore them when the prompt already embeds the context.
 */
export type GenerateFn = (
  prompt: string,
  contextItems: readonly EvidenceItem[],
  options?: GenerateOptions
) => Promise<string>;

export interface SynthesisResult {
  answer: string;
  /** sourceIds in order of first citation */
  citations: string[];
  /** Caveats shown alongside the answer */
  notices: string[];
}

/**
 * Produces the answer for a turn from its evidence.
 */
export interface Synthesizer {
  synthesize(queryText: string, bundle: EvidenceBundle, options?: CallOptions): Promise<SynthesisResult>;
}

// ============================================================================
// Turns
// ============================================================================

/**
 * One completed question/answer exchange. Created only by the
 * orchestrator and never mutated afterwards.
 */
export interface Turn {
  readonly query: string;
  readonly intent: Intent;
  readonly constraints: Constraints;
  readonly evidence: EvidenceBundle;
  readonly answer: string;
  readonly citations: readonly string[];
  readonly agentUsed: string;
  /** ISO-8601 */
  readonly timestamp: string;
}

export const TURN_STATES = [
  'Received',
  'Classified',
  'Dispatched',
  'EvidenceCollected',
  'Synthesized',
  'Completed',
  'Failed',
] as const;

export type TurnState = (typeof TURN_STATES)[number];

export interface TurnRequest {
  sessionId: string;
  query: string;
  signal?: AbortSignal;
}

export interface TurnResult {
  turn: Turn;
  answer: string;
  citations: string[];
  agentUsed: string;
  classification: Classification;
  /** Agents run, in order (at most two) */
  dispatches: AgentKind[];
  /** States visited, in order */
  states: TurnState[];
  notices: string[];
  traceId?: string;
}
