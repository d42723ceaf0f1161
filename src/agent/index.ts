/**
 * Agent Module
 *
 * Intent routing and grounded answering for skincare questions:
 * 1. Classify the question (catalog, document or general knowledge)
 * 2. Dispatch to the matching specialist, with one fallback hop
 * 3. Synthesize an answer that cites the evidence it used
 *
 * @example
 * ```typescript
 * import { createOrchestrator, createIntentClassifier, createSynthesizer } from './agent/index.js';
 *
 * const orchestrator = createOrchestrator({
 *   classifier: createIntentClassifier(),
 *   agents: { catalog, document, 'general-knowledge': general },
 *   synthesizer: createSynthesizer({ generate }),
 *   store: new InMemoryConversationStore(),
 * });
 *
 * const result = await orchestrator.runTurn({
 *   sessionId: 'demo',
 *   query: 'Recommend a moisturizer under 1200 for oily skin',
 * });
 * console.log(result.answer, result.citations);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Orchestration
// ============================================================================

export {
  TRANSITIONS,
  DEFAULT_HISTORY_WINDOW,
  IllegalTransitionError,
  TurnMachine,
  TurnOrchestrator,
  createOrchestrator,
  type OrchestratorConfig,
} from './orchestrator.js';

export {
  createEngine,
  createAgents,
  type Engine,
  type EngineOptions,
  type EngineLoadStage,
} from './engine.js';

// ============================================================================
// Classification
// ============================================================================

export {
  FOLLOW_UP_CONFIDENCE,
  DEFAULT_CONFIDENCE_THRESHOLD,
  KeywordIntentClassifier,
  LLMIntentClassifier,
  LLMClassificationResponseSchema,
  parseClassificationResponse,
  createIntentClassifier,
  type KeywordIntentClassifierConfig,
  type IntentScores,
  type LLMClassificationResponse,
  type LLMIntentClassifierConfig,
  type IntentClassifierOptions,
} from './intent-classifier.js';

export {
  SKIN_TYPES,
  DEFAULT_AFFORDABLE_PRICE_CEILING,
  extractConstraints,
  mergeConstraints,
  type ExtractionOptions,
} from './constraint-extractor.js';

// ============================================================================
// Specialists
// ============================================================================

export {
  CONSTRAINT_PRIORITY,
  DEFAULT_TOP_K,
  DEFAULT_MIN_RESULTS,
  DEFAULT_WEB_RESULTS,
  createBundle,
  mostImportantConstraint,
  CatalogAgent,
  DocumentAgent,
  GeneralKnowledgeAgent,
  type CatalogAgentConfig,
  type DocumentAgentConfig,
  type GeneralKnowledgeAgentConfig,
} from './specialists.js';

// ============================================================================
// Synthesis and citations
// ============================================================================

export {
  DEFAULT_GENERATION_TIMEOUT_MS,
  NO_EVIDENCE_ANSWER,
  WEB_NOTICE,
  SYSTEM_PROMPT,
  formatSourcesContext,
  buildPrompt,
  buildNotices,
  ResponseSynthesizer,
  createSynthesizer,
  type SynthesizerConfig,
} from './synthesizer.js';

export {
  extractCitations,
  resolveCitations,
  formatCitation,
  formatCitations,
  formatCitationJSON,
  formatCitationsJSON,
  createCitationFormatter,
  CitationStyleSchema,
  CitationFormatOptionsSchema,
  DEFAULT_CITATION_CONFIG,
  type Citation,
  type CitationStyle,
  type CitationFormatOptions,
  type CitationJSON,
  type CitationsOutputJSON,
  type CitationFormatter,
} from './citations.js';

// ============================================================================
// Errors and types
// ============================================================================

export {
  TurnAbortedError,
  SynthesisFailureError,
  TurnFailedError,
  type TurnFailureCode,
} from './errors.js';

export {
  INTENTS,
  IntentSchema,
  AGENT_FOR_INTENT,
  FALLBACK_AGENT_LABEL,
  TURN_STATES,
  type Intent,
  type AgentKind,
  type ClassificationMethod,
  type Classification,
  type CallOptions,
  type IntentClassifier,
  type RelaxationLevel,
  type EvidenceBundle,
  type SpecialistAgent,
  type GenerateOptions,
  type GenerateFn,
  type SynthesisResult,
  type Synthesizer,
  type Turn,
  type TurnState,
  type TurnRequest,
  type TurnResult,
} from './types.js';
