/**
 * Response Synthesizer
 *
 * Turns an EvidenceBundle into a grounded answer. The model sees only the
 * numbered evidence and is asked to cite it as [n]; the citations returned
 * are whatever markers it actually used, resolved against the bundle.
 */

import type { Logger } from '../utils/logger.js';
import { OperationTimeoutError, isAbortError, runWithTimeout } from '../utils/abort.js';
import type { EvidenceItem } from '../search/types.js';
import { extractCitations } from './citations.js';
import { SynthesisFailureError, TurnAbortedError } from './errors.js';
import type {
  CallOptions,
  EvidenceBundle,
  GenerateFn,
  SynthesisResult,
  Synthesizer,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_GENERATION_TIMEOUT_MS = 8000;

/** Returned without a model call when there is nothing to ground an answer in. */
export const NO_EVIDENCE_ANSWER =
  "I couldn't find anything in the product catalog, articles or web results that answers this. " +
  'Try rephrasing the question or loosening the filters.';

export const WEB_NOTICE =
  'This information is from web search. Always verify with reliable sources.';

/**
 * System prompt for answer generation.
 *
 * - Numbered sources only (grounding)
 * - [n] markers so citations can be resolved
 * - Health caveats for a skincare audience
 */
export const SYSTEM_PROMPT = `You are a skincare assistant that recommends products and explains skin care.

## Your Role
- Answer the question using ONLY the numbered sources provided
- If the sources don't contain enough information, say so clearly
- Be concise, practical and friendly

## Context Format
The sources are provided as XML:
<sources>
  <source id="1" kind="catalog" ref="p-101" score="0.912">
    Product: ...
  </source>
</sources>

## Citation Requirements
- Cite sources as [1], [2], etc. right after the statement they support
- Only cite sources that directly support your answer
- Never invent products, prices or studies that are not in the sources

## Health and Safety
- Prices are in INR (₹); quote them exactly as given
- Do not diagnose conditions or promise results
- Suggest a patch test for new actives and a dermatologist for persistent,
  painful or worsening skin problems`;

// ============================================================================
// Prompt building
// ============================================================================

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttribute(value: string): string {
  return escapeXml(value).replace(/"/g, '&quot;');
}

/**
 * Evidence as an XML context block. Source ids are 1-based positions, the
 * numbers the model is told to cite.
 */
export function formatSourcesContext(items: readonly EvidenceItem[]): string {
  if (items.length === 0) {
    return '<sources>\n  <!-- No relevant context found -->\n</sources>';
  }

  const sourceElements = items
    .map(
      (item, idx) =>
        `  <source id="${idx + 1}" kind="${item.sourceKind}" ref="${escapeAttribute(
          item.sourceId
        )}" score="${item.score.toFixed(3)}">
${escapeXml(item.excerpt)}
  </source>`
    )
    .join('\n');

  return `<sources>\n${sourceElements}\n</sources>`;
}

export function buildPrompt(queryText: string, items: readonly EvidenceItem[]): string {
  return `## Sources
${formatSourcesContext(items)}

## Question
${queryText.trim()}`;
}

/**
 * Caveats that travel with the answer: web provenance and missing sources.
 */
export function buildNotices(bundle: EvidenceBundle): string[] {
  const notices: string[] = [];

  if (bundle.items.some((item) => item.sourceKind === 'web')) {
    notices.push(WEB_NOTICE);
  }

  if (bundle.degraded) {
    const sources = bundle.unavailableSources;
    const subject =
      sources.length === 0
        ? 'A retrieval source was'
        : `The ${sources.join(', ')} ${sources.length > 1 ? 'sources were' : 'source was'}`;
    notices.push(
      bundle.fallback && bundle.items.length > 0
        ? `${subject} unavailable, so this answer falls back to web search.`
        : `${subject} unavailable; this answer may be incomplete.`
    );
  }

  return notices;
}

// ============================================================================
// Synthesizer
// ============================================================================

export interface SynthesizerConfig {
  generate: GenerateFn;
  /** Generation deadline (default: 8000) */
  timeoutMs?: number;
  /** Sampling temperature passed to the generator (default: 0) */
  temperature?: number;
  logger?: Logger;
}

export class ResponseSynthesizer implements Synthesizer {
  private readonly generate: GenerateFn;
  private readonly timeoutMs: number;
  private readonly temperature: number;
  private readonly logger?: Logger;

  constructor(config: SynthesizerConfig) {
    this.generate = config.generate;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.temperature = config.temperature ?? 0;
    this.logger = config.logger;
  }

  /**
   * Produce an answer grounded in `bundle`.
   *
   * @throws SynthesisFailureError when generation fails, times out or is empty
   * @throws TurnAbortedError when the caller aborts
   */
  async synthesize(
    queryText: string,
    bundle: EvidenceBundle,
    options: CallOptions = {}
  ): Promise<SynthesisResult> {
    const notices = buildNotices(bundle);

    if (bundle.items.length === 0) {
      this.logger?.debug?.('No evidence; answering without generation');
      return { answer: NO_EVIDENCE_ANSWER, citations: [], notices };
    }

    const prompt = buildPrompt(queryText, bundle.items);
    this.logger?.debug?.(`Synthesis prompt: ~${Math.ceil(prompt.length / 4)} tokens, ${bundle.items.length} sources`);

    let text: string;
    try {
      text = await runWithTimeout(
        (signal) =>
          this.generate(prompt, bundle.items, {
            signal,
            system: SYSTEM_PROMPT,
            temperature: this.temperature,
          }),
        { timeoutMs: this.timeoutMs, signal: options.signal, label: 'generation' }
      );
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error)) {
        throw new TurnAbortedError();
      }
      if (error instanceof OperationTimeoutError) {
        throw new SynthesisFailureError(`Generation timed out after ${this.timeoutMs}ms`, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SynthesisFailureError(`Generation failed: ${message}`, error);
    }

    const answer = text.trim();
    if (!answer) {
      throw new SynthesisFailureError('The generation model returned an empty answer');
    }

    return { answer, citations: extractCitations(answer, bundle.items), notices };
  }
}

export function createSynthesizer(config: SynthesizerConfig): ResponseSynthesizer {
  return new ResponseSynthesizer(config);
}
