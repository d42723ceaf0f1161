/**
 * Ask Command
 *
 * Answers a skincare question end to end: classify, retrieve from the
 * matching source, synthesize a cited answer and record the turn.
 *
 *   derma ask "Recommend a moisturizer under 1200 for oily skin"
 *   derma ask "and for dry skin?" --session morning
 *   derma ask "latest acne research 2025" --top-k 3 --json
 *
 * Uses the existing infrastructure:
 * - createEngine for loading data and wiring the orchestrator
 * - resolveCitations / formatCitations for source display
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { randomUUID } from 'node:crypto';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { createEngine, type Engine, type EngineLoadStage } from '../../agent/engine.js';
import {
  formatCitations,
  formatCitationsJSON,
  resolveCitations,
  type CitationJSON,
} from '../../agent/citations.js';
import type { Classification, TurnResult, TurnState } from '../../agent/types.js';
import {
  formatEvidenceJSON,
  formatEvidenceList,
  type FormattedEvidenceJSON,
} from '../../search/formatter.js';
import type { Constraints } from '../../search/types.js';
import { CLIError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
export interface AskCommandOptions {
  /** Conversation to continue (default: a new one) */
  session?: string;
  /** Evidence items per specialist */
  topK?: string;
}

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  sessionId: string;
  answer: string;
  agentUsed: string;
  intent: Classification['intent'];
  confidence: number;
  constraints: Constraints;
  sources: CitationJSON[];
  /** Everything the specialist returned, cited or not */
  evidence: FormattedEvidenceJSON[];
  notices: string[];
  metadata: {
    dispatches: string[];
    states: TurnState[];
    degraded: boolean;
    totalMs: number;
    traceId?: string;
  };
}

/** Builds the engine; replaceable in tests. */
export type EngineFactory = typeof createEngine;

// ============================================================================
// Constants
// ============================================================================

const MAX_TOP_K = 20;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse and validate the --top-k option.
 *
 * @throws CLIError if invalid
 */
export function parseTopK(topKStr: string): number {
  const topK = Number(topKStr);

  if (!Number.isInteger(topK) || topK < 1) {
    throw new CLIError(
      `Invalid --top-k value: "${topKStr}"`,
      `Must be a positive integer (1-${MAX_TOP_K})`
    );
  }

  if (topK > MAX_TOP_K) {
    throw new CLIError(`--top-k value too large: ${topK}`, `Maximum allowed is ${MAX_TOP_K}`);
  }

  return topK;
}

function stageLabel(stage: EngineLoadStage): string {
  return stage === 'catalog' ? 'products' : 'article chunks';
}

/**
 * Build the JSON document printed with --json.
 */
export function toAskJSON(
  question: string,
  sessionId: string,
  result: TurnResult,
  totalMs: number
): AskOutputJSON {
  const { turn, classification } = result;
  return {
    question,
    sessionId,
    answer: result.answer,
    agentUsed: result.agentUsed,
    intent: classification.intent,
    confidence: classification.confidence,
    constraints: classification.constraints,
    sources: formatCitationsJSON(resolveCitations(result.citations, turn.evidence.items)).citations,
    evidence: turn.evidence.items.map(formatEvidenceJSON),
    notices: result.notices,
    metadata: {
      dispatches: result.dispatches,
      states: result.states,
      degraded: turn.evidence.degraded,
      totalMs: Math.round(totalMs),
      ...(result.traceId ? { traceId: result.traceId } : {}),
    },
  };
}

/**
 * Print a turn for the terminal.
 */
export function renderAnswer(ctx: CommandContext, sessionId: string, result: TurnResult): void {
  const { turn, classification } = result;

  ctx.log(result.answer);

  const citations = resolveCitations(result.citations, turn.evidence.items);
  if (citations.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    ctx.log(formatCitations(citations, { style: ctx.options.verbose ? 'detailed' : 'compact' }));
  }

  if (ctx.options.verbose && turn.evidence.items.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Evidence:'));
    ctx.log(formatEvidenceList(turn.evidence.items, { snippetLength: 120 }));
  }

  for (const notice of result.notices) {
    ctx.log('');
    ctx.log(chalk.yellow(notice));
  }

  ctx.log('');
  ctx.log(
    chalk.dim(
      `Answered by ${result.agentUsed} (${classification.intent}, confidence ${classification.confidence.toFixed(2)})`
    )
  );
  ctx.log(chalk.dim(`Session: ${sessionId}`));
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 * @param buildEngine - Engine factory (defaults to createEngine)
 */
export function createAskCommand(
  getContext: () => CommandContext,
  buildEngine: EngineFactory = createEngine,
  getConfig: () => Config = loadConfig
): Command {
  return new Command('ask')
    .argument('<question>', 'Skincare question in plain language')
    .description('Ask a skincare question and get a cited answer')
    .option('-s, --session <id>', 'Continue a conversation (default: start a new one)')
    .option('-k, --top-k <number>', 'Evidence items per source')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();
      const startTime = performance.now();

      ctx.debug(`Question: "${question}"`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      // ─────────────────────────────────────────────────────────────────────
      // 1. Validate input
      // ─────────────────────────────────────────────────────────────────────
      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: derma ask "Which sunscreen suits oily skin?"'
        );
      }

      const baseConfig = getConfig();
      const config: Config =
        cmdOptions.topK === undefined
          ? baseConfig
          : { ...baseConfig, retrieval: { ...baseConfig.retrieval, top_k: parseTopK(cmdOptions.topK) } };
      const sessionId = cmdOptions.session?.trim() || randomUUID();
      ctx.debug(`Session: ${sessionId}, top-k: ${config.retrieval.top_k}`);

      // Ctrl+C cancels the in-flight turn; nothing is recorded.
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      const spinner = ora({ text: 'Loading catalog and articles...', isSilent: ctx.options.json });
      spinner.start();

      let engine: Engine | undefined;
      try {
        // ───────────────────────────────────────────────────────────────────
        // 2. Load data and build the engine
        // ───────────────────────────────────────────────────────────────────
        engine = await buildEngine(config, {
          logger: ctx,
          signal: controller.signal,
          onProgress: (stage, progress) => {
            spinner.text = `Embedding ${stageLabel(stage)} (${progress.embedded}/${progress.total})...`;
          },
        });

        // ───────────────────────────────────────────────────────────────────
        // 3. Run the turn
        // ───────────────────────────────────────────────────────────────────
        spinner.text = 'Thinking...';
        const result = await engine.orchestrator.runTurn({
          sessionId,
          query: trimmedQuestion,
          signal: controller.signal,
        });
        spinner.stop();

        const totalMs = performance.now() - startTime;
        ctx.debug(`States: ${result.states.join(' → ')}`);
        ctx.debug(`Dispatches: ${result.dispatches.join(', ')}`);
        ctx.debug(`Total: ${totalMs.toFixed(0)}ms`);

        // ───────────────────────────────────────────────────────────────────
        // 4. Output results
        // ───────────────────────────────────────────────────────────────────
        if (ctx.options.json) {
          console.log(JSON.stringify(toAskJSON(trimmedQuestion, sessionId, result, totalMs), null, 2));
        } else {
          renderAnswer(ctx, sessionId, result);
        }
      } catch (error) {
        spinner.stop();
        throw error;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        if (engine) {
          await engine.close().catch((err: unknown) => ctx.debug(`Tracer shutdown error: ${String(err)}`));
        }
      }
    });
}
