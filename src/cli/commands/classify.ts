/**
 * Classify Command
 *
 * Shows how a question would be routed without retrieving anything or
 * calling a model:
 *
 *   derma classify "Recommend a moisturizer under 1200 for oily skin"
 *   derma classify "what about dry skin?" --session morning
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { createIntentClassifier } from '../../agent/intent-classifier.js';
import { AGENT_FOR_INTENT, type Classification, type Turn } from '../../agent/types.js';
import { openConversationStore } from '../../history/sqlite-store.js';
import type { ConversationStore } from '../../history/types.js';
import { describeConstraints } from '../../search/constraints.js';
import { CLIError } from '../../errors/index.js';

interface ClassifyCommandOptions {
  /** Use this session's recent turns as context */
  session?: string;
}

export interface ClassifyDependencies {
  getConfig: () => Config;
  openStore: (config: Config) => ConversationStore;
}

const defaultDependencies: ClassifyDependencies = {
  getConfig: () => loadConfig(),
  openStore: (config) => openConversationStore(config.history.database),
};

/**
 * Print a classification as aligned label/value rows.
 */
export function renderClassification(ctx: CommandContext, classification: Classification): void {
  const rows: Array<[string, string]> = [
    ['Intent', chalk.cyan(classification.intent)],
    ['Agent', AGENT_FOR_INTENT[classification.intent]],
    ['Confidence', classification.confidence.toFixed(2)],
    ['Method', classification.method + (classification.ambiguous ? chalk.yellow(' (ambiguous)') : '')],
    ['Constraints', describeConstraints(classification.constraints)],
    ['Reason', chalk.dim(classification.reason)],
  ];
  for (const [label, value] of rows) {
    ctx.log(`${`${label}:`.padEnd(13)}${value}`);
  }
}

export function createClassifyCommand(
  getContext: () => CommandContext,
  deps: ClassifyDependencies = defaultDependencies
): Command {
  return new Command('classify')
    .argument('<question>', 'Question to route')
    .description('Show the intent and constraints for a question (no retrieval)')
    .option('-s, --session <id>', 'Use the recent turns of a session as context')
    .action(async (question: string, cmdOptions: ClassifyCommandOptions) => {
      const ctx = getContext();

      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError('Question cannot be empty', 'Provide a question, e.g.: derma classify "toner for dry skin"');
      }

      const config = deps.getConfig();
      const classifier = createIntentClassifier({
        confidenceThreshold: config.classifier.confidence_threshold,
        affordablePriceCeiling: config.classifier.affordable_price_ceiling,
      });

      let history: Turn[] = [];
      if (cmdOptions.session) {
        history = await deps
          .openStore(config)
          .read(cmdOptions.session, config.classifier.history_window);
        ctx.debug(`Using ${history.length} previous turn(s) from session ${cmdOptions.session}`);
      }

      const classification = await classifier.classify(trimmedQuestion, history);

      if (ctx.options.json) {
        console.log(JSON.stringify({ question: trimmedQuestion, ...classification }, null, 2));
      } else {
        renderClassification(ctx, classification);
      }
    });
}
