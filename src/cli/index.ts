#!/usr/bin/env node
/**
 * dermaroute CLI Entry Point
 *
 * This is the main entry point for the `derma` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'node:module';
import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createClassifyCommand } from './commands/classify.js';
import { createConfigCommand } from './commands/config.js';
import { createHistoryCommand } from './commands/history.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../../package.json');
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

// Create the root program
const program = new Command();

// Configure the program
program
  .name('derma')
  .description('Skincare question answering with intent routing and cited sources')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('derma ask "Recommend a moisturizer under 1200 for oily skin"')}
  ${chalk.cyan('derma ask "what about for dry skin?" --session morning')}   Follow-up in a session
  ${chalk.cyan('derma classify "latest acne research 2025"')}               Routing decision only
  ${chalk.cyan('derma history')}                                            List sessions
  ${chalk.cyan('derma config set retrieval.top_k 8')}                       Change a setting
`);

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createClassifyCommand(getContext));
program.addCommand(createHistoryCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: derma --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // These catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
