/**
 * History Command
 *
 * Browse and clean up stored conversations:
 *   derma history                 - List recent sessions
 *   derma history <session>       - Show the turns of a session
 *   derma history <session> --delete
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import type { Turn } from '../../agent/types.js';
import { openConversationStore } from '../../history/sqlite-store.js';
import type { ConversationStore, SessionSummary } from '../../history/types.js';
import { CLIError } from '../../errors/index.js';

interface HistoryCommandOptions {
  limit: string;
  delete?: boolean;
}

export interface HistoryDependencies {
  getConfig: () => Config;
  openStore: (config: Config) => ConversationStore;
}

const defaultDependencies: HistoryDependencies = {
  getConfig: () => loadConfig(),
  openStore: (config) => openConversationStore(config.history.database),
};

const DEFAULT_LIMIT = 20;

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new CLIError(`Invalid --limit value: "${value}"`, 'Must be a positive integer');
  }
  return limit;
}

/** "2026-03-01T10:00:00.000Z" → "2026-03-01 10:00" */
export function formatTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

function renderSessions(ctx: CommandContext, sessions: SessionSummary[]): void {
  if (sessions.length === 0) {
    ctx.log(chalk.yellow('No conversations yet.'));
    ctx.log(chalk.dim('Start one with: derma ask "<question>"'));
    return;
  }

  ctx.log(chalk.bold('Sessions:'));
  for (const session of sessions) {
    const turns = `${session.turnCount} turn${session.turnCount === 1 ? '' : 's'}`;
    ctx.log(
      `  ${chalk.cyan(session.sessionId)}  ${session.title}  ${chalk.dim(
        `${turns}, last active ${formatTimestamp(session.lastActiveAt)}`
      )}`
    );
  }
}

function renderTurns(ctx: CommandContext, sessionId: string, turns: Turn[]): void {
  ctx.log(chalk.bold(`Session ${sessionId}`));
  turns.forEach((turn, i) => {
    ctx.log('');
    ctx.log(`${chalk.dim(`#${i + 1} ${formatTimestamp(turn.timestamp)}`)} ${chalk.cyan(turn.intent)} → ${turn.agentUsed}`);
    ctx.log(`${chalk.bold('Q:')} ${turn.query}`);
    ctx.log(`${chalk.bold('A:')} ${turn.answer}`);
  });
}

export function createHistoryCommand(
  getContext: () => CommandContext,
  deps: HistoryDependencies = defaultDependencies
): Command {
  return new Command('history')
    .argument('[session]', 'Session id to show')
    .description('List conversations, or show the turns of one')
    .option('-n, --limit <number>', 'Maximum sessions to list', String(DEFAULT_LIMIT))
    .option('--delete', 'Delete the given session')
    .action(async (sessionId: string | undefined, cmdOptions: HistoryCommandOptions) => {
      const ctx = getContext();
      const store = deps.openStore(deps.getConfig());

      if (!sessionId) {
        if (cmdOptions.delete) {
          throw new CLIError('--delete needs a session id', 'Run: derma history  to list sessions');
        }
        const sessions = await store.listSessions(parseLimit(cmdOptions.limit));
        if (ctx.options.json) {
          console.log(JSON.stringify({ sessions }, null, 2));
        } else {
          renderSessions(ctx, sessions);
        }
        return;
      }

      if (cmdOptions.delete) {
        const deleted = await store.deleteSession(sessionId);
        if (!deleted) {
          throw new CLIError(`Session not found: ${sessionId}`, 'Run: derma history  to list sessions');
        }
        if (ctx.options.json) {
          console.log(JSON.stringify({ deleted: sessionId }));
        } else {
          ctx.log(`${chalk.green('✓')} Deleted session ${chalk.cyan(sessionId)}`);
        }
        return;
      }

      const turns = await store.read(sessionId);
      if (turns.length === 0) {
        throw new CLIError(`Session not found: ${sessionId}`, 'Run: derma history  to list sessions');
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ sessionId, turns }, null, 2));
      } else {
        renderTurns(ctx, sessionId, turns);
      }
    });
}
