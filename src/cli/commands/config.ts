/**
 * Config Command
 *
 * Manages ~/.dermaroute/config.toml via CLI:
 *   derma config get <key>         - Get a specific value
 *   derma config set <key> <value> - Set a value
 *   derma config list              - Show all configuration
 *   derma config path              - Show config file location
 *   derma config reset --force     - Restore the defaults
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import { loadConfig, getConfigValue, setConfigValue, listConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { CommandContext } from '../types.js';
import { CLIError } from '../../errors/index.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  // derma config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., derma config get generation.model)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('derma config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else if (value !== null && typeof value === 'object') {
          // A whole section: one line per setting
          for (const [entryKey, entryValue] of listConfig().filter(([k]) => k.startsWith(`${key}.`))) {
            ctx.log(`${chalk.cyan(entryKey)} = ${chalk.yellow(formatValue(entryValue))}`);
          }
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // derma config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., derma config set retrieval.top_k 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // derma config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          const obj = Object.fromEntries(entries);
          console.log(JSON.stringify(obj, null, 2));
        } else {
          ctx.log(chalk.bold('Configuration:'));
          ctx.log('');

          // Group by top-level key for readability
          let currentGroup = '';
          for (const [key, value] of entries) {
            const group = key.split('.')[0] ?? '';

            // Add spacing between groups
            if (group !== currentGroup) {
              if (currentGroup !== '') ctx.log('');
              currentGroup = group;
            }

            const formatted = formatValue(value);
            ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatted)}`);
          }

          ctx.log('');
          ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // derma config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // derma config reset (bonus command - useful for troubleshooting)
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = getConfigPath();

        if (fs.existsSync(configPath)) {
          fs.unlinkSync(configPath);
        }

        // Reload to create fresh config
        loadConfig(true);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Handle config errors with user-friendly messages
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  const hint = error instanceof CLIError ? error.hint : undefined;

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message, ...(hint && { hint }) }));
  } else {
    ctx.error(message);
    if (hint) ctx.log(chalk.dim(`Hint: ${hint}`));
  }

  process.exitCode = error instanceof CLIError ? error.code : 1;
}
