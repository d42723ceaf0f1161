/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.dermaroute)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';

import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { buildConfigTemplate, buildDefaultConfig } from './defaults.js';
import { getAppDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

/**
 * Ensure the ~/.dermaroute directory exists
 */
function ensureAppDir(): void {
  const appDir = getAppDir();
  if (!fs.existsSync(appDir)) {
    fs.mkdirSync(appDir, { recursive: true });
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Read and parse the TOML file as a plain table.
 *
 * @throws ConfigError for TOML syntax errors
 */
function readConfigFile(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default config on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();
  const defaults = buildDefaultConfig();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureAppDir();
      fs.writeFileSync(configPath, buildConfigTemplate(defaults), 'utf-8');
    }
    return defaults;
  }

  const parsed = readConfigFile(configPath);

  // Validate against the partial schema (allows missing fields)
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error)}`,
      `Fix the values in ${configPath} or delete it to restore defaults`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(defaults, partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error)}`,
      `Fix the values in ${configPath} or delete it to restore defaults`
    );
  }
  return merged.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('retrieval.top_k') => 5
 */
export function getConfigValue(key: string, config: Config = loadConfig()): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 *
 * @throws ConfigError for unknown keys or values the schema rejects
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  const parts = key.split('.');
  const lastPart = parts.pop();
  if (!lastPart || parts.some((part) => !part)) {
    throw new ConfigError(`Invalid config key: "${key}"`, 'Run: derma config list  to see available keys');
  }

  const defaults = buildDefaultConfig();
  const existing = getConfigValue(key, defaults);
  if (existing === undefined && !isOptionalKey(key)) {
    throw new ConfigError(`Unknown config key: "${key}"`, 'Run: derma config list  to see available keys');
  }
  if (isPlainObject(existing)) {
    throw new ConfigError(`"${key}" is a section, not a value`, 'Run: derma config list  to see available keys');
  }

  ensureAppDir();
  const config: Record<string, unknown> = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  // Walk/create the nested tables
  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const table: Record<string, unknown> = {};
      current[part] = table;
      current = table;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const validationResult = ConfigSchema.safeParse(deepMerge(defaults, config));
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error)}`,
      'Run: derma config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(toJsonMap(config)), 'utf-8');
}

/** Keys that exist in the schema but have no default value. */
const OPTIONAL_KEYS = ['observability.langfuse_public_key', 'observability.langfuse_secret_key'];

function isOptionalKey(key: string): boolean {
  return OPTIONAL_KEYS.includes(key);
}

/**
 * Rebuild a plain table as a TOML JsonMap, dropping values TOML can't hold.
 */
function toJsonMap(table: Record<string, unknown>): TOML.JsonMap {
  const map: TOML.JsonMap = {};
  for (const [key, value] of Object.entries(table)) {
    if (isPlainObject(value)) {
      map[key] = toJsonMap(value);
    } else if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      map[key] = value;
    } else if (isStringArray(value)) {
      map[key] = value;
    }
  }
  return map;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
export function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['retrieval.top_k', 5]
 */
export function listConfig(config: Config = loadConfig()): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
