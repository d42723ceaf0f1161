/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to service hosts and API keys.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist - production uses real env vars
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema with optional values.
 * Keys are not required at load time; a capability checks for its key
 * when it is created.
 */
export const EnvSchema = z.object({
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  SERPAPI_API_KEY: z.string().optional(),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_BASE_URL: z.string().url().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * _clearEnvCache() resets it for test isolation.
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * A malformed URL falls back to the default rather than failing every
 * command; the offending variable is simply ignored.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OLLAMA_HOST: process.env['OLLAMA_HOST'] || undefined,
    SERPAPI_API_KEY: process.env['SERPAPI_API_KEY'] || undefined,
    LANGFUSE_PUBLIC_KEY: process.env['LANGFUSE_PUBLIC_KEY'] || undefined,
    LANGFUSE_SECRET_KEY: process.env['LANGFUSE_SECRET_KEY'] || undefined,
    LANGFUSE_BASE_URL: process.env['LANGFUSE_BASE_URL'] || undefined,
  };

  const result = EnvSchema.safeParse(raw);
  if (result.success) {
    _envCache = result.data;
  } else {
    const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
    _envCache = EnvSchema.parse(
      Object.fromEntries(Object.entries(raw).filter(([key]) => !invalid.has(key)))
    );
  }

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured (non-empty) WITHOUT exposing it.
 */
export function hasApiKey(service: 'serpapi' | 'langfuse'): boolean {
  const env = loadEnv();
  switch (service) {
    case 'serpapi':
      return Boolean(env.SERPAPI_API_KEY?.trim());
    case 'langfuse':
      return Boolean(env.LANGFUSE_PUBLIC_KEY?.trim() && env.LANGFUSE_SECRET_KEY?.trim());
  }
}

/**
 * Get the Ollama host URL (default http://localhost:11434).
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Service-specific setup instructions, shown when a capability is missing.
 */
export const SETUP_INSTRUCTIONS: Record<'ollama' | 'serpapi', string> = {
  ollama: `
Embedding and answer generation use Ollama:

1. Install Ollama from https://ollama.com/
2. Start the server:

   ollama serve

3. Pull the configured models:

   ollama pull llama3.1
   ollama pull nomic-embed-text

4. (Optional) Point at another host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  serpapi: `
General skincare questions are answered from web search via SerpAPI:

1. Get an API key from https://serpapi.com/
2. Set the environment variable (or add it to .env):

   export SERPAPI_API_KEY="your-key"
`.trim(),
};
