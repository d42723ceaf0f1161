/**
 * Capability Configuration Validators
 *
 * Validates hosts and API keys without exposing key values.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 * They only report presence/absence and format validity.
 */

import { z } from 'zod';
import { getEnv, SETUP_INSTRUCTIONS } from '../config/env.js';
import { ProviderError, type ProviderService } from './errors.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating a capability's configuration.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * Ollama host URL format validation.
 * Must be a valid HTTP or HTTPS URL.
 */
export const OllamaHostSchema = z
  .string()
  .url('Invalid Ollama host URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Ollama host must be an HTTP(S) URL'
  );

/**
 * SerpAPI keys are opaque hex strings; only reject obviously broken values.
 */
export const SerpApiKeySchema = z
  .string()
  .trim()
  .min(1, 'API key cannot be empty')
  .regex(/^\S+$/, 'SerpAPI key must not contain whitespace');

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate a specific Ollama host URL.
 *
 * @example
 * ```typescript
 * const validation = validateOllamaHostUrl(options.host ?? getOllamaHost());
 * ```
 */
export function validateOllamaHostUrl(host: string): ValidationResult {
  const result = OllamaHostSchema.safeParse(host);

  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid Ollama host URL',
      setupInstructions: SETUP_INSTRUCTIONS.ollama,
    };
  }

  return { valid: true };
}

/**
 * Validate a SerpAPI key, defaulting to SERPAPI_API_KEY.
 */
export function validateSerpApiKey(key: string | undefined = getEnv('SERPAPI_API_KEY')): ValidationResult {
  if (key === undefined || !key.trim()) {
    return {
      valid: false,
      error: 'SERPAPI_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS.serpapi,
    };
  }

  const result = SerpApiKeySchema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS.serpapi,
    };
  }

  return { valid: true };
}

// ============================================================================
// RESPONSE VALIDATION
// ============================================================================

/**
 * Check a decoded response body against `schema` before it reaches the
 * engine.
 *
 * @throws ProviderError naming the first mismatched field
 */
export function parseProviderResponse<S extends z.ZodTypeAny>(
  service: ProviderService,
  schema: S,
  payload: unknown
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ProviderError(
      service,
      `Unexpected ${service} response${where}: ${issue?.message ?? 'invalid shape'}`,
      SETUP_INSTRUCTIONS[service],
      result.error
    );
  }
  return result.data;
}
