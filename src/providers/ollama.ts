/**
 * Ollama Capability Clients
 *
 * Embedding and answer generation through the official `ollama` client,
 * against a local (or remote) Ollama server.
 *
 * KEY DIFFERENCES FROM HOSTED APIS:
 * - No API key required (local inference)
 * - Works offline once the models are pulled
 */

import { Ollama } from 'ollama';
import { z } from 'zod';

import { getOllamaHost, SETUP_INSTRUCTIONS } from '../config/env.js';
import type { GenerateFn, GenerateOptions } from '../agent/types.js';
import type { CapabilityCallOptions, EmbedFn } from '../search/types.js';
import { ProviderError } from './errors.js';
import { parseProviderResponse, validateOllamaHostUrl } from './validation.js';

// ============================================================================
// TYPES
// ============================================================================

export interface OllamaClientOptions {
  /**
   * Model to call. Run `ollama list` to see available models.
   */
  model?: string;

  /**
   * Ollama server host URL.
   * Reads from OLLAMA_HOST env var if not specified.
   * @default 'http://localhost:11434'
   */
  host?: string;

  /**
   * Keep the model loaded between requests ('0' unloads immediately,
   * or a duration like '5m').
   */
  keepAlive?: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_OLLAMA_GENERATION_MODEL = 'llama3.1';
export const DEFAULT_OLLAMA_EMBEDDING_MODEL = 'nomic-embed-text';

export const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

export const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

// ============================================================================
// HELPERS
// ============================================================================

/** Validate the host and strip trailing slashes. */
function resolveHost(host: string | undefined): string {
  const resolved = host ?? getOllamaHost();
  const validation = validateOllamaHostUrl(resolved);
  if (!validation.valid) {
    throw new ProviderError('ollama', validation.error, validation.setupInstructions);
  }
  return resolved.replace(/\/+$/, '');
}

/**
 * A client whose requests carry the caller's signal.
 *
 * The client only cancels streamed requests itself, so the signal is
 * attached through the fetch it is given.
 */
export function createOllamaClient(host: string, signal?: AbortSignal): Ollama {
  if (!signal) return new Ollama({ host });
  const fetchWithSignal: typeof fetch = (input, init) => fetch(input, { ...init, signal });
  return new Ollama({ host, fetch: fetchWithSignal });
}

/** HTTP status carried by the client's ResponseError. */
function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status_code' in error) {
    return typeof error.status_code === 'number' ? error.status_code : undefined;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one client call, mapping failures to ProviderError.
 *
 * Aborts propagate unchanged so the caller's deadline logic sees them.
 */
async function callOllama<T>(call: () => Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (signal?.aborted) throw error;
    const status = statusOf(error);
    const message =
      status === undefined
        ? `Could not reach ollama: ${describe(error)}`
        : `ollama request failed with status ${status}: ${describe(error)}`;
    throw new ProviderError('ollama', message, SETUP_INSTRUCTIONS.ollama, error, status);
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Create an EmbedFn backed by Ollama's embeddings endpoint.
 *
 * @throws ProviderError if the host URL is invalid
 *
 * @example
 * ```typescript
 * const embed = createOllamaEmbedder({ model: 'nomic-embed-text' });
 * const vector = await embed('niacinamide serum');
 * ```
 */
export function createOllamaEmbedder(options: OllamaClientOptions = {}): EmbedFn {
  const host = resolveHost(options.host);
  const model = options.model ?? DEFAULT_OLLAMA_EMBEDDING_MODEL;

  return async (text: string, callOptions: CapabilityCallOptions = {}): Promise<number[]> => {
    const client = createOllamaClient(host, callOptions.signal);
    const payload = await callOllama(
      () =>
        client.embeddings({
          model,
          prompt: text,
          ...(options.keepAlive !== undefined && { keep_alive: options.keepAlive }),
        }),
      callOptions.signal
    );
    const { embedding } = parseProviderResponse('ollama', OllamaEmbeddingResponseSchema, payload);

    if (embedding.length === 0) {
      throw new ProviderError(
        'ollama',
        `Model "${model}" returned an empty embedding`,
        `Check that "${model}" is an embedding model: ollama pull ${model}`
      );
    }
    return embedding;
  };
}

/**
 * Create a GenerateFn backed by Ollama's generate endpoint (non-streaming).
 *
 * The prompt already embeds the evidence, so `contextItems` is not sent.
 *
 * @throws ProviderError if the host URL is invalid
 */
export function createOllamaGenerator(options: OllamaClientOptions = {}): GenerateFn {
  const host = resolveHost(options.host);
  const model = options.model ?? DEFAULT_OLLAMA_GENERATION_MODEL;

  return async (prompt, _contextItems, callOptions: GenerateOptions = {}): Promise<string> => {
    const client = createOllamaClient(host, callOptions.signal);
    const payload = await callOllama(
      () =>
        client.generate({
          model,
          prompt,
          stream: false,
          ...(callOptions.system !== undefined && { system: callOptions.system }),
          ...(callOptions.temperature !== undefined && {
            options: { temperature: callOptions.temperature },
          }),
          ...(options.keepAlive !== undefined && { keep_alive: options.keepAlive }),
        }),
      callOptions.signal
    );
    return parseProviderResponse('ollama', OllamaGenerateResponseSchema, payload).response;
  };
}
