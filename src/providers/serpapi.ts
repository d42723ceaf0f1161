/**
 * SerpAPI Web Search Client
 *
 * Google results through SerpAPI's search.json endpoint, reduced to the
 * organic hits the general-knowledge agent cites.
 */

import axios from 'axios';
import { z } from 'zod';

import { getEnv, SETUP_INSTRUCTIONS } from '../config/env.js';
import type { WebResult, WebSearchFn } from '../search/types.js';
import { ProviderError } from './errors.js';
import { parseProviderResponse, validateSerpApiKey } from './validation.js';

export const SERPAPI_ENDPOINT = 'https://serpapi.com/search.json';

export const DEFAULT_SERPAPI_RESULTS = 5;

export interface SerpApiSearchOptions {
  /** Falls back to SERPAPI_API_KEY */
  apiKey?: string;
  /** Search engine (default: google) */
  engine?: string;
  /** Override for testing or a proxy */
  endpoint?: string;
}

const OrganicResultSchema = z.object({
  title: z.string().optional(),
  snippet: z.string().optional(),
  link: z.string().optional(),
});

export const SerpApiResponseSchema = z.object({
  organic_results: z.array(OrganicResultSchema).optional(),
  error: z.string().optional(),
});

export type SerpApiResponse = z.infer<typeof SerpApiResponseSchema>;

/**
 * Keep organic results that have a title and a link, in rank order.
 */
export function toWebResults(response: SerpApiResponse, limit: number): WebResult[] {
  const results: WebResult[] = [];
  for (const organic of response.organic_results ?? []) {
    if (!organic.title || !organic.link) continue;
    results.push({ title: organic.title, snippet: organic.snippet ?? '', url: organic.link });
    if (results.length >= limit) break;
  }
  return results;
}

/** Map a failed request to ProviderError; aborts pass through. */
function toProviderError(error: unknown, signal: AbortSignal | undefined): unknown {
  if (signal?.aborted || axios.isCancel(error)) return error;
  if (axios.isAxiosError(error) && error.response) {
    return new ProviderError(
      'serpapi',
      `serpapi request failed with status ${error.response.status}`,
      SETUP_INSTRUCTIONS.serpapi,
      error,
      error.response.status
    );
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ProviderError('serpapi', `Could not reach serpapi: ${reason}`, SETUP_INSTRUCTIONS.serpapi, error);
}

/**
 * Create a WebSearchFn backed by SerpAPI.
 *
 * A missing key doesn't fail here: every call throws instead, so the web
 * source reports itself unavailable while catalog and article questions
 * keep working.
 */
export function createSerpApiSearch(options: SerpApiSearchOptions = {}): WebSearchFn {
  const apiKey = options.apiKey ?? getEnv('SERPAPI_API_KEY');
  const validation = validateSerpApiKey(apiKey);
  const endpoint = options.endpoint ?? SERPAPI_ENDPOINT;
  const engine = options.engine ?? 'google';

  return async (query, callOptions = {}): Promise<WebResult[]> => {
    if (!validation.valid || apiKey === undefined) {
      throw new ProviderError(
        'serpapi',
        validation.valid ? 'SERPAPI_API_KEY is not set' : validation.error,
        SETUP_INSTRUCTIONS.serpapi
      );
    }

    const limit = callOptions.limit ?? DEFAULT_SERPAPI_RESULTS;
    let payload: unknown;
    try {
      const response = await axios.get<unknown>(endpoint, {
        params: { engine, q: query, num: limit, api_key: apiKey.trim() },
        signal: callOptions.signal,
      });
      payload = response.data;
    } catch (error) {
      throw toProviderError(error, callOptions.signal);
    }

    const response = parseProviderResponse('serpapi', SerpApiResponseSchema, payload);
    if (response.error && !response.organic_results) {
      // "Google hasn't returned any results" is an empty answer, not an outage
      if (/hasn't returned any results/i.test(response.error)) return [];
      throw new ProviderError('serpapi', `SerpAPI error: ${response.error}`, SETUP_INSTRUCTIONS.serpapi);
    }

    return toWebResults(response, limit);
  };
}
