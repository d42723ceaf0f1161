/**
 * SerpAPI Client Tests
 *
 * axios.get is stubbed; no request leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios, { AxiosError, AxiosHeaders, CanceledError, type AxiosResponse } from 'axios';
import { createSerpApiSearch, toWebResults } from '../serpapi.js';
import { ProviderError } from '../errors.js';
import { _clearEnvCache } from '../../config/env.js';

function axiosResponse(data: unknown, status = 200): AxiosResponse<unknown> {
  return {
    data,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

describe('toWebResults', () => {
  it('keeps titled, linked results in order up to the limit', () => {
    const results = toWebResults(
      {
        organic_results: [
          { title: 'Retinoids explained', snippet: 'Vitamin A derivatives', link: 'https://a.example/retinoids' },
          { title: 'No link here', snippet: 'skipped' },
          { title: 'Sunscreen basics', link: 'https://b.example/spf' },
          { title: 'Third', link: 'https://c.example/3' },
        ],
      },
      2
    );

    expect(results).toEqual([
      { title: 'Retinoids explained', snippet: 'Vitamin A derivatives', url: 'https://a.example/retinoids' },
      { title: 'Sunscreen basics', snippet: '', url: 'https://b.example/spf' },
    ]);
  });

  it('returns nothing when organic_results is absent', () => {
    expect(toWebResults({}, 5)).toEqual([]);
  });
});

describe('createSerpApiSearch', () => {
  const getMock = vi.spyOn(axios, 'get');

  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
    getMock.mockReset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('queries search.json with engine, query, limit and key', async () => {
    getMock.mockResolvedValue(
      axiosResponse({ organic_results: [{ title: 'Acne study', snippet: 'New data', link: 'https://j.example/acne' }] })
    );
    const search = createSerpApiSearch({ apiKey: 'test-secret' });
    const controller = new AbortController();

    const results = await search('acne research skincare', { limit: 3, signal: controller.signal });

    expect(results).toEqual([{ title: 'Acne study', snippet: 'New data', url: 'https://j.example/acne' }]);
    expect(getMock).toHaveBeenCalledWith('https://serpapi.com/search.json', {
      params: { engine: 'google', q: 'acne research skincare', num: 3, api_key: 'test-secret' },
      signal: controller.signal,
    });
  });

  it('fails each call without a key, and makes no request', async () => {
    vi.stubEnv('SERPAPI_API_KEY', '');
    const search = createSerpApiSearch();

    const error = await search('spf').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.message).toBe('SERPAPI_API_KEY environment variable is not set');
      expect(error.service).toBe('serpapi');
    }
    expect(getMock).not.toHaveBeenCalled();
  });

  it('treats the no-results error as an empty list', async () => {
    getMock.mockResolvedValue(axiosResponse({ error: "Google hasn't returned any results for this query." }));
    const search = createSerpApiSearch({ apiKey: 'test-secret' });

    await expect(search('zzqx')).resolves.toEqual([]);
  });

  it('surfaces other API errors', async () => {
    getMock.mockResolvedValue(axiosResponse({ error: 'Invalid API key.' }));
    const search = createSerpApiSearch({ apiKey: 'test-secret' });

    await expect(search('spf')).rejects.toThrow('SerpAPI error: Invalid API key.');
  });

  it('maps HTTP errors to ProviderError with the status', async () => {
    const response = axiosResponse({ error: 'quota' }, 429);
    getMock.mockRejectedValue(
      new AxiosError('Request failed with status code 429', 'ERR_BAD_REQUEST', response.config, undefined, response)
    );
    const search = createSerpApiSearch({ apiKey: 'test-secret' });

    const error = await search('spf').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.message).toBe('serpapi request failed with status 429');
      expect(error.status).toBe(429);
    }
  });

  it('maps a network failure to ProviderError', async () => {
    getMock.mockRejectedValue(new AxiosError('getaddrinfo ENOTFOUND serpapi.com', 'ENOTFOUND'));
    const search = createSerpApiSearch({ apiKey: 'test-secret' });

    await expect(search('spf')).rejects.toThrow('Could not reach serpapi: getaddrinfo ENOTFOUND serpapi.com');
  });

  it('passes a cancellation through unchanged', async () => {
    const canceled = new CanceledError();
    getMock.mockRejectedValue(canceled);
    const search = createSerpApiSearch({ apiKey: 'test-secret' });

    await expect(search('spf')).rejects.toBe(canceled);
  });

  it('rejects a body that is not a SerpAPI response', async () => {
    getMock.mockResolvedValue(axiosResponse({ organic_results: 'none' }));
    const search = createSerpApiSearch({ apiKey: 'test-secret' });

    await expect(search('spf')).rejects.toThrow(/^Unexpected serpapi response at organic_results/);
  });
});
