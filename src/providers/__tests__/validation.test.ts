/**
 * Capability Validation Tests
 *
 * Tests for src/providers/validation.ts
 * Verifies host/key validation and error messages.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  validateOllamaHostUrl,
  validateSerpApiKey,
  OllamaHostSchema,
  SerpApiKeySchema,
} from '../validation.js';
import { _clearEnvCache } from '../../config/env.js';

describe('Ollama Host Validation', () => {
  it('accepts http and https URLs', () => {
    expect(validateOllamaHostUrl('http://localhost:11434')).toEqual({ valid: true });
    expect(validateOllamaHostUrl('https://ollama.internal:8443')).toEqual({ valid: true });
  });

  it('rejects a value that is not a URL', () => {
    const result = validateOllamaHostUrl('localhost');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Ollama host URL');
      expect(result.setupInstructions).toContain('ollama serve');
    }
  });

  it('rejects non-HTTP schemes', () => {
    const result = validateOllamaHostUrl('ftp://localhost:11434');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Ollama host must be an HTTP(S) URL');
    }
  });

  it('schema parses a valid host', () => {
    expect(OllamaHostSchema.parse('http://127.0.0.1:11434')).toBe('http://127.0.0.1:11434');
  });
});

describe('SerpAPI Key Validation', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('accepts a key passed directly', () => {
    expect(validateSerpApiKey('test-secret')).toEqual({ valid: true });
  });

  it('reads SERPAPI_API_KEY when no key is passed', () => {
    vi.stubEnv('SERPAPI_API_KEY', 'test-secret');

    expect(validateSerpApiKey()).toEqual({ valid: true });
  });

  it('returns setup instructions when the key is missing', () => {
    vi.stubEnv('SERPAPI_API_KEY', '');

    const result = validateSerpApiKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('SERPAPI_API_KEY environment variable is not set');
      expect(result.setupInstructions).toContain('serpapi.com');
    }
  });

  it('rejects a blank key', () => {
    const result = validateSerpApiKey('   ');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('SERPAPI_API_KEY environment variable is not set');
    }
  });

  it('rejects a key with inner whitespace', () => {
    const result = validateSerpApiKey('test secret');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('SerpAPI key must not contain whitespace');
    }
  });

  it('schema trims surrounding whitespace', () => {
    expect(SerpApiKeySchema.parse('  test-secret  ')).toBe('test-secret');
  });
});
