/**
 * Data Loader Tests
 *
 * Uses a temporary directory for the JSON files.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { buildArticleIndex, buildCatalogIndex, loadArticles, loadCatalog } from '../loaders.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import type { EmbedFn } from '../types.js';

describe('loaders', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dermaroute-loaders-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeJson(name: string, value: unknown): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, JSON.stringify(value), 'utf-8');
    return filePath;
  }

  describe('loadCatalog', () => {
    it('should normalize ids, categories and list attributes', () => {
      const filePath = writeJson('catalog.json', [
        {
          id: 42,
          name: 'Daily Sunscreen',
          price: 650,
          category: 'Sunscreen',
          skin_type: ['Oily', 'Normal'],
        },
      ]);

      const [record] = loadCatalog(filePath);

      expect(record).toEqual({
        id: '42',
        name: 'Daily Sunscreen',
        price: 650,
        category: 'sunscreen',
        skin_type: ['oily', 'normal'],
        key_ingredients: [],
      });
    });

    it('should list invalid records by index', () => {
      const filePath = writeJson('catalog.json', [
        { id: 'ok', name: 'Fine', price: 10, category: 'toner' },
        { id: 'bad', name: 'Negative', price: -5, category: 'toner' },
      ]);

      try {
        loadCatalog(filePath);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.message).toBe(`Invalid records in ${filePath}`);
          expect(error.issues).toEqual(['[1].price: Number must be greater than or equal to 0']);
        }
      }
    });

    it('should reject a file that is not an array', () => {
      const filePath = writeJson('catalog.json', { products: [] });

      expect(() => loadCatalog(filePath)).toThrow(`Expected a JSON array in ${filePath}`);
    });

    it('should throw FileNotFoundError for a missing file', () => {
      expect(() => loadCatalog(path.join(tempDir, 'missing.json'))).toThrow(FileNotFoundError);
    });
  });

  describe('loadArticles', () => {
    it('should apply chunk defaults', () => {
      const filePath = writeJson('articles.json', [
        { id: 'a-1', title: 'Sunscreen Basics', content: 'Reapply every two hours.', tags: ['SPF'] },
      ]);

      expect(loadArticles(filePath)).toEqual([
        {
          id: 'a-1',
          title: 'Sunscreen Basics',
          content: 'Reapply every two hours.',
          tags: ['spf'],
          chunk_index: 0,
          total_chunks: 1,
        },
      ]);
    });
  });

  describe('index building', () => {
    it('should embed each product once and report progress', async () => {
      const embed = vi.fn<EmbedFn>(async () => [1, 0]);
      const onProgress = vi.fn();
      const records = loadCatalog(
        writeJson('catalog.json', [
          { id: 'a', name: 'Gel', price: 10, category: 'moisturizer', skin_type: ['oily'] },
          { id: 'b', name: 'Balm', price: 20, category: 'moisturizer' },
        ])
      );

      const index = await buildCatalogIndex(records, embed, { onProgress, supportsFilters: false });

      expect(index.size).toBe(2);
      expect(index.supportsFilters).toBe(false);
      expect(embed.mock.calls.map((call) => call[0])).toEqual([
        'Gel. moisturizer. for oily skin',
        'Balm. moisturizer',
      ]);
      expect(onProgress).toHaveBeenLastCalledWith({ embedded: 2, total: 2 });
    });

    it('should embed article title with content', async () => {
      const embed = vi.fn<EmbedFn>(async () => [1, 0]);
      const chunks = loadArticles(
        writeJson('articles.json', [{ id: 'a-1', title: 'Retinol 101', content: 'Start slow.' }])
      );

      await buildArticleIndex(chunks, embed);

      expect(embed.mock.calls[0]?.[0]).toBe('Retinol 101\nStart slow.');
    });
  });
});
