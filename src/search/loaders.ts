/**
 * Data Loaders
 *
 * Read the catalog and article JSON files, validate every record and build
 * in-memory indexes by embedding each record's text.
 */

import * as fs from 'node:fs';
import type { z } from 'zod';

import { FileNotFoundError, ValidationError } from '../errors/index.js';
import { CatalogRecordSchema, productSearchText, toCatalogIndexRecord, type CatalogRecord } from './catalog.js';
import { ArticleChunkSchema, toArticleIndexRecord, type ArticleChunk } from './documents.js';
import { InMemoryVectorIndex, type IndexRecord } from './in-memory-index.js';
import type { EmbedFn } from './types.js';

/** Progress reported while embedding records. */
export interface IndexBuildProgress {
  embedded: number;
  total: number;
}

export interface BuildIndexOptions {
  /** Let the index apply constraints itself (default: true) */
  supportsFilters?: boolean;
  onProgress?: (progress: IndexBuildProgress) => void;
  signal?: AbortSignal;
}

function readJsonArray(filePath: string): unknown[] {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath, 'Set catalog.data_path / documents.data_path in config.toml');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ValidationError(`Invalid JSON in ${filePath}: ${message}`);
  }

  if (!Array.isArray(parsed)) {
    throw new ValidationError(`Expected a JSON array in ${filePath}`);
  }
  return parsed;
}

function parseAll<S extends z.ZodTypeAny>(
  schema: S,
  rows: unknown[],
  filePath: string
): Array<z.output<S>> {
  const records: Array<z.output<S>> = [];
  const issues: string[] = [];

  rows.forEach((row, i) => {
    const result = schema.safeParse(row);
    if (result.success) {
      records.push(result.data);
    } else {
      for (const issue of result.error.issues) {
        issues.push(`[${i}].${issue.path.join('.')}: ${issue.message}`);
      }
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(`Invalid records in ${filePath}`, issues.slice(0, 10));
  }
  return records;
}

/** Load and validate a catalog file. */
export function loadCatalog(filePath: string): CatalogRecord[] {
  return parseAll(CatalogRecordSchema, readJsonArray(filePath), filePath);
}

/** Load and validate an articles file. */
export function loadArticles(filePath: string): ArticleChunk[] {
  return parseAll(ArticleChunkSchema, readJsonArray(filePath), filePath);
}

async function buildIndex<T>(
  records: T[],
  textOf: (record: T) => string,
  toIndexRecord: (record: T, vector: number[]) => IndexRecord,
  embed: EmbedFn,
  options: BuildIndexOptions
): Promise<InMemoryVectorIndex> {
  const index = new InMemoryVectorIndex({ supportsFilters: options.supportsFilters });
  const batch: IndexRecord[] = [];

  for (const record of records) {
    const vector = await embed(textOf(record), { signal: options.signal });
    batch.push(toIndexRecord(record, vector));
    options.onProgress?.({ embedded: batch.length, total: records.length });
  }

  index.add(batch);
  return index;
}

/** Embed every product and return a ready index. */
export function buildCatalogIndex(
  records: CatalogRecord[],
  embed: EmbedFn,
  options: BuildIndexOptions = {}
): Promise<InMemoryVectorIndex> {
  return buildIndex(records, productSearchText, toCatalogIndexRecord, embed, options);
}

/** Embed every article chunk and return a ready index. */
export function buildArticleIndex(
  chunks: ArticleChunk[],
  embed: EmbedFn,
  options: BuildIndexOptions = {}
): Promise<InMemoryVectorIndex> {
  return buildIndex(
    chunks,
    (chunk) => `${chunk.title}\n${chunk.content}`,
    toArticleIndexRecord,
    embed,
    options
  );
}
