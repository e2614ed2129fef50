import fs from 'node:fs';
import path from 'node:path';
import { IndexCacheError, IndexEntryNotFoundError, StaleIndexError } from '../cli/errors.js';
import { IdIndexSchema, type IdIndex, type IdIndexRow } from '../schema/index.js';
import type { Collection } from '../store/collection.js';
import type { ListedTodo } from '../query/filters.js';

/**
 * Replaces the cache with exactly `rows`; nothing from an earlier listing survives.
 */
export function writeIndexFile(rows: IdIndexRow[], outputPath: string, now: Date = new Date()): void {
  const index: IdIndex = {
    version: 1,
    generatedAt: now.toISOString(),
    rows,
  };
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, `${JSON.stringify(index, null, 2)}\n`, 'utf-8');
}

export function readIndexFile(inputPath: string): IdIndex | null {
  if (!fs.existsSync(inputPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(inputPath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new IndexCacheError(inputPath, 'invalid JSON');
    }
    throw error;
  }

  const result = IdIndexSchema.safeParse(raw);
  if (!result.success) {
    throw new IndexCacheError(inputPath, 'unexpected format');
  }
  return result.data;
}

/**
 * Maps an id from the last listing back to its record. A missing cache or row is
 * an {@link IndexEntryNotFoundError}; a row whose list or file is gone is a
 * {@link StaleIndexError}.
 */
export function resolveTodo(collection: Collection, cachePath: string, id: number): ListedTodo {
  const index = readIndexFile(cachePath);
  const row = index?.rows.find((r) => r.id === id);
  if (!row) {
    throw new IndexEntryNotFoundError(id);
  }

  const list = collection.get(row.list);
  const todo = list?.get(row.filename);
  if (!list || !todo) {
    throw new StaleIndexError(id, row.list, row.filename);
  }
  return { list, todo };
}
