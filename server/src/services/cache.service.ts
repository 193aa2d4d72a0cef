/**
 * Persistent record cache backed by a single JSON file.
 *
 * The file maps id (as a string) to a MathematicianRecord. It is read in full
 * by `load()` and written in full by `flush()`; nothing expires, entries are
 * only removed by `clear()` or `purge()`.
 */

import fs from 'fs';
import path from 'path';
import type { CacheDocument, MathematicianRecord } from '@mathlineage/shared';
import { logger } from '../lib/logger.js';

export class CacheCorruptError extends Error {
  constructor(file: string, reason: string) {
    super(`Cache file ${file} is corrupt (${reason}); delete or purge it and run again`);
    this.name = 'CacheCorruptError';
  }
}

const isIdList = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((v) => Number.isSafeInteger(v));

const isStringMap = (value: unknown): value is Record<string, string> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) &&
  Object.values(value).every((v) => typeof v === 'string');

export const isMathematicianRecord = (value: unknown): value is MathematicianRecord => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const r: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    Number.isSafeInteger(r.id) &&
    typeof r.name === 'string' &&
    isIdList(r.advisors) &&
    isStringMap(r.advisorNames) &&
    (r.university === undefined || typeof r.university === 'string') &&
    Array.isArray(r.schools) && r.schools.every((s) => typeof s === 'string') &&
    typeof r.country === 'string' &&
    isIdList(r.advisees) &&
    typeof r.reportedDescendantCount === 'number'
  );
};

export class CacheStore {
  private entries = new Map<number, MathematicianRecord>();
  private changed = false;

  constructor(readonly file: string) {}

  /**
   * Read the cache file if present; a missing file yields an empty store
   */
  static load(file: string): CacheStore {
    const store = new CacheStore(file);
    if (!fs.existsSync(file)) return store;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      throw new CacheCorruptError(file, err instanceof Error ? err.message : String(err));
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new CacheCorruptError(file, 'expected an object of id -> record');
    }

    for (const [key, value] of Object.entries(parsed)) {
      if (!isMathematicianRecord(value) || String(value.id) !== key) {
        throw new CacheCorruptError(file, `bad entry for id ${key}`);
      }
      store.entries.set(value.id, value);
    }

    logger.cache('cache', `Loaded ${store.size} records from ${file}`);
    return store;
  }

  exists(): boolean {
    return fs.existsSync(this.file);
  }

  get size(): number {
    return this.entries.size;
  }

  get dirty(): boolean {
    return this.changed;
  }

  get(id: number): MathematicianRecord | undefined {
    return this.entries.get(id);
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  /**
   * Create-or-skip: an id already cached keeps its record
   */
  put(id: number, record: MathematicianRecord): boolean {
    if (this.entries.has(id)) return false;
    this.entries.set(id, record);
    this.changed = true;
    return true;
  }

  ids(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  records(): Map<number, MathematicianRecord> {
    return new Map([...this.entries.entries()].sort(([a], [b]) => a - b));
  }

  clear(): void {
    if (this.entries.size) this.changed = true;
    this.entries.clear();
  }

  /**
   * Manually invalidate entries; returns how many were removed
   */
  purge(ids: Iterable<number>): number {
    let removed = 0;
    for (const id of ids) {
      if (this.entries.delete(id)) removed++;
    }
    if (removed) this.changed = true;
    return removed;
  }

  toJSON(): CacheDocument {
    const doc: CacheDocument = {};
    for (const [id, record] of this.records()) {
      doc[String(id)] = record;
    }
    return doc;
  }

  /**
   * Write every entry to disk (full overwrite)
   */
  flush(): void {
    fs.mkdirSync(path.dirname(path.resolve(this.file)), { recursive: true });
    fs.writeFileSync(this.file, JSON.stringify(this.toJSON(), null, 2));
    this.changed = false;
    logger.cache('cache', `Saved ${this.size} records to ${this.file}`);
  }
}
