/**
 * Batch fetch orchestration.
 *
 * Cached ids are never requested again. Uncached ids are fetched one at a time
 * (sequential) or by a fixed pool of workers pulling from one shared queue
 * (parallel). Every outcome goes through a single collector, which is the only
 * place that writes to the cache and the summary.
 */

import type { FetchMode, MathematicianRecord, RecordMap } from '@mathlineage/shared';
import type { MathematicianSource } from '../lib/mgp/fetcher.js';
import { json2mathematician } from '../lib/mgp/transformer.js';
import { logger } from '../lib/logger.js';
import type { CacheStore } from './cache.service.js';

export const DEFAULT_CONCURRENCY = 10;

export type FetchStatus = 'fetched' | 'miss' | 'malformed';

export interface FetchProgress {
  id: number;
  status: FetchStatus;
  done: number;
  total: number;
}

export interface FetchOptions {
  cache: CacheStore;
  source: MathematicianSource;
  country: string;
  countryNames?: string[];
  mode?: FetchMode;
  concurrency?: number;
  onProgress?: (progress: FetchProgress) => void;
}

export interface FetchSummary {
  records: RecordMap;
  misses: number[];
  malformed: number[];
  fetched: number;
  cached: number;
}

type Outcome =
  | { id: number; status: 'fetched'; record: MathematicianRecord }
  | { id: number; status: 'miss'; reason: string }
  | { id: number; status: 'malformed' };

const poolSize = (concurrency: number, pending: number): number => {
  const requested = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  return Math.max(1, Math.min(requested, pending));
};

export async function fetchRecords(ids: Iterable<number>, options: FetchOptions): Promise<FetchSummary> {
  const {
    cache,
    source,
    country,
    countryNames = [country],
    mode = 'parallel',
    concurrency = DEFAULT_CONCURRENCY,
    onProgress,
  } = options;

  const requested = [...new Set(ids)];
  const pending = requested.filter((id) => !cache.has(id));
  const misses: number[] = [];
  const malformed: number[] = [];
  let fetched = 0;
  let done = 0;

  const fetchOne = async (id: number): Promise<Outcome> => {
    let payload: unknown;
    try {
      payload = await source.getMathematician(id);
    } catch (err) {
      return { id, status: 'miss', reason: err instanceof Error ? err.message : String(err) };
    }
    const record = json2mathematician(payload, country, countryNames);
    // a payload describing someone else is as unusable as a broken one
    if (!record || record.id !== id) return { id, status: 'malformed' };
    return { id, status: 'fetched', record };
  };

  const collect = (outcome: Outcome): void => {
    done++;
    switch (outcome.status) {
      case 'fetched':
        cache.put(outcome.id, outcome.record);
        fetched++;
        break;
      case 'miss':
        misses.push(outcome.id);
        logger.error('fetch', `Failed to fetch ID ${outcome.id}: ${outcome.reason}`);
        break;
      case 'malformed':
        malformed.push(outcome.id);
        logger.warn('fetch', `Skipping ID ${outcome.id}: unexpected record shape`);
        break;
    }
    onProgress?.({ id: outcome.id, status: outcome.status, done, total: pending.length });
  };

  if (mode === 'sequential') {
    for (const id of pending) {
      collect(await fetchOne(id));
    }
  } else if (pending.length) {
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < pending.length) {
        const id = pending[next++];
        collect(await fetchOne(id));
      }
    };
    await Promise.all(Array.from({ length: poolSize(concurrency, pending.length) }, () => worker()));
  }

  const records: RecordMap = new Map();
  for (const id of requested) {
    const record = cache.get(id);
    if (record) records.set(id, record);
  }

  return {
    records,
    misses: misses.sort((a, b) => a - b),
    malformed: malformed.sort((a, b) => a - b),
    fetched,
    cached: requested.length - pending.length,
  };
}

export const fetchService = {
  fetchRecords,
};
