/**
 * MGP endpoints with retry logic for transient errors
 */

import { FetchError, type MgpClient } from './client.js';
import { parseId } from './transformer.js';
import { logger } from '../logger.js';
import { sleep } from '../../utils/sleep.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
}

/**
 * Anything that can produce a raw record payload for an id
 */
export interface MathematicianSource {
  getMathematician(id: number): Promise<unknown>;
}

/**
 * IDs of mathematicians whose degree was awarded in `country`.
 * The endpoint answers either `[id, ...]` or `[[id, ...], ...]`.
 */
export const listIdsByCountry = async (client: MgpClient, country: string): Promise<number[]> => {
  const body = await client.get('/search', { country });
  if (!Array.isArray(body)) {
    throw new FetchError(`Unexpected search response for ${country}`, {
      url: `${client.baseUrl}/search`,
      isNetworkError: false,
      isTransient: false,
    });
  }

  const seen = new Set<number>();
  for (const entry of body) {
    const id = parseId(Array.isArray(entry) ? entry[0] : entry);
    if (id !== null) seen.add(id);
  }
  return [...seen];
};

export const getMathematician = (client: MgpClient, id: number): Promise<unknown> =>
  client.get('/acad', { id });

/**
 * Run `fn`, retrying transient failures with exponential backoff.
 * Non-transient errors and exhausted retries are rethrown.
 */
export const fetchWithRetry = async <T>(
  fn: () => Promise<T>,
  { maxRetries, baseDelay }: RetryOptions,
  label = 'request'
): Promise<T> => {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof FetchError) || !err.isTransient || attempt >= maxRetries) throw err;
      const retryDelay = baseDelay * Math.pow(2, attempt);
      logger.warn(
        'mgp-api',
        `${err.code || err.statusCode || 'Network error'} for ${label}, retrying in ${retryDelay / 1000}s (attempt ${attempt + 1}/${maxRetries})...`
      );
      await sleep(retryDelay);
    }
  }
};

export const createMgpSource = (client: MgpClient, retry: RetryOptions): MathematicianSource => ({
  getMathematician: (id) => fetchWithRetry(() => getMathematician(client, id), retry, `ID ${id}`),
});
