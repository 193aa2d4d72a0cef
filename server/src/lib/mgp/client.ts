/**
 * Minimal HTTP client for the Mathematics Genealogy Project API.
 * Every request carries the API key in the `x-access-token` header.
 */

import { logger } from '../logger.js';

// Transient network error codes that should trigger retry
const TRANSIENT_ERROR_CODES = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
];

export interface FetchErrorDetails {
  url: string;
  isNetworkError: boolean;
  isTransient: boolean;
  isAuthError?: boolean;
  code?: string;
  statusCode?: number;
}

export class FetchError extends Error {
  readonly url: string;
  readonly isNetworkError: boolean;
  readonly isTransient: boolean;
  readonly isAuthError: boolean;
  readonly code?: string;
  readonly statusCode?: number;

  constructor(message: string, details: FetchErrorDetails) {
    super(message);
    this.name = 'FetchError';
    this.url = details.url;
    this.isNetworkError = details.isNetworkError;
    this.isTransient = details.isTransient;
    this.isAuthError = details.isAuthError ?? false;
    this.code = details.code;
    this.statusCode = details.statusCode;
  }
}

export type QueryParams = Record<string, string | number>;

export interface MgpClient {
  readonly baseUrl: string;
  get(path: string, query?: QueryParams): Promise<unknown>;
}

export interface MgpClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
}

// fetch() wraps socket errors as `TypeError('fetch failed', { cause })`
const errorCode = (err: unknown): string | undefined => {
  if (!(err instanceof Error)) return undefined;
  if (err.name === 'TimeoutError' || err.name === 'AbortError') return 'ETIMEDOUT';
  const cause = err.cause;
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
};

const networkError = (url: string, err: unknown): FetchError => {
  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);
  return new FetchError(`Network error for ${url}: ${code ?? message}`, {
    url,
    isNetworkError: true,
    isTransient: TRANSIENT_ERROR_CODES.includes(code ?? ''),
    code,
  });
};

export const buildUrl = (baseUrl: string, path: string, query: QueryParams = {}): string => {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
};

export function createMgpClient({ baseUrl, apiKey, timeoutMs = 30000 }: MgpClientOptions): MgpClient {
  return {
    baseUrl,

    async get(path, query) {
      const url = buildUrl(baseUrl, path, query);
      const signal = AbortSignal.timeout(timeoutMs);

      const response = await fetch(url, {
        headers: { 'x-access-token': apiKey, Accept: 'application/json' },
        signal,
      }).catch((err: unknown) => {
        throw networkError(url, err);
      });

      if (!response.ok) {
        const status = response.status;
        const isAuthError = status === 401 || status === 403;
        if (isAuthError) {
          logger.error('mgp-api', `HTTP ${status}: the API key was rejected, check your credentials`);
        }
        throw new FetchError(`HTTP ${status} for ${url}`, {
          url,
          isNetworkError: false,
          isTransient: status >= 500 || status === 429,
          isAuthError,
          statusCode: status,
        });
      }

      const body = await response.text().catch((err: unknown) => {
        throw networkError(url, err);
      });

      try {
        return JSON.parse(body);
      } catch {
        throw new FetchError(`Invalid JSON from ${url}`, {
          url,
          isNetworkError: false,
          isTransient: false,
          statusCode: response.status,
        });
      }
    },
  };
}

export default createMgpClient;
