/**
 * Runtime configuration, read once from the environment.
 *
 *   MGP_API_KEY=... MGP_WORKERS=4 npx tsx scripts/analyze.ts
 */

import type { FetchMode } from '@mathlineage/shared';

export interface Config {
  baseUrl: string;
  apiKey?: string;
  apiKeyFile: string;
  cacheFile: string;
  country: string;
  countryAliases: Record<string, string[]>;
  mode: FetchMode;
  workers: number;
  maxRetries: number;
  retryBaseDelay: number;
  timeoutMs: number;
  outputDir: string;
  port: number;
}

const toInt = (value: string | undefined, fallback: number): number => {
  const n = Number.parseInt(value ?? '', 10);
  return Number.isNaN(n) ? fallback : n;
};

const toMode = (value: string | undefined): FetchMode =>
  value === 'sequential' ? 'sequential' : 'parallel';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => ({
  baseUrl: env.MGP_BASE_URL || 'https://mathgenealogy.org:8000/api/v2/MGP',
  apiKey: env.MGP_API_KEY || undefined,
  apiKeyFile: env.MGP_API_KEY_FILE || './data/api_key.txt',
  cacheFile: env.MGP_CACHE_FILE || './data/cache_brazil_data.json',
  country: env.MGP_COUNTRY || 'Brazil',
  // schools are listed in whatever language the institution used
  countryAliases: {
    Brazil: ['Brazil', 'Brasil'],
  },
  mode: toMode(env.MGP_MODE),
  workers: toInt(env.MGP_WORKERS, 10),
  maxRetries: toInt(env.MGP_MAX_RETRIES, 0),
  retryBaseDelay: toInt(env.MGP_RETRY_BASE_DELAY, 1000),
  timeoutMs: toInt(env.MGP_TIMEOUT, 30000),
  outputDir: env.MGP_OUTPUT_DIR || './data',
  port: toInt(env.PORT, 6375),
});

export const config = loadConfig();

/**
 * Names a school may use for the given country (the country itself when no aliases are known)
 */
export const countryNames = (country: string, cfg: Config = config): string[] =>
  cfg.countryAliases[country] ?? [country];

export default config;
