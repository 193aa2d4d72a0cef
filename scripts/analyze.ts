#!/usr/bin/env npx tsx
/**
 * Mathematics Genealogy Project analysis for one country
 *
 * Fetches every mathematician whose degree was awarded in the country, caches
 * the records, builds the advisor -> student graph and prints/exports the summary.
 *
 * Usage:
 *   MGP_API_KEY=YOUR_KEY npx tsx scripts/analyze.ts [options]
 *
 * Options:
 *   --country=NAME                 Country to analyze (default: Brazil)
 *   --mode=parallel|sequential     Fetch strategy (default: parallel)
 *   --workers=N                    Parallel workers (default: 10)
 *   --top=N                        Size of every ranking (default: 10)
 *   --reuse / --fresh              Answer the "reuse cache?" prompt up front
 *   --offline                      Analyze the cache only, no network calls
 *   --cache=FILE --out=DIR         Cache file and export directory
 */

import chalk from 'chalk';
import { hideBin } from 'yargs/helpers';

import { config, countryNames } from '../server/src/lib/config.js';
import { logger } from '../server/src/lib/logger.js';
import { createMgpClient, createMgpSource, fetchWithRetry, listIdsByCountry } from '../server/src/lib/mgp/index.js';
import type { CacheStore } from '../server/src/services/cache.service.js';
import { pipelineService, type MgpApi } from '../server/src/services/pipeline.service.js';
import { analyzeArgs } from './utils/analyzeArgs.js';
import { confirm } from './utils/prompt.js';
import { printReport } from './utils/printReport.js';

const PROGRESS_EVERY = 100;

const argv = analyzeArgs(hideBin(process.argv), config).parseSync();

const retry = { maxRetries: config.maxRetries, baseDelay: config.retryBaseDelay };

let cache: CacheStore | undefined;

const connect = (apiKey: string): MgpApi => {
  const client = createMgpClient({ baseUrl: config.baseUrl, apiKey, timeoutMs: config.timeoutMs });
  return {
    listIds: (country) => fetchWithRetry(() => listIdsByCountry(client, country), retry, `${country} search`),
    source: createMgpSource(client, retry),
  };
};

const main = async (): Promise<void> => {
  logger.time('analyze', 'total');
  logger.start('analyze', `Mathematics Genealogy Project analysis - ${argv.country}`);

  await pipelineService.runPipeline(
    {
      country: argv.country,
      countryNames: countryNames(argv.country),
      credentials: { env: config.apiKey, file: config.apiKeyFile },
      cacheFile: argv.cache,
      outputDir: argv.out,
      mode: argv.mode,
      workers: argv.workers,
      top: argv.top,
      reuse: argv.reuse,
      fresh: argv.fresh,
      offline: argv.offline,
    },
    {
      connect,
      confirm: (question) => confirm(`${chalk.cyan('[cache]')} ${question}`),
      onCacheLoaded: (store) => {
        cache = store;
      },
      onProgress: ({ done, total }) => {
        if (done % PROGRESS_EVERY === 0 || done === total) {
          logger.data('fetch', `${done}/${total} fetched`);
        }
      },
      print: printReport,
    }
  );

  logger.timeEnd('analyze', 'total');
};

process.on('SIGINT', () => {
  if (cache?.dirty) cache.flush();
  process.exit(130);
});

main().catch((err: unknown) => {
  logger.error('analyze', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
