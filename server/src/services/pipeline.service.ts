/**
 * The analyze pipeline: credentials, cache, listing, fetch, analysis, export.
 *
 * Network access and the terminal prompt are injected so the CLI wires the
 * real client and readline while tests pass in-memory stand-ins.
 */

import type { AnalysisReport, FetchMode, RecordMap } from '@mathlineage/shared';
import type { MathematicianSource } from '../lib/mgp/fetcher.js';
import { logger } from '../lib/logger.js';
import { analysisService, universityMatcher, type Analysis } from './analysis.service.js';
import { CacheStore } from './cache.service.js';
import { credentialsService, type ApiKeySource } from './credentials.service.js';
import { exportService } from './export.service.js';
import { fetchService, type FetchProgress, type FetchSummary } from './fetch.service.js';

export interface MgpApi {
  listIds(country: string): Promise<number[]>;
  source: MathematicianSource;
}

export interface PipelineOptions {
  country: string;
  countryNames: string[];
  credentials: ApiKeySource;
  cacheFile: string;
  outputDir: string;
  mode: FetchMode;
  workers: number;
  top: number;
  reuse?: boolean;
  fresh?: boolean;
  offline?: boolean;
}

export interface PipelineDeps {
  connect(apiKey: string): MgpApi;
  confirm(question: string): Promise<boolean>;
  onCacheLoaded?: (cache: CacheStore) => void;
  onProgress?: (progress: FetchProgress) => void;
  print?: (report: AnalysisReport) => void;
  now?: () => Date;
}

export interface PipelineResult {
  records: RecordMap;
  analysis: Analysis;
  fetch: FetchSummary | null;
  csvPath: string;
  jsonPath: string;
}

const reuseCache = async (cache: CacheStore, options: PipelineOptions, deps: PipelineDeps): Promise<boolean> => {
  if (options.offline || options.reuse) return true;
  if (options.fresh) return false;
  return deps.confirm(`Cache found with ${cache.size} records. Reuse it?`);
};

const fetchCountry = async (
  api: MgpApi,
  cache: CacheStore,
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<FetchSummary> => {
  const { country } = options;
  logger.api('pipeline', `Listing mathematicians trained in ${country}...`);
  const ids = await api.listIds(country);
  logger.ok('pipeline', `Found ${ids.length} mathematicians trained in ${country}`);

  const workers = options.mode === 'parallel' ? `, ${options.workers} workers` : '';
  logger.start('pipeline', `Fetching records (${options.mode}${workers})...`);
  logger.time('pipeline', 'fetch');
  const summary = await fetchService.fetchRecords(ids, {
    cache,
    source: api.source,
    country,
    countryNames: options.countryNames,
    mode: options.mode,
    concurrency: options.workers,
    onProgress: deps.onProgress,
  });
  logger.timeEnd('pipeline', 'fetch');

  cache.flush();
  logger.ok('pipeline', `Records: ${summary.records.size} (new: ${summary.fetched}, cached: ${summary.cached})`);
  return summary;
};

export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const { country, offline = false } = options;

  // nothing touches the network without a key
  const apiKey = offline ? '' : credentialsService.readApiKey(options.credentials);

  const cache = CacheStore.load(options.cacheFile);
  deps.onCacheLoaded?.(cache);
  if (cache.exists() && !(await reuseCache(cache, options, deps))) {
    cache.clear();
    logger.cache('pipeline', 'Discarded cached records, fetching everything again');
  }

  let summary: FetchSummary | null = null;
  let records: RecordMap;
  if (offline) {
    records = cache.records();
    logger.skip('pipeline', `Offline: analyzing ${records.size} cached records`);
  } else {
    summary = await fetchCountry(deps.connect(apiKey), cache, options, deps);
    records = summary.records;
  }

  logger.graph('pipeline', 'Building genealogy graph...');
  const analysis = analysisService.analyze(records, {
    country,
    top: options.top,
    universityFilter: universityMatcher(options.countryNames),
    now: deps.now,
  });
  deps.print?.(analysis.report);

  const rows = exportService.buildExportRows(analysis.graph, records, analysis.descendantCounts);
  const { csvPath, jsonPath } = exportService.writeExports(options.outputDir, country, rows, analysis.report);
  logger.export('pipeline', `Saved ${csvPath} and ${jsonPath}`);

  if (summary?.misses.length) {
    logger.warn('pipeline', `${summary.misses.length} records could not be fetched: ${summary.misses.join(', ')}`);
  }
  if (summary?.malformed.length) {
    logger.warn('pipeline', `${summary.malformed.length} records were malformed: ${summary.malformed.join(', ')}`);
  }

  return { records, analysis, fetch: summary, csvPath, jsonPath };
}

export const pipelineService = {
  runPipeline,
};
