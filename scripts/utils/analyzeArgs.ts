import yargs from 'yargs';
import type { Config } from '../../server/src/lib/config.js';

/**
 * Option parser for scripts/analyze.ts; the prompt flags are left unset when absent
 */
export const analyzeArgs = (args: string[], config: Config) =>
  yargs(args)
    .usage('Usage: npx tsx scripts/analyze.ts [options]')
    .option('country', { type: 'string', default: config.country })
    .option('mode', { choices: ['parallel', 'sequential'] as const, default: config.mode })
    .option('workers', { type: 'number', default: config.workers })
    .option('top', { type: 'number', default: 10 })
    .option('reuse', { type: 'boolean', describe: 'Reuse the cache without asking' })
    .option('fresh', { type: 'boolean', describe: 'Discard the cache without asking' })
    .option('offline', { type: 'boolean', describe: 'Analyze the cache only, no network calls' })
    .option('cache', { type: 'string', default: config.cacheFile })
    .option('out', { type: 'string', default: config.outputDir })
    .conflicts('reuse', 'fresh')
    .conflicts('offline', 'fresh')
    .strict();
