#!/usr/bin/env npx tsx
/**
 * Purge records for specific IDs from the record cache
 *
 * If a record was fixed upstream (e.g. an advisor loop was corrected in MGP)
 * remove it here so the next analyze run fetches it again.
 *
 * Usage:
 *   npx tsx scripts/purge.ts ID1,ID2,... [--dry-run] [--cache=FILE]
 */

import chalk from 'chalk';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { config } from '../server/src/lib/config.js';
import { CacheStore } from '../server/src/services/cache.service.js';
import { parseIdParam } from '../server/src/utils/parseId.js';

const argv = yargs(hideBin(process.argv))
  .usage('Usage: npx tsx scripts/purge.ts ID1,ID2,... [--dry-run]')
  .option('dry-run', { type: 'boolean', default: false })
  .option('cache', { type: 'string', default: config.cacheFile })
  .demandCommand(1)
  .parseSync();

const ids = String(argv._[0])
  .split(',')
  .map((value) => parseIdParam(value.trim()))
  .filter((id): id is number => id !== null);

if (!ids.length) {
  console.error('Usage: npx tsx scripts/purge.ts ID1,ID2,... [--dry-run]');
  process.exit(1);
}

const cache = CacheStore.load(argv.cache);
const present = ids.filter((id) => cache.has(id));

console.log(`purging ${chalk.blue(ids.length)} ids from ${chalk.blue(argv.cache)}...`);
if (argv.dryRun) {
  present.forEach((id) => console.log(`${chalk.yellow('[DRY RUN]')} would purge ${chalk.blue(id)}`));
} else {
  const removed = cache.purge(present);
  cache.flush();
  console.log(`purged ${chalk.blue(removed)} records, ${ids.length - removed} were not cached`);
}
