/**
 * Integration test setup
 * Creates the Express app over an in-memory record source
 */

import type { Express } from 'express';
import type { RecordMap } from '@mathlineage/shared';
import { createApp } from '../../server/src/app.js';
import { createReportService, type RecordSource } from '../../server/src/services/report.service.js';
import { sampleRecords } from '../utils/fixtures.js';

export interface TestContext {
  app: Express;
  source: RecordSource;
}

/**
 * Create a test app serving `records` (the sample genealogy by default)
 */
export const createTestApp = (load: () => RecordMap | Promise<RecordMap> = sampleRecords): TestContext => {
  const source: RecordSource = { load };
  const reports = createReportService(source, { country: 'Brazil', countryNames: ['Brazil', 'Brasil'] });
  return { app: createApp(reports), source };
};
