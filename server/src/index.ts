import { createApp } from './app.js';
import { config, countryNames } from './lib/config.js';
import { logger } from './lib/logger.js';
import { cacheRecordSource, createReportService } from './services/report.service.js';

const reports = createReportService(cacheRecordSource(config.cacheFile), {
  country: config.country,
  countryNames: countryNames(config.country),
});

const app = createApp(reports);

const server = app.listen(config.port, () => {
  logger.start('server', `Report API listening on http://localhost:${config.port} (cache: ${config.cacheFile})`);
});

const shutdown = () => {
  logger.done('server', 'Shutting down...');
  server.close(() => process.exit(0));
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
