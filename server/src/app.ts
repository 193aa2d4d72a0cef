import express, { type Express } from 'express';
import cors from 'cors';
import { createReportRoutes, createExportRoutes } from './routes/report.routes.js';
import { createMathematicianRoutes } from './routes/mathematician.routes.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import type { ReportService } from './services/report.service.js';

export function createApp(reports: ReportService): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: '*' }));
  app.use(requestLogger);

  // Routes
  app.use('/api/report', createReportRoutes(reports));
  app.use('/api/mathematicians', createMathematicianRoutes(reports));
  app.use('/api/export', createExportRoutes(reports));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(errorHandler);

  return app;
}
