import { Router } from 'express';
import type { AnalysisReport, ApiResponse } from '@mathlineage/shared';
import type { ReportService } from '../services/report.service.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { parseCountParam } from '../utils/parseId.js';

export const createReportRoutes = (reports: ReportService): Router => {
  const router = Router();

  // GET /api/report?top=N - Full analysis summary
  router.get('/', asyncHandler(async (req, res) => {
    const top = parseCountParam(req.query.top);
    if (top === null) {
      return res.status(400).json({ success: false, error: 'top must be a non-negative integer' } satisfies ApiResponse<never>);
    }
    const report = await reports.getReport(top);
    res.json({ success: true, data: report } satisfies ApiResponse<AnalysisReport>);
  }));

  return router;
};

export const createExportRoutes = (reports: ReportService): Router => {
  const router = Router();

  // GET /api/export/csv - id,name,descendant_count,direct_student_count
  router.get('/csv', asyncHandler(async (_req, res) => {
    const csv = await reports.exportCsv();
    res.type('text/csv').send(csv);
  }));

  return router;
};
