import { Router } from 'express';
import type { ApiResponse, MathematicianDetail } from '@mathlineage/shared';
import type { ReportService } from '../services/report.service.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { parseIdParam } from '../utils/parseId.js';

export const createMathematicianRoutes = (reports: ReportService): Router => {
  const router = Router();

  // GET /api/mathematicians/:id - Record with graph-derived counts
  router.get('/:id', asyncHandler(async (req, res) => {
    const id = parseIdParam(req.params.id);
    if (id === null) {
      return res.status(400).json({ success: false, error: 'id must be a positive integer' } satisfies ApiResponse<never>);
    }
    const detail = await reports.getMathematician(id);
    if (!detail) {
      return res.status(404).json({ success: false, error: `Mathematician ${id} not found` } satisfies ApiResponse<never>);
    }
    res.json({ success: true, data: detail } satisfies ApiResponse<MathematicianDetail>);
  }));

  // GET /api/mathematicians/:id/descendants - Every id reachable through advisor -> student edges
  router.get('/:id/descendants', asyncHandler(async (req, res) => {
    const id = parseIdParam(req.params.id);
    if (id === null) {
      return res.status(400).json({ success: false, error: 'id must be a positive integer' } satisfies ApiResponse<never>);
    }
    const descendants = await reports.getDescendants(id);
    if (!descendants) {
      return res.status(404).json({ success: false, error: `Mathematician ${id} not found` } satisfies ApiResponse<never>);
    }
    res.json({
      success: true,
      data: { id, count: descendants.length, descendants },
    } satisfies ApiResponse<{ id: number; count: number; descendants: number[] }>);
  }));

  return router;
};
