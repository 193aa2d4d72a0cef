import type { ErrorRequestHandler } from 'express';
import type { ApiResponse } from '@mathlineage/shared';
import { logger } from '../lib/logger.js';

// Anything a route throws or rejects with ends up here as a 500
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const message = err instanceof Error ? err.message : String(err);
  logger.error('server', `${req.method} ${req.path} failed: ${message}`);
  res.status(500).json({
    success: false,
    error: message || 'Internal server error',
  } satisfies ApiResponse<never>);
};
