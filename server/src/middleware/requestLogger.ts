import type { Request, Response, NextFunction } from 'express';
import { formatElapsed, logger } from '../lib/logger.js';

const SLOW_MS = 500;

// Successful fast GETs are not logged; everything else is
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = performance.now();

  res.on('finish', () => {
    const elapsed = performance.now() - start;
    if (req.method === 'GET' && res.statusCode < 400 && elapsed < SLOW_MS) return;

    const line = `${req.method} ${req.path} ${res.statusCode} (${formatElapsed(elapsed)})`;
    if (res.statusCode < 400) {
      logger.done('http', line);
    } else {
      logger.error('http', line);
    }
  });

  next();
};
