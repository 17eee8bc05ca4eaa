import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';

/**
 * Access log: one line per request once the response is done.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
    logger.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      durationMs: Math.round(durationMs * 10) / 10,
      remoteAddress: req.ip,
    });
  });

  next();
}
