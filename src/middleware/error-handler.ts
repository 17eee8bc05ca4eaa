import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Status of an error raised by Express or body-parser (http-errors), if it carries one.
 */
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function describe(err: unknown): { statusCode: number; message: string; code: string } {
  if (err instanceof AppError) {
    return { statusCode: err.statusCode, message: err.message, code: err.code };
  }

  const status = httpStatusOf(err);
  if (status !== undefined && status >= 400 && status < 500 && err instanceof Error) {
    return { statusCode: status, message: err.message, code: 'HTTP_ERROR' };
  }

  return { statusCode: 500, message: 'Internal Server Error', code: 'INTERNAL_ERROR' };
}

/**
 * Global error handler middleware.
 * Responds in plain text and writes the one log line for the failed request.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { statusCode, message, code } = describe(err);
  const meta: Record<string, unknown> = {
    code,
    statusCode,
    method: req.method,
    path: req.path,
    ...(err instanceof AppError ? err.details : undefined),
  };

  if (statusCode >= 500) {
    logger.error(message, {
      ...meta,
      ...(!(err instanceof AppError) && err instanceof Error && { error: err.message, stack: err.stack }),
    });
  } else {
    logger.warn(message, meta);
  }

  // Internal detail stays in the log
  res.status(statusCode).type('text/plain').send(message);
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).type('text/plain').send('Not Found');
}

/**
 * 405 for known paths hit with the wrong method.
 */
export function methodNotAllowed(allowed: string[]) {
  return (_req: Request, res: Response): void => {
    res.set('Allow', allowed.join(', ')).status(405).type('text/plain').send('Method Not Allowed');
  };
}
