/**
 * @fileoverview Express middleware for gateway request logging, unknown routes and errors.
 *
 * Key exports:
 * - createRequestLogger(): method, path, status code and duration per request
 * - createNotFoundHandler(): standardized 404 for unknown API paths
 * - createErrorMiddleware(): malformed JSON bodies become 400, everything else 500
 */

import type { NextFunction, Request, Response } from 'express';
import { ErrorCode } from '../../utils/error.utils';
import type { Logger } from '../../utils/logging';
import { sendErrorResponse } from './routes/route-helpers';

/**
 * Request logging middleware
 */
export function createRequestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`${req.method} ${req.path} - ${res.statusCode} (${duration}ms)`);
    });

    next();
  };
}

export function createNotFoundHandler() {
  return (req: Request, res: Response): void => {
    sendErrorResponse(res, 404, `No route for ${req.method} ${req.path}`);
  };
}

/**
 * Error handling middleware (must be registered last)
 */
export function createErrorMiddleware(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof SyntaxError) {
      sendErrorResponse(res, 400, 'Invalid JSON body', { code: ErrorCode.VALIDATION });
      return;
    }

    logger.error('Express error:', err);
    sendErrorResponse(res, 500, 'Internal server error', { code: ErrorCode.UNKNOWN });
  };
}
