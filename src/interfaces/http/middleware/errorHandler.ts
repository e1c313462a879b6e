/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Sits at the end of the middleware chain. Express 5 forwards both thrown
 * errors and rejected promises from handlers here.
 *
 * Three cases:
 *   - Operational AppError (404 route, 400 binding failure): logged at
 *     "warn", answered with its statusCode and message.
 *   - Client errors raised by Express's own body parser (malformed JSON,
 *     payload too large): they carry a 4xx `status` and a message safe to
 *     expose, and get the same treatment.
 *   - Everything else: logged at "error", answered with a generic 500.
 *
 * Express only treats a middleware as an error handler when it declares all
 * FOUR parameters, hence the unused `_next`.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

interface HttpClientError extends Error {
  status: number;
}

function isHttpClientError(err: Error): err is HttpClientError {
  return 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  if (isHttpClientError(err)) {
    logger.warn({ statusCode: err.status, message: err.message }, 'Rejected request');
    res.status(err.status).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
