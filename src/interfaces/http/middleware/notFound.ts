/**
 * Unmatched Route Handler
 * Layer: Interfaces (HTTP)
 *
 * Registered after every router and before the error handler, so any request
 * no route claimed becomes a 404 in the usual `{ status, message }` shape.
 */
import { NotFoundError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function notFound(req: Request, _res: Response, _next: NextFunction): void {
  throw new NotFoundError('Route', `${req.method} ${req.originalUrl}`);
}
