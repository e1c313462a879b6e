/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app on every call. Integration tests rely on this: each one
 * overrides container registrations, then calls createApp() so the book
 * controller resolves the overrides.
 *
 * Middleware order:
 *   1. helmet()      — security headers.
 *   2. cors()        — cross-origin requests from browser clients.
 *   3. compression() — gzip response bodies.
 *   4. express.json()— parse JSON bodies into req.body.
 *   5. requestLogger — one log line per request/response.
 *   6. Routes        — books.
 *   7. notFound      — anything no route claimed.
 *   8. errorHandler  — MUST be last.
 *
 * The `import '@core/container'` side effect makes sure the container is
 * populated before any controller resolves from it.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFound } from '@interfaces/http/middleware/notFound';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { createBookRoutes } from '@interfaces/http/routes/bookRoutes';
import { BOOKS_BASE_PATH } from '@shared/constants';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use(BOOKS_BASE_PATH, createBookRoutes());

  app.use(notFound);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
