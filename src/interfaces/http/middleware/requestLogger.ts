/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http logs every request and response (method, URL, status, response
 * time) through the shared logger from core/logger.ts. This is the framework
 * log; the per-operation catalog log is the ActivityLogger's job.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({ logger });
