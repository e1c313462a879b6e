/**
 * Server Entry Point — Startup & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * Runs a single process. The catalog is in-memory state owned by one
 * BookService instance, so forked workers would each hold a different
 * catalog and a book added through one would be missing from the others.
 *
 * On SIGTERM/SIGINT the server stops accepting connections, lets in-flight
 * requests finish, then exits with code 0. The catalog is discarded with the
 * process.
 */
import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info({ pid: process.pid, port: config.port }, `Library API listening on :${config.port}`);
});

const shutdown = (signal: string): void => {
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing the HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
