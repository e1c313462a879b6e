/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token (see types.ts)
 * maps to a concrete implementation, so a class that says "I need the
 * BookService" never constructs one itself.
 *
 * How tsyringe works here:
 *   - `reflect-metadata` must be imported first — it lets the @inject and
 *     @injectable decorators record constructor parameter metadata, which
 *     tsyringe reads to auto-resolve dependencies.
 *   - `useValue` registers a pre-built object (the pino logger).
 *   - `registerSingleton` builds the class on first resolve and hands back
 *     that same instance afterwards. The catalog is process-wide state, so
 *     BookService MUST be a singleton: a transient registration would give
 *     each resolver its own copy of the seed list.
 *
 * Swapping the in-memory catalog for another IBookService means changing one
 * line here; the controller only knows the interface.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { TOKENS } from './types';
import { logger } from './logger';

import { BookService } from '@application/services/BookService';
import type { IActivityLogger } from '@domain/interfaces/IActivityLogger';
import type { IBookService } from '@domain/interfaces/IBookService';
import { PinoActivityLogger } from '@infrastructure/logging/PinoActivityLogger';

container.register(TOKENS.Logger, { useValue: logger });
container.registerSingleton<IActivityLogger>(TOKENS.ActivityLogger, PinoActivityLogger);
container.registerSingleton<IBookService>(TOKENS.BookService, BookService);

export { container };
