/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up by one of these tokens. When the
 * BookController asks for TOKENS.BookService, the container hands back
 * whatever implementation container.ts registered under that badge — the
 * in-memory BookService in production, a fresh instance or a mock in tests.
 *
 * Symbols rather than strings: no accidental collision with some other
 * "Logger" string elsewhere, and they stay out of JSON.stringify output.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Logger: Symbol.for('Logger'),
  ActivityLogger: Symbol.for('ActivityLogger'),

  // Services — application-level operations
  BookService: Symbol.for('BookService'),
} as const;
