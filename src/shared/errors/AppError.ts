/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure reach the error handler:
 *
 *   1. Operational — expected problems such as a request for a route that
 *      does not exist or a body that cannot be bound to a Book. The client
 *      gets the error's statusCode and message.
 *   2. Programmer — anything else, including an AppError created with
 *      `isOperational = false`. The client gets a generic 500; the details
 *      only go to the log.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses when the compile target breaks the Error prototype
 * chain.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}
