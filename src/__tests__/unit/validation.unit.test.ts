/**
 * Unit Tests — validate() middleware with the book schemas
 *
 * The middleware is called directly with hand-built request objects; no
 * Express app is involved.
 */
import { validate } from '@interfaces/http/middleware/validation';
import { bookIdParamsSchema, createBookBodySchema } from '@interfaces/http/schemas/bookSchemas';
import { ValidationError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';

function requestWith(part: 'body' | 'params', value: unknown): Request {
  return { [part]: value } as unknown as Request;
}

const res = {} as Response;

describe('validate(bookIdParamsSchema, "params")', () => {
  const middleware = validate(bookIdParamsSchema, 'params');

  it('should replace the id string with a number and call next', () => {
    const req = requestWith('params', { id: '42' });
    const next = jest.fn();

    middleware(req, res, next);

    expect(req.params).toEqual({ id: 42 });
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should accept a negative id', () => {
    const req = requestWith('params', { id: '-3' });

    middleware(req, res, jest.fn());

    expect(req.params).toEqual({ id: -3 });
  });

  it.each(['abc', '1.5', '7x'])('should reject %s with a ValidationError', (id) => {
    const next = jest.fn();

    expect(() => middleware(requestWith('params', { id }), res, next)).toThrow(ValidationError);
    expect(next).not.toHaveBeenCalled();
  });

  it('should report only the integer message for a non-numeric id', () => {
    expect(() => middleware(requestWith('params', { id: 'abc' }), res, jest.fn())).toThrow(
      new ValidationError('id must be an integer'),
    );
  });

  it('should reject ids beyond the safe integer range', () => {
    expect(() => middleware(requestWith('params', { id: '99999999999999999999' }), res, jest.fn())).toThrow(
      'id is out of range',
    );
  });
});

describe('validate(createBookBodySchema, "body")', () => {
  const middleware = validate(createBookBodySchema, 'body');

  it('should pass a complete book through and drop unknown keys', () => {
    const req = requestWith('body', { id: 5, title: 'Kindred', author: 'Octavia E. Butler', isbn: 'x' });

    middleware(req, res, jest.fn());

    expect(req.body).toEqual({ id: 5, title: 'Kindred', author: 'Octavia E. Butler' });
  });

  it('should accept empty strings', () => {
    const req = requestWith('body', { id: 0, title: '', author: '' });
    const next = jest.fn();

    middleware(req, res, next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should reject a missing author', () => {
    expect(() => middleware(requestWith('body', { id: 5, title: 'Kindred' }), res, jest.fn())).toThrow(
      ValidationError,
    );
  });

  it('should reject a non-integer id', () => {
    expect(() =>
      middleware(requestWith('body', { id: 5.5, title: 'Kindred', author: 'Octavia E. Butler' }), res, jest.fn()),
    ).toThrow(ValidationError);
  });

  it('should reject an absent body', () => {
    expect(() => middleware(requestWith('body', undefined), res, jest.fn())).toThrow(ValidationError);
  });
});
