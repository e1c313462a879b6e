/**
 * Book Request Schemas
 * Layer: Interfaces (HTTP)
 *
 * Binding rules for the book routes, applied by the `validate` middleware.
 * They check shape only: an integer id, a string title, a string author.
 * Empty strings, negative ids and ids already in the catalog all pass.
 */
import { z } from 'zod/v4';

const INTEGER_LITERAL = /^-?\d+$/;

export const bookIdParamsSchema = z.object({
  id: z
    .string()
    .regex(INTEGER_LITERAL, { error: 'id must be an integer', abort: true })
    .transform((value) => Number(value))
    .refine((value) => Number.isSafeInteger(value), 'id is out of range'),
});

/** Unknown keys are dropped, so only `id`, `title` and `author` reach the catalog. */
export const createBookBodySchema = z.object({
  id: z.number().int(),
  title: z.string(),
  author: z.string(),
});

export type BookIdParams = z.infer<typeof bookIdParamsSchema>;
export type CreateBookBody = z.infer<typeof createBookBodySchema>;
