/**
 * Book Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under BOOKS_BASE_PATH (`/api/books`) in app.ts:
 *
 *   GET    /api/books      →  controller.list
 *   GET    /api/books/:id  →  controller.getById
 *   POST   /api/books      →  controller.create
 *   DELETE /api/books/:id  →  controller.remove
 *
 * A factory rather than a module-level router: the controller resolves its
 * dependencies when the router is built, not when this file is first imported.
 */
import { BookController } from '@interfaces/http/controllers/BookController';
import { validate } from '@interfaces/http/middleware/validation';
import { bookIdParamsSchema, createBookBodySchema } from '@interfaces/http/schemas/bookSchemas';
import { Router } from 'express';

export function createBookRoutes(): Router {
  const router = Router();
  const controller = new BookController();

  router.get('/', controller.list);
  router.get('/:id', validate(bookIdParamsSchema, 'params'), controller.getById);
  router.post('/', validate(createBookBodySchema, 'body'), controller.create);
  router.delete('/:id', validate(bookIdParamsSchema, 'params'), controller.remove);

  return router;
}
