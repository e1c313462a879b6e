/**
 * Book Controller — HTTP Boundary for the Catalog
 * Layer: Interfaces (HTTP)
 *
 * Thin adapters: log the access, call the catalog, map the result to a status.
 * Route params and bodies have already been bound by the `validate`
 * middleware, so `req.params.id` holds a number and `req.body` a Book.
 *
 * Both collaborators are resolved from the container in the constructor, and
 * the controller is built when createApp() assembles the routes, so a test
 * can register a fresh catalog or a mock logger before building its app.
 * Arrow functions keep `this` bound when Express calls them.
 */
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Book } from '@domain/entities/Book';
import type { IActivityLogger } from '@domain/interfaces/IActivityLogger';
import type { IBookService } from '@domain/interfaces/IBookService';
import { BOOKS_BASE_PATH } from '@shared/constants';
import type { Request, Response } from 'express';

export class BookController {
  private service: IBookService;
  private activity: IActivityLogger;

  constructor() {
    this.service = container.resolve<IBookService>(TOKENS.BookService);
    this.activity = container.resolve<IActivityLogger>(TOKENS.ActivityLogger);
  }

  list = (_req: Request, res: Response): void => {
    this.activity.log('GET all books');
    res.status(200).json(this.service.list());
  };

  getById = (req: Request, res: Response): void => {
    const id = Number(req.params.id);
    this.activity.log(`GET book ${id}`);

    const book = this.service.get(id);
    if (!book) {
      res.status(404).end();
      return;
    }

    res.status(200).json(book);
  };

  create = (req: Request, res: Response): void => {
    const book: Book = req.body;
    this.activity.log(`POST book ${book.id} "${book.title}"`);

    this.service.add(book);

    res.status(201).location(`${BOOKS_BASE_PATH}/${book.id}`).json(book);
  };

  remove = (req: Request, res: Response): void => {
    const id = Number(req.params.id);
    this.activity.log(`DELETE book ${id}`);

    this.service.delete(id);

    res.status(204).end();
  };
}
