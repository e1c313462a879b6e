/**
 * Book Service — The In-Memory Catalog
 * Layer: Application
 *
 * Owns the ordered list of books for the life of the process. The container
 * registers this class as a singleton (see core/container.ts), so every
 * request handler sees the same list.
 *
 * There is no locking. Every operation is synchronous and Node runs each
 * handler to completion, so no two operations interleave; nothing beyond that
 * (no transactions, no ordering across requests) is promised.
 *
 * Lookups scan in insertion order and stop at the first match, which is also
 * the tie-break when two books share an id.
 */
import type { Book } from '@domain/entities/Book';
import type { IBookService } from '@domain/interfaces/IBookService';
import { SEED_BOOKS } from '@shared/constants';
import { injectable } from 'tsyringe';

@injectable()
export class BookService implements IBookService {
  private readonly books: Book[] = SEED_BOOKS.map((book) => ({ ...book }));

  list(): readonly Book[] {
    return this.books;
  }

  get(id: number): Book | undefined {
    return this.books.find((book) => book.id === id);
  }

  add(book: Book): void {
    this.books.push(book);
  }

  delete(id: number): void {
    const index = this.books.findIndex((book) => book.id === id);
    if (index !== -1) this.books.splice(index, 1);
  }
}
