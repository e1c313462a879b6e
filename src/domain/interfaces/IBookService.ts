/**
 * Book Service Interface — The Catalog Contract
 * Layer: Domain
 *
 * WHAT the catalog can do, without saying HOW the books are stored. The HTTP
 * controller depends on this interface only; the container decides which
 * implementation (today: the in-memory BookService) stands behind it.
 *
 * All four operations are total: a missing id is a normal outcome, never an
 * exception.
 */
import type { Book } from '@domain/entities/Book';

export interface IBookService {
  /** Every book in insertion order. The live backing sequence, not a copy. */
  list(): readonly Book[];

  /** First book whose id matches, or undefined when there is none. */
  get(id: number): Book | undefined;

  /** Appends the book. Duplicate ids are accepted. */
  add(book: Book): void;

  /** Removes the first book whose id matches; no-op when there is none. */
  delete(id: number): void;
}
