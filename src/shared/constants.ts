import type { Book } from '@domain/entities/Book';

/** Books every fresh catalog starts with, in this order. */
export const SEED_BOOKS: readonly Book[] = [
  { id: 1, title: '1984', author: 'George Orwell' },
  { id: 2, title: 'To Kill a Mockingbird', author: 'Harper Lee' },
];

/** Mount point of the book routes; also the base of the Location header on create. */
export const BOOKS_BASE_PATH = '/api/books';
