/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * sample* = one complete Book. Ids start at 3 so they never collide with
 * the two seed books unless a test means them to.
 */
import type { Book } from '@domain/entities/Book';

export const sampleBook: Book = {
  id: 3,
  title: 'Dune',
  author: 'Frank Herbert',
};

export const anotherBook: Book = {
  id: 4,
  title: 'The Left Hand of Darkness',
  author: 'Ursula K. Le Guin',
};

/** Shares id 1 with the first seed book. */
export const duplicateIdBook: Book = {
  id: 1,
  title: 'Animal Farm',
  author: 'George Orwell',
};

/** Passes binding even though the fields are meaningless. */
export const degenerateBook: Book = {
  id: -7,
  title: '',
  author: '',
};
