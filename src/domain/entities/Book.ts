/**
 * Book Entity
 * Layer: Domain
 *
 * The only record the catalog holds. The id is assigned by the caller, never
 * generated, and nothing enforces uniqueness: two books may share an id, and
 * lookups then resolve to the one added first.
 *
 * The field names double as the wire format — `{ id, title, author }` is what
 * the HTTP layer sends and accepts.
 */
export interface Book {
  id: number;
  title: string;
  author: string;
}
