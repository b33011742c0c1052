import { randomUUID } from 'crypto';
import { getDb } from '../utils/db';
import type { Book, SortDirection } from '../types/domain';

type BookRow = {
  id: string;
  isbn: string;
  title: string;
  author: string;
  is_available: number;
  created_at: string;
};

const SORT_COLUMNS = {
  title: 'title',
  author: 'author',
  createdAt: 'created_at'
} as const;

export type BookSortField = keyof typeof SORT_COLUMNS;

export type BookFilter = {
  search?: string;
  isbn?: string;
  availableOnly: boolean;
  sortField: BookSortField;
  direction: SortDirection;
  skip: number;
  limit: number;
};

function toBook(row: BookRow): Book {
  return {
    id: row.id,
    isbn: row.isbn,
    title: row.title,
    author: row.author,
    isAvailable: row.is_available === 1,
    createdAt: row.created_at
  };
}

/**
 * Retrieves books matching the filter, one page at a time.
 * @param filter Search, ISBN and availability filters plus paging.
 * @returns Page rows and the total number of matches.
 */
export function listBooks(filter: BookFilter): { rows: Book[]; count: number } {
  const conditions: string[] = [];
  const params: Array<string | number> = [];

  if (filter.search) {
    conditions.push('(title LIKE ? OR author LIKE ?)');
    params.push(`%${filter.search}%`, `%${filter.search}%`);
  }
  if (filter.isbn) {
    conditions.push('isbn = ?');
    params.push(filter.isbn);
  }
  if (filter.availableOnly) {
    conditions.push('is_available = 1');
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const db = getDb();
  const total = db
    .prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM books ${where}`)
    .get(...params);
  const rows = db
    .prepare<unknown[], BookRow>(
      `SELECT * FROM books ${where}
       ORDER BY ${SORT_COLUMNS[filter.sortField]} ${filter.direction.toUpperCase()}, id ASC
       LIMIT ? OFFSET ?`
    )
    .all(...params, filter.limit, filter.skip);

  return { rows: rows.map(toBook), count: total?.total ?? 0 };
}

/**
 * Retrieves a book copy by identifier.
 * @param bookId Book identifier.
 * @returns Book or null.
 */
export function getBookById(bookId: string): Book | null {
  const row = getDb().prepare<[string], BookRow>('SELECT * FROM books WHERE id = ?').get(bookId);
  return row ? toBook(row) : null;
}

/**
 * Retrieves every copy registered under an ISBN.
 * @param isbn Canonical ISBN.
 * @param excludeId Copy to leave out, used when re-checking an update.
 * @returns Copies in registration order.
 */
export function listCopiesByIsbn(isbn: string, excludeId?: string): Book[] {
  const rows = excludeId
    ? getDb()
        .prepare<[string, string], BookRow>(
          'SELECT * FROM books WHERE isbn = ? AND id <> ? ORDER BY created_at ASC, id ASC'
        )
        .all(isbn, excludeId)
    : getDb()
        .prepare<[string], BookRow>('SELECT * FROM books WHERE isbn = ? ORDER BY created_at ASC, id ASC')
        .all(isbn);
  return rows.map(toBook);
}

/**
 * Creates a new, available book copy.
 * @param data Canonical ISBN, title and author.
 * @returns Created book.
 */
export function createBook(data: { isbn: string; title: string; author: string }): Book {
  const book: Book = {
    id: randomUUID(),
    isbn: data.isbn,
    title: data.title,
    author: data.author,
    isAvailable: true,
    createdAt: new Date().toISOString()
  };
  getDb()
    .prepare('INSERT INTO books (id, isbn, title, author, is_available, created_at) VALUES (?, ?, ?, ?, 1, ?)')
    .run(book.id, book.isbn, book.title, book.author, book.createdAt);
  return book;
}

/**
 * Overwrites a copy's catalog fields. Availability is not writable here.
 * @param bookId Identifier for the book to update.
 * @param data New ISBN, title and author.
 * @returns Updated book, or null when no row matched.
 */
export function updateBookDetails(
  bookId: string,
  data: { isbn: string; title: string; author: string }
): Book | null {
  getDb()
    .prepare('UPDATE books SET isbn = ?, title = ?, author = ? WHERE id = ?')
    .run(data.isbn, data.title, data.author, bookId);
  return getBookById(bookId);
}

/**
 * Deletes a copy, but only while it is on the shelf.
 * @param bookId Identifier for the book.
 * @returns True when the row was removed.
 */
export function deleteAvailableBook(bookId: string): boolean {
  const result = getDb().prepare('DELETE FROM books WHERE id = ? AND is_available = 1').run(bookId);
  return result.changes > 0;
}

/**
 * Flips a copy from available to lent. Compare-and-swap on the flag: only
 * one caller can observe the copy as available.
 * @param bookId Identifier for the book.
 * @returns True when this call claimed the copy.
 */
export function claimAvailableBook(bookId: string): boolean {
  const result = getDb()
    .prepare('UPDATE books SET is_available = 0 WHERE id = ? AND is_available = 1')
    .run(bookId);
  return result.changes === 1;
}

/**
 * Puts a copy back on the shelf.
 * @param bookId Identifier for the book.
 * @returns True when the flag changed.
 */
export function releaseBook(bookId: string): boolean {
  const result = getDb()
    .prepare('UPDATE books SET is_available = 1 WHERE id = ? AND is_available = 0')
    .run(bookId);
  return result.changes === 1;
}
