import {
  BookFilter,
  createBook,
  deleteAvailableBook,
  getBookById,
  listBooks,
  listCopiesByIsbn,
  updateBookDetails
} from '../repositories/bookRepository';
import { countBorrowsForBook } from '../repositories/borrowRepository';
import { atomically } from '../utils/db';
import { ConflictError, NotAvailableError, NotFoundError } from '../utils/errors';
import { assertIsbnConsistency, normalizeIsbn } from '../utils/isbn';
import { info } from '../utils/logger';
import type { Page } from '../utils/response';
import type { Book } from '../types/domain';

/**
 * Lists books with optional search, ISBN and availability filters.
 * @param filter Listing filter; the ISBN, when present, is normalized first.
 * @returns Promise resolving to one page of books.
 * @throws {ValidationError} When the ISBN filter is malformed.
 */
export async function getBooks(filter: BookFilter): Promise<Page<Book>> {
  const isbn = filter.isbn ? normalizeIsbn(filter.isbn) : undefined;
  const { rows, count } = listBooks({ ...filter, isbn });
  return { items: rows, count, skip: filter.skip, limit: filter.limit };
}

/**
 * Retrieves a single book copy.
 * @param bookId Identifier of the copy.
 * @returns Promise resolving to found book.
 * @throws {NotFoundError} When the book does not exist.
 */
export async function getBook(bookId: string): Promise<Book> {
  const book = getBookById(bookId);
  if (!book) {
    throw new NotFoundError('Book not found');
  }
  return book;
}

/**
 * Registers a new physical copy.
 *
 * The existing-copies read and the insert share one immediate transaction,
 * so two first registrations of the same ISBN cannot both see an empty set:
 * the later one is checked against the earlier one's title and author.
 * @param payload Raw ISBN, title and author.
 * @returns Promise resolving to the created copy.
 * @throws {ValidationError} When the ISBN is malformed.
 * @throws {ConflictError} When the ISBN is registered with another title or author.
 */
export async function registerBook(payload: { isbn: string; title: string; author: string }): Promise<Book> {
  const isbn = normalizeIsbn(payload.isbn);

  const book = atomically('book registration', () => {
    assertIsbnConsistency(isbn, payload.title, payload.author, listCopiesByIsbn(isbn));
    return createBook({ isbn, title: payload.title, author: payload.author });
  });

  info('Book copy registered', { bookId: book.id, isbn });
  return book;
}

/**
 * Updates a copy's catalog fields. The resulting (ISBN, title, author) is
 * checked against the other copies of the target ISBN inside the same
 * transaction as the write.
 * @param bookId Identifier of the copy to update.
 * @param payload Partial update payload.
 * @returns Promise resolving to updated book.
 * @throws {NotFoundError} When the book is missing.
 * @throws {ConflictError} When the change would break ISBN identity.
 */
export async function updateBook(
  bookId: string,
  payload: Partial<{ isbn: string; title: string; author: string }>
): Promise<Book> {
  const isbn = payload.isbn !== undefined ? normalizeIsbn(payload.isbn) : undefined;

  return atomically('book update', () => {
    const book = getBookById(bookId);
    if (!book) {
      throw new NotFoundError('Book not found');
    }

    const next = {
      isbn: isbn ?? book.isbn,
      title: payload.title ?? book.title,
      author: payload.author ?? book.author
    };
    assertIsbnConsistency(next.isbn, next.title, next.author, listCopiesByIsbn(next.isbn, bookId));

    const updated = updateBookDetails(bookId, next);
    if (!updated) {
      throw new NotFoundError('Book not found');
    }
    return updated;
  });
}

/**
 * Deletes a copy that is on the shelf and has never been lent. Borrow
 * records are kept forever, so a copy with history stays.
 * @param bookId Identifier of the copy.
 * @returns Promise resolving to the removed book.
 * @throws {NotFoundError} When the book is missing.
 * @throws {NotAvailableError} When the copy is currently borrowed.
 * @throws {ConflictError} When the copy has borrow history.
 */
export async function removeBook(bookId: string): Promise<Book> {
  const removed = atomically('book deletion', () => {
    const book = getBookById(bookId);
    if (!book) {
      throw new NotFoundError('Book not found');
    }
    if (!book.isAvailable) {
      throw new NotAvailableError('Cannot delete a book that is currently borrowed');
    }
    if (countBorrowsForBook(bookId) > 0) {
      throw new ConflictError('Cannot delete a book with borrow history');
    }
    if (!deleteAvailableBook(bookId)) {
      throw new NotAvailableError('Cannot delete a book that is currently borrowed');
    }
    return book;
  });

  info('Book copy deleted', { bookId, isbn: removed.isbn });
  return removed;
}
