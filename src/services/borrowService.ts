import { claimAvailableBook, getBookById, releaseBook } from '../repositories/bookRepository';
import {
  BorrowFilter,
  closeBorrowRecord,
  createBorrowRecord,
  findActiveBorrowForBook,
  getBorrowRecordById,
  listBorrowRecords
} from '../repositories/borrowRepository';
import { atomically, isUniqueViolation } from '../utils/db';
import { AlreadyReturnedError, NotAvailableError, NotFoundError } from '../utils/errors';
import { info, warn } from '../utils/logger';
import type { Page } from '../utils/response';
import type { AuthenticatedUser, BorrowRecord } from '../types/domain';
import { assertAuthorized, assertCanReturn, assertCanViewBorrow } from './accessGate';

/**
 * Lends a copy to the requesting user.
 *
 * Inside one immediate transaction the availability flag is flipped by a
 * conditional update and the record is inserted. Of several concurrent
 * borrowers exactly one flips the flag; the others see NOT_AVAILABLE. The
 * partial unique index on active records backs this up at the store level.
 * @param bookId Copy to borrow.
 * @param borrower Authenticated requester.
 * @returns Promise resolving to the new active record.
 * @throws {ForbiddenError} Without `borrows:create`.
 * @throws {NotFoundError} When the copy does not exist.
 * @throws {NotAvailableError} When the copy is already lent out.
 */
export async function borrowBook(bookId: string, borrower: AuthenticatedUser): Promise<BorrowRecord> {
  assertAuthorized(borrower, 'borrows:create');

  const record = atomically('borrow', () => {
    const book = getBookById(bookId);
    if (!book) {
      throw new NotFoundError('Book not found');
    }
    if (!book.isAvailable || findActiveBorrowForBook(bookId)) {
      throw new NotAvailableError(`Book '${book.title}' is not available for borrowing`);
    }
    if (!claimAvailableBook(bookId)) {
      throw new NotAvailableError(`Book '${book.title}' is not available for borrowing`);
    }

    try {
      return createBorrowRecord({ bookId, borrowerId: borrower.id });
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new NotAvailableError(`Book '${book.title}' is already borrowed`);
      }
      throw err;
    }
  });

  info('Book borrowed', { borrowId: record.id, bookId, borrowerId: borrower.id });
  return record;
}

/**
 * Closes a loan and puts the copy back on the shelf, atomically.
 *
 * Checks run in order: existence, then the `borrows:return` grant and
 * ownership, then whether the record is still open. The close itself is a
 * conditional update, so a duplicate return sees ALREADY_RETURNED.
 * @param borrowId Record to close.
 * @param requester Authenticated requester.
 * @returns Promise resolving to the closed record.
 * @throws {NotFoundError} When the record does not exist.
 * @throws {ForbiddenError} When the requester is not the borrower.
 * @throws {AlreadyReturnedError} When the record is already closed.
 */
export async function returnBook(borrowId: string, requester: AuthenticatedUser): Promise<BorrowRecord> {
  const record = atomically('return', () => {
    const existing = getBorrowRecordById(borrowId);
    if (!existing) {
      throw new NotFoundError('Borrow record not found');
    }
    assertCanReturn(requester, existing);
    if (existing.returnedAt !== null) {
      throw new AlreadyReturnedError('This book has already been returned');
    }

    const returnedAt = new Date().toISOString();
    if (!closeBorrowRecord(borrowId, returnedAt)) {
      throw new AlreadyReturnedError('This book has already been returned');
    }
    if (!releaseBook(existing.bookId)) {
      warn('Returned book was already flagged available', { borrowId, bookId: existing.bookId });
    }
    return { ...existing, returnedAt };
  });

  info('Book returned', { borrowId, bookId: record.bookId, borrowerId: record.borrowerId });
  return record;
}

/**
 * Lists the requesting user's own borrow records.
 * @param userId Borrower identifier.
 * @param filter Listing filter; any borrower filter is replaced.
 * @returns Promise resolving to one page of records.
 */
export async function listMyBorrows(
  userId: string,
  filter: Omit<BorrowFilter, 'borrowerId'>
): Promise<Page<BorrowRecord>> {
  const { rows, count } = listBorrowRecords({ ...filter, borrowerId: userId });
  return { items: rows, count, skip: filter.skip, limit: filter.limit };
}

/**
 * Lists borrow records across all users.
 * @param filter Listing filter.
 * @returns Promise resolving to one page of records.
 */
export async function listAllBorrows(filter: BorrowFilter): Promise<Page<BorrowRecord>> {
  const { rows, count } = listBorrowRecords(filter);
  return { items: rows, count, skip: filter.skip, limit: filter.limit };
}

/**
 * Retrieves one borrow record, subject to the read rule.
 * @param borrowId Record identifier.
 * @param requester Authenticated requester.
 * @returns Promise resolving to the record.
 * @throws {NotFoundError} When the record is missing.
 * @throws {ForbiddenError} When the requester may not see it.
 */
export async function getBorrow(borrowId: string, requester: AuthenticatedUser): Promise<BorrowRecord> {
  const record = getBorrowRecordById(borrowId);
  if (!record) {
    throw new NotFoundError('Borrow record not found');
  }
  assertCanViewBorrow(requester, record);
  return record;
}
