import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import request from 'supertest';
import { app, asAuthenticated, resetDatabase, seedUser } from './setup';
import { atomically, getDb, initDatabase, isUniqueViolation } from '../src/utils/db';
import { borrowBook, getBorrow, listMyBorrows, returnBook } from '../src/services/borrowService';
import { registerBook, removeBook } from '../src/services/bookService';
import { claimAvailableBook, getBookById } from '../src/repositories/bookRepository';
import { createBorrowRecord, listBorrowRecords } from '../src/repositories/borrowRepository';
import {
  AlreadyReturnedError,
  ConflictError,
  ForbiddenError,
  NotAvailableError,
  NotFoundError,
  TransientError
} from '../src/utils/errors';
import type { AuthenticatedUser, Book } from '../src/types/domain';

const DUNE = { isbn: '978-0-441-01359-3', title: 'Dune', author: 'Frank Herbert' };

describe('lending state machine', () => {
  let alice: AuthenticatedUser;
  let bob: AuthenticatedUser;
  let book: Book;

  beforeEach(async () => {
    resetDatabase();
    alice = asAuthenticated((await seedUser('alice@example.com')).user);
    bob = asAuthenticated((await seedUser('bob@example.com')).user);
    book = await registerBook(DUNE);
  });

  test('borrow marks the copy unavailable and opens a record', async () => {
    const record = await borrowBook(book.id, alice);

    expect(record.bookId).toBe(book.id);
    expect(record.borrowerId).toBe(alice.id);
    expect(record.returnedAt).toBeNull();
    expect(getBookById(book.id)?.isAvailable).toBe(false);
  });

  test('second borrow of a lent copy is not available', async () => {
    await borrowBook(book.id, alice);
    await expect(borrowBook(book.id, bob)).rejects.toThrow(
      new NotAvailableError("Book 'Dune' is not available for borrowing")
    );
  });

  test('borrowing a missing copy is not found', async () => {
    await expect(borrowBook('no-such-book', alice)).rejects.toBeInstanceOf(NotFoundError);
  });

  test('borrowing without borrows:create is forbidden', async () => {
    const librarian = asAuthenticated((await seedUser('lib@example.com', { role: 'librarian' })).user);
    await expect(borrowBook(book.id, librarian)).rejects.toThrow(
      new ForbiddenError('Missing required permissions: borrows:create')
    );
  });

  test('only the borrower may return, and only once', async () => {
    const record = await borrowBook(book.id, alice);

    await expect(returnBook(record.id, bob)).rejects.toBeInstanceOf(ForbiddenError);

    const closed = await returnBook(record.id, alice);
    expect(closed.returnedAt).not.toBeNull();
    expect(getBookById(book.id)?.isAvailable).toBe(true);

    await expect(returnBook(record.id, alice)).rejects.toThrow(
      new AlreadyReturnedError('This book has already been returned')
    );
  });

  test('returning a missing record is not found before ownership is checked', async () => {
    await expect(returnBook('no-such-record', bob)).rejects.toThrow(new NotFoundError('Borrow record not found'));
  });

  test('a returned copy can be borrowed again', async () => {
    const first = await borrowBook(book.id, alice);
    await returnBook(first.id, alice);

    const second = await borrowBook(book.id, bob);
    expect(second.borrowerId).toBe(bob.id);
    expect(listBorrowRecords({ bookId: book.id, activeOnly: false, sortField: 'borrowedAt', direction: 'asc', skip: 0, limit: 10 }).count).toBe(2);
  });

  test('of several borrowers of one copy only the first gets a loan', async () => {
    const borrowers = [alice, bob];
    for (let i = 0; i < 6; i += 1) {
      borrowers.push(asAuthenticated((await seedUser(`reader${i}@example.com`)).user));
    }

    const results = await Promise.allSettled(borrowers.map((borrower) => borrowBook(book.id, borrower)));
    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );

    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(7);
    rejected.forEach((result) => expect(result.reason).toBeInstanceOf(NotAvailableError));

    const active = listBorrowRecords({
      bookId: book.id,
      activeOnly: true,
      sortField: 'borrowedAt',
      direction: 'asc',
      skip: 0,
      limit: 10
    });
    expect(active.count).toBe(1);
  });

  test('a repeated return closes the record once', async () => {
    const record = await borrowBook(book.id, alice);

    const results = await Promise.allSettled([returnBook(record.id, alice), returnBook(record.id, alice)]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    if (results[1].status === 'rejected') {
      expect(results[1].reason).toBeInstanceOf(AlreadyReturnedError);
    }
  });

  test('the store rejects a second active record for one copy', async () => {
    await borrowBook(book.id, alice);

    let caught: unknown;
    try {
      createBorrowRecord({ bookId: book.id, borrowerId: bob.id });
    } catch (err) {
      caught = err;
    }
    expect(isUniqueViolation(caught)).toBe(true);
  });

  test('claiming an already claimed copy fails', () => {
    expect(claimAvailableBook(book.id)).toBe(true);
    expect(claimAvailableBook(book.id)).toBe(false);
  });

  test('borrow records are readable by their borrower only', async () => {
    const record = await borrowBook(book.id, alice);

    await expect(getBorrow(record.id, alice)).resolves.toEqual(record);
    await expect(getBorrow(record.id, bob)).rejects.toBeInstanceOf(ForbiddenError);
  });

  test('listMyBorrows only returns the requester records', async () => {
    await borrowBook(book.id, alice);

    const mine = await listMyBorrows(bob.id, {
      activeOnly: false,
      sortField: 'borrowedAt',
      direction: 'desc',
      skip: 0,
      limit: 100
    });
    expect(mine).toEqual({ items: [], count: 0, skip: 0, limit: 100 });
  });

  test('a lent copy cannot be deleted, nor one with history', async () => {
    const record = await borrowBook(book.id, alice);
    await expect(removeBook(book.id)).rejects.toBeInstanceOf(NotAvailableError);

    await returnBook(record.id, alice);
    await expect(removeBook(book.id)).rejects.toThrow(new ConflictError('Cannot delete a book with borrow history'));
  });
});

describe('ISBN registration', () => {
  beforeEach(() => {
    resetDatabase();
  });

  test('copies share one normalized ISBN', async () => {
    const first = await registerBook(DUNE);
    const second = await registerBook({ ...DUNE, isbn: '9780441013593' });

    expect(first.isbn).toBe('9780441013593');
    expect(second.isbn).toBe('9780441013593');
    expect(second.id).not.toBe(first.id);
  });

  test('a second first registration with a different title is refused', async () => {
    const results = await Promise.allSettled([
      registerBook(DUNE),
      registerBook({ ...DUNE, isbn: '9780441013593', title: 'Dune Messiah' })
    ]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    if (results[1].status === 'rejected') {
      expect(results[1].reason).toEqual(
        new ConflictError("ISBN 9780441013593 is already registered with title 'Dune'")
      );
    }
  });
});

describe('store transactions', () => {
  test('a busy lock is retried once', () => {
    let attempts = 0;
    const result = atomically('probe', () => {
      attempts += 1;
      if (attempts === 1) {
        throw new Database.SqliteError('database is locked', 'SQLITE_BUSY');
      }
      return 'done';
    });

    expect(result).toBe('done');
    expect(attempts).toBe(2);
  });

  test('a lock that stays busy surfaces as transient', () => {
    let attempts = 0;
    expect(() =>
      atomically('probe', () => {
        attempts += 1;
        throw new Database.SqliteError('database is locked', 'SQLITE_BUSY');
      })
    ).toThrow(new TransientError('Store is busy, probe could not complete; retry later'));
    expect(attempts).toBe(2);
  });

  test('other errors are not retried', () => {
    let attempts = 0;
    expect(() =>
      atomically('probe', () => {
        attempts += 1;
        throw new ConflictError('nope');
      })
    ).toThrow(ConflictError);
    expect(attempts).toBe(1);
  });

  describe('with a second connection holding the write lock', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'lending-'));
      file = join(dir, 'busy.db');
      initDatabase({ file, busyTimeoutMs: 20 });
    });

    afterEach(() => {
      initDatabase();
      rmSync(dir, { recursive: true, force: true });
    });

    test('borrow fails transiently, then succeeds once the lock is released', async () => {
      const alice = asAuthenticated((await seedUser('alice@example.com')).user);
      const book = await registerBook(DUNE);

      const blocker = new Database(file, { timeout: 20 });
      blocker.exec('BEGIN IMMEDIATE');
      try {
        await expect(borrowBook(book.id, alice)).rejects.toBeInstanceOf(TransientError);
        expect(getDb().prepare('SELECT COUNT(*) AS total FROM borrow_records').get()).toEqual({ total: 0 });
      } finally {
        blocker.exec('ROLLBACK');
        blocker.close();
      }

      const record = await borrowBook(book.id, alice);
      expect(record.bookId).toBe(book.id);
    });

    test('a lock that blocks reads answers HTTP requests with transient', async () => {
      const { token } = await seedUser('alice@example.com');
      const book = await registerBook(DUNE);

      const blocker = new Database(file, { timeout: 20 });
      blocker.exec('BEGIN EXCLUSIVE');
      try {
        const busy = await request(app)
          .post('/borrows')
          .set('Authorization', `Bearer ${token}`)
          .send({ bookId: book.id });
        expect(busy.status).toBe(503);
        expect(busy.body.error).toEqual({ message: 'Store is busy; retry later', code: 'TRANSIENT' });
      } finally {
        blocker.exec('ROLLBACK');
        blocker.close();
      }

      const res = await request(app)
        .post('/borrows')
        .set('Authorization', `Bearer ${token}`)
        .send({ bookId: book.id });
      expect(res.status).toBe(201);
    });

    test('a copy lent through another connection is not available here', async () => {
      const alice = asAuthenticated((await seedUser('alice@example.com')).user);
      const bob = (await seedUser('bob@example.com')).user;
      const book = await registerBook(DUNE);

      const other = new Database(file, { timeout: 20 });
      try {
        other
          .transaction(() => {
            other.prepare('UPDATE books SET is_available = 0 WHERE id = ? AND is_available = 1').run(book.id);
            other
              .prepare('INSERT INTO borrow_records (id, book_id, borrower_id, borrowed_at) VALUES (?, ?, ?, ?)')
              .run('loan-elsewhere', book.id, bob.id, new Date().toISOString());
          })
          .immediate();
      } finally {
        other.close();
      }

      await expect(borrowBook(book.id, alice)).rejects.toBeInstanceOf(NotAvailableError);
      expect(getBookById(book.id)?.isAvailable).toBe(false);
    });
  });
});
