import { randomUUID } from 'crypto';
import { getDb } from '../utils/db';
import type { BorrowRecord, SortDirection } from '../types/domain';

type BorrowRow = {
  id: string;
  book_id: string;
  borrower_id: string;
  borrowed_at: string;
  returned_at: string | null;
};

const SORT_COLUMNS = {
  borrowedAt: 'borrowed_at',
  returnedAt: 'returned_at'
} as const;

export type BorrowSortField = keyof typeof SORT_COLUMNS;

export type BorrowFilter = {
  borrowerId?: string;
  bookId?: string;
  activeOnly: boolean;
  sortField: BorrowSortField;
  direction: SortDirection;
  skip: number;
  limit: number;
};

function toBorrowRecord(row: BorrowRow): BorrowRecord {
  return {
    id: row.id,
    bookId: row.book_id,
    borrowerId: row.borrower_id,
    borrowedAt: row.borrowed_at,
    returnedAt: row.returned_at
  };
}

/**
 * Creates an active borrow record. The partial unique index on
 * (book_id) WHERE returned_at IS NULL rejects a second active record.
 * @param data Book and borrower identifiers.
 * @returns Created record.
 */
export function createBorrowRecord(data: { bookId: string; borrowerId: string }): BorrowRecord {
  const record: BorrowRecord = {
    id: randomUUID(),
    bookId: data.bookId,
    borrowerId: data.borrowerId,
    borrowedAt: new Date().toISOString(),
    returnedAt: null
  };
  getDb()
    .prepare('INSERT INTO borrow_records (id, book_id, borrower_id, borrowed_at, returned_at) VALUES (?, ?, ?, ?, NULL)')
    .run(record.id, record.bookId, record.borrowerId, record.borrowedAt);
  return record;
}

/**
 * Retrieves a borrow record by identifier.
 * @param borrowId Record identifier.
 * @returns Record or null.
 */
export function getBorrowRecordById(borrowId: string): BorrowRecord | null {
  const row = getDb()
    .prepare<[string], BorrowRow>('SELECT * FROM borrow_records WHERE id = ?')
    .get(borrowId);
  return row ? toBorrowRecord(row) : null;
}

/**
 * Retrieves the open loan on a copy, if any.
 * @param bookId Book identifier.
 * @returns Active record or null.
 */
export function findActiveBorrowForBook(bookId: string): BorrowRecord | null {
  const row = getDb()
    .prepare<[string], BorrowRow>('SELECT * FROM borrow_records WHERE book_id = ? AND returned_at IS NULL')
    .get(bookId);
  return row ? toBorrowRecord(row) : null;
}

/**
 * Counts every record, open or closed, that references a copy.
 * @param bookId Book identifier.
 */
export function countBorrowsForBook(bookId: string): number {
  const row = getDb()
    .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM borrow_records WHERE book_id = ?')
    .get(bookId);
  return row?.total ?? 0;
}

/**
 * Closes an open record. Only succeeds while returned_at is still null, so
 * of two racing returns exactly one changes the row.
 * @param borrowId Record identifier.
 * @param returnedAt Return timestamp.
 * @returns True when this call closed the record.
 */
export function closeBorrowRecord(borrowId: string, returnedAt: string): boolean {
  const result = getDb()
    .prepare('UPDATE borrow_records SET returned_at = ? WHERE id = ? AND returned_at IS NULL')
    .run(returnedAt, borrowId);
  return result.changes === 1;
}

/**
 * Lists borrow records matching the filter, one page at a time.
 * @param filter Borrower, book and activity filters plus paging.
 * @returns Page rows and the total number of matches.
 */
export function listBorrowRecords(filter: BorrowFilter): { rows: BorrowRecord[]; count: number } {
  const conditions: string[] = [];
  const params: Array<string | number> = [];

  if (filter.borrowerId) {
    conditions.push('borrower_id = ?');
    params.push(filter.borrowerId);
  }
  if (filter.bookId) {
    conditions.push('book_id = ?');
    params.push(filter.bookId);
  }
  if (filter.activeOnly) {
    conditions.push('returned_at IS NULL');
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const db = getDb();
  const total = db
    .prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM borrow_records ${where}`)
    .get(...params);
  const rows = db
    .prepare<unknown[], BorrowRow>(
      `SELECT * FROM borrow_records ${where}
       ORDER BY ${SORT_COLUMNS[filter.sortField]} ${filter.direction.toUpperCase()}, id ASC
       LIMIT ? OFFSET ?`
    )
    .all(...params, filter.limit, filter.skip);

  return { rows: rows.map(toBorrowRecord), count: total?.total ?? 0 };
}
