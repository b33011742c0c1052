import { Request, Response, NextFunction } from 'express';
import { borrowBook, getBorrow, listAllBorrows, listMyBorrows, returnBook } from '../services/borrowService';
import { currentUser } from '../middleware/auth';
import { parseRequest } from '../middleware/validate';
import {
  borrowIdSchema,
  createBorrowSchema,
  listAllBorrowsSchema,
  listMyBorrowsSchema
} from '../validation/borrow.schema';
import { sendSuccess } from '../utils/response';

/**
 * Borrows a book copy for the requester.
 * @param req Express request containing the book id.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function borrow(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { body } = parseRequest(createBorrowSchema, req);
    const record = await borrowBook(body.bookId, currentUser(req));
    sendSuccess(res, record, 201);
  } catch (error) {
    next(error);
  }
}

/**
 * Returns a borrowed copy.
 * @param req Express request containing the borrow id.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function giveBack(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(borrowIdSchema, req);
    const record = await returnBook(params.borrowId, currentUser(req));
    sendSuccess(res, record);
  } catch (error) {
    next(error);
  }
}

/**
 * Lists the requester's own borrow records.
 * @param req Express request containing listing query.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function myBorrows(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { query } = parseRequest(listMyBorrowsSchema, req);
    const page = await listMyBorrows(currentUser(req).id, {
      bookId: query.bookId,
      activeOnly: query.activeOnly,
      sortField: query.sort.field,
      direction: query.sort.direction,
      skip: query.skip,
      limit: query.limit
    });
    sendSuccess(res, page);
  } catch (error) {
    next(error);
  }
}

/**
 * Lists borrow records across all borrowers.
 * @param req Express request containing listing query.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function allBorrows(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { query } = parseRequest(listAllBorrowsSchema, req);
    const page = await listAllBorrows({
      borrowerId: query.borrowerId,
      bookId: query.bookId,
      activeOnly: query.activeOnly,
      sortField: query.sort.field,
      direction: query.sort.direction,
      skip: query.skip,
      limit: query.limit
    });
    sendSuccess(res, page);
  } catch (error) {
    next(error);
  }
}

/**
 * Retrieves one borrow record.
 * @param req Express request containing the borrow id.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function getBorrowById(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(borrowIdSchema, req);
    const record = await getBorrow(params.borrowId, currentUser(req));
    sendSuccess(res, record);
  } catch (error) {
    next(error);
  }
}
