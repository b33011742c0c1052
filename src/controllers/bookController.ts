import { Request, Response, NextFunction } from 'express';
import { getBook, getBooks, registerBook, removeBook, updateBook } from '../services/bookService';
import { parseRequest } from '../middleware/validate';
import { bookIdSchema, createBookSchema, listBooksSchema, updateBookSchema } from '../validation/book.schema';
import { sendSuccess } from '../utils/response';

/**
 * Lists books.
 * @param req Express request containing listing query.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function listAllBooks(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { query } = parseRequest(listBooksSchema, req);
    const page = await getBooks({
      search: query.search,
      isbn: query.isbn,
      availableOnly: query.availableOnly,
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
 * Retrieves a single book copy.
 * @param req Express request containing book id path param.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function getBookById(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(bookIdSchema, req);
    sendSuccess(res, await getBook(params.bookId));
  } catch (error) {
    next(error);
  }
}

/**
 * Registers a new book copy.
 * @param req Express request containing book payload.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function createBookEntry(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { body } = parseRequest(createBookSchema, req);
    const book = await registerBook(body);
    sendSuccess(res, book, 201);
  } catch (error) {
    next(error);
  }
}

/**
 * Updates an existing book copy.
 * @param req Express request containing book id and update payload.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function updateBookEntry(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params, body } = parseRequest(updateBookSchema, req);
    const book = await updateBook(params.bookId, body);
    sendSuccess(res, book);
  } catch (error) {
    next(error);
  }
}

/**
 * Deletes a book copy.
 * @param req Express request containing book id path param.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function deleteBookEntry(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(bookIdSchema, req);
    const book = await removeBook(params.bookId);
    sendSuccess(res, book);
  } catch (error) {
    next(error);
  }
}
