import { z } from 'zod';
import { flagQuery, idParam, pagingQuery, sortQuery } from './common.schema';

const borrowListQuery = {
  ...pagingQuery,
  activeOnly: flagQuery,
  bookId: idParam.optional(),
  sort: sortQuery(['borrowedAt', 'returnedAt'], '-borrowedAt')
};

export const createBorrowSchema = z.object({
  body: z.object({ bookId: idParam })
});

export const borrowIdSchema = z.object({
  params: z.object({ borrowId: idParam })
});

export const listMyBorrowsSchema = z.object({
  query: z.object(borrowListQuery)
});

export const listAllBorrowsSchema = z.object({
  query: z.object({ ...borrowListQuery, borrowerId: idParam.optional() })
});
