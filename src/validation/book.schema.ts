import { z } from 'zod';
import { flagQuery, idParam, pagingQuery, sortQuery } from './common.schema';

const isbn = z.string().min(1).max(32);
const title = z.string().trim().min(1).max(500);
const author = z.string().trim().min(1).max(255);

export const listBooksSchema = z.object({
  query: z.object({
    ...pagingQuery,
    search: z.string().trim().min(1).optional(),
    isbn: isbn.optional(),
    availableOnly: flagQuery,
    sort: sortQuery(['title', 'author', 'createdAt'], 'title')
  })
});

export const bookIdSchema = z.object({
  params: z.object({ bookId: idParam })
});

export const createBookSchema = z.object({
  body: z.object({ isbn, title, author })
});

export const updateBookSchema = z.object({
  params: z.object({ bookId: idParam }),
  body: z
    .object({
      isbn: isbn.optional(),
      title: title.optional(),
      author: author.optional()
    })
    .strict()
});
