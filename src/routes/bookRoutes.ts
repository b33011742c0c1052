import { Router } from 'express';
import { authenticate } from '../middleware/auth';
import { requirePermission } from '../middleware/permission';
import {
  createBookEntry,
  deleteBookEntry,
  getBookById,
  listAllBooks,
  updateBookEntry
} from '../controllers/bookController';

const router = Router();

router.use(authenticate);

router.get('/', requirePermission('books:read'), listAllBooks);
router.get('/:bookId', requirePermission('books:read'), getBookById);
router.post('/', requirePermission('books:create'), createBookEntry);
router.patch('/:bookId', requirePermission('books:update'), updateBookEntry);
router.delete('/:bookId', requirePermission('books:delete'), deleteBookEntry);

export default router;
