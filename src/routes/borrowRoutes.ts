import { Router } from 'express';
import { authenticate } from '../middleware/auth';
import { requireAnyPermission, requirePermission } from '../middleware/permission';
import { allBorrows, borrow, getBorrowById, giveBack, myBorrows } from '../controllers/borrowController';

const router = Router();

router.use(authenticate);

router.post('/', requirePermission('borrows:create'), borrow);
// Existence is checked before the return grant and ownership, in the service.
router.post('/:borrowId/return', giveBack);
router.get('/me', requirePermission('borrows:read'), myBorrows);
router.get('/', requirePermission('borrows:read_all'), allBorrows);
router.get('/:borrowId', requireAnyPermission('borrows:read', 'borrows:read_all'), getBorrowById);

export default router;
