import { Router } from 'express';
import { authenticate } from '../middleware/auth';
import { requirePermission, requireSuperuser } from '../middleware/permission';
import {
  createUserAccount,
  getUserById,
  listAllUsers,
  updateOwnPassword,
  updateOwnProfile,
  updateUserAccount
} from '../controllers/userController';
import {
  createUserOverride,
  deleteUserOverride,
  getUserPermissions,
  listUserOverrides
} from '../controllers/permissionController';

const router = Router();

router.use(authenticate);

router.patch('/me', updateOwnProfile);
router.patch('/me/password', updateOwnPassword);

router.get('/', requirePermission('users:read'), listAllUsers);
router.post('/', requireSuperuser, createUserAccount);
router.get('/:userId', getUserById);
router.patch('/:userId', requireSuperuser, updateUserAccount);

router.get('/:userId/permissions', getUserPermissions);
router.get('/:userId/permissions/overrides', requireSuperuser, listUserOverrides);
router.post('/:userId/permissions/overrides', requireSuperuser, createUserOverride);
router.delete('/:userId/permissions/overrides/:overrideId', requireSuperuser, deleteUserOverride);

export default router;
