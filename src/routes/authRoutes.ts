import { Router } from 'express';
import { authRateLimiter } from '../middleware/rateLimit';
import { authenticate } from '../middleware/auth';
import { loginUser, me, register } from '../controllers/authController';

const router = Router();

router.post('/signup', authRateLimiter(), register);
router.post('/login', authRateLimiter('Too many login attempts, please try again later'), loginUser);
router.get('/me', authenticate, me);

export default router;
