import { Router } from 'express';
import { requireAuth } from '../../auth';
import { logout } from './logout';
import { listSessions } from './sessions';

const router = Router();

router.post('/logout', requireAuth, logout);
router.get('/sessions', requireAuth, listSessions);

export default router;
