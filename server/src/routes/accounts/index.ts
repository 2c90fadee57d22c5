import { Router } from 'express';
import { requireAuth, requireAdmin } from '../../auth';
import { getCurrentAccount } from './me';
import { updateCurrentAccount } from './updateMe';
import { listAccounts } from './list';
import { getAccount } from './get';
import { updateAccountRole } from './updateRole';

const router = Router();

// Current account profile - any authenticated account
router.get('/me', requireAuth, getCurrentAccount);
router.patch('/me', requireAuth, updateCurrentAccount);

// Admin-only account management
router.get('/', requireAdmin, listAccounts);
router.get('/:id', requireAdmin, getAccount);
router.put('/:id/role', requireAdmin, updateAccountRole);

export default router;
