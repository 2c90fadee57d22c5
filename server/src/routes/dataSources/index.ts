import { Router } from 'express';
import { requireAuth } from '../../auth';
import { createDataSource } from './create';
import { listDataSources, listMyDataSources } from './list';
import { listByCreator, listByTeam, listForAccountTeams } from './scoped';
import { getDataSource } from './get';
import { updateDataSource } from './update';
import { deleteDataSource } from './delete';

const router = Router();

router.use(requireAuth);

// Collection and scoped listings; literal paths before /:id
router.post('/', createDataSource);
router.get('/', listDataSources);
router.get('/my', listMyDataSources);
router.get('/by-creator/:accountId', listByCreator);
router.get('/by-team/:teamId', listByTeam);
router.get('/for-account-teams/:accountId', listForAccountTeams);

// Single record; access policy applied in each handler
router.get('/:id', getDataSource);
router.patch('/:id', updateDataSource);
router.delete('/:id', deleteDataSource);

export default router;
