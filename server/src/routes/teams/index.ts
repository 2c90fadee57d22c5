import { Router } from 'express';
import { requireAuth } from '../../auth';
import { listTeams } from './list';
import { getTeam } from './get';
import { createTeam } from './create';
import { updateTeam } from './update';
import { deleteTeam } from './delete';
import { addRelated } from './members/add';
import { removeRelated } from './members/remove';

const router = Router();

router.use(requireAuth);

// Team CRUD - read is open to associated accounts, write requires the owner or an admin
router.get('/', listTeams);
router.post('/', createTeam);
router.get('/:id', getTeam);
router.patch('/:id', updateTeam);
router.delete('/:id', deleteTeam);

// Member and manager relations - owner or admin
router.post('/:id/members', addRelated('members'));
router.delete('/:id/members', removeRelated('members'));
router.post('/:id/managers', addRelated('managers'));
router.delete('/:id/managers', removeRelated('managers'));

export default router;
