import { Request, Response } from 'express';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';
import logger from '../../utils/logger';
import { loadOwnedTeam } from './access';

/**
 * Deleting a team detaches its data sources (team_id set to null) and
 * drops its member and manager rows.
 */
export function deleteTeam(req: Request, res: Response): void {
  try {
    const stores = getStores();
    const team = loadOwnedTeam(req, stores);

    stores.teams.delete(team.id);
    logger.info({ teamId: team.id }, 'team deleted');

    res.json({ message: 'Team deleted successfully' });
  } catch (error) {
    sendErrorResponse(res, error, 'deleting team');
  }
}
