import { Request, Response } from 'express';
import { getStores } from '../../stores';
import { NotFoundError, sendErrorResponse } from '../../utils/errors';
import { asRecord, validateTeamUpdate } from '../../utils/validation';
import { buildTeamDetail, loadOwnedTeam } from './access';

export function updateTeam(req: Request, res: Response): void {
  try {
    const stores = getStores();
    const existing = loadOwnedTeam(req, stores);
    const input = validateTeamUpdate(asRecord(req.body));

    const team = stores.teams.update(existing.id, input);
    if (!team) {
      throw new NotFoundError('Team');
    }

    res.json(buildTeamDetail(stores, team));
  } catch (error) {
    sendErrorResponse(res, error, 'updating team');
  }
}
