import { Request, Response } from 'express';
import { getActor } from '../../auth';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';
import { formatAccount } from '../formatters';

/**
 * The calling account along with the ids of the teams it is associated with.
 */
export function getCurrentAccount(req: Request, res: Response): void {
  try {
    const account = getActor(req);
    const teamIds = getStores().teams.getTeamIdsForAccount(account.id);

    res.json({ ...formatAccount(account), team_ids: teamIds });
  } catch (error) {
    sendErrorResponse(res, error, 'fetching current account');
  }
}
