import { Request, Response } from 'express';
import { AuthorizationService, assertAuthorized, getActor } from '../../auth';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';
import { buildTeamDetail, loadTeam } from './access';

export function getTeam(req: Request, res: Response): void {
  try {
    const stores = getStores();
    const team = loadTeam(stores, req.params.id);
    assertAuthorized(AuthorizationService.checkTeamScope(getActor(req), team.id));

    res.json(buildTeamDetail(stores, team));
  } catch (error) {
    sendErrorResponse(res, error, 'fetching team');
  }
}
