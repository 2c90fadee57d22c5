import { Request, Response } from 'express';
import { AuthorizationService, getActor } from '../../auth';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';
import { formatTeamListItem } from '../formatters';

export function listTeams(req: Request, res: Response): void {
  try {
    const actor = getActor(req);
    const stores = getStores();

    // Admins see every team; others only the teams they are associated with
    const teams = actor.role === 'admin'
      ? stores.teams.findAll()
      : stores.teams.findByIds(AuthorizationService.getTeamIdsForAccount(actor.id));

    res.json(
      teams.map((team) =>
        formatTeamListItem(
          team,
          stores.teams.getMemberCount(team.id),
          stores.teams.getDataSourceCount(team.id)
        )
      )
    );
  } catch (error) {
    sendErrorResponse(res, error, 'listing teams');
  }
}
