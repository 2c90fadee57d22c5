import { Request } from 'express';
import { AuthorizationService, assertAuthorized, getActor } from '../../auth';
import { Team } from '../../db/types';
import { StoreRegistry } from '../../stores';
import { NotFoundError } from '../../utils/errors';
import { formatTeamDetail, FormattedTeamDetail, toAccountSummary } from '../formatters';

export function loadTeam(stores: StoreRegistry, id: string): Team {
  const team = stores.teams.findById(id);
  if (!team) {
    throw new NotFoundError('Team');
  }
  return team;
}

/**
 * Load the `:id` team and require its owner (or an admin).
 */
export function loadOwnedTeam(req: Request, stores: StoreRegistry): Team {
  const team = loadTeam(stores, req.params.id);
  assertAuthorized(AuthorizationService.checkTeamOwnerAccess(getActor(req), team));
  return team;
}

export function buildTeamDetail(stores: StoreRegistry, team: Team): FormattedTeamDetail {
  const owner = team.owner_id ? stores.accounts.findById(team.owner_id) : undefined;
  return formatTeamDetail(
    team,
    owner ? toAccountSummary(owner) : null,
    stores.teams.findRelated(team.id, 'members'),
    stores.teams.findRelated(team.id, 'managers')
  );
}
