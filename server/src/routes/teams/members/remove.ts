import { Request, Response, RequestHandler } from 'express';
import { TeamRelation } from '../../../db/types';
import { getStores, withTransaction } from '../../../stores';
import { sendErrorResponse } from '../../../utils/errors';
import { asRecord, validateAccountIds } from '../../../utils/validation';
import { buildTeamDetail, loadOwnedTeam } from '../access';

/**
 * Handler removing every account in `account_ids` from the team's members
 * or managers. Accounts that are not related are ignored.
 */
export function removeRelated(relation: TeamRelation): RequestHandler {
  return (req: Request, res: Response): void => {
    try {
      const stores = getStores();
      const team = loadOwnedTeam(req, stores);
      const accountIds = validateAccountIds(asRecord(req.body));

      withTransaction((tx) => {
        for (const accountId of accountIds) {
          tx.teams.removeRelated(team.id, relation, accountId);
        }
      });

      res.json(buildTeamDetail(stores, team));
    } catch (error) {
      sendErrorResponse(res, error, `removing team ${relation}`);
    }
  };
}
