import { Request, Response, RequestHandler } from 'express';
import { TeamRelation } from '../../../db/types';
import { getStores, withTransaction } from '../../../stores';
import { NotFoundError, sendErrorResponse } from '../../../utils/errors';
import { asRecord, validateAccountIds } from '../../../utils/validation';
import { buildTeamDetail, loadOwnedTeam } from '../access';

/**
 * Handler adding every account in `account_ids` to the team's members or
 * managers. Accounts already related are skipped; all-or-nothing otherwise.
 */
export function addRelated(relation: TeamRelation): RequestHandler {
  return (req: Request, res: Response): void => {
    try {
      const stores = getStores();
      const team = loadOwnedTeam(req, stores);
      const accountIds = validateAccountIds(asRecord(req.body));

      for (const accountId of accountIds) {
        if (!stores.accounts.exists(accountId)) {
          throw new NotFoundError('Account');
        }
      }

      withTransaction((tx) => {
        for (const accountId of accountIds) {
          tx.teams.addRelated(team.id, relation, accountId);
        }
      });

      res.json(buildTeamDetail(stores, team));
    } catch (error) {
      sendErrorResponse(res, error, `adding team ${relation}`);
    }
  };
}
