import { Request, Response } from 'express';
import { getActor } from '../../auth';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';
import { asRecord, validateTeamCreate } from '../../utils/validation';
import logger from '../../utils/logger';
import { buildTeamDetail } from './access';

export function createTeam(req: Request, res: Response): void {
  try {
    const actor = getActor(req);
    const input = validateTeamCreate(asRecord(req.body));
    const stores = getStores();

    const team = stores.teams.create({ ...input, owner_id: actor.id });
    logger.info({ teamId: team.id, ownerId: actor.id }, 'team created');

    res.status(201).json(buildTeamDetail(stores, team));
  } catch (error) {
    sendErrorResponse(res, error, 'creating team');
  }
}
