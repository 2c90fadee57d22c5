import { Request, Response } from 'express';
import { getActor } from '../../auth';
import { Account } from '../../db/types';
import { getStores } from '../../stores';
import {
  ConflictError,
  NotFoundError,
  isUniqueConstraintError,
  sendErrorResponse,
} from '../../utils/errors';
import { asRecord, validateProfileUpdate } from '../../utils/validation';
import logger from '../../utils/logger';
import { formatAccount } from '../formatters';

const USERNAME_TAKEN = 'Username already taken';

/**
 * Update the caller's own name, username or avatar.
 */
export function updateCurrentAccount(req: Request, res: Response): void {
  try {
    const actor = getActor(req);
    const changes = validateProfileUpdate(asRecord(req.body));
    const stores = getStores();

    if (changes.username !== undefined) {
      const holder = stores.accounts.findByUsername(changes.username);
      if (holder && holder.id !== actor.id) {
        throw new ConflictError(USERNAME_TAKEN);
      }
    }

    let updated: Account | undefined;
    try {
      updated = stores.accounts.update(actor.id, changes);
    } catch (error) {
      if (isUniqueConstraintError(error, 'accounts.username')) {
        throw new ConflictError(USERNAME_TAKEN);
      }
      throw error;
    }
    if (!updated) {
      throw new NotFoundError('Account');
    }

    logger.info({ accountId: actor.id, fields: Object.keys(changes) }, 'account profile updated');

    const teamIds = stores.teams.getTeamIdsForAccount(actor.id);
    res.json({ ...formatAccount(updated), team_ids: teamIds });
  } catch (error) {
    sendErrorResponse(res, error, 'updating current account');
  }
}
