import { Request, Response } from 'express';
import { getActor } from '../../auth';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';
import { formatSessionListItem } from '../formatters';

/**
 * Every session of the calling account, newest first. Tokens are never
 * included.
 */
export function listSessions(req: Request, res: Response): void {
  try {
    const sessions = getStores().sessions.findByAccountId(getActor(req).id);
    res.json(sessions.map(formatSessionListItem));
  } catch (error) {
    sendErrorResponse(res, error, 'listing sessions');
  }
}
