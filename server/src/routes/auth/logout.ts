import { Request, Response } from 'express';
import { getSessionToken } from '../../auth';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';

/**
 * Revoke the bearer token the request was made with.
 */
export function logout(req: Request, res: Response): void {
  try {
    getStores().sessions.revoke(getSessionToken(req));
    res.json({ message: 'Logged out successfully' });
  } catch (error) {
    sendErrorResponse(res, error, 'logging out');
  }
}
