import { Request, Response } from 'express';
import { getStores } from '../../stores';
import { NotFoundError, sendErrorResponse } from '../../utils/errors';
import { formatAccount } from '../formatters';

export function getAccount(req: Request, res: Response): void {
  try {
    const account = getStores().accounts.findById(req.params.id);
    if (!account) {
      throw new NotFoundError('Account');
    }
    res.json(formatAccount(account));
  } catch (error) {
    sendErrorResponse(res, error, 'fetching account');
  }
}
