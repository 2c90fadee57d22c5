import { Request, Response } from 'express';
import { getStores } from '../../stores';
import { sendErrorResponse } from '../../utils/errors';
import { parsePagination } from '../../utils/validation';
import { formatAccount } from '../formatters';

export function listAccounts(req: Request, res: Response): void {
  try {
    const accounts = getStores().accounts.findAll(parsePagination(req.query));
    res.json(accounts.map(formatAccount));
  } catch (error) {
    sendErrorResponse(res, error, 'listing accounts');
  }
}
