import { Request, Response } from 'express';
import { getStores } from '../../stores';
import { NotFoundError, ValidationError, sendErrorResponse } from '../../utils/errors';
import { asRecord, validateAccountRole } from '../../utils/validation';
import logger from '../../utils/logger';
import { formatAccount } from '../formatters';

export function updateAccountRole(req: Request, res: Response): void {
  try {
    const { id } = req.params;
    const role = validateAccountRole(asRecord(req.body));
    const stores = getStores();

    const account = stores.accounts.findById(id);
    if (!account) {
      throw new NotFoundError('Account');
    }

    // At least one admin must remain
    if (account.role === 'admin' && role !== 'admin' && stores.accounts.countAdmins() <= 1) {
      throw new ValidationError('Cannot demote the last admin account', 'role');
    }

    const updated = stores.accounts.update(id, { role });
    if (!updated) {
      throw new NotFoundError('Account');
    }

    logger.info({ accountId: id, previousRole: account.role, newRole: role }, 'account role changed');

    res.json(formatAccount(updated));
  } catch (error) {
    sendErrorResponse(res, error, 'updating account role');
  }
}
