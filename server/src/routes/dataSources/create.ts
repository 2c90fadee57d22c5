import { Request, Response } from 'express';
import { getActor } from '../../auth';
import { DataSourceService } from '../../services/dataSources';
import { sendErrorResponse } from '../../utils/errors';
import { asRecord, validateDataSourceCreate } from '../../utils/validation';
import { formatDataSource } from '../formatters';

export function createDataSource(req: Request, res: Response): void {
  try {
    const actor = getActor(req);
    const input = validateDataSourceCreate(asRecord(req.body));

    const source = new DataSourceService().create(input, actor.id);

    res.status(201).json(formatDataSource(source));
  } catch (error) {
    sendErrorResponse(res, error, 'creating data source');
  }
}
