import { Request, Response } from 'express';
import { DataSourceService } from '../../services/dataSources';
import { sendErrorResponse } from '../../utils/errors';
import { asRecord, validateDataSourceUpdate } from '../../utils/validation';
import { formatDataSource } from '../formatters';
import { loadAuthorizedDataSource } from './access';

export function updateDataSource(req: Request, res: Response): void {
  try {
    const service = new DataSourceService();
    const existing = loadAuthorizedDataSource(req, service);
    const input = validateDataSourceUpdate(asRecord(req.body));

    const source = service.update(existing.id, input);

    res.json(formatDataSource(source));
  } catch (error) {
    sendErrorResponse(res, error, 'updating data source');
  }
}
