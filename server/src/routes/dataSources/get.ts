import { Request, Response } from 'express';
import { DataSourceService } from '../../services/dataSources';
import { sendErrorResponse } from '../../utils/errors';
import { formatDataSource } from '../formatters';
import { loadAuthorizedDataSource } from './access';

export function getDataSource(req: Request, res: Response): void {
  try {
    const source = loadAuthorizedDataSource(req, new DataSourceService());
    res.json(formatDataSource(source));
  } catch (error) {
    sendErrorResponse(res, error, 'fetching data source');
  }
}
