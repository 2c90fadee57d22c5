import { Request, Response } from 'express';
import { DataSourceService } from '../../services/dataSources';
import { sendErrorResponse } from '../../utils/errors';
import { loadAuthorizedDataSource } from './access';

export function deleteDataSource(req: Request, res: Response): void {
  try {
    const service = new DataSourceService();
    const existing = loadAuthorizedDataSource(req, service);

    service.delete(existing.id);

    res.json({ message: 'Data source deleted successfully' });
  } catch (error) {
    sendErrorResponse(res, error, 'deleting data source');
  }
}
