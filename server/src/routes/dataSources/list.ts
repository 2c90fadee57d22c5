import { Request, Response } from 'express';
import { getActor } from '../../auth';
import { DataSourceService } from '../../services/dataSources';
import { sendErrorResponse } from '../../utils/errors';
import { parseDataSourceFilters, parsePagination } from '../../utils/validation';
import { formatDataSourceList } from '../formatters';

/**
 * Admins see every data source; everyone else sees what they created plus
 * what belongs to their teams.
 */
export function listDataSources(req: Request, res: Response): void {
  try {
    const actor = getActor(req);
    const options = { ...parseDataSourceFilters(req.query), ...parsePagination(req.query) };
    const service = new DataSourceService();

    const sources = actor.role === 'admin'
      ? service.list(options)
      : service.listAccessible(actor.id, options);

    res.json(formatDataSourceList(sources));
  } catch (error) {
    sendErrorResponse(res, error, 'listing data sources');
  }
}

export function listMyDataSources(req: Request, res: Response): void {
  try {
    const actor = getActor(req);
    const options = { ...parseDataSourceFilters(req.query), ...parsePagination(req.query) };

    const sources = new DataSourceService().listAccessible(actor.id, options);

    res.json(formatDataSourceList(sources));
  } catch (error) {
    sendErrorResponse(res, error, 'listing own data sources');
  }
}
