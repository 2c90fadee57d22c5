import { Request, Response } from 'express';
import { AuthorizationService, assertAuthorized, getActor } from '../../auth';
import { DataSourceService } from '../../services/dataSources';
import { sendErrorResponse } from '../../utils/errors';
import { parsePagination } from '../../utils/validation';
import { formatDataSourceList } from '../formatters';

export function listByCreator(req: Request, res: Response): void {
  try {
    const { accountId } = req.params;
    assertAuthorized(AuthorizationService.checkAccountScope(getActor(req), accountId));

    const sources = new DataSourceService().listByCreator(accountId, parsePagination(req.query));

    res.json(formatDataSourceList(sources));
  } catch (error) {
    sendErrorResponse(res, error, 'listing data sources by creator');
  }
}

export function listByTeam(req: Request, res: Response): void {
  try {
    const { teamId } = req.params;
    assertAuthorized(AuthorizationService.checkTeamScope(getActor(req), teamId));

    const sources = new DataSourceService().listByTeam(teamId, parsePagination(req.query));

    res.json(formatDataSourceList(sources));
  } catch (error) {
    sendErrorResponse(res, error, 'listing data sources by team');
  }
}

export function listForAccountTeams(req: Request, res: Response): void {
  try {
    const { accountId } = req.params;
    assertAuthorized(AuthorizationService.checkAccountScope(getActor(req), accountId));

    const sources = new DataSourceService().listForAccountTeams(accountId, parsePagination(req.query));

    res.json(formatDataSourceList(sources));
  } catch (error) {
    sendErrorResponse(res, error, 'listing data sources for account teams');
  }
}
