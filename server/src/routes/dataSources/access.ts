import { Request } from 'express';
import { AuthorizationService, assertAuthorized, getActor } from '../../auth';
import { DataSource } from '../../db/types';
import { DataSourceService } from '../../services/dataSources';

/**
 * Load the `:id` data source and apply the record-level access policy.
 * @throws NotFoundError before ForbiddenError
 */
export function loadAuthorizedDataSource(req: Request, service: DataSourceService): DataSource {
  const actor = getActor(req);
  const source = service.getById(req.params.id);

  assertAuthorized(
    AuthorizationService.checkResourceAccess(actor, {
      ownerId: source.created_by,
      teamId: source.team_id,
    })
  );

  return source;
}
