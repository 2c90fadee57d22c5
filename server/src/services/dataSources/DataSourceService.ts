import {
  getStores,
  StoreRegistry,
  ListOptions,
  DataSourceListOptions,
  DataSourceUpdateInput,
} from '../../stores';
import { DataSource } from '../../db/types';
import { ConflictError, NotFoundError, isUniqueConstraintError } from '../../utils/errors';
import {
  ValidatedDataSourceInput,
  ValidatedDataSourceUpdateInput,
} from '../../utils/validation';
import logger from '../../utils/logger';
import { validateDataSourceConfig } from './configSchemas';

const TITLE_CONFLICT_MESSAGE = 'A data source with this title already exists';

/**
 * Repository operations over data sources. Authorization is the caller's
 * job; every method here assumes the actor is already allowed.
 */
export class DataSourceService {
  constructor(private stores: StoreRegistry = getStores()) {}

  /**
   * Validate the config for the declared type and insert a new record in
   * `pending` status.
   * @throws ValidationError, NotFoundError('Team') or ConflictError
   */
  create(input: ValidatedDataSourceInput, createdBy: string): DataSource {
    const config = validateDataSourceConfig(input.type, input.config);

    if (input.team_id !== null) {
      this.requireTeam(input.team_id);
    }

    if (this.stores.dataSources.findByTitle(input.title)) {
      throw new ConflictError(TITLE_CONFLICT_MESSAGE);
    }

    const source = this.withTitleConflict(() =>
      this.stores.dataSources.create({
        title: input.title,
        type: input.type,
        created_by: createdBy,
        team_id: input.team_id,
        config,
      })
    );

    logger.info({ dataSourceId: source.id, type: source.type, createdBy }, 'data source created');
    return source;
  }

  getById(id: string): DataSource {
    const source = this.stores.dataSources.findById(id);
    if (!source) {
      throw new NotFoundError('Data source');
    }
    return source;
  }

  /**
   * Apply a partial update. A new config is validated against the
   * record's existing type.
   */
  update(id: string, input: ValidatedDataSourceUpdateInput): DataSource {
    const existing = this.getById(id);
    const changes: DataSourceUpdateInput = {};

    if (input.title !== undefined) {
      const duplicate = this.stores.dataSources.findByTitle(input.title);
      if (duplicate && duplicate.id !== id) {
        throw new ConflictError(TITLE_CONFLICT_MESSAGE);
      }
      changes.title = input.title;
    }

    if (input.status !== undefined) {
      changes.status = input.status;
    }

    if (input.team_id !== undefined) {
      if (input.team_id !== null) {
        this.requireTeam(input.team_id);
      }
      changes.team_id = input.team_id;
    }

    if (input.config !== undefined) {
      changes.config = validateDataSourceConfig(existing.type, input.config);
    }

    const updated = this.withTitleConflict(() => this.stores.dataSources.update(id, changes));
    if (!updated) {
      throw new NotFoundError('Data source');
    }

    logger.info({ dataSourceId: id, fields: Object.keys(changes) }, 'data source updated');
    return updated;
  }

  delete(id: string): void {
    if (!this.stores.dataSources.delete(id)) {
      throw new NotFoundError('Data source');
    }
    logger.info({ dataSourceId: id }, 'data source deleted');
  }

  list(options: DataSourceListOptions): DataSource[] {
    return this.stores.dataSources.findAll({ kind: 'all' }, options);
  }

  listByCreator(accountId: string, page: ListOptions): DataSource[] {
    this.requireAccount(accountId);
    return this.stores.dataSources.findAll({ kind: 'creator', accountId }, page);
  }

  listByTeam(teamId: string, page: ListOptions): DataSource[] {
    this.requireTeam(teamId);
    return this.stores.dataSources.findAll({ kind: 'teams', teamIds: [teamId] }, page);
  }

  /**
   * Data sources attached to any team the account owns, belongs to or
   * manages. No teams yields an empty list.
   */
  listForAccountTeams(accountId: string, page: ListOptions): DataSource[] {
    this.requireAccount(accountId);
    const teamIds = this.stores.teams.getTeamIdsForAccount(accountId);
    if (teamIds.length === 0) {
      return [];
    }
    return this.stores.dataSources.findAll({ kind: 'teams', teamIds }, page);
  }

  /**
   * Everything the account may see: rows it created plus rows of its teams.
   */
  listAccessible(accountId: string, options: DataSourceListOptions): DataSource[] {
    this.requireAccount(accountId);
    const teamIds = this.stores.teams.getTeamIdsForAccount(accountId);
    return this.stores.dataSources.findAll({ kind: 'accessible', accountId, teamIds }, options);
  }

  private requireAccount(accountId: string): void {
    if (!this.stores.accounts.exists(accountId)) {
      throw new NotFoundError('Account');
    }
  }

  private requireTeam(teamId: string): void {
    if (!this.stores.teams.exists(teamId)) {
      throw new NotFoundError('Team');
    }
  }

  // A concurrent insert can pass the findByTitle check; the unique index catches it
  private withTitleConflict<T>(write: () => T): T {
    try {
      return write();
    } catch (error) {
      if (isUniqueConstraintError(error, 'data_sources.title')) {
        throw new ConflictError(TITLE_CONFLICT_MESSAGE);
      }
      throw error;
    }
  }
}
