import { DataSource } from '../../db/types';
import { maskConfigPassword } from '../../services/dataSources/configSchemas';
import { FormattedDataSource, FormattedDataSourceListItem } from './types';

/**
 * Format a data source for single-record endpoints
 */
export function formatDataSource(source: DataSource): FormattedDataSource {
  return {
    ...source,
    config: maskConfigPassword(source.config),
  };
}

export function formatDataSourceListItem(source: DataSource): FormattedDataSourceListItem {
  return {
    id: source.id,
    title: source.title,
    type: source.type,
    status: source.status,
    created_by: source.created_by,
    team_id: source.team_id,
    created_at: source.created_at,
  };
}

export function formatDataSourceList(sources: DataSource[]): FormattedDataSourceListItem[] {
  return sources.map(formatDataSourceListItem);
}
