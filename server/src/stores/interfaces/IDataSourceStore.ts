import { DataSource } from '../../db/types';
import {
  DataSourceCreateInput,
  DataSourceUpdateInput,
  DataSourceListOptions,
  DataSourceScope,
} from '../types';

/**
 * Store interface for DataSource entity operations
 */
export interface IDataSourceStore {
  // Find operations
  findById(id: string): DataSource | undefined;
  findByTitle(title: string): DataSource | undefined;
  findAll(scope: DataSourceScope, options?: DataSourceListOptions): DataSource[];

  // Write operations
  create(input: DataSourceCreateInput): DataSource;
  update(id: string, input: DataSourceUpdateInput): DataSource | undefined;
  delete(id: string): boolean;
}
