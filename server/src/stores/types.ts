import {
  AccountRole,
  AuthProvider,
  DataSourceConfig,
  DataSourceStatus,
  DataSourceType,
} from '../db/types';

// Offset/limit pagination
export interface ListOptions {
  limit?: number;
  offset?: number;
}

// Data source filter options
export interface DataSourceListOptions extends ListOptions {
  type?: DataSourceType;
  status?: DataSourceStatus;
}

/**
 * Which rows a data source listing may return.
 * `accessible` is the union of rows created by the account and rows
 * belonging to any of `teamIds`.
 */
export type DataSourceScope =
  | { kind: 'all' }
  | { kind: 'creator'; accountId: string }
  | { kind: 'teams'; teamIds: string[] }
  | { kind: 'accessible'; accountId: string; teamIds: string[] };

// Input types for store operations

export interface AccountCreateInput {
  email: string;
  username: string;
  name?: string | null;
  role?: AccountRole;
  provider?: AuthProvider;
  provider_account_id?: string | null;
  avatar_url?: string | null;
}

export interface AccountUpdateInput {
  name?: string | null;
  username?: string;
  avatar_url?: string | null;
  role?: AccountRole;
}

export interface TeamCreateInput {
  name: string;
  avatar_url?: string | null;
  owner_id: string | null;
}

export interface TeamUpdateInput {
  name?: string;
  avatar_url?: string | null;
}

export interface SessionCreateInput {
  account_id: string;
  expires_at: string;
  ip_address?: string | null;
}

export interface DataSourceCreateInput {
  title: string;
  type: DataSourceType;
  created_by: string | null;
  team_id: string | null;
  config: DataSourceConfig;
}

/**
 * Partial update. `undefined` leaves a column untouched; `null` on
 * `team_id` clears it.
 */
export interface DataSourceUpdateInput {
  title?: string;
  status?: DataSourceStatus;
  team_id?: string | null;
  config?: DataSourceConfig;
}
