import {
  AccountRole,
  AccountSummary,
  AuthProvider,
  DataSource,
  Team,
} from '../../db/types';

/** Single-record data source response; `config.password` is masked. */
export type FormattedDataSource = DataSource;

// Data source list responses omit the config
export type FormattedDataSourceListItem = Pick<
  DataSource,
  'id' | 'title' | 'type' | 'status' | 'created_by' | 'team_id' | 'created_at'
>;

export interface FormattedTeamListItem extends Team {
  member_count: number;
  data_source_count: number;
}

export interface FormattedTeamDetail extends Team {
  owner: AccountSummary | null;
  members: AccountSummary[];
  managers: AccountSummary[];
}

// Sessions are listed without their bearer token
export interface FormattedSessionListItem {
  id: string;
  created_at: string;
  expires_at: string;
  ip_address: string | null;
  is_active: boolean;
}

export interface FormattedAccount {
  id: string;
  email: string;
  username: string;
  name: string | null;
  role: AccountRole;
  provider: AuthProvider;
  avatar_url: string | null;
  email_verified: boolean;
  created_at: string;
  updated_at: string;
}
