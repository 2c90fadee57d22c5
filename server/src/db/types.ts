// Account types
export type AccountRole = 'owner' | 'manager' | 'admin' | 'user';

export const ACCOUNT_ROLES: AccountRole[] = ['owner', 'manager', 'admin', 'user'];

export type AuthProvider = 'email' | 'google';

export interface Account {
  id: string;
  email: string;
  username: string;
  name: string | null;
  role: AccountRole;
  provider: AuthProvider;
  provider_account_id: string | null;
  avatar_url: string | null;
  email_verified: number; // SQLite boolean
  created_at: string;
  updated_at: string;
}

/**
 * The authenticated account performing a request.
 */
export type Actor = Pick<Account, 'id' | 'role'>;

// Team types
export interface Team {
  id: string;
  name: string;
  avatar_url: string | null;
  owner_id: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * The two many-to-many relations between teams and accounts.
 * Ownership is a column on the team itself.
 */
export type TeamRelation = 'members' | 'managers';

export interface AccountSummary {
  id: string;
  email: string;
  username: string;
  name: string | null;
  role: AccountRole;
  avatar_url: string | null;
}

// Session types
export interface Session {
  id: string;
  account_id: string;
  session_token: string;
  expires_at: string;
  created_at: string;
  ip_address: string | null;
  is_active: number; // SQLite boolean
}

// Data source types
export type DataSourceType = 'postgresql' | 'mysql' | 'oracle';

export const DATA_SOURCE_TYPES: DataSourceType[] = ['postgresql', 'mysql', 'oracle'];

export type DataSourceStatus = 'active' | 'inactive' | 'error' | 'pending';

export const DATA_SOURCE_STATUSES: DataSourceStatus[] = ['active', 'inactive', 'error', 'pending'];

export type SslMode = 'disable' | 'allow' | 'prefer' | 'require' | 'verify-ca' | 'verify-full';

export const SSL_MODES: SslMode[] = ['disable', 'allow', 'prefer', 'require', 'verify-ca', 'verify-full'];

/** Connection fields shared by every data source type. */
export interface BaseConnectionConfig {
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface PostgresConfig extends BaseConnectionConfig {
  database: string;
  ssl: boolean;
  ssl_mode: SslMode | null;
  connect_timeout: number;
  application_name: string | null;
}

export interface MySqlConfig extends BaseConnectionConfig {
  database: string;
  ssl: boolean;
  charset: string;
  connect_timeout: number;
}

export interface OracleConfig extends BaseConnectionConfig {
  service_name: string;
}

/** Validated configuration shape for each data source type. */
export interface DataSourceConfigMap {
  postgresql: PostgresConfig;
  mysql: MySqlConfig;
  oracle: OracleConfig;
}

export type DataSourceConfig = DataSourceConfigMap[DataSourceType];

/**
 * Row as stored in the data_sources table. `config` holds JSON text.
 */
export interface DataSourceRow {
  id: string;
  title: string;
  type: DataSourceType;
  status: DataSourceStatus;
  created_by: string | null;
  team_id: string | null;
  config: string;
  created_at: string;
  updated_at: string;
}

export interface DataSource extends Omit<DataSourceRow, 'config'> {
  config: DataSourceConfig;
}
