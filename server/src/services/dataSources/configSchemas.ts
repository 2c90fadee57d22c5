import {
  BaseConnectionConfig,
  DataSourceConfigMap,
  DataSourceType,
  DATA_SOURCE_TYPES,
  MySqlConfig,
  OracleConfig,
  PostgresConfig,
  SslMode,
  SSL_MODES,
} from '../../db/types';
import { ValidationError } from '../../utils/errors';

export const PASSWORD_MASK = '********';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;
export const MIN_CONNECT_TIMEOUT = 1;
export const MAX_CONNECT_TIMEOUT = 300;
export const DEFAULT_CONNECT_TIMEOUT = 10;
export const DEFAULT_MYSQL_CHARSET = 'utf8mb4';

type RawConfig = Record<string, unknown>;

/**
 * Turns a loosely-typed config mapping into the validated shape for one
 * data source type. Unknown keys are dropped.
 */
type ConfigSchema<T> = (raw: RawConfig) => T;

function fieldName(name: string): string {
  return `config.${name}`;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Field readers
// ============================================================================

function lengthMessage(name: string, min: number, max?: number): string {
  if (max === undefined) {
    return `${fieldName(name)} must be at least ${min} character${min === 1 ? '' : 's'}`;
  }
  if (min === 0) {
    return `${fieldName(name)} must be at most ${max} characters`;
  }
  return `${fieldName(name)} must be between ${min} and ${max} characters`;
}

function readString(raw: RawConfig, name: string, min: number, max?: number): string {
  const value = raw[name];
  if (value === undefined || value === null) {
    throw new ValidationError(`${fieldName(name)} is required`, fieldName(name));
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName(name)} must be a string`, fieldName(name));
  }
  if (value.length < min || (max !== undefined && value.length > max)) {
    throw new ValidationError(lengthMessage(name, min, max), fieldName(name));
  }
  return value;
}

function readOptionalString(raw: RawConfig, name: string, max: number, fallback: string): string {
  if (raw[name] === undefined) {
    return fallback;
  }
  return readString(raw, name, 0, max);
}

function readNullableString(raw: RawConfig, name: string, max: number): string | null {
  const value = raw[name];
  if (value === undefined || value === null) {
    return null;
  }
  return readString(raw, name, 0, max);
}

function readInteger(
  raw: RawConfig,
  name: string,
  min: number,
  max: number,
  fallback?: number
): number {
  const value = raw[name];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (value === undefined || value === null) {
    throw new ValidationError(`${fieldName(name)} is required`, fieldName(name));
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(
      `${fieldName(name)} must be an integer between ${min} and ${max}`,
      fieldName(name)
    );
  }
  return value;
}

function readBoolean(raw: RawConfig, name: string, fallback: boolean): boolean {
  const value = raw[name];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${fieldName(name)} must be a boolean`, fieldName(name));
  }
  return value;
}

function readSslMode(raw: RawConfig): SslMode | null {
  const value = raw.ssl_mode;
  if (value === undefined || value === null) {
    return null;
  }
  const mode = SSL_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new ValidationError(
      `${fieldName('ssl_mode')} must be one of: ${SSL_MODES.join(', ')}`,
      fieldName('ssl_mode')
    );
  }
  return mode;
}

// ============================================================================
// Schemas
// ============================================================================

function readBase(raw: RawConfig): BaseConnectionConfig {
  return {
    host: readString(raw, 'host', 1, 255),
    port: readInteger(raw, 'port', MIN_PORT, MAX_PORT),
    username: readString(raw, 'username', 1, 255),
    password: readString(raw, 'password', 1),
  };
}

const postgresSchema: ConfigSchema<PostgresConfig> = (raw) => ({
  ...readBase(raw),
  database: readString(raw, 'database', 1, 255),
  ssl: readBoolean(raw, 'ssl', false),
  ssl_mode: readSslMode(raw),
  connect_timeout: readInteger(
    raw, 'connect_timeout', MIN_CONNECT_TIMEOUT, MAX_CONNECT_TIMEOUT, DEFAULT_CONNECT_TIMEOUT
  ),
  application_name: readNullableString(raw, 'application_name', 255),
});

const mysqlSchema: ConfigSchema<MySqlConfig> = (raw) => ({
  ...readBase(raw),
  database: readString(raw, 'database', 1, 255),
  ssl: readBoolean(raw, 'ssl', false),
  charset: readOptionalString(raw, 'charset', 50, DEFAULT_MYSQL_CHARSET),
  connect_timeout: readInteger(
    raw, 'connect_timeout', MIN_CONNECT_TIMEOUT, MAX_CONNECT_TIMEOUT, DEFAULT_CONNECT_TIMEOUT
  ),
});

const oracleSchema: ConfigSchema<OracleConfig> = (raw) => ({
  ...readBase(raw),
  service_name: readString(raw, 'service_name', 1, 255),
});

const CONFIG_SCHEMAS: { [K in DataSourceType]: ConfigSchema<DataSourceConfigMap[K]> } = {
  postgresql: postgresSchema,
  mysql: mysqlSchema,
  oracle: oracleSchema,
};

// ============================================================================
// Public API
// ============================================================================

export function isDataSourceType(value: unknown): value is DataSourceType {
  return DATA_SOURCE_TYPES.some((type) => type === value);
}

/**
 * Narrow an untrusted type tag.
 * @throws ValidationError on field `type` for anything outside the closed set
 */
export function parseDataSourceType(value: unknown): DataSourceType {
  if (!isDataSourceType(value)) {
    throw new ValidationError(
      `type must be one of: ${DATA_SOURCE_TYPES.join(', ')}`,
      'type'
    );
  }
  return value;
}

/**
 * Validate `raw` against the schema registered for `type`, filling defaults.
 * The result is the normalized value that gets persisted.
 * @throws ValidationError naming the first offending field
 */
export function validateDataSourceConfig<K extends DataSourceType>(
  type: K,
  raw: unknown
): DataSourceConfigMap[K] {
  if (!isRecord(raw)) {
    throw new ValidationError('config must be an object', 'config');
  }
  return CONFIG_SCHEMAS[type](raw);
}

/**
 * Shallow copy with `password` replaced by {@link PASSWORD_MASK} when present.
 */
export function maskConfigPassword<T extends object>(config: T): T {
  if (!Object.prototype.hasOwnProperty.call(config, 'password')) {
    return { ...config };
  }
  return { ...config, password: PASSWORD_MASK };
}
