import { ValidationError } from './errors';
import {
  AccountRole,
  ACCOUNT_ROLES,
  DataSourceStatus,
  DataSourceType,
  DATA_SOURCE_STATUSES,
} from '../db/types';
import { parseDataSourceType } from '../services/dataSources/configSchemas';

// ============================================================================
// Pagination
// ============================================================================

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

export const MAX_TITLE_LENGTH = 255;
export const MAX_TEAM_NAME_LENGTH = 255;
export const MIN_USERNAME_LENGTH = 3;
export const MAX_USERNAME_LENGTH = 100;
export const MAX_ACCOUNT_NAME_LENGTH = 255;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Check if a value is a non-empty string
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Treat a request body or query as a field mapping; anything else reads as empty.
 */
export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return { ...value };
}

/**
 * Check if a value is a string (can be empty)
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isDataSourceStatus(value: unknown): value is DataSourceStatus {
  return DATA_SOURCE_STATUSES.some((status) => status === value);
}

export function isAccountRole(value: unknown): value is AccountRole {
  return ACCOUNT_ROLES.some((role) => role === value);
}

// Any 1..255 character string; stored exactly as given
function validateTitle(value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError('title is required and must be a non-empty string', 'title');
  }
  if (value.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(`title must be at most ${MAX_TITLE_LENGTH} characters`, 'title');
  }
  return value;
}

function validateStatus(value: unknown): DataSourceStatus {
  if (!isDataSourceStatus(value)) {
    throw new ValidationError(
      `status must be one of: ${DATA_SOURCE_STATUSES.join(', ')}`,
      'status'
    );
  }
  return value;
}

function validateOptionalTeamId(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isNonEmptyString(value)) {
    throw new ValidationError('team_id must be a non-empty string or null', 'team_id');
  }
  return value;
}

// ============================================================================
// Query Parsing
// ============================================================================

export interface Pagination {
  offset: number;
  limit: number;
}

function parseIntegerParam(value: unknown, field: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value !== 'string' || !/^-?\d+$/.test(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
  const parsed = parseInt(value, 10);
  // Past this SQLite receives a REAL and rejects it as LIMIT/OFFSET
  if (!Number.isSafeInteger(parsed)) {
    throw new ValidationError(`${field} is out of range`, field);
  }
  return parsed;
}

/**
 * Read `skip` and `limit` from a query string.
 * @throws ValidationError when skip is negative or limit is outside 1..100
 */
export function parsePagination(query: Record<string, unknown>): Pagination {
  const skip = parseIntegerParam(query.skip, 'skip') ?? 0;
  const limit = parseIntegerParam(query.limit, 'limit') ?? DEFAULT_PAGE_LIMIT;

  if (skip < 0) {
    throw new ValidationError('skip must be greater than or equal to 0', 'skip');
  }
  if (limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new ValidationError(`limit must be between 1 and ${MAX_PAGE_LIMIT}`, 'limit');
  }

  return { offset: skip, limit };
}

export interface DataSourceFilters {
  type?: DataSourceType;
  status?: DataSourceStatus;
}

/**
 * Read the optional `type` and `status` filters from a query string.
 */
export function parseDataSourceFilters(query: Record<string, unknown>): DataSourceFilters {
  const filters: DataSourceFilters = {};
  if (query.type !== undefined && query.type !== '') {
    filters.type = parseDataSourceType(query.type);
  }
  if (query.status !== undefined && query.status !== '') {
    filters.status = validateStatus(query.status);
  }
  return filters;
}

// ============================================================================
// Data Source Validation
// ============================================================================

export interface ValidatedDataSourceInput {
  title: string;
  type: DataSourceType;
  team_id: string | null;
  config: unknown;
}

export interface ValidatedDataSourceUpdateInput {
  title?: string;
  status?: DataSourceStatus;
  team_id?: string | null;
  config?: unknown;
}

/**
 * Validate data source creation input. `config` is left for the schema
 * registry of the resolved type. A client-supplied `status` is ignored.
 * @throws ValidationError if validation fails
 */
export function validateDataSourceCreate(input: Record<string, unknown>): ValidatedDataSourceInput {
  const title = validateTitle(input.title);
  const type = parseDataSourceType(input.type);

  if (input.config === undefined || input.config === null) {
    throw new ValidationError('config is required', 'config');
  }

  return {
    title,
    type,
    team_id: validateOptionalTeamId(input.team_id),
    config: input.config,
  };
}

/**
 * Validate a partial data source update. Omitted fields stay omitted;
 * `team_id: null` is kept so it can clear the team.
 * @throws ValidationError if validation fails or nothing would change
 */
export function validateDataSourceUpdate(
  input: Record<string, unknown>
): ValidatedDataSourceUpdateInput {
  const result: ValidatedDataSourceUpdateInput = {};
  let hasUpdates = false;

  // type is fixed at creation
  if (input.type !== undefined) {
    throw new ValidationError('type cannot be changed after creation', 'type');
  }

  if (input.title !== undefined) {
    result.title = validateTitle(input.title);
    hasUpdates = true;
  }

  if (input.status !== undefined) {
    result.status = validateStatus(input.status);
    hasUpdates = true;
  }

  if (input.team_id !== undefined) {
    result.team_id = validateOptionalTeamId(input.team_id);
    hasUpdates = true;
  }

  if (input.config !== undefined) {
    if (input.config === null) {
      throw new ValidationError('config must be an object', 'config');
    }
    result.config = input.config;
    hasUpdates = true;
  }

  if (!hasUpdates) {
    throw new ValidationError('No valid fields to update');
  }

  return result;
}

// ============================================================================
// Team Validation
// ============================================================================

export interface ValidatedTeamInput {
  name: string;
  avatar_url: string | null;
}

export interface ValidatedTeamUpdateInput {
  name?: string;
  avatar_url?: string | null;
}

function validateTeamName(value: unknown): string {
  if (!isNonEmptyString(value)) {
    throw new ValidationError('name is required and must be a non-empty string', 'name');
  }
  const name = value.trim();
  if (name.length > MAX_TEAM_NAME_LENGTH) {
    throw new ValidationError(`name must be at most ${MAX_TEAM_NAME_LENGTH} characters`, 'name');
  }
  return name;
}

function validateAvatarUrl(value: unknown): string | null {
  if (value === null) {
    return null;
  }
  if (!isString(value)) {
    throw new ValidationError('avatar_url must be a string or null', 'avatar_url');
  }
  return value || null;
}

/**
 * Validate team creation input
 * @throws ValidationError if validation fails
 */
export function validateTeamCreate(input: Record<string, unknown>): ValidatedTeamInput {
  return {
    name: validateTeamName(input.name),
    avatar_url: input.avatar_url === undefined ? null : validateAvatarUrl(input.avatar_url),
  };
}

/**
 * Validate team update input
 * @throws ValidationError if validation fails or nothing would change
 */
export function validateTeamUpdate(input: Record<string, unknown>): ValidatedTeamUpdateInput {
  const result: ValidatedTeamUpdateInput = {};

  if (input.name !== undefined) {
    result.name = validateTeamName(input.name);
  }
  if (input.avatar_url !== undefined) {
    result.avatar_url = validateAvatarUrl(input.avatar_url);
  }

  if (result.name === undefined && result.avatar_url === undefined) {
    throw new ValidationError('No valid fields to update');
  }

  return result;
}

/**
 * Validate the `account_ids` list used by member and manager endpoints.
 * Duplicates are collapsed.
 */
export function validateAccountIds(input: Record<string, unknown>): string[] {
  const value = input.account_ids;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError('account_ids must be a non-empty array', 'account_ids');
  }
  const ids: string[] = [];
  for (const id of value) {
    if (!isNonEmptyString(id)) {
      throw new ValidationError('account_ids must contain only non-empty strings', 'account_ids');
    }
    if (!ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

// ============================================================================
// Account Validation
// ============================================================================

/**
 * Validate a role change request
 * @throws ValidationError if validation fails
 */
export function validateAccountRole(input: Record<string, unknown>): AccountRole {
  if (!isAccountRole(input.role)) {
    throw new ValidationError(`role must be one of: ${ACCOUNT_ROLES.join(', ')}`, 'role');
  }
  return input.role;
}

export interface ValidatedProfileUpdateInput {
  name?: string | null;
  username?: string;
  avatar_url?: string | null;
}

function validateAccountName(value: unknown): string | null {
  if (value === null || value === '') {
    return null;
  }
  if (!isString(value)) {
    throw new ValidationError('name must be a string or null', 'name');
  }
  if (value.length > MAX_ACCOUNT_NAME_LENGTH) {
    throw new ValidationError(`name must be at most ${MAX_ACCOUNT_NAME_LENGTH} characters`, 'name');
  }
  return value;
}

function validateUsername(value: unknown): string {
  if (
    !isString(value) ||
    value.length < MIN_USERNAME_LENGTH ||
    value.length > MAX_USERNAME_LENGTH
  ) {
    throw new ValidationError(
      `username must be between ${MIN_USERNAME_LENGTH} and ${MAX_USERNAME_LENGTH} characters`,
      'username'
    );
  }
  return value;
}

/**
 * Validate a self-service profile update. Role, email and verification
 * are not editable here and are ignored.
 * @throws ValidationError if validation fails or nothing would change
 */
export function validateProfileUpdate(input: Record<string, unknown>): ValidatedProfileUpdateInput {
  const result: ValidatedProfileUpdateInput = {};

  if (input.name !== undefined) {
    result.name = validateAccountName(input.name);
  }
  if (input.username !== undefined) {
    result.username = validateUsername(input.username);
  }
  if (input.avatar_url !== undefined) {
    result.avatar_url = validateAvatarUrl(input.avatar_url);
  }

  if (Object.keys(result).length === 0) {
    throw new ValidationError('No valid fields to update');
  }

  return result;
}
