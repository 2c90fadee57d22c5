import {
  asRecord,
  isNonEmptyString,
  parseDataSourceFilters,
  parsePagination,
  validateAccountIds,
  validateAccountRole,
  validateDataSourceCreate,
  validateDataSourceUpdate,
  validateTeamCreate,
  validateTeamUpdate,
  validateProfileUpdate,
  DEFAULT_PAGE_LIMIT,
} from './validation';
import { ValidationError } from './errors';

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('Validation helpers', () => {
  it('should detect non-empty strings', () => {
    expect(isNonEmptyString('a')).toBe(true);
    expect(isNonEmptyString('   ')).toBe(false);
    expect(isNonEmptyString(3)).toBe(false);
  });

  it('should read only plain objects as records', () => {
    expect(asRecord({ a: 1 })).toEqual({ a: 1 });
    expect(asRecord(null)).toEqual({});
    expect(asRecord(['a'])).toEqual({});
    expect(asRecord('text')).toEqual({});
  });
});

describe('parsePagination', () => {
  it('should default skip and limit', () => {
    expect(parsePagination({})).toEqual({ offset: 0, limit: DEFAULT_PAGE_LIMIT });
  });

  it('should parse both values', () => {
    expect(parsePagination({ skip: '40', limit: '100' })).toEqual({ offset: 40, limit: 100 });
  });

  it('should reject a limit outside 1..100', () => {
    expect(captureValidationError(() => parsePagination({ limit: '0' })).message)
      .toBe('limit must be between 1 and 100');
    expect(() => parsePagination({ limit: '101' })).toThrow(ValidationError);
  });

  it('should reject a negative skip', () => {
    const error = captureValidationError(() => parsePagination({ skip: '-1' }));
    expect(error.message).toBe('skip must be greater than or equal to 0');
    expect(error.field).toBe('skip');
  });

  it('should reject values beyond the safe integer range', () => {
    const error = captureValidationError(() => parsePagination({ skip: '9223372036854775807' }));
    expect(error.message).toBe('skip is out of range');
    expect(error.field).toBe('skip');
    expect(parsePagination({ skip: String(Number.MAX_SAFE_INTEGER) }).offset).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('should reject non-integer values', () => {
    expect(captureValidationError(() => parsePagination({ limit: '2.5' })).message)
      .toBe('limit must be an integer');
    expect(captureValidationError(() => parsePagination({ skip: ['1', '2'] })).message)
      .toBe('skip must be an integer');
  });
});

describe('parseDataSourceFilters', () => {
  it('should return no filters when none are given', () => {
    expect(parseDataSourceFilters({})).toEqual({});
    expect(parseDataSourceFilters({ type: '', status: '' })).toEqual({});
  });

  it('should accept known values', () => {
    expect(parseDataSourceFilters({ type: 'mysql', status: 'error' }))
      .toEqual({ type: 'mysql', status: 'error' });
  });

  it('should reject an unknown status', () => {
    expect(captureValidationError(() => parseDataSourceFilters({ status: 'broken' })).message)
      .toBe('status must be one of: active, inactive, error, pending');
  });
});

describe('validateDataSourceCreate', () => {
  const config = { host: 'db.internal' };

  it('should accept a minimal body', () => {
    expect(validateDataSourceCreate({ title: 'Orders DB', type: 'postgresql', config })).toEqual({
      title: 'Orders DB',
      type: 'postgresql',
      team_id: null,
      config,
    });
  });

  it('should keep the title as given', () => {
    expect(validateDataSourceCreate({ title: ' Orders ', type: 'oracle', config }).title).toBe(' Orders ');
  });

  it('should reject an empty or non-string title', () => {
    const error = captureValidationError(() =>
      validateDataSourceCreate({ title: '', type: 'postgresql', config })
    );
    expect(error.message).toBe('title is required and must be a non-empty string');
    expect(error.field).toBe('title');
    expect(() => validateDataSourceCreate({ title: 42, type: 'postgresql', config })).toThrow(ValidationError);
  });

  it('should accept a whitespace-only title', () => {
    expect(validateDataSourceCreate({ title: '   ', type: 'postgresql', config }).title).toBe('   ');
  });

  it('should reject a title longer than 255 characters', () => {
    expect(captureValidationError(() =>
      validateDataSourceCreate({ title: 'x'.repeat(256), type: 'postgresql', config })
    ).message).toBe('title must be at most 255 characters');
  });

  it('should reject a non-string team id', () => {
    expect(captureValidationError(() =>
      validateDataSourceCreate({ title: 'Orders DB', type: 'postgresql', team_id: 7, config })
    ).field).toBe('team_id');
  });
});

describe('validateDataSourceUpdate', () => {
  it('should keep only provided fields', () => {
    expect(validateDataSourceUpdate({ status: 'inactive' })).toEqual({ status: 'inactive' });
  });

  it('should keep an explicit null team', () => {
    expect(validateDataSourceUpdate({ team_id: null })).toEqual({ team_id: null });
  });

  it('should reject a null config', () => {
    expect(captureValidationError(() => validateDataSourceUpdate({ config: null })).message)
      .toBe('config must be an object');
  });

  it('should reject a type change', () => {
    expect(captureValidationError(() => validateDataSourceUpdate({ type: 'postgresql' })).field)
      .toBe('type');
  });

  it('should reject an empty update', () => {
    expect(captureValidationError(() => validateDataSourceUpdate({})).message)
      .toBe('No valid fields to update');
  });
});

describe('Team validation', () => {
  it('should trim the name and default the avatar', () => {
    expect(validateTeamCreate({ name: '  Payments ' })).toEqual({ name: 'Payments', avatar_url: null });
  });

  it('should reject a non-string avatar', () => {
    expect(captureValidationError(() => validateTeamCreate({ name: 'Payments', avatar_url: 5 })).message)
      .toBe('avatar_url must be a string or null');
  });

  it('should accept a partial update', () => {
    expect(validateTeamUpdate({ avatar_url: null })).toEqual({ avatar_url: null });
  });

  it('should reject an empty update', () => {
    expect(() => validateTeamUpdate({})).toThrow('No valid fields to update');
  });
});

describe('validateAccountIds', () => {
  it('should collapse duplicates preserving order', () => {
    expect(validateAccountIds({ account_ids: ['b', 'a', 'b'] })).toEqual(['b', 'a']);
  });

  it('should reject a missing list', () => {
    expect(captureValidationError(() => validateAccountIds({})).message)
      .toBe('account_ids must be a non-empty array');
  });

  it('should reject blank entries', () => {
    expect(captureValidationError(() => validateAccountIds({ account_ids: ['a', ''] })).message)
      .toBe('account_ids must contain only non-empty strings');
  });
});

describe('validateAccountRole', () => {
  it('should accept a known role', () => {
    expect(validateAccountRole({ role: 'manager' })).toBe('manager');
  });

  it('should reject anything else', () => {
    expect(() => validateAccountRole({ role: 'ADMIN' })).toThrow(ValidationError);
  });
});

describe('validateProfileUpdate', () => {
  it('should keep only profile fields', () => {
    expect(validateProfileUpdate({ name: '', username: 'carol', role: 'admin' })).toEqual({
      name: null,
      username: 'carol',
    });
  });

  it('should clear the avatar with an empty string', () => {
    expect(validateProfileUpdate({ avatar_url: '' })).toEqual({ avatar_url: null });
  });

  it('should bound the username length', () => {
    expect(captureValidationError(() => validateProfileUpdate({ username: 'x'.repeat(101) })).field)
      .toBe('username');
    expect(validateProfileUpdate({ username: 'abc' }).username).toBe('abc');
  });

  it('should reject a non-string name', () => {
    expect(captureValidationError(() => validateProfileUpdate({ name: 7 })).message)
      .toBe('name must be a string or null');
  });
});
