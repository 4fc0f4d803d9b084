import { describe, it, expect } from 'vitest';
import { ValidationError } from '@core/errors';
import {
  caseListQuerySchema,
  checkinInputSchema,
  inboxQuerySchema,
  isRecordId,
  notificationQuerySchema,
  openCaseSchema,
  parseInput,
  registerPersonSchema,
  validate,
} from '@core/validation';

describe('checkinInputSchema', () => {
  const valid = {
    housingStatus: 'stable',
    jobStatus: 'training',
    mentalState: 'moderate',
    familyStatus: 'neutral',
  };

  it('fills in empty notes', () => {
    const result = validate(checkinInputSchema, valid);
    expect(result).toEqual({ success: true, data: { ...valid, notes: '' } });
  });

  it('rejects values outside the enumerations with the field path', () => {
    const result = validate(checkinInputSchema, { ...valid, mentalState: 'great' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.startsWith('mentalState: ')).toBe(true);
    }
  });

  it('rejects a month index outside 1..12', () => {
    expect(validate(checkinInputSchema, { ...valid, monthIndex: 0 }).success).toBe(false);
    expect(validate(checkinInputSchema, { ...valid, monthIndex: 13 }).success).toBe(false);
    expect(validate(checkinInputSchema, { ...valid, monthIndex: 12 }).success).toBe(true);
  });
});

describe('registerPersonSchema', () => {
  it('trims the national ID and defaults the role', () => {
    expect(parseInput(registerPersonSchema, { nationalId: ' 1234567890 ', fullName: 'A B' })).toEqual({
      nationalId: '1234567890',
      fullName: 'A B',
      role: 'beneficiary',
      phone: '',
    });
  });

  it('rejects national IDs longer than 10 characters', () => {
    expect(() =>
      parseInput(registerPersonSchema, { nationalId: '12345678901', fullName: 'A B' }),
    ).toThrow(ValidationError);
  });
});

describe('openCaseSchema', () => {
  it('rejects impossible calendar dates', () => {
    const result = validate(openCaseSchema, { personId: 'p-1', releaseDate: '2026-02-30' });
    expect(result).toEqual({ success: false, error: 'releaseDate: Expected a YYYY-MM-DD date' });
  });

  it('defaults city and caseworker', () => {
    const data = parseInput(openCaseSchema, { personId: 'p-1', releaseDate: '2026-02-28' });
    expect(data.city).toBe('riyadh');
    expect(data.assignedCaseWorkerId).toBeNull();
    expect(data.followupEndDate).toBeUndefined();
  });

  it('rejects a follow-up end before the release date', () => {
    const result = validate(openCaseSchema, {
      personId: 'p-1',
      releaseDate: '2026-03-01',
      followupEndDate: '2026-02-28',
    });
    expect(result).toEqual({
      success: false,
      error: 'followupEndDate: Follow-up end date cannot be before the release date',
    });
  });

  it('accepts a follow-up end on the release date', () => {
    const data = parseInput(openCaseSchema, {
      personId: 'p-1',
      releaseDate: '2026-03-01',
      followupEndDate: '2026-03-01',
    });
    expect(data.followupEndDate).toBe('2026-03-01');
  });
});

describe('inboxQuerySchema', () => {
  it('coerces limit and reads unread as a boolean', () => {
    expect(parseInput(inboxQuerySchema, { limit: '5', unread: 'true' })).toEqual({
      unreadOnly: true,
      limit: 5,
    });
    expect(parseInput(inboxQuerySchema, {})).toEqual({ unreadOnly: false, limit: undefined });
  });

  it.each(['-1', '0', '101', '2.5', 'abc'])('rejects limit %s', (limit) => {
    expect(() => parseInput(inboxQuerySchema, { limit })).toThrow(ValidationError);
  });

  it('rejects an unread flag other than true or false', () => {
    expect(validate(inboxQuerySchema, { unread: 'yes' }).success).toBe(false);
  });
});

describe('notificationQuerySchema', () => {
  it('bounds the limit', () => {
    expect(validate(notificationQuerySchema, { limit: 100 }).success).toBe(true);
    expect(validate(notificationQuerySchema, { limit: -1 }).success).toBe(false);
  });
});

describe('isRecordId', () => {
  it('accepts UUIDs only', () => {
    expect(isRecordId('7d444840-9dc0-11d1-b245-5ffdce74fad2')).toBe(true);
    expect(isRecordId('abc')).toBe(false);
    expect(isRecordId('')).toBe(false);
  });
});

describe('caseListQuerySchema', () => {
  it('reads includeCompleted as a boolean', () => {
    expect(parseInput(caseListQuerySchema, {}).includeCompleted).toBe(false);
    expect(parseInput(caseListQuerySchema, { includeCompleted: 'true' }).includeCompleted).toBe(true);
  });
});
