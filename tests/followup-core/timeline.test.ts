import { describe, it, expect } from 'vitest';
import {
  currentMonth,
  defaultFollowupEnd,
  describeTimeline,
  parseCalendarDate,
  progressPercentage,
  resolveFollowupEnd,
  toCalendarDate,
} from '@core/timeline';

const at = (iso: string) => new Date(`${iso}T12:00:00Z`);

describe('currentMonth', () => {
  it('is 1 on release day', () => {
    expect(currentMonth('2026-01-01', at('2026-01-01'))).toBe(1);
  });

  it('counts 30-day blocks since release', () => {
    expect(currentMonth('2026-01-01', at('2026-01-30'))).toBe(1);
    expect(currentMonth('2026-01-01', at('2026-01-31'))).toBe(2);
    // 90 days
    expect(currentMonth('2026-01-01', at('2026-04-01'))).toBe(4);
  });

  it('reaches month 12 at day 330 and stays there', () => {
    // 2025-01-01 + 330 days = 2025-11-27
    expect(currentMonth('2025-01-01', at('2025-11-26'))).toBe(11);
    expect(currentMonth('2025-01-01', at('2025-11-27'))).toBe(12);
    expect(currentMonth('2025-01-01', at('2026-06-01'))).toBe(12);
  });

  it('clamps a future release date to month 1', () => {
    expect(currentMonth('2026-05-01', at('2026-04-01'))).toBe(1);
  });

  it('returns 0 when there is no usable release date', () => {
    expect(currentMonth(null, at('2026-04-01'))).toBe(0);
    expect(currentMonth(undefined, at('2026-04-01'))).toBe(0);
    expect(currentMonth('not-a-date', at('2026-04-01'))).toBe(0);
  });

  it('ignores the time of day', () => {
    expect(currentMonth('2026-01-01', new Date('2026-01-31T00:00:01Z'))).toBe(2);
    expect(currentMonth('2026-01-01', new Date('2026-01-30T23:59:59Z'))).toBe(1);
  });
});

describe('progressPercentage', () => {
  it('rounds month / 12 to a whole percentage', () => {
    expect(progressPercentage(0)).toBe(0);
    expect(progressPercentage(1)).toBe(8);
    expect(progressPercentage(4)).toBe(33);
    expect(progressPercentage(6)).toBe(50);
    expect(progressPercentage(12)).toBe(100);
  });
});

describe('calendar dates', () => {
  it('rejects dates that do not exist', () => {
    expect(parseCalendarDate('2026-02-30')).toBeNull();
    expect(parseCalendarDate('2026-13-01')).toBeNull();
    expect(parseCalendarDate('2026-1-1')).toBeNull();
  });

  it('formats an instant as its UTC calendar date', () => {
    expect(toCalendarDate(new Date('2026-03-05T23:30:00Z'))).toBe('2026-03-05');
  });
});

describe('follow-up end date', () => {
  it('defaults to release + 365 days', () => {
    expect(defaultFollowupEnd('2026-01-01')).toBe('2027-01-01');
    expect(defaultFollowupEnd('2024-03-01')).toBe('2025-03-01');
    expect(defaultFollowupEnd('2024-01-01')).toBe('2024-12-31');
  });

  it('throws on an invalid release date', () => {
    expect(() => defaultFollowupEnd('2026-02-30')).toThrow(RangeError);
  });

  it('keeps a supplied end date', () => {
    expect(resolveFollowupEnd('2026-01-01', '2026-09-30')).toBe('2026-09-30');
    expect(resolveFollowupEnd('2026-01-01', null)).toBe('2027-01-01');
  });
});

describe('describeTimeline', () => {
  it('combines month, progress and elapsed flag', () => {
    const record = { releaseDate: '2026-01-01', followupEndDate: '2027-01-01' };
    expect(describeTimeline(record, at('2026-04-01'))).toEqual({
      releaseDate: '2026-01-01',
      followupEndDate: '2027-01-01',
      currentMonth: 4,
      progressPercentage: 33,
      periodElapsed: false,
    });
    expect(describeTimeline(record, at('2027-01-01')).periodElapsed).toBe(true);
  });
});
