// src/followup-core/timeline.ts
// Program timeline arithmetic. Pure functions over calendar dates.

import { PROGRAM_MONTHS } from '@shared/constants';

const DAY_MS = 24 * 60 * 60 * 1000;
const DAYS_PER_PROGRAM_MONTH = 30;
const FOLLOWUP_LENGTH_DAYS = 365;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a YYYY-MM-DD calendar date to its UTC midnight timestamp.
 * Returns null for anything that is not a real calendar date.
 */
export function parseCalendarDate(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const ts = Date.UTC(Number(y), Number(m) - 1, Number(d));
  const check = new Date(ts);
  if (
    check.getUTCFullYear() !== Number(y) ||
    check.getUTCMonth() !== Number(m) - 1 ||
    check.getUTCDate() !== Number(d)
  ) {
    return null;
  }
  return ts;
}

export function formatCalendarDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

/** Calendar date (UTC) of an instant. */
export function toCalendarDate(instant: Date): string {
  return formatCalendarDate(
    Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate()),
  );
}

function daysBetween(fromTs: number, to: Date): number {
  const toTs = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate());
  return Math.round((toTs - fromTs) / DAY_MS);
}

/**
 * Month of the follow-up program the beneficiary is in: 30-day blocks since
 * release, 1-based, clamped to [1, 12]. 0 means there is no timeline (no or
 * unreadable release date).
 */
export function currentMonth(releaseDate: string | null | undefined, today: Date): number {
  if (!releaseDate) return 0;
  const releaseTs = parseCalendarDate(releaseDate);
  if (releaseTs === null) return 0;

  const month = Math.floor(daysBetween(releaseTs, today) / DAYS_PER_PROGRAM_MONTH) + 1;
  return Math.min(PROGRAM_MONTHS, Math.max(1, month));
}

export function progressPercentage(month: number): number {
  return Math.min(100, Math.round((month / PROGRAM_MONTHS) * 100));
}

export function defaultFollowupEnd(releaseDate: string): string {
  const releaseTs = parseCalendarDate(releaseDate);
  if (releaseTs === null) {
    throw new RangeError(`Invalid release date: ${releaseDate}`);
  }
  return formatCalendarDate(releaseTs + FOLLOWUP_LENGTH_DAYS * DAY_MS);
}

/**
 * Keeps a follow-up end date that was supplied (manual override) and only
 * falls back to release + 365 days when none was.
 */
export function resolveFollowupEnd(
  releaseDate: string,
  followupEndDate?: string | null,
): string {
  return followupEndDate || defaultFollowupEnd(releaseDate);
}

export interface TimelineView {
  releaseDate: string;
  followupEndDate: string;
  currentMonth: number;
  progressPercentage: number;
  /** True once the calendar has reached the follow-up end date. */
  periodElapsed: boolean;
}

export function describeTimeline(
  record: { releaseDate: string; followupEndDate: string },
  today: Date,
): TimelineView {
  const month = currentMonth(record.releaseDate, today);
  return {
    releaseDate: record.releaseDate,
    followupEndDate: record.followupEndDate,
    currentMonth: month,
    progressPercentage: progressPercentage(month),
    periodElapsed: toCalendarDate(today) >= record.followupEndDate,
  };
}
