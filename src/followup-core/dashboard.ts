import { PROGRAM_MONTHS } from '@shared/constants';
import { currentMonth } from './timeline';
import type { CaseRecord, City, JobOpportunityRecord, ReportRecord, RiskTier } from './types';

export interface MonthSlot {
  number: number;
  report: ReportRecord | null;
  isCurrent: boolean;
  isPast: boolean;
  isFuture: boolean;
}

export function buildMonthGrid(
  caseRecord: CaseRecord,
  reports: readonly ReportRecord[],
  today: Date,
): MonthSlot[] {
  const current = currentMonth(caseRecord.releaseDate, today);
  const byMonth = new Map(reports.map((r) => [r.monthIndex, r]));

  return Array.from({ length: PROGRAM_MONTHS }, (_, i) => {
    const number = i + 1;
    return {
      number,
      report: byMonth.get(number) ?? null,
      isCurrent: number === current,
      isPast: number < current,
      isFuture: number > current,
    };
  });
}

/** Tier counts over cases still in the program. */
export function countByTier(cases: readonly CaseRecord[]): Record<RiskTier, number> {
  const counts: Record<RiskTier, number> = { red: 0, yellow: 0, green: 0 };
  for (const c of cases) {
    if (!c.completed) counts[c.riskTier] += 1;
  }
  return counts;
}

/**
 * Active jobs with the beneficiary's city first, newest first within each
 * group.
 */
export function recommendJobs(
  jobs: readonly JobOpportunityRecord[],
  city: City | null,
  limit?: number,
): JobOpportunityRecord[] {
  const active = jobs
    .filter((j) => j.active)
    .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  const ordered = city
    ? [...active.filter((j) => j.city === city), ...active.filter((j) => j.city !== city)]
    : active;
  return limit === undefined ? ordered : ordered.slice(0, limit);
}
