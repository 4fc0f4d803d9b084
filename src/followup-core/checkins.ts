import { ConcurrencyConflictError, NotFoundError, ValidationError } from './errors';
import type { EngineOptions, ProcessingResult } from './orchestrator';
import { DEFAULT_ENGINE_OPTIONS, processReport } from './orchestrator';
import { authorizeOnCase } from './permissions';
import type { CaseStore } from './store';
import { currentMonth } from './timeline';
import type { EngineContext, ReportRecord } from './types';
import { checkinInputSchema, parseInput } from './validation';

export interface CheckinOutcome {
  report: ReportRecord;
  result: ProcessingResult;
}

/**
 * Stores the beneficiary's check-in for a month (replacing an earlier one for
 * the same month) and runs case progression on it, as one unit of work.
 * Input is validated before anything is written.
 */
export async function submitCheckin(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
  input: unknown,
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS,
): Promise<CheckinOutcome> {
  const data = parseInput(checkinInputSchema, input);

  const caseRecord = await store.getCase(caseId);
  if (!caseRecord) throw new NotFoundError('Case', caseId);
  authorizeOnCase(ctx.actor, 'submit_checkin', caseRecord);

  const monthIndex = data.monthIndex ?? currentMonth(caseRecord.releaseDate, ctx.now);
  if (monthIndex < 1) {
    throw new ValidationError(`Case ${caseId} has no active timeline`);
  }

  return store.withCaseLock(caseId, async (tx) => {
    const report = await tx.upsertReport(caseId, monthIndex, {
      housingStatus: data.housingStatus,
      jobStatus: data.jobStatus,
      mentalState: data.mentalState,
      familyStatus: data.familyStatus,
      notes: data.notes,
    });
    const result = await processReport(tx, report, options);
    return { report, result };
  });
}

export async function listCheckins(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
): Promise<ReportRecord[]> {
  const caseRecord = await store.getCase(caseId);
  if (!caseRecord) throw new NotFoundError('Case', caseId);
  authorizeOnCase(ctx.actor, 'view_case', caseRecord);
  return store.listReports(caseId);
}

/**
 * Re-runs `operation` when the store reports a concurrency conflict, up to
 * `retries` extra attempts. Other errors propagate immediately.
 */
export async function retryOnConflict<T>(
  operation: () => Promise<T>,
  retries: number,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!(err instanceof ConcurrencyConflictError) || attempt >= retries) throw err;
    }
  }
}
