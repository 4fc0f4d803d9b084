// src/followup-core/case-admin.ts
// Intake, caseworker assignment and program completion.

import { BENEFICIARY_DASHBOARD_LINK } from '@shared/constants';
import { NotFoundError, ValidationError } from './errors';
import { notificationText } from './messages';
import { authorize, authorizeOnCase } from './permissions';
import type { CaseFilter, CaseStore } from './store';
import { resolveFollowupEnd } from './timeline';
import type { CaseRecord, EngineContext, PersonRecord } from './types';
import { openCaseSchema, parseInput, registerPersonSchema } from './validation';

export async function registerPerson(
  store: CaseStore,
  ctx: EngineContext,
  input: unknown,
): Promise<PersonRecord> {
  authorize(ctx.actor, 'register_person');
  const data = parseInput(registerPersonSchema, input);

  const existing = await store.getPersonByNationalId(data.nationalId);
  if (existing) {
    throw new ValidationError(`National ID ${data.nationalId} is already registered`);
  }
  return store.createPerson(data);
}

/** Removes a person together with everything they own. */
export async function removePerson(
  store: CaseStore,
  ctx: EngineContext,
  personId: string,
): Promise<void> {
  authorize(ctx.actor, 'remove_person');
  if (!(await store.deletePerson(personId))) throw new NotFoundError('Person', personId);
}

export async function listCases(
  store: CaseStore,
  ctx: EngineContext,
  filter: CaseFilter = {},
): Promise<CaseRecord[]> {
  authorize(ctx.actor, 'list_cases');
  return store.listCases(filter);
}

async function requireCaseWorker(store: CaseStore, id: string): Promise<PersonRecord> {
  const person = await store.getPerson(id);
  if (!person) throw new NotFoundError('Person', id);
  if (person.role !== 'case_worker') {
    throw new ValidationError(`Person ${id} is not a case worker`);
  }
  return person;
}

/**
 * Opens the follow-up case of a beneficiary. The follow-up end date is taken
 * as given or defaults to one year after release.
 */
export async function openCase(
  store: CaseStore,
  ctx: EngineContext,
  input: unknown,
): Promise<CaseRecord> {
  authorize(ctx.actor, 'open_case');
  const data = parseInput(openCaseSchema, input);

  const person = await store.getPerson(data.personId);
  if (!person) throw new NotFoundError('Person', data.personId);
  if (person.role !== 'beneficiary') {
    throw new ValidationError('Only beneficiaries can have a follow-up case');
  }
  if (await store.getCaseByPerson(person.id)) {
    throw new ValidationError(`Person ${person.id} already has a case`);
  }
  if (data.assignedCaseWorkerId) {
    await requireCaseWorker(store, data.assignedCaseWorkerId);
  }

  return store.createCase({
    personId: person.id,
    releaseDate: data.releaseDate,
    followupEndDate: resolveFollowupEnd(data.releaseDate, data.followupEndDate),
    city: data.city,
    notes: data.notes,
    assignedCaseWorkerId: data.assignedCaseWorkerId,
  });
}

/** Loads a case the caller is allowed to see. */
export async function loadCase(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
): Promise<CaseRecord> {
  const caseRecord = await store.getCase(caseId);
  if (!caseRecord) throw new NotFoundError('Case', caseId);
  authorizeOnCase(ctx.actor, 'view_case', caseRecord);
  return caseRecord;
}

export async function assignCaseWorker(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
  caseWorkerId: string | null,
): Promise<CaseRecord> {
  authorize(ctx.actor, 'assign_case_worker');
  if (caseWorkerId) await requireCaseWorker(store, caseWorkerId);

  return store.withCaseLock(caseId, async (tx) => {
    const caseRecord = await tx.getCase(caseId);
    if (!caseRecord) throw new NotFoundError('Case', caseId);
    return tx.saveCase({ ...caseRecord, assignedCaseWorkerId: caseWorkerId });
  });
}

/**
 * Marks the program completed and congratulates the beneficiary. Completion
 * is terminal; completing twice changes nothing and sends nothing.
 */
export async function completeCase(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
): Promise<CaseRecord> {
  authorize(ctx.actor, 'complete_case');

  return store.withCaseLock(caseId, async (tx) => {
    const caseRecord = await tx.getCase(caseId);
    if (!caseRecord) throw new NotFoundError('Case', caseId);
    if (caseRecord.completed) return caseRecord;

    const saved = await tx.saveCase({ ...caseRecord, completed: true });
    await tx.createNotification(
      saved.personId,
      notificationText.programCompleted(),
      BENEFICIARY_DASHBOARD_LINK,
    );
    return saved;
  });
}
