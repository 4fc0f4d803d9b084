import { MemoryCaseStore } from '@db/memory-store';
import type { CaseRecord, EngineContext, PersonRecord, ReportFields, Role } from '@core/types';

export const NOW = new Date('2026-04-01T09:00:00Z');

export const STABLE_REPORT: ReportFields = {
  housingStatus: 'stable',
  jobStatus: 'employed',
  mentalState: 'good',
  familyStatus: 'supportive',
  notes: '',
};

/** Bad mental state, temporary housing, unemployed, problematic family. */
export const CRISIS_REPORT: ReportFields = {
  housingStatus: 'temporary',
  jobStatus: 'unemployed',
  mentalState: 'bad',
  familyStatus: 'problematic',
  notes: '',
};

let nationalIdSeq = 1000000000;

export function addPerson(
  store: MemoryCaseStore,
  role: Role,
  fullName = 'Test Person',
): Promise<PersonRecord> {
  nationalIdSeq += 1;
  return store.createPerson({ nationalId: String(nationalIdSeq), fullName, role, phone: '' });
}

export function contextFor(person: PersonRecord, now: Date = NOW): EngineContext {
  return { actor: { personId: person.id, role: person.role }, now };
}

export interface Household {
  store: MemoryCaseStore;
  admin: PersonRecord;
  caseWorker: PersonRecord;
  beneficiary: PersonRecord;
  caseRecord: CaseRecord;
}

/**
 * A store holding one beneficiary released on 2026-01-01 (month 4 at NOW),
 * their assigned caseworker and an admin.
 */
export async function seedHousehold(
  options: { assigned?: boolean; releaseDate?: string } = {},
): Promise<Household> {
  const store = new MemoryCaseStore();
  const admin = await addPerson(store, 'admin', 'Dana Admin');
  const caseWorker = await addPerson(store, 'case_worker', 'Lee Worker');
  const beneficiary = await addPerson(store, 'beneficiary', 'Omar Haddad');
  const releaseDate = options.releaseDate ?? '2026-01-01';
  const caseRecord = await store.createCase({
    personId: beneficiary.id,
    releaseDate,
    followupEndDate: '2027-01-01',
    city: 'jeddah',
    notes: '',
    assignedCaseWorkerId: options.assigned === false ? null : caseWorker.id,
  });
  return { store, admin, caseWorker, beneficiary, caseRecord };
}
