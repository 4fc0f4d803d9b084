import { CASE_ACTIONS } from '@shared/constants';
import { ForbiddenError } from './errors';
import type { Actor, CaseRecord, Role } from './types';

export type CaseAction = (typeof CASE_ACTIONS)[number];

// ---------------------------------------------------------------------------
// Role Permissions
// ---------------------------------------------------------------------------

export const ROLE_PERMISSIONS: Record<CaseAction, readonly Role[]> = {
  register_person: ['admin'],
  remove_person: ['admin'],
  list_cases: ['case_worker', 'admin'],
  open_case: ['case_worker', 'admin'],
  assign_case_worker: ['case_worker', 'admin'],
  view_case: ['beneficiary', 'case_worker', 'admin'],
  submit_checkin: ['beneficiary'],
  open_ticket: ['case_worker', 'admin'],
  change_ticket_status: ['case_worker', 'admin'],
  complete_case: ['case_worker', 'admin'],
  message_case_worker: ['beneficiary'],
};

/** Actions a beneficiary may only take on their own case. */
const OWNER_ONLY: ReadonlySet<CaseAction> = new Set<CaseAction>([
  'view_case',
  'submit_checkin',
  'message_case_worker',
]);

export function can(actor: Actor, action: CaseAction): boolean {
  return ROLE_PERMISSIONS[action].includes(actor.role);
}

export function authorize(actor: Actor, action: CaseAction): void {
  if (!can(actor, action)) {
    throw new ForbiddenError(`Role '${actor.role}' is not permitted to perform '${action}'`);
  }
}

/**
 * Role check plus ownership: beneficiaries act on their own case only.
 */
export function authorizeOnCase(actor: Actor, action: CaseAction, caseRecord: CaseRecord): void {
  authorize(actor, action);
  if (
    actor.role === 'beneficiary' &&
    OWNER_ONLY.has(action) &&
    caseRecord.personId !== actor.personId
  ) {
    throw new ForbiddenError(`Case ${caseRecord.id} does not belong to the caller`);
  }
}
