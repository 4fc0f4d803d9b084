export const API_PREFIX = '/api';

export const PROGRAM_MONTHS = 12;

export const ROLES = ['beneficiary', 'case_worker', 'admin'] as const;

export const RISK_TIERS = ['green', 'yellow', 'red'] as const;

export const CITIES = [
  'riyadh',
  'jeddah',
  'mecca',
  'medina',
  'dammam',
  'khobar',
  'taif',
  'tabuk',
  'other',
] as const;

export const HOUSING_STATUSES = [
  'stable',
  'temporary',
  'with_family',
  'homeless',
] as const;

export const JOB_STATUSES = [
  'employed',
  'self_employed',
  'searching',
  'unemployed',
  'training',
] as const;

export const MENTAL_STATES = ['good', 'moderate', 'stressed', 'bad'] as const;

export const FAMILY_STATUSES = [
  'supportive',
  'neutral',
  'problematic',
  'no_contact',
] as const;

export const TICKET_CATEGORIES = [
  'job',
  'social',
  'psychological',
  'housing',
  'financial',
] as const;

export const TICKET_STATUSES = [
  'open',
  'in_progress',
  'resolved',
  'closed',
] as const;

export const CASE_ACTIONS = [
  'register_person',
  'remove_person',
  'list_cases',
  'open_case',
  'assign_case_worker',
  'view_case',
  'submit_checkin',
  'open_ticket',
  'change_ticket_status',
  'complete_case',
  'message_case_worker',
] as const;

export const BENEFICIARY_DASHBOARD_LINK = '/beneficiary/dashboard';

export function caseWorkerCaseLink(caseId: string): string {
  return `/caseworker/cases/${caseId}`;
}
