// followup-core: risk evaluation and case progression.
// No HTTP. Everything that touches state goes through a CaseStore.

export const FOLLOWUP_CORE_VERSION = '0.1.0';

export * from './types';
export * from './errors';
export * from './timeline';
export * from './risk-classifier';
export * from './ticket-policy';
export * from './orchestrator';
export * from './risk-summary';
export * from './permissions';
export * from './validation';
export * from './case-admin';
export * from './checkins';
export * from './ticket-desk';
export * from './inbox';
export * from './dashboard';
export * from './messages';
export type * from './store';
