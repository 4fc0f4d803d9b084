// src/followup-core/ticket-policy.ts
// Auto-ticket issuance: which support categories a check-in opens.

import type { RiskCondition } from './risk-classifier';
import { RISK_CONDITIONS } from './risk-classifier';
import type { CaseStore } from './store';
import type { CaseRecord, ReportRecord, TicketCategory, TicketRecord } from './types';

export interface TicketRule {
  category: TicketCategory;
  /** Any of these conditions on the report triggers the rule. */
  triggers: readonly RiskCondition[];
  note: (monthIndex: number) => string;
}

export const TICKET_RULES: readonly TicketRule[] = [
  {
    category: 'psychological',
    triggers: ['mental_bad'],
    note: (m) => `Auto-generated: mental state reported as bad in month ${m}`,
  },
  {
    category: 'housing',
    triggers: ['homeless'],
    note: (m) => `Auto-generated: homeless in month ${m}`,
  },
  {
    category: 'job',
    triggers: ['unemployed'],
    note: (m) => `Auto-generated: unemployed in month ${m}`,
  },
  {
    category: 'social',
    triggers: ['family_problematic', 'family_no_contact'],
    note: (m) => `Auto-generated: family difficulties in month ${m}`,
  },
];

export function triggeredRules(report: ReportRecord): TicketRule[] {
  return TICKET_RULES.filter((rule) =>
    rule.triggers.some((c) => RISK_CONDITIONS[c](report)),
  );
}

export interface TicketPolicyOutcome {
  /** Categories the report requires an open auto-ticket for. */
  required: TicketCategory[];
  /** Tickets that did not exist before this run. */
  created: TicketRecord[];
}

/**
 * Ensures one open auto-generated ticket per triggered category. Existing
 * open auto-tickets are left as they are; manual tickets never match.
 */
export async function applyTicketPolicy(
  store: CaseStore,
  caseRecord: CaseRecord,
  report: ReportRecord,
): Promise<TicketPolicyOutcome> {
  const rules = triggeredRules(report);
  const created: TicketRecord[] = [];

  for (const rule of rules) {
    const result = await store.findOrCreateTicket(
      {
        caseId: caseRecord.id,
        category: rule.category,
        status: 'open',
        autoGenerated: true,
      },
      { notes: rule.note(report.monthIndex) },
    );
    if (result.created) created.push(result.record);
  }

  return { required: rules.map((r) => r.category), created };
}
