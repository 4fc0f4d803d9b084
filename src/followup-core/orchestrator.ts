// src/followup-core/orchestrator.ts
// Case progression: what happens when a check-in arrives.

import { BENEFICIARY_DASHBOARD_LINK, caseWorkerCaseLink } from '@shared/constants';
import { NotFoundError } from './errors';
import { TIER_MESSAGES, notificationText } from './messages';
import { classify } from './risk-classifier';
import type { CaseStore } from './store';
import { applyTicketPolicy } from './ticket-policy';
import type {
  CaseRecord,
  NotificationRecord,
  ReportRecord,
  RiskTier,
  TicketCategory,
  TicketRecord,
} from './types';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface EngineOptions {
  /** Auto-ticket categories whose creation alerts the assigned caseworker. */
  alertCategories: readonly TicketCategory[];
  /**
   * Alert on every triggering report for alert categories, not only when
   * the open ticket is first created.
   */
  repeatUrgentAlerts: boolean;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  alertCategories: ['psychological', 'housing'],
  repeatUrgentAlerts: false,
};

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface ProcessingResult {
  oldTier: RiskTier;
  newTier: RiskTier;
  tierChanged: boolean;
  createdTickets: TicketRecord[];
  notifications: NotificationRecord[];
}

// ---------------------------------------------------------------------------
// Processing
// ---------------------------------------------------------------------------

/**
 * Classifies the report, stores the case's new tier, opens the required
 * auto-tickets and emits the resulting notifications, all inside the case's
 * unit of work. Safe to re-run with the same report: tickets are
 * find-or-create and the beneficiary is only told about tier changes.
 */
export async function processReport(
  store: CaseStore,
  report: ReportRecord,
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS,
): Promise<ProcessingResult> {
  return store.withCaseLock(report.caseId, async (tx) => {
    const caseRecord = await tx.getCase(report.caseId);
    if (!caseRecord) throw new NotFoundError('Case', report.caseId);

    const newTier = classify(report);
    const oldTier = caseRecord.riskTier;

    const saved = await tx.saveCase({ ...caseRecord, riskTier: newTier });

    const policy = await applyTicketPolicy(tx, saved, report);
    const notifications = await alertCaseWorker(
      tx,
      saved,
      policy.required,
      policy.created,
      options,
    );

    if (newTier !== oldTier) {
      notifications.push(
        await tx.createNotification(
          saved.personId,
          TIER_MESSAGES[newTier],
          BENEFICIARY_DASHBOARD_LINK,
        ),
      );
    }

    return {
      oldTier,
      newTier,
      tierChanged: newTier !== oldTier,
      createdTickets: policy.created,
      notifications,
    };
  });
}

async function alertCaseWorker(
  store: CaseStore,
  caseRecord: CaseRecord,
  required: TicketCategory[],
  created: TicketRecord[],
  options: EngineOptions,
): Promise<NotificationRecord[]> {
  const caseWorkerId = caseRecord.assignedCaseWorkerId;
  if (!caseWorkerId) return [];

  const createdCategories = new Set(created.map((t) => t.category));
  const toAlert = required.filter(
    (category) =>
      options.alertCategories.includes(category) &&
      (options.repeatUrgentAlerts || createdCategories.has(category)),
  );
  if (toAlert.length === 0) return [];

  const beneficiary = await store.getPerson(caseRecord.personId);
  if (!beneficiary) throw new NotFoundError('Person', caseRecord.personId);

  const sent: NotificationRecord[] = [];
  for (const category of toAlert) {
    sent.push(
      await store.createNotification(
        caseWorkerId,
        notificationText.urgentAlert(category, beneficiary.fullName),
        caseWorkerCaseLink(caseRecord.id),
      ),
    );
  }
  return sent;
}
