import { describe, it, expect } from 'vitest';
import { caseWorkerCaseLink } from '@shared/constants';
import { TIER_MESSAGES } from '@core/messages';
import { processReport } from '@core/orchestrator';
import { CRISIS_REPORT, STABLE_REPORT, seedHousehold } from '../fixtures';

describe('processReport', () => {
  it('raises the tier, opens tickets and alerts the caseworker once', async () => {
    const { store, caseRecord, caseWorker, beneficiary } = await seedHousehold();
    const report = await store.upsertReport(caseRecord.id, 2, CRISIS_REPORT);

    const result = await processReport(store, report);

    expect(result.oldTier).toBe('green');
    expect(result.newTier).toBe('red');
    expect(result.tierChanged).toBe(true);
    expect(result.createdTickets.map((t) => t.category)).toEqual([
      'psychological',
      'job',
      'social',
    ]);
    expect(result.notifications.map((n) => [n.recipientId, n.message, n.link])).toEqual([
      [
        caseWorker.id,
        'Alert: Omar Haddad needs urgent psychological support',
        caseWorkerCaseLink(caseRecord.id),
      ],
      [beneficiary.id, TIER_MESSAGES.red, '/beneficiary/dashboard'],
    ]);
    expect((await store.getCase(caseRecord.id))?.riskTier).toBe('red');
  });

  it('changes nothing when the same report is processed again', async () => {
    const { store, caseRecord, caseWorker, beneficiary } = await seedHousehold();
    const report = await store.upsertReport(caseRecord.id, 2, CRISIS_REPORT);
    await processReport(store, report);

    const again = await processReport(store, report);

    expect(again).toEqual({
      oldTier: 'red',
      newTier: 'red',
      tierChanged: false,
      createdTickets: [],
      notifications: [],
    });
    expect(await store.listTickets(caseRecord.id)).toHaveLength(3);
    expect(await store.listNotifications(caseWorker.id)).toHaveLength(1);
    expect(await store.listNotifications(beneficiary.id)).toHaveLength(1);
  });

  it('leaves a stable green case untouched', async () => {
    const { store, caseRecord, beneficiary } = await seedHousehold();
    const report = await store.upsertReport(caseRecord.id, 1, STABLE_REPORT);

    const result = await processReport(store, report);

    expect(result.newTier).toBe('green');
    expect(result.tierChanged).toBe(false);
    expect(result.createdTickets).toEqual([]);
    expect(await store.listNotifications(beneficiary.id)).toEqual([]);
  });

  it('tells the beneficiary when the tier goes back to green', async () => {
    const { store, caseRecord, beneficiary } = await seedHousehold();
    await processReport(store, await store.upsertReport(caseRecord.id, 1, CRISIS_REPORT));

    const result = await processReport(
      store,
      await store.upsertReport(caseRecord.id, 2, STABLE_REPORT),
    );

    expect(result.oldTier).toBe('red');
    expect(result.newTier).toBe('green');
    const inbox = await store.listNotifications(beneficiary.id);
    expect(inbox.map((n) => n.message).sort()).toEqual(
      [TIER_MESSAGES.green, TIER_MESSAGES.red].sort(),
    );
  });

  it('does not treat a manual ticket as the auto ticket', async () => {
    const { store, caseRecord, caseWorker } = await seedHousehold();
    await store.createTicket({
      caseId: caseRecord.id,
      category: 'psychological',
      notes: 'Opened by hand',
      createdById: caseWorker.id,
    });
    const report = await store.upsertReport(caseRecord.id, 1, {
      ...STABLE_REPORT,
      mentalState: 'bad',
    });

    const result = await processReport(store, report);

    expect(result.createdTickets).toHaveLength(1);
    expect(result.createdTickets[0].autoGenerated).toBe(true);
    expect(await store.listTickets(caseRecord.id)).toHaveLength(2);
  });

  it('skips caseworker alerts on an unassigned case', async () => {
    const { store, caseRecord, beneficiary } = await seedHousehold({ assigned: false });
    const report = await store.upsertReport(caseRecord.id, 1, {
      ...STABLE_REPORT,
      housingStatus: 'homeless',
    });

    const result = await processReport(store, report);

    expect(result.createdTickets.map((t) => t.category)).toEqual(['housing']);
    expect(result.notifications.map((n) => n.recipientId)).toEqual([beneficiary.id]);
  });

  it('alerts on housing tickets with the homeless message', async () => {
    const { store, caseRecord, caseWorker } = await seedHousehold();
    const report = await store.upsertReport(caseRecord.id, 1, {
      ...STABLE_REPORT,
      housingStatus: 'homeless',
    });

    await processReport(store, report);

    const alerts = await store.listNotifications(caseWorker.id);
    expect(alerts.map((n) => n.message)).toEqual(['Alert: Omar Haddad is homeless']);
  });

  it('repeats urgent alerts when configured to', async () => {
    const { store, caseRecord, caseWorker } = await seedHousehold();
    const report = await store.upsertReport(caseRecord.id, 1, CRISIS_REPORT);
    const options = { alertCategories: ['psychological'] as const, repeatUrgentAlerts: true };
    await processReport(store, report, options);

    const again = await processReport(store, report, options);

    expect(again.createdTickets).toEqual([]);
    expect(again.notifications.map((n) => n.recipientId)).toEqual([caseWorker.id]);
    expect(await store.listNotifications(caseWorker.id)).toHaveLength(2);
  });

  it('alerts only on the configured categories', async () => {
    const { store, caseRecord, caseWorker } = await seedHousehold();
    const report = await store.upsertReport(caseRecord.id, 1, CRISIS_REPORT);

    await processReport(store, report, {
      alertCategories: ['job', 'social'],
      repeatUrgentAlerts: false,
    });

    const alerts = await store.listNotifications(caseWorker.id);
    expect(alerts.map((n) => n.message).sort()).toEqual([
      'Alert: Omar Haddad reported being unemployed',
      'Alert: Omar Haddad reported family difficulties',
    ]);
  });
});
