import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { once } from 'events';
import type { Server } from 'http';
import { DEFAULT_ENGINE_OPTIONS } from '@core/orchestrator';
import { createApp } from '../../src/followup-api/app';
import { CRISIS_REPORT, seedHousehold, type Household } from '../fixtures';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let household: Household;
let server: Server;
let baseUrl: string;

async function call(
  method: string,
  path: string,
  options: { as?: string; body?: unknown; rawBody?: string } = {},
) {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (options.as) headers['x-person-id'] = options.as;
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body)),
  });
  const payload: unknown = await res.json();
  return { status: res.status, payload };
}

beforeAll(async () => {
  household = await seedHousehold();
  household.store.addJob({
    title: 'Warehouse assistant',
    company: 'Test Logistics',
    description: '',
    city: 'jeddah',
    active: true,
    linkUrl: '',
  });

  const app = createApp(
    { store: household.store, engineOptions: DEFAULT_ENGINE_OPTIONS, processRetryLimit: 2 },
    { clientUrl: 'http://localhost:5174', logRequests: false },
  );
  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no port');
  baseUrl = `http://127.0.0.1:${address.port}/api`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('follow-up API', () => {
  it('answers health checks without a caller', async () => {
    const { status, payload } = await call('GET', '/health');
    expect(status).toBe(200);
    expect(payload).toMatchObject({ success: true, data: { status: 'ok' } });
  });

  it('requires a known caller for everything else', async () => {
    expect((await call('GET', '/cases')).status).toBe(401);
    expect((await call('GET', '/cases', { as: 'nobody' })).status).toBe(401);
  });

  it('rejects an invalid check-in with 400', async () => {
    const { beneficiary, caseRecord } = household;
    const { status, payload } = await call('POST', `/cases/${caseRecord.id}/checkins`, {
      as: beneficiary.id,
      body: { ...CRISIS_REPORT, jobStatus: 'astronaut' },
    });
    expect(status).toBe(400);
    expect(payload).toMatchObject({ success: false, code: 'VALIDATION' });
  });

  it('rejects a malformed JSON body with 400', async () => {
    const { beneficiary, caseRecord } = household;
    const { status, payload } = await call('POST', `/cases/${caseRecord.id}/checkins`, {
      as: beneficiary.id,
      rawBody: '{"housingStatus":',
    });
    expect(status).toBe(400);
    expect(payload).toEqual({ success: false, error: 'Malformed JSON body' });
  });

  it('processes a check-in into tier, tickets and alerts', async () => {
    const { beneficiary, caseRecord } = household;
    const { status, payload } = await call('POST', `/cases/${caseRecord.id}/checkins`, {
      as: beneficiary.id,
      body: CRISIS_REPORT,
    });
    expect(status).toBe(201);
    expect(payload).toMatchObject({
      success: true,
      data: { oldTier: 'green', newTier: 'red', tierChanged: true },
    });
  });

  it('shows the caseworker tier counts', async () => {
    const { caseWorker } = household;
    const { status, payload } = await call('GET', '/cases', { as: caseWorker.id });
    expect(status).toBe(200);
    expect(payload).toMatchObject({
      success: true,
      data: { riskCounts: { red: 1, yellow: 0, green: 0 } },
    });
  });

  it('keeps the case list from beneficiaries', async () => {
    const { status, payload } = await call('GET', '/cases', { as: household.beneficiary.id });
    expect(status).toBe(403);
    expect(payload).toMatchObject({ success: false, code: 'FORBIDDEN' });
  });

  it('builds the beneficiary dashboard', async () => {
    const { status, payload } = await call('GET', '/dashboard', { as: household.beneficiary.id });
    expect(status).toBe(200);
    expect(payload).toMatchObject({
      success: true,
      data: {
        case: { id: household.caseRecord.id, riskTier: 'red' },
        riskSummary: {
          tier: 'red',
          factors: ['Poor mental state', 'Unemployed', 'Family problems'],
        },
        notifications: [{ message: 'We need to contact you urgently. Please wait for a call from your caseworker.' }],
        jobs: [{ title: 'Warehouse assistant' }],
      },
    });
  });

  it('lets the caseworker move a ticket and read their alert', async () => {
    const { caseWorker, caseRecord, store } = household;
    const [ticket] = await store.listTickets(caseRecord.id);

    const moved = await call('PATCH', `/tickets/${ticket.id}/status`, {
      as: caseWorker.id,
      body: { status: 'resolved' },
    });
    expect(moved.status).toBe(200);
    expect(moved.payload).toMatchObject({ data: { status: 'resolved' } });

    const [alert] = await store.listNotifications(caseWorker.id);
    const read = await call('POST', `/notifications/${alert.id}/read`, { as: caseWorker.id });
    expect(read.payload).toMatchObject({ success: true, data: { read: true } });
  });

  it('returns 404 for an unknown case', async () => {
    const { status, payload } = await call('GET', '/cases/unknown', { as: household.caseWorker.id });
    expect(status).toBe(404);
    expect(payload).toEqual({ success: false, error: 'Case not found: unknown', code: 'NOT_FOUND' });
  });

  it('rejects an out-of-range notification limit with 400', async () => {
    const { status, payload } = await call('GET', '/notifications?limit=-1', {
      as: household.caseWorker.id,
    });
    expect(status).toBe(400);
    expect(payload).toMatchObject({ success: false, code: 'VALIDATION' });
  });

  it('limits the notification list', async () => {
    const { status, payload } = await call('GET', '/notifications?limit=1', {
      as: household.caseWorker.id,
    });
    expect(status).toBe(200);
    expect(payload).toMatchObject({ success: true, data: [expect.any(Object)] });
  });
});
