import { Router } from 'express';
import { buildMonthGrid, recommendJobs } from '@core/dashboard';
import { summarizeRisk } from '@core/risk-summary';
import { describeTimeline } from '@core/timeline';
import { asyncHandler, contextOf, services } from '../middleware/index';

const router = Router();

// Beneficiary home: own case, month grid, unread notifications, active tickets
router.get(
  '/dashboard',
  asyncHandler(async (req, res) => {
    const { store } = services(req);
    const ctx = contextOf(res);
    const row = await store.getCaseByPerson(ctx.actor.personId);
    if (!row) {
      return res
        .status(404)
        .json({ success: false, error: 'No follow-up case for this person' });
    }

    const [reports, summary, inbox, tickets, jobs] = await Promise.all([
      store.listReports(row.id),
      summarizeRisk(store, row),
      store.listNotifications(ctx.actor.personId, { unreadOnly: true, limit: 5 }),
      store.listTickets(row.id, ['open', 'in_progress']),
      store.listJobs(true),
    ]);

    res.json({
      success: true,
      data: {
        case: row,
        timeline: describeTimeline(row, ctx.now),
        months: buildMonthGrid(row, reports, ctx.now),
        riskSummary: summary,
        notifications: inbox,
        openTickets: tickets,
        jobs: recommendJobs(jobs, row.city, 3),
      },
    });
  }),
);

// Job listings, the caller's city first
router.get(
  '/jobs',
  asyncHandler(async (req, res) => {
    const { store } = services(req);
    const ctx = contextOf(res);
    const [jobs, row] = await Promise.all([
      store.listJobs(true),
      store.getCaseByPerson(ctx.actor.personId),
    ]);
    res.json({ success: true, data: recommendJobs(jobs, row?.city ?? null) });
  }),
);

export default router;
