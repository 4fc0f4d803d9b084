import { Router } from 'express';
import {
  assignCaseWorker,
  completeCase,
  listCases,
  loadCase,
  openCase,
} from '@core/case-admin';
import { buildMonthGrid, countByTier } from '@core/dashboard';
import { summarizeRisk } from '@core/risk-summary';
import { describeTimeline } from '@core/timeline';
import { assignCaseWorkerSchema, caseListQuerySchema, parseInput } from '@core/validation';
import { asyncHandler, contextOf, services } from '../middleware/index';

const router = Router();

// List cases with tier counts (caseworker dashboard)
router.get(
  '/cases',
  asyncHandler(async (req, res) => {
    const { store } = services(req);
    const ctx = contextOf(res);
    const query = parseInput(caseListQuerySchema, req.query);

    const all = await listCases(store, ctx);
    const rows = await listCases(store, ctx, {
      riskTier: query.risk,
      city: query.city,
      completed: query.includeCompleted ? undefined : false,
    });
    res.json({ success: true, data: { cases: rows, riskCounts: countByTier(all) } });
  }),
);

// Open a case at intake
router.post(
  '/cases',
  asyncHandler(async (req, res) => {
    const created = await openCase(services(req).store, contextOf(res), req.body);
    res.status(201).json({ success: true, data: created });
  }),
);

// Case detail: timeline, risk summary, check-ins and tickets
router.get(
  '/cases/:id',
  asyncHandler(async (req, res) => {
    const { store } = services(req);
    const ctx = contextOf(res);
    const row = await loadCase(store, ctx, req.params.id);
    const [summary, reports, tickets] = await Promise.all([
      summarizeRisk(store, row),
      store.listReports(row.id),
      store.listTickets(row.id),
    ]);
    res.json({
      success: true,
      data: {
        ...row,
        timeline: describeTimeline(row, ctx.now),
        months: buildMonthGrid(row, reports, ctx.now),
        riskSummary: summary,
        tickets,
      },
    });
  }),
);

router.get(
  '/cases/:id/risk-summary',
  asyncHandler(async (req, res) => {
    const { store } = services(req);
    const row = await loadCase(store, contextOf(res), req.params.id);
    res.json({ success: true, data: await summarizeRisk(store, row) });
  }),
);

router.post(
  '/cases/:id/assign',
  asyncHandler(async (req, res) => {
    const { caseWorkerId } = parseInput(assignCaseWorkerSchema, req.body);
    const updated = await assignCaseWorker(
      services(req).store,
      contextOf(res),
      req.params.id,
      caseWorkerId,
    );
    res.json({ success: true, data: updated });
  }),
);

router.post(
  '/cases/:id/complete',
  asyncHandler(async (req, res) => {
    const updated = await completeCase(services(req).store, contextOf(res), req.params.id);
    res.json({ success: true, data: updated });
  }),
);

export default router;
