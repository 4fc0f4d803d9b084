import { Router } from 'express';
import { listCheckins, retryOnConflict, submitCheckin } from '@core/checkins';
import { asyncHandler, contextOf, services } from '../middleware/index';

const router = Router();

// Submit (or resubmit) a monthly check-in; runs case progression
router.post(
  '/cases/:id/checkins',
  asyncHandler(async (req, res) => {
    const { store, engineOptions, processRetryLimit } = services(req);
    const ctx = contextOf(res);

    const { report, result } = await retryOnConflict(
      () => submitCheckin(store, ctx, req.params.id, req.body, engineOptions),
      processRetryLimit,
    );

    if (result.tierChanged) {
      console.warn(
        `[CHECKIN] case ${report.caseId} month ${report.monthIndex}: ${result.oldTier} -> ${result.newTier}`,
      );
    }

    res.status(201).json({ success: true, data: { report, ...result } });
  }),
);

router.get(
  '/cases/:id/checkins',
  asyncHandler(async (req, res) => {
    const rows = await listCheckins(services(req).store, contextOf(res), req.params.id);
    res.json({ success: true, data: rows });
  }),
);

export default router;
