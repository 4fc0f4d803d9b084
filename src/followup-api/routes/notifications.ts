import { Router } from 'express';
import { listInbox, markNotificationRead, messageCaseWorker } from '@core/inbox';
import { inboxQuerySchema, parseInput } from '@core/validation';
import { asyncHandler, contextOf, services } from '../middleware/index';

const router = Router();

router.get(
  '/notifications',
  asyncHandler(async (req, res) => {
    const query = parseInput(inboxQuerySchema, req.query);
    const rows = await listInbox(services(req).store, contextOf(res), query);
    res.json({ success: true, data: rows });
  }),
);

router.post(
  '/notifications/:id/read',
  asyncHandler(async (req, res) => {
    const row = await markNotificationRead(services(req).store, contextOf(res), req.params.id);
    res.json({ success: true, data: row });
  }),
);

// Beneficiary message to the assigned caseworker
router.post(
  '/cases/:id/messages',
  asyncHandler(async (req, res) => {
    const sent = await messageCaseWorker(
      services(req).store,
      contextOf(res),
      req.params.id,
      req.body,
    );
    res.status(201).json({ success: true, data: { delivered: sent !== null } });
  }),
);

export default router;
