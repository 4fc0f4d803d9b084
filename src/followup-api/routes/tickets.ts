import { Router } from 'express';
import { changeTicketStatus, listCaseTickets, openManualTicket } from '@core/ticket-desk';
import { asyncHandler, contextOf, services } from '../middleware/index';

const router = Router();

router.get(
  '/cases/:id/tickets',
  asyncHandler(async (req, res) => {
    const rows = await listCaseTickets(
      services(req).store,
      contextOf(res),
      req.params.id,
      req.query.active === 'true',
    );
    res.json({ success: true, data: rows });
  }),
);

// Manual ticket opened by a caseworker
router.post(
  '/cases/:id/tickets',
  asyncHandler(async (req, res) => {
    const ticket = await openManualTicket(
      services(req).store,
      contextOf(res),
      req.params.id,
      req.body,
    );
    res.status(201).json({ success: true, data: ticket });
  }),
);

router.patch(
  '/tickets/:id/status',
  asyncHandler(async (req, res) => {
    const ticket = await changeTicketStatus(
      services(req).store,
      contextOf(res),
      req.params.id,
      req.body,
    );
    res.json({ success: true, data: ticket });
  }),
);

export default router;
