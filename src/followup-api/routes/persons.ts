import { Router } from 'express';
import { registerPerson, removePerson } from '@core/case-admin';
import { asyncHandler, contextOf, services } from '../middleware/index';

const router = Router();

// Register a person (admin)
router.post(
  '/persons',
  asyncHandler(async (req, res) => {
    const person = await registerPerson(services(req).store, contextOf(res), req.body);
    res.status(201).json({ success: true, data: person });
  }),
);

// Remove a person and everything they own (admin)
router.delete(
  '/persons/:id',
  asyncHandler(async (req, res) => {
    await removePerson(services(req).store, contextOf(res), req.params.id);
    res.json({ success: true });
  }),
);

export default router;
