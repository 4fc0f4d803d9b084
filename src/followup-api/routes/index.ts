import { Router } from 'express';
import { resolveActor } from '../middleware/index';
import healthRouter from './health';
import personsRouter from './persons';
import casesRouter from './cases';
import checkinsRouter from './checkins';
import ticketsRouter from './tickets';
import notificationsRouter from './notifications';
import dashboardRouter from './dashboard';

const router = Router();
router.use(healthRouter);
router.use(resolveActor);
router.use(personsRouter);
router.use(casesRouter);
router.use(checkinsRouter);
router.use(ticketsRouter);
router.use(notificationsRouter);
router.use(dashboardRouter);

export default router;
