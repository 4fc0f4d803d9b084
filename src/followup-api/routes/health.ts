import { Router } from 'express';
import { FOLLOWUP_CORE_VERSION } from '@core/index';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({
    success: true,
    data: { status: 'ok', version: FOLLOWUP_CORE_VERSION, uptime: process.uptime() },
  });
});

export default router;
