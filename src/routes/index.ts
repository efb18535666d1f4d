/**
 * Routes Index
 * Centralized route exports
 */

import { Router } from 'express';
import { analysisRoutes } from './analysisRoutes';
import { updatesRoutes } from './updatesRoutes';
import { backupsRoutes } from './backupsRoutes';

const router = Router();

router.use('/analysis', analysisRoutes);
router.use('/updates', updatesRoutes);
router.use('/backups', backupsRoutes);

// Health check
router.get('/health', (_req, res) => {
  res.json({
    ok: true,
    data: {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    },
  });
});

export { router as apiRoutes };
