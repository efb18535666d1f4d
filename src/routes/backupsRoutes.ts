/**
 * Backups Routes
 */

import { Router } from 'express';
import { backupsController } from '../controllers/backupsController';
import { validateBodyString } from '../middleware/validation';

const router = Router();

router.post('/restore', validateBodyString('folder'), (req, res, next) => backupsController.restoreAll(req, res, next));
router.post('/restore-file', validateBodyString('path'), (req, res, next) => backupsController.restoreFile(req, res, next));
router.post('/cleanup', validateBodyString('folder'), (req, res, next) => backupsController.cleanup(req, res, next));

export { router as backupsRoutes };
