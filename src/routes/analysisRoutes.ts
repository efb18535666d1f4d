/**
 * Analysis Routes
 */

import { Router } from 'express';
import { analysisController } from '../controllers/analysisController';
import { validateBodyString } from '../middleware/validation';

const router = Router();

router.post('/', validateBodyString('folder'), (req, res, next) => analysisController.analyze(req, res, next));
router.post('/preview', validateBodyString('folder'), (req, res, next) => analysisController.preview(req, res, next));

export { router as analysisRoutes };
