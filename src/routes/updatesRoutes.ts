/**
 * Updates Routes
 */

import { Router } from 'express';
import { updatesController } from '../controllers/updatesController';
import { validateBodyString } from '../middleware/validation';

const router = Router();

router.post('/', validateBodyString('folder'), (req, res, next) => updatesController.run(req, res, next));

export { router as updatesRoutes };
