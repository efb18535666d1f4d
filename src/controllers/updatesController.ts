/**
 * Updates Controller
 * Analyze a folder, then write suggested dates into files that miss them
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { fileAnalysisEngine } from '../services/analysis/fileAnalysisEngine';
import { updateOrchestrator } from '../services/update/updateOrchestrator';
import { assertOverridesMatch, parseBoolean, parseFields, parseOverrides } from '../middleware/validation';
import { logger } from '../utils/logger';
import { serializeOutcome } from '../utils/serializeRecord';

export class UpdatesController {
  /**
   * POST /api/updates
   */
  async run(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const folder: string = req.body.folder;
      const fields = parseFields(req.body.fields);
      const dryRun = parseBoolean(req.body.dryRun, 'dryRun', false);
      const backup = parseBoolean(req.body.backup, 'backup', config.createBackups);
      const overrides = parseOverrides(req.body.overrides, folder);

      logger.info('Update request', { folder, fields, dryRun, backup, overrides: overrides.size });

      const records = await fileAnalysisEngine.analyzeFolder(folder);
      assertOverridesMatch(overrides, records);
      const result = await updateOrchestrator.updateMany(records, { fields, dryRun, backup, overrides });

      res.json({
        ok: true,
        data: {
          dryRun,
          successCount: result.successCount,
          failureCount: result.failureCount,
          skippedCount: result.skippedCount,
          outcomes: result.outcomes.map(serializeOutcome),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const updatesController = new UpdatesController();
