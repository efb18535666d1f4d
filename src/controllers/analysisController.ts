/**
 * Analysis Controller
 * HTTP handlers for folder analysis and update previews
 */

import { Request, Response, NextFunction } from 'express';
import { fileAnalysisEngine } from '../services/analysis/fileAnalysisEngine';
import { computeStatistics, previewUpdates } from '../services/analysis/analysisViews';
import { parseFields } from '../middleware/validation';
import { serializePlanEntry, serializeRecord } from '../utils/serializeRecord';

export class AnalysisController {
  /**
   * POST /api/analysis
   * Analyze every supported file below a folder
   */
  async analyze(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const folder: string = req.body.folder;
      const records = await fileAnalysisEngine.analyzeFolder(folder);
      res.json({
        ok: true,
        data: {
          records: records.map(serializeRecord),
          statistics: computeStatistics(records),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/analysis/preview
   * Which files an update would write, with which date
   */
  async preview(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const folder: string = req.body.folder;
      const fields = parseFields(req.body.fields);
      const records = await fileAnalysisEngine.analyzeFolder(folder);
      const plan = previewUpdates(records, fields);
      res.json({
        ok: true,
        data: { plan: plan.map(serializePlanEntry) },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const analysisController = new AnalysisController();
