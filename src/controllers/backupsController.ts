/**
 * Backups Controller
 * Restore and clean up sidecar backups
 */

import { Request, Response, NextFunction } from 'express';
import path from 'path';
import { backupManager } from '../services/backup/backupManager';
import { assertDirectory } from '../services/analysis/mediaScanner';

export class BackupsController {
  /**
   * POST /api/backups/restore
   */
  async restoreAll(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const folder = await assertDirectory(req.body.folder);
      const restored = await backupManager.restoreAll(folder);
      res.json({ ok: true, data: { restored } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/backups/restore-file
   * 404 when the file has no backup
   */
  async restoreFile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const filePath = path.resolve(req.body.path);
      const restored = await backupManager.restoreBackup(filePath);
      res.json({ ok: true, data: { path: filePath, restored } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/backups/cleanup
   */
  async cleanup(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const folder = await assertDirectory(req.body.folder);
      const removed = await backupManager.cleanup(folder);
      res.json({ ok: true, data: { removed } });
    } catch (error) {
      next(error);
    }
  }
}

export const backupsController = new BackupsController();
