/**
 * Backup Manager
 * One sidecar copy per original (<file><suffix>), created before any metadata write.
 * Filesystem state only; knows nothing about metadata.
 */

import fs from 'fs/promises';
import { config } from '../../config';
import { logger } from '../../utils/logger';
import { BackupError, NotFoundError } from '../../utils/errors';
import { listFiles } from '../analysis/mediaScanner';

export class BackupManager {
  private suffix: string;

  constructor(suffix?: string) {
    this.suffix = suffix || config.backupSuffix;
  }

  /**
   * Deterministic backup location for an original
   */
  backupPathFor(filePath: string): string {
    return `${filePath}${this.suffix}`;
  }

  isBackupPath(filePath: string): boolean {
    return filePath.endsWith(this.suffix) && filePath.length > this.suffix.length;
  }

  originalPathFor(backupPath: string): string {
    return backupPath.slice(0, -this.suffix.length);
  }

  /**
   * Copy the file byte-for-byte to its backup location, replacing any previous backup.
   * Timestamps are carried over so restored files keep their filesystem dates.
   */
  async createBackup(filePath: string): Promise<string> {
    const backupPath = this.backupPathFor(filePath);
    try {
      const stats = await fs.stat(filePath);
      await fs.copyFile(filePath, backupPath);
      await fs.utimes(backupPath, stats.atime, stats.mtime);
    } catch (error) {
      throw new BackupError(`Failed to create backup for ${filePath}`, { error: String(error) });
    }

    logger.info('Backup created', { path: filePath, backupPath });
    return backupPath;
  }

  async hasBackup(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.backupPathFor(filePath));
      return stats.isFile();
    } catch {
      return false;
    }
  }

  /**
   * Copy the backup over the original. The backup stays in place.
   * Returns false without writing when the original already matches the backup.
   */
  async restoreBackup(filePath: string): Promise<boolean> {
    if (!(await this.hasBackup(filePath))) {
      throw new NotFoundError('Backup', this.backupPathFor(filePath));
    }
    const backupPath = this.backupPathFor(filePath);

    try {
      const backup = await fs.readFile(backupPath);
      const current = await this.readIfExists(filePath);
      if (current && current.equals(backup)) {
        logger.debug('Restore skipped, file already matches backup', { path: filePath });
        return false;
      }

      const stats = await fs.stat(backupPath);
      await fs.copyFile(backupPath, filePath);
      await fs.utimes(filePath, stats.atime, stats.mtime);
    } catch (error) {
      throw new BackupError(`Failed to restore ${filePath} from backup`, { error: String(error) });
    }

    logger.info('File restored from backup', { path: filePath, backupPath });
    return true;
  }

  /**
   * Every backup file below the folder
   */
  async findBackups(folder: string): Promise<string[]> {
    const files = await listFiles(folder);
    return files.filter((f) => this.isBackupPath(f));
  }

  /**
   * Restore every backup below the folder. Failures are logged and skipped.
   * Returns how many originals were actually rewritten.
   */
  async restoreAll(folder: string): Promise<number> {
    const backups = await this.findBackups(folder);
    let restored = 0;

    for (const backupPath of backups) {
      const original = this.originalPathFor(backupPath);
      try {
        if (await this.restoreBackup(original)) restored++;
      } catch (error) {
        logger.warn('Restore failed', { path: original, error: String(error) });
      }
    }

    logger.info('Restore finished', { folder, backups: backups.length, restored });
    return restored;
  }

  /**
   * Delete every backup file below the folder. Other files are never touched.
   */
  async cleanup(folder: string): Promise<number> {
    const backups = await this.findBackups(folder);
    let removed = 0;

    for (const backupPath of backups) {
      try {
        await fs.unlink(backupPath);
        removed++;
      } catch (error) {
        logger.warn('Failed to remove backup', { backupPath, error: String(error) });
      }
    }

    logger.info('Backups removed', { folder, removed });
    return removed;
  }

  private async readIfExists(filePath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
  }
}

export const backupManager = new BackupManager();
