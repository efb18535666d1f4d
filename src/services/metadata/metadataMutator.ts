/**
 * Metadata Mutator
 * Writes a chosen date into a file's date tags: validate, encode in memory, back up, then swap atomically.
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  AnalysisRecord,
  MediaKind,
  TargetField,
  UpdateOptions,
  UpdateOutcome,
  UpdateStatus,
  WritableField,
} from '../../types';
import { assertPlausibleDate } from '../../utils/dates';
import {
  BackupError,
  ImplausibleDateError,
  MetadataWriteError,
  UnsupportedFormatError,
  ValidationError,
  describeError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { BackupManager, backupManager } from '../backup/backupManager';
import { mediaFormatOf } from '../analysis/mediaFormats';
import { DateTagChanges, MetadataCodec } from './metadataCodec';
import { exifCodec } from './exifCodec';

const WRITABLE_FIELDS: readonly TargetField[] = [TargetField.DateTimeOriginal, TargetField.DateCreated];

/**
 * Throws ValidationError for an empty or unknown field selection.
 */
export function validateFields(fields: readonly string[]): WritableField[] {
  if (fields.length === 0) {
    throw new ValidationError('At least one date field must be selected');
  }
  const valid: WritableField[] = [];
  for (const field of fields) {
    if (field === TargetField.DateTimeOriginal || field === TargetField.DateCreated) {
      if (!valid.includes(field)) valid.push(field);
    } else {
      throw new ValidationError(`Field cannot be written: ${field}`, { allowed: WRITABLE_FIELDS });
    }
  }
  return valid;
}

/**
 * Tag changes for a field selection; DateTimeDigitized travels with DateTimeOriginal.
 */
export function buildChanges(fields: readonly WritableField[], date: Date): DateTagChanges {
  const changes: DateTagChanges = {};
  if (fields.includes(TargetField.DateTimeOriginal)) {
    changes[TargetField.DateTimeOriginal] = date;
    changes[TargetField.DateTimeDigitized] = date;
  }
  if (fields.includes(TargetField.DateCreated)) {
    changes[TargetField.DateCreated] = date;
  }
  return changes;
}

function changedFields(changes: DateTagChanges): TargetField[] {
  return Object.values(TargetField).filter((field) => changes[field] !== undefined);
}

export class MetadataMutator {
  constructor(
    private readonly codec: MetadataCodec = exifCodec,
    private readonly backups: BackupManager = backupManager
  ) {}

  async update(target: AnalysisRecord | string, date: Date, options: UpdateOptions): Promise<UpdateOutcome> {
    const fields = validateFields(options.fields);
    const filePath = typeof target === 'string' ? path.resolve(target) : target.path;
    const format = mediaFormatOf(filePath);
    const kind = typeof target === 'string' ? format.kind : target.kind;

    if (kind !== MediaKind.Image || !format.writable || !this.codec.canWrite(filePath)) {
      return { status: UpdateStatus.Skipped, path: filePath, reason: 'unsupported-format' };
    }

    try {
      assertPlausibleDate(date);
    } catch (error) {
      if (error instanceof ImplausibleDateError) {
        return { status: UpdateStatus.Skipped, path: filePath, reason: 'implausible-date' };
      }
      throw error;
    }

    const changes = buildChanges(fields, date);
    const fieldsWritten = changedFields(changes);

    try {
      const original = await fs.readFile(filePath);
      const updated = this.codec.encodeDateTags(original, filePath, changes);

      if (options.dryRun) {
        logger.info('[DRY RUN] Would update file', { path: filePath, date: date.toISOString(), fields: fieldsWritten });
        return { status: UpdateStatus.Success, path: filePath, date, fieldsWritten, dryRun: true };
      }

      const backupPath = options.backup ? await this.backups.createBackup(filePath) : undefined;
      await this.replaceAtomically(filePath, updated);

      logger.info('File updated', { path: filePath, date: date.toISOString(), fields: fieldsWritten, backupPath });
      return {
        status: UpdateStatus.Success,
        path: filePath,
        date,
        fieldsWritten,
        dryRun: false,
        ...(backupPath !== undefined && { backupPath }),
      };
    } catch (error) {
      if (error instanceof UnsupportedFormatError) {
        return { status: UpdateStatus.Skipped, path: filePath, reason: 'unsupported-format' };
      }
      const described = describeError(error);
      logger.error('File update failed', error, {
        path: filePath,
        stage: error instanceof BackupError ? 'backup' : 'write',
      });
      return { status: UpdateStatus.Failed, path: filePath, error: described };
    }
  }

  /**
   * Write to a sibling temp file, then rename over the original.
   * Readers see either the old bytes or the new bytes, never a mix.
   */
  private async replaceAtomically(filePath: string, data: Buffer): Promise<void> {
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${uuidv4()}.tmp`);
    try {
      const stats = await fs.stat(filePath);
      await fs.writeFile(tempPath, data, { mode: stats.mode });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new MetadataWriteError(`Failed to write ${filePath}`, { error: String(error) });
    }
  }
}

export const metadataMutator = new MetadataMutator();
