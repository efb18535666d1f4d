/**
 * File Analysis Engine
 * Per-file orchestration: classify, read tags, extract candidates, rank, report missing fields.
 * Every call re-reads the filesystem; nothing is cached between runs.
 */

import fs from 'fs/promises';
import path from 'path';
import { AnalysisRecord, MediaKind, TagBag, TargetField } from '../../types';
import { parseExifDateTime } from '../../utils/dates';
import { describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { extractCandidates } from '../inference/candidateExtractor';
import { rankCandidates } from '../inference/suggestionRanker';
import { MetadataCodec } from '../metadata/metadataCodec';
import { exifCodec } from '../metadata/exifCodec';
import { mediaKindOf } from './mediaFormats';
import { scanMediaFiles } from './mediaScanner';

// Target field -> tag holding it
const FIELD_TAGS: Record<TargetField, string> = {
  [TargetField.DateTimeOriginal]: 'DateTimeOriginal',
  [TargetField.DateTimeDigitized]: 'DateTimeDigitized',
  [TargetField.DateCreated]: 'DateTime',
};

const ALL_FIELDS: readonly TargetField[] = Object.values(TargetField);

/**
 * Fields absent or unparsable in the tag bag
 */
export function findMissingFields(tags: TagBag): Set<TargetField> {
  const missing = new Set<TargetField>();
  for (const field of ALL_FIELDS) {
    const value = tags[FIELD_TAGS[field]];
    if (value === undefined) {
      missing.add(field);
      continue;
    }
    try {
      parseExifDateTime(value);
    } catch {
      missing.add(field);
    }
  }
  return missing;
}

export class FileAnalysisEngine {
  constructor(private readonly codec: MetadataCodec = exifCodec) {}

  async analyze(filePath: string): Promise<AnalysisRecord> {
    const absolutePath = path.resolve(filePath);
    const filename = path.basename(absolutePath);
    const kind = mediaKindOf(absolutePath);

    try {
      const stats = await fs.stat(absolutePath);
      if (!stats.isFile()) {
        throw new Error('Not a regular file');
      }
      // Unsupported files still report filename and filesystem dates.
      const tags = kind === MediaKind.Unsupported ? {} : await this.codec.readTags(absolutePath);
      const candidates = extractCandidates({
        tags,
        filename,
        kind,
        fsCreated: stats.birthtime,
        fsModified: stats.mtime,
      });

      return {
        path: absolutePath,
        filename,
        kind,
        sizeBytes: stats.size,
        missingFields: findMissingFields(tags),
        candidates,
        suggestion: rankCandidates(candidates),
      };
    } catch (error) {
      const { message } = describeError(error);
      logger.warn('File analysis failed', { path: absolutePath, error: message });
      return {
        path: absolutePath,
        filename,
        kind,
        sizeBytes: 0,
        missingFields: new Set(ALL_FIELDS),
        candidates: [],
        suggestion: null,
        error: message,
      };
    }
  }

  /**
   * One record per input, in input order
   */
  async analyzeMany(filePaths: readonly string[]): Promise<AnalysisRecord[]> {
    const records: AnalysisRecord[] = [];
    for (const filePath of filePaths) {
      records.push(await this.analyze(filePath));
    }
    return records;
  }

  async analyzeFolder(folder: string): Promise<AnalysisRecord[]> {
    const files = await scanMediaFiles(folder);
    logger.info('Analyzing folder', { folder, files: files.length });
    return this.analyzeMany(files);
  }
}

export const fileAnalysisEngine = new FileAnalysisEngine();
