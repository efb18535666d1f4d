/**
 * Analysis views
 * Pure queries over caller-owned AnalysisRecord collections.
 */

import {
  AnalysisRecord,
  BatchStatistics,
  DateCandidate,
  DateSource,
  MediaKind,
  TargetField,
  WritableField,
} from '../../types';
import { NotFoundError } from '../../utils/errors';
import { MetadataCodec } from '../metadata/metadataCodec';
import { exifCodec } from '../metadata/exifCodec';
import { isWritableMedia } from './mediaFormats';

export function filesWithMissingDates(records: readonly AnalysisRecord[]): AnalysisRecord[] {
  return records.filter((r) => r.missingFields.size > 0);
}

export function filesWithSuggestions(records: readonly AnalysisRecord[]): AnalysisRecord[] {
  return records.filter((r) => r.suggestion !== null);
}

export function computeStatistics(records: readonly AnalysisRecord[]): BatchStatistics {
  const stats: BatchStatistics = {
    totalFiles: records.length,
    imageFiles: 0,
    videoFiles: 0,
    unsupportedFiles: 0,
    missingDateTimeOriginal: 0,
    missingDateTimeDigitized: 0,
    missingDateCreated: 0,
    filesWithSuggestions: 0,
  };

  for (const record of records) {
    if (record.kind === MediaKind.Image) stats.imageFiles++;
    else if (record.kind === MediaKind.Video) stats.videoFiles++;
    else stats.unsupportedFiles++;

    if (record.missingFields.has(TargetField.DateTimeOriginal)) stats.missingDateTimeOriginal++;
    if (record.missingFields.has(TargetField.DateTimeDigitized)) stats.missingDateTimeDigitized++;
    if (record.missingFields.has(TargetField.DateCreated)) stats.missingDateCreated++;
    if (record.suggestion) stats.filesWithSuggestions++;
  }

  return stats;
}

export function findCandidate(record: AnalysisRecord, source: DateSource): DateCandidate | undefined {
  return record.candidates.find((c) => c.source === source);
}

/**
 * New record whose suggestion is the candidate from another source
 * (manual pick in a review table). The input record is left untouched.
 */
export function withSuggestionFrom(record: AnalysisRecord, source: DateSource): AnalysisRecord {
  const candidate = findCandidate(record, source);
  if (!candidate) {
    throw new NotFoundError(`Date source '${source}' for`, record.path);
  }
  return { ...record, suggestion: candidate };
}

/**
 * Requested fields that the record is actually missing.
 * DateTimeOriginal also counts when only DateTimeDigitized is missing, since they are written together.
 */
export function fieldsToWrite(record: AnalysisRecord, requested: readonly WritableField[]): WritableField[] {
  return requested.filter((field) => {
    if (field === TargetField.DateTimeOriginal) {
      return (
        record.missingFields.has(TargetField.DateTimeOriginal) ||
        record.missingFields.has(TargetField.DateTimeDigitized)
      );
    }
    return record.missingFields.has(field);
  });
}

export interface UpdatePlanEntry {
  path: string;
  filename: string;
  date: Date;
  source: DateSource;
  confidence: number;
  fields: WritableField[];
}

/**
 * What an update run would write: files the codec can write, with a suggestion and at least one missing requested field.
 */
export function previewUpdates(
  records: readonly AnalysisRecord[],
  requested: readonly WritableField[],
  codec: Pick<MetadataCodec, 'canWrite'> = exifCodec
): UpdatePlanEntry[] {
  const plan: UpdatePlanEntry[] = [];
  for (const record of records) {
    if (!record.suggestion || !isWritableMedia(record.path) || !codec.canWrite(record.path)) continue;
    const fields = fieldsToWrite(record, requested);
    if (fields.length === 0) continue;
    plan.push({
      path: record.path,
      filename: record.filename,
      date: record.suggestion.value,
      source: record.suggestion.source,
      confidence: record.suggestion.confidence,
      fields,
    });
  }
  return plan;
}
