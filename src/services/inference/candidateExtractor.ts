/**
 * Date Candidate Extractor
 * Turns a tag bag, a filename and filesystem timestamps into scored capture-date candidates.
 * Pure: no I/O beyond its input.
 */

import { DateCandidate, DateSource, MediaKind, TagBag, TagValue } from '../../types';
import { assertPlausibleDate, isPlausibleDate, parseExifDateTime, parseVideoDateTime } from '../../utils/dates';
import { AppError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { extractFilenameDate } from './filenameDates';
import { SOURCE_CONFIDENCE, sortCandidates } from './suggestionRanker';

export interface ExtractionInput {
  tags: TagBag;
  filename: string;
  kind: MediaKind;
  fsCreated?: Date | null;
  fsModified?: Date | null;
  now?: Date;
}

/** Container tags checked for a video creation time, first parseable wins */
export const VIDEO_DATE_TAGS = ['creation_time', 'date', 'creation_date', 'encoded_date'] as const;

function makeCandidate(source: DateSource, value: Date, rawText?: string): DateCandidate {
  return Object.freeze({
    source,
    value,
    confidence: SOURCE_CONFIDENCE[source],
    ...(rawText !== undefined && { rawText }),
  });
}

function rawTextOf(value: TagValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Parse one tag into a candidate; unparsable or implausible values are dropped.
 */
function fromTag(
  source: DateSource,
  value: TagValue | undefined,
  parse: (value: TagValue) => Date,
  now: Date
): DateCandidate | null {
  if (value === undefined || value === '') return null;
  try {
    const date = assertPlausibleDate(parse(value), now);
    return makeCandidate(source, date, rawTextOf(value));
  } catch (error) {
    if (!(error instanceof AppError)) throw error;
    logger.debug('Date candidate dropped', { source, value: rawTextOf(value), reason: error.code });
    return null;
  }
}

function videoCandidate(tags: TagBag, now: Date): DateCandidate | null {
  for (const key of VIDEO_DATE_TAGS) {
    const candidate = fromTag(DateSource.VideoCreationDate, tags[key], parseVideoDateTime, now);
    if (candidate) return candidate;
  }
  return null;
}

function filesystemCandidate(source: DateSource, date: Date | null | undefined, now: Date): DateCandidate | null {
  if (!date) return null;
  if (!isPlausibleDate(date, now)) {
    logger.debug('Date candidate dropped', { source, reason: 'IMPLAUSIBLE_DATE' });
    return null;
  }
  return makeCandidate(source, date);
}

export function extractCandidates(input: ExtractionInput): DateCandidate[] {
  const { tags, filename, kind } = input;
  const now = input.now ?? new Date();
  const candidates: Array<DateCandidate | null> = [];

  candidates.push(fromTag(DateSource.ExifDateTimeOriginal, tags.DateTimeOriginal, parseExifDateTime, now));
  candidates.push(fromTag(DateSource.ExifDateTimeDigitized, tags.DateTimeDigitized, parseExifDateTime, now));

  if (kind === MediaKind.Video) {
    candidates.push(videoCandidate(tags, now));
  }

  const fromName = extractFilenameDate(filename, now);
  if (fromName) {
    candidates.push(makeCandidate(DateSource.FilenameDate, fromName.date, fromName.text));
  }

  // Creation time only counts when the filesystem records one of its own.
  const created = input.fsCreated;
  const modified = input.fsModified;
  if (created && created.getTime() > 0 && (!modified || created.getTime() !== modified.getTime())) {
    candidates.push(filesystemCandidate(DateSource.FilesystemCreation, created, now));
  }
  candidates.push(filesystemCandidate(DateSource.FilesystemModification, modified, now));

  return sortCandidates(candidates.filter((c): c is DateCandidate => c !== null));
}
