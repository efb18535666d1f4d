/**
 * Domain types for the capture-date repair service
 * Analysis records, date candidates and update outcomes
 */

// ============================================================================
// ENUMS
// ============================================================================

export enum MediaKind {
  Image = 'image',
  Video = 'video',
  Unsupported = 'unsupported',
}

/**
 * Metadata date fields the service reports on and can write.
 * DateCreated lives in the IFD0 DateTime tag.
 */
export enum TargetField {
  DateTimeOriginal = 'DateTimeOriginal',
  DateTimeDigitized = 'DateTimeDigitized',
  DateCreated = 'DateCreated',
}

/**
 * Evidence sources, in priority order (highest first).
 * Values double as the human-readable label.
 */
export enum DateSource {
  ExifDateTimeOriginal = 'EXIF DateTimeOriginal',
  ExifDateTimeDigitized = 'EXIF DateTimeDigitized',
  VideoCreationDate = 'Video Creation Date',
  FilenameDate = 'Filename Date',
  FilesystemCreation = 'Filesystem Creation',
  FilesystemModification = 'Filesystem Modification',
}

export enum UpdateStatus {
  Success = 'success',
  Skipped = 'skipped',
  Failed = 'failed',
}

export type SkipReason =
  | 'unsupported-format'
  | 'implausible-date'
  | 'no-suggestion'
  | 'no-missing-fields';

// ============================================================================
// TAG BAG
// ============================================================================

export type TagValue = string | number | Date;

/**
 * Raw metadata as decoded by a codec, keyed by canonical tag name
 * (DateTimeOriginal, DateTimeDigitized, DateTime, creation_time, ...)
 */
export type TagBag = Readonly<Record<string, TagValue | undefined>>;

// ============================================================================
// ANALYSIS
// ============================================================================

export interface DateCandidate {
  readonly source: DateSource;
  readonly value: Date;
  readonly confidence: number; // 0-1, fixed per source
  readonly rawText?: string;
}

export type MissingFieldSet = ReadonlySet<TargetField>;

/**
 * One per analyzed file. Never mutated; re-analysis produces a new record.
 */
export interface AnalysisRecord {
  readonly path: string;
  readonly filename: string;
  readonly kind: MediaKind;
  readonly sizeBytes: number;
  readonly missingFields: MissingFieldSet;
  readonly candidates: readonly DateCandidate[];
  readonly suggestion: DateCandidate | null;
  readonly error?: string;
}

export interface BatchStatistics {
  totalFiles: number;
  imageFiles: number;
  videoFiles: number;
  unsupportedFiles: number;
  missingDateTimeOriginal: number;
  missingDateTimeDigitized: number;
  missingDateCreated: number;
  filesWithSuggestions: number;
}

// ============================================================================
// UPDATES
// ============================================================================

/**
 * Fields a caller may ask to write. DateTimeDigitized follows DateTimeOriginal.
 */
export type WritableField = TargetField.DateTimeOriginal | TargetField.DateCreated;

export interface UpdateOptions {
  fields: readonly WritableField[];
  dryRun: boolean;
  backup: boolean;
}

export interface UpdateSuccess {
  status: UpdateStatus.Success;
  path: string;
  date: Date;
  fieldsWritten: TargetField[];
  backupPath?: string;
  dryRun: boolean;
}

export interface UpdateSkipped {
  status: UpdateStatus.Skipped;
  path: string;
  reason: SkipReason;
}

export interface UpdateFailed {
  status: UpdateStatus.Failed;
  path: string;
  error: { code: string; message: string };
}

export type UpdateOutcome = UpdateSuccess | UpdateSkipped | UpdateFailed;

export interface BatchUpdateResult {
  successCount: number;
  failureCount: number;
  skippedCount: number;
  outcomes: UpdateOutcome[];
}
