/**
 * Update Orchestrator
 * Runs the mutator over a batch, one file at a time. A failing file never stops the batch.
 */

import {
  AnalysisRecord,
  BatchUpdateResult,
  DateCandidate,
  DateSource,
  UpdateOutcome,
  UpdateStatus,
  WritableField,
} from '../../types';
import { describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { fieldsToWrite, withSuggestionFrom } from '../analysis/analysisViews';
import { MetadataMutator, metadataMutator, validateFields } from '../metadata/metadataMutator';

export interface BatchUpdateOptions {
  fields: readonly WritableField[];
  dryRun: boolean;
  backup: boolean;
  /** Per-path source to use instead of the ranked suggestion */
  overrides?: ReadonlyMap<string, DateSource>;
}

export function summarizeOutcomes(outcomes: UpdateOutcome[]): BatchUpdateResult {
  return {
    successCount: outcomes.filter((o) => o.status === UpdateStatus.Success).length,
    failureCount: outcomes.filter((o) => o.status === UpdateStatus.Failed).length,
    skippedCount: outcomes.filter((o) => o.status === UpdateStatus.Skipped).length,
    outcomes,
  };
}

export class UpdateOrchestrator {
  constructor(private readonly mutator: MetadataMutator = metadataMutator) {}

  async updateMany(records: readonly AnalysisRecord[], options: BatchUpdateOptions): Promise<BatchUpdateResult> {
    const fields = validateFields(options.fields);
    const outcomes: UpdateOutcome[] = [];

    for (const record of records) {
      outcomes.push(await this.updateOne(record, fields, options));
    }

    const result = summarizeOutcomes(outcomes);
    logger.info('Batch update finished', {
      files: records.length,
      dryRun: options.dryRun,
      successCount: result.successCount,
      failureCount: result.failureCount,
      skippedCount: result.skippedCount,
    });
    return result;
  }

  private async updateOne(
    record: AnalysisRecord,
    requested: WritableField[],
    options: BatchUpdateOptions
  ): Promise<UpdateOutcome> {
    // Analysis could not read the file; nothing to write from.
    if (record.error !== undefined) {
      return { status: UpdateStatus.Failed, path: record.path, error: { code: 'IO_ERROR', message: record.error } };
    }

    let chosen: DateCandidate | null;
    try {
      chosen = this.chooseCandidate(record, options.overrides);
    } catch (error) {
      return { status: UpdateStatus.Failed, path: record.path, error: describeError(error) };
    }
    if (!chosen) {
      return { status: UpdateStatus.Skipped, path: record.path, reason: 'no-suggestion' };
    }

    const fields = fieldsToWrite(record, requested);
    if (fields.length === 0) {
      return { status: UpdateStatus.Skipped, path: record.path, reason: 'no-missing-fields' };
    }

    try {
      return await this.mutator.update(record, chosen.value, {
        fields,
        dryRun: options.dryRun,
        backup: options.backup,
      });
    } catch (error) {
      return { status: UpdateStatus.Failed, path: record.path, error: describeError(error) };
    }
  }

  /**
   * The ranked suggestion, or the candidate from the overriding source.
   * Throws NotFoundError when the record has no candidate from that source.
   */
  private chooseCandidate(
    record: AnalysisRecord,
    overrides?: ReadonlyMap<string, DateSource>
  ): DateCandidate | null {
    const source = overrides?.get(record.path);
    if (source) return withSuggestionFrom(record, source).suggestion;
    return record.suggestion;
  }
}

export const updateOrchestrator = new UpdateOrchestrator();
