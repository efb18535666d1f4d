#!/usr/bin/env node
/**
 * Analyze a folder and optionally write suggested capture dates.
 * Usage: npm run fix-dates -- <folder> [--update] [--dry-run] [--no-backup]
 *        [--no-datetime-original] [--no-date-created] [--detailed] [--restore] [--cleanup]
 */

import { AnalysisRecord, TargetField, UpdateStatus, WritableField } from '../types';
import { fileAnalysisEngine } from '../services/analysis/fileAnalysisEngine';
import {
  computeStatistics,
  filesWithMissingDates,
  filesWithSuggestions,
  previewUpdates,
} from '../services/analysis/analysisViews';
import { assertDirectory } from '../services/analysis/mediaScanner';
import { backupManager } from '../services/backup/backupManager';
import { updateOrchestrator } from '../services/update/updateOrchestrator';
import { config } from '../config';

const RULE = '='.repeat(60);

interface CliOptions {
  folder: string;
  update: boolean;
  dryRun: boolean;
  backup: boolean;
  fields: WritableField[];
  detailed: boolean;
  restore: boolean;
  cleanup: boolean;
}

function parseArgs(argv: string[]): CliOptions {
  const flags = new Set(argv.filter((a) => a.startsWith('--')));
  const positional = argv.filter((a) => !a.startsWith('--'));
  if (positional.length !== 1) {
    throw new Error('Usage: fix-dates <folder> [--update] [--dry-run] [--no-backup] [--detailed] [--restore] [--cleanup]');
  }

  const fields: WritableField[] = [];
  if (!flags.has('--no-datetime-original')) fields.push(TargetField.DateTimeOriginal);
  if (!flags.has('--no-date-created')) fields.push(TargetField.DateCreated);

  return {
    folder: positional[0],
    update: flags.has('--update'),
    dryRun: flags.has('--dry-run'),
    backup: config.createBackups && !flags.has('--no-backup'),
    fields,
    detailed: flags.has('--detailed'),
    restore: flags.has('--restore'),
    cleanup: flags.has('--cleanup'),
  };
}

function printRecord(record: AnalysisRecord): void {
  console.log(`\nFile: ${record.filename}`);
  console.log(`Path: ${record.path}`);
  console.log(`Size: ${record.sizeBytes.toLocaleString()} bytes`);
  console.log(`Missing dates: ${[...record.missingFields].join(', ') || 'none'}`);
  if (record.error) console.log(`Error: ${record.error}`);
  console.log('Available dates:');
  for (const c of record.candidates) {
    console.log(`  - ${c.source}: ${c.value.toISOString()} (confidence ${c.confidence.toFixed(2)})`);
  }
  console.log(
    record.suggestion
      ? `Suggested date: ${record.suggestion.value.toISOString()} (source: ${record.suggestion.source})`
      : 'No date suggestion available'
  );
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const folder = await assertDirectory(options.folder);

  if (options.restore) {
    const restored = await backupManager.restoreAll(folder);
    console.log(`Restored ${restored} files from backup.`);
    return;
  }
  if (options.cleanup) {
    const removed = await backupManager.cleanup(folder);
    console.log(`Removed ${removed} backup files.`);
    return;
  }
  if (options.fields.length === 0) {
    throw new Error('At least one date field must be enabled for updates.');
  }

  console.log(`Analyzing media files in: ${folder}`);
  const records = await fileAnalysisEngine.analyzeFolder(folder);
  const stats = computeStatistics(records);

  console.log(`\n${RULE}\nCAPTURE DATE ANALYSIS SUMMARY\n${RULE}`);
  console.log(`Total files analyzed: ${stats.totalFiles}`);
  console.log(`Image files: ${stats.imageFiles}`);
  console.log(`Video files: ${stats.videoFiles}`);
  console.log(`Files missing DateTimeOriginal: ${stats.missingDateTimeOriginal}`);
  console.log(`Files missing DateCreated: ${stats.missingDateCreated}`);
  console.log(`Files with date suggestions: ${stats.filesWithSuggestions}`);

  const missing = filesWithMissingDates(records);
  if (options.detailed) missing.forEach(printRecord);

  if (!options.update && !options.dryRun) {
    console.log(
      missing.length > 0
        ? `\nFound ${missing.length} files with missing dates. Use --update or --dry-run.`
        : '\nAll files have complete date information!'
    );
    return;
  }

  const plan = previewUpdates(records, options.fields);
  console.log(`\nFiles to update: ${plan.length}`);
  for (const entry of plan) {
    console.log(`  ${entry.filename}: ${entry.date.toISOString()} (${entry.source}) -> ${entry.fields.join(', ')}`);
  }

  const result = await updateOrchestrator.updateMany(filesWithSuggestions(records), {
    fields: options.fields,
    dryRun: options.dryRun,
    backup: options.backup,
  });

  console.log(`\n${RULE}\n${options.dryRun ? '[DRY RUN] ' : ''}UPDATE SUMMARY\n${RULE}`);
  console.log(`Updated: ${result.successCount}, failed: ${result.failureCount}, skipped: ${result.skippedCount}`);
  for (const outcome of result.outcomes) {
    if (outcome.status === UpdateStatus.Failed) {
      console.log(`  FAILED  ${outcome.path}: ${outcome.error.message}`);
    } else if (outcome.status === UpdateStatus.Skipped) {
      console.log(`  SKIPPED ${outcome.path}: ${outcome.reason}`);
    }
  }
  if (result.failureCount > 0) process.exitCode = 1;
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
