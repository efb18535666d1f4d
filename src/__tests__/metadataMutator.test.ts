/**
 * Metadata mutator tests
 */

import fs from 'fs/promises';
import path from 'path';
import { BackupManager } from '../services/backup/backupManager';
import { MetadataMutator, buildChanges, validateFields } from '../services/metadata/metadataMutator';
import { TargetField, UpdateOptions, UpdateStatus } from '../types';
import { ValidationError } from '../utils/errors';
import { FakeCodec, fakeMedia, makeTempDir, readFakeTags, writeMedia } from './helpers/fakeCodec';

const DATE = new Date(2023, 11, 15, 14, 20, 30);

const WRITE_ORIGINAL: UpdateOptions = {
  fields: [TargetField.DateTimeOriginal],
  dryRun: false,
  backup: true,
};

describe('validateFields', () => {
  it('rejects an empty selection', () => {
    expect(() => validateFields([])).toThrow(ValidationError);
  });

  it('rejects fields that cannot be written directly', () => {
    expect(() => validateFields(['DateTimeDigitized'])).toThrow('Field cannot be written: DateTimeDigitized');
  });

  it('drops duplicates', () => {
    expect(validateFields(['DateCreated', 'DateCreated', 'DateTimeOriginal'])).toEqual([
      TargetField.DateCreated,
      TargetField.DateTimeOriginal,
    ]);
  });
});

describe('buildChanges', () => {
  it('writes DateTimeDigitized together with DateTimeOriginal', () => {
    expect(buildChanges([TargetField.DateTimeOriginal], DATE)).toEqual({
      DateTimeOriginal: DATE,
      DateTimeDigitized: DATE,
    });
    expect(buildChanges([TargetField.DateCreated], DATE)).toEqual({ DateCreated: DATE });
  });
});

describe('MetadataMutator', () => {
  let dir: string;
  const backups = new BackupManager('.backup');
  const mutator = new MetadataMutator(new FakeCodec(), backups);

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the date, backing up the original first', async () => {
    const original = fakeMedia({ DateTime: '2020:01:01 00:00:00' });
    const file = await writeMedia(dir, 'photo.jpg', original);

    const outcome = await mutator.update(file, DATE, WRITE_ORIGINAL);

    expect(outcome).toEqual({
      status: UpdateStatus.Success,
      path: file,
      date: DATE,
      fieldsWritten: [TargetField.DateTimeOriginal, TargetField.DateTimeDigitized],
      dryRun: false,
      backupPath: `${file}.backup`,
    });
    expect(await readFakeTags(file)).toEqual({
      DateTime: '2020:01:01 00:00:00',
      DateTimeOriginal: '2023:12:15 14:20:30',
      DateTimeDigitized: '2023:12:15 14:20:30',
    });
    expect(await fs.readFile(`${file}.backup`, 'utf8')).toBe(original);
  });

  it('leaves no temp files behind', async () => {
    const file = await writeMedia(dir, 'photo.jpg', fakeMedia());
    await mutator.update(file, DATE, { ...WRITE_ORIGINAL, backup: false });
    expect(await fs.readdir(dir)).toEqual(['photo.jpg']);
  });

  it('changes nothing on a dry run', async () => {
    const file = await writeMedia(dir, 'photo.jpg', fakeMedia());

    const outcome = await mutator.update(file, DATE, { ...WRITE_ORIGINAL, dryRun: true });

    expect(outcome).toEqual({
      status: UpdateStatus.Success,
      path: file,
      date: DATE,
      fieldsWritten: [TargetField.DateTimeOriginal, TargetField.DateTimeDigitized],
      dryRun: true,
    });
    expect(await fs.readFile(file, 'utf8')).toBe(fakeMedia());
    expect(await backups.hasBackup(file)).toBe(false);
  });

  it('skips formats it cannot write', async () => {
    const png = await writeMedia(dir, 'shot.png', fakeMedia());
    const movie = await writeMedia(dir, 'clip.mov', fakeMedia());

    await expect(mutator.update(png, DATE, WRITE_ORIGINAL)).resolves.toEqual({
      status: UpdateStatus.Skipped,
      path: png,
      reason: 'unsupported-format',
    });
    await expect(mutator.update(movie, DATE, WRITE_ORIGINAL)).resolves.toEqual({
      status: UpdateStatus.Skipped,
      path: movie,
      reason: 'unsupported-format',
    });
    expect(await backups.hasBackup(png)).toBe(false);
  });

  it('skips when the codec refuses the container', async () => {
    const jpegOnly = new MetadataMutator(new FakeCodec(['.jpg']), backups);
    const file = await writeMedia(dir, 'scan.tif', fakeMedia());

    await expect(jpegOnly.update(file, DATE, WRITE_ORIGINAL)).resolves.toEqual({
      status: UpdateStatus.Skipped,
      path: file,
      reason: 'unsupported-format',
    });
    expect(await backups.hasBackup(file)).toBe(false);
  });

  it('skips implausible and invalid dates without touching the file', async () => {
    const file = await writeMedia(dir, 'photo.jpg', fakeMedia());

    for (const date of [new Date(1850, 0, 1), new Date(Number.NaN)]) {
      await expect(mutator.update(file, date, WRITE_ORIGINAL)).resolves.toEqual({
        status: UpdateStatus.Skipped,
        path: file,
        reason: 'implausible-date',
      });
    }
    expect(await fs.readFile(file, 'utf8')).toBe(fakeMedia());
  });

  it('throws ValidationError for an empty field selection', async () => {
    const file = await writeMedia(dir, 'photo.jpg', fakeMedia());
    await expect(mutator.update(file, DATE, { ...WRITE_ORIGINAL, fields: [] })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('fails without writing when the backup cannot be created', async () => {
    const file = await writeMedia(dir, 'photo.jpg', fakeMedia());
    await fs.mkdir(`${file}.backup`);

    const outcome = await mutator.update(file, DATE, WRITE_ORIGINAL);

    expect(outcome.status).toBe(UpdateStatus.Failed);
    expect(outcome.status === UpdateStatus.Failed && outcome.error.code).toBe('IO_ERROR');
    expect(await fs.readFile(file, 'utf8')).toBe(fakeMedia());
  });

  it('reports a failure for a corrupt file', async () => {
    const file = await writeMedia(dir, 'photo.jpg', 'not json');

    const outcome = await mutator.update(file, DATE, WRITE_ORIGINAL);

    expect(outcome.status).toBe(UpdateStatus.Failed);
    expect(await fs.readFile(file, 'utf8')).toBe('not json');
    expect(await fs.readdir(dir)).toEqual([path.basename(file)]);
  });
});
