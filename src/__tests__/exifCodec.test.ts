/**
 * EXIF codec tests
 */

import fs from 'fs/promises';
import path from 'path';
import { ExifCodec } from '../services/metadata/exifCodec';
import { MetadataWriteError, ParseError, UnsupportedFormatError } from '../utils/errors';
import { makeTempDir, writeMedia } from './helpers/fakeCodec';

// Baseline JPEG whose only tag is IFD0 DateTime = 2020:01:01 00:00:00
const BASELINE_JPEG = path.join(__dirname, 'fixtures', 'baseline.jpg');

describe('ExifCodec', () => {
  let dir: string;
  const codec = new ExifCodec();
  const date = new Date(2023, 11, 15, 14, 20, 30);

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes DateTimeOriginal and DateTimeDigitized into a JPEG', async () => {
    const baseline = await fs.readFile(BASELINE_JPEG);
    const before = path.join(dir, 'before.jpg');
    await fs.writeFile(before, baseline);
    expect(await codec.readTags(before)).toEqual({ DateTime: '2020:01:01 00:00:00' });

    const updated = codec.encodeDateTags(baseline, before, { DateTimeOriginal: date, DateTimeDigitized: date });
    const after = path.join(dir, 'after.jpg');
    await fs.writeFile(after, updated);

    expect(await codec.readTags(after)).toEqual({
      DateTimeOriginal: '2023:12:15 14:20:30',
      DateTimeDigitized: '2023:12:15 14:20:30',
      DateTime: '2020:01:01 00:00:00',
    });
    expect(updated.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
  });

  it('knows which containers it can write', () => {
    expect(codec.canWrite('/photos/a.JPG')).toBe(true);
    expect(codec.canWrite('/photos/a.jpeg')).toBe(true);
    expect(codec.canWrite('/scans/page.tiff')).toBe(false);
    expect(codec.canWrite('/photos/a.png')).toBe(false);
  });

  it('does not decode video containers', async () => {
    const file = await writeMedia(dir, 'clip.mp4', 'not really a movie');
    await expect(codec.readTags(file)).resolves.toEqual({});
  });

  it('reports undecodable images as parse errors', async () => {
    const file = await writeMedia(dir, 'photo.jpg', 'not really a jpeg');
    await expect(codec.readTags(file)).rejects.toBeInstanceOf(ParseError);
  });

  it('only writes JPEG', () => {
    expect(() => codec.encodeDateTags(Buffer.from('II*\u0000'), '/scans/page.tif', { DateCreated: date })).toThrow(
      UnsupportedFormatError
    );
    expect(() => codec.encodeDateTags(Buffer.from(''), '/notes/readme', { DateCreated: date })).toThrow(
      'Metadata writing not supported for files without extension'
    );
  });

  it('wraps encoder failures', () => {
    expect(() =>
      codec.encodeDateTags(Buffer.from('garbage'), '/photos/photo.jpg', { DateTimeOriginal: date })
    ).toThrow(MetadataWriteError);
  });
});
