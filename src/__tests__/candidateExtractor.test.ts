/**
 * Candidate extraction and ranking tests
 */

import { extractCandidates } from '../services/inference/candidateExtractor';
import { rankCandidates, sortCandidates } from '../services/inference/suggestionRanker';
import { DateCandidate, DateSource, MediaKind } from '../types';

const NOW = new Date(2026, 0, 1);
const MODIFIED = new Date(2023, 11, 20, 10, 15, 22);
const CREATED = new Date(2023, 11, 18, 9, 0, 0);

describe('extractCandidates', () => {
  it('uses the filename when no EXIF date exists', () => {
    const candidates = extractCandidates({
      tags: {},
      filename: 'IMG_20231215_142030.jpg',
      kind: MediaKind.Image,
      fsModified: MODIFIED,
      now: NOW,
    });

    expect(candidates).toEqual([
      {
        source: DateSource.FilenameDate,
        value: new Date(2023, 11, 15, 14, 20, 30),
        confidence: 0.7,
        rawText: 'IMG_20231215_142030',
      },
      { source: DateSource.FilesystemModification, value: MODIFIED, confidence: 0.3 },
    ]);

    const suggestion = rankCandidates(candidates);
    expect(suggestion?.source).toBe(DateSource.FilenameDate);
    expect(suggestion?.value).toEqual(new Date(2023, 11, 15, 14, 20, 30));
    expect(suggestion?.confidence).toBe(0.7);
  });

  it('falls back to the modification time when nothing else parses', () => {
    const candidates = extractCandidates({
      tags: { DateTimeOriginal: 'unknown', DateTimeDigitized: '' },
      filename: 'DSC_0042.jpg',
      kind: MediaKind.Image,
      fsCreated: MODIFIED,
      fsModified: MODIFIED,
      now: NOW,
    });

    expect(candidates).toEqual([{ source: DateSource.FilesystemModification, value: MODIFIED, confidence: 0.3 }]);
    expect(rankCandidates(candidates)).toEqual({
      source: DateSource.FilesystemModification,
      value: MODIFIED,
      confidence: 0.3,
    });
  });

  it('adds the creation time only when it differs from modification time', () => {
    const distinct = extractCandidates({
      tags: {},
      filename: 'photo.jpg',
      kind: MediaKind.Image,
      fsCreated: CREATED,
      fsModified: MODIFIED,
      now: NOW,
    });
    expect(distinct.map((c) => c.source)).toEqual([
      DateSource.FilesystemCreation,
      DateSource.FilesystemModification,
    ]);

    const same = extractCandidates({
      tags: {},
      filename: 'photo.jpg',
      kind: MediaKind.Image,
      fsCreated: MODIFIED,
      fsModified: MODIFIED,
      now: NOW,
    });
    expect(same.map((c) => c.source)).toEqual([DateSource.FilesystemModification]);
  });

  it('ignores a zero birth time', () => {
    const candidates = extractCandidates({
      tags: {},
      filename: 'photo.jpg',
      kind: MediaKind.Image,
      fsCreated: new Date(0),
      fsModified: MODIFIED,
      now: NOW,
    });
    expect(candidates).toHaveLength(1);
    expect(rankCandidates(candidates)).toEqual({
      source: DateSource.FilesystemModification,
      value: MODIFIED,
      confidence: 0.3,
    });
  });

  it('always suggests DateTimeOriginal when it parses', () => {
    const candidates = extractCandidates({
      tags: {
        DateTimeOriginal: '2019:06:01 12:00:00',
        DateTimeDigitized: '2019:06:02 12:00:00',
      },
      filename: 'IMG_20231215_142030.jpg',
      kind: MediaKind.Image,
      fsCreated: CREATED,
      fsModified: MODIFIED,
      now: NOW,
    });

    expect(candidates.map((c) => c.source)).toEqual([
      DateSource.ExifDateTimeOriginal,
      DateSource.ExifDateTimeDigitized,
      DateSource.FilenameDate,
      DateSource.FilesystemCreation,
      DateSource.FilesystemModification,
    ]);
    expect(rankCandidates(candidates)).toEqual({
      source: DateSource.ExifDateTimeOriginal,
      value: new Date(2019, 5, 1, 12, 0, 0),
      confidence: 1,
      rawText: '2019:06:01 12:00:00',
    });
  });

  it('omits unparsable and implausible tags', () => {
    const candidates = extractCandidates({
      tags: {
        DateTimeOriginal: '0000:00:00 00:00:00',
        DateTimeDigitized: '1850:01:01 00:00:00',
      },
      filename: 'scan.jpg',
      kind: MediaKind.Image,
      fsModified: MODIFIED,
      now: NOW,
    });
    expect(candidates.map((c) => c.source)).toEqual([DateSource.FilesystemModification]);
  });

  it('reads the first parseable video creation tag for videos only', () => {
    const tags = { creation_time: 'garbage', encoded_date: '2022-07-04 18:30:00' };

    const video = extractCandidates({ tags, filename: 'clip.mp4', kind: MediaKind.Video, now: NOW });
    expect(video).toEqual([
      {
        source: DateSource.VideoCreationDate,
        value: new Date(2022, 6, 4, 18, 30, 0),
        confidence: 0.8,
        rawText: '2022-07-04 18:30:00',
      },
    ]);

    const image = extractCandidates({ tags, filename: 'clip.jpg', kind: MediaKind.Image, now: NOW });
    expect(image).toEqual([]);
  });

  it('is deterministic for unchanged input', () => {
    const input = {
      tags: { DateTimeDigitized: '2020:02:02 02:02:02' },
      filename: 'VID_20200101.jpg',
      kind: MediaKind.Image,
      fsModified: MODIFIED,
      now: NOW,
    };
    expect(rankCandidates(extractCandidates(input))).toEqual(rankCandidates(extractCandidates(input)));
  });
});

describe('rankCandidates', () => {
  const at = new Date(2020, 0, 1);

  it('returns null for no candidates', () => {
    expect(rankCandidates([])).toBeNull();
  });

  it('breaks equal confidence by source priority', () => {
    const filesystem: DateCandidate = { source: DateSource.FilesystemCreation, value: at, confidence: 0.7 };
    const filename: DateCandidate = { source: DateSource.FilenameDate, value: at, confidence: 0.7 };
    expect(rankCandidates([filesystem, filename])).toBe(filename);
  });

  it('does not reorder its input', () => {
    const low: DateCandidate = { source: DateSource.FilesystemModification, value: at, confidence: 0.3 };
    const high: DateCandidate = { source: DateSource.ExifDateTimeOriginal, value: at, confidence: 1 };
    const input = [low, high];
    expect(sortCandidates(input)).toEqual([high, low]);
    expect(input).toEqual([low, high]);
  });
});
