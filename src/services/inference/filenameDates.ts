/**
 * Filename Date Patterns
 * Finds a capture date embedded in a file name (IMG_20231215_142030.jpg, 2023-12-15 Party.mov, ...)
 */

import { CalendarParts, buildLocalDate, isPlausibleDate } from '../../utils/dates';

type FieldOrder = 'ymd' | 'dmy';

interface FilenamePattern {
  name: string;
  regex: RegExp;
  order: FieldOrder;
}

export interface FilenameDateMatch {
  pattern: string;
  date: Date;
  text: string;
  index: number;
  hasTime: boolean;
}

// Order matters only for ties at the same position.
const FILENAME_PATTERNS: FilenamePattern[] = [
  {
    name: 'YYYY-MM-DD_HH-MM-SS',
    regex: /(?<!\d)(\d{4})[-_](\d{2})[-_](\d{2})[_ T](\d{2})[-.](\d{2})[-.](\d{2})(?!\d)/gi,
    order: 'ymd',
  },
  {
    name: 'IMG_YYYYMMDD',
    regex: /(?:IMG|VID|PXL)[_-](\d{4})(\d{2})(\d{2})(?:[_-](\d{2})(\d{2})(\d{2}))?(?!\d)/gi,
    order: 'ymd',
  },
  {
    name: 'YYYYMMDD_HHMMSS',
    regex: /(?<!\d)(\d{4})(\d{2})(\d{2})[_-]?(\d{2})(\d{2})(\d{2})(?!\d)/g,
    order: 'ymd',
  },
  {
    name: 'YYYY-MM-DD',
    regex: /(?<!\d)(\d{4})[-_](\d{2})[-_](\d{2})(?!\d)/g,
    order: 'ymd',
  },
  {
    name: 'YYYYMMDD',
    regex: /(?<!\d)(\d{4})(\d{2})(\d{2})(?!\d)/g,
    order: 'ymd',
  },
  {
    name: 'DD-MM-YYYY',
    regex: /(?<!\d)(\d{2})[-_](\d{2})[-_](\d{4})(?!\d)/g,
    order: 'dmy',
  },
];

function toParts(groups: string[], order: FieldOrder): CalendarParts {
  const [a, b, c, hh, mm, ss] = groups.map((g) => (g === undefined ? 0 : Number(g)));
  const [year, month, day] = order === 'ymd' ? [a, b, c] : [c, b, a];
  return { year, month, day, hour: hh, minute: mm, second: ss };
}

/**
 * Every plausible date match of every pattern in the name.
 */
export function findFilenameDates(filename: string, now: Date = new Date()): FilenameDateMatch[] {
  const matches: FilenameDateMatch[] = [];

  for (const pattern of FILENAME_PATTERNS) {
    for (const m of filename.matchAll(pattern.regex)) {
      const groups = m.slice(1);
      let date: Date;
      try {
        date = buildLocalDate(toParts(groups, pattern.order));
      } catch {
        continue; // not a calendar date
      }
      if (!isPlausibleDate(date, now)) continue;

      matches.push({
        pattern: pattern.name,
        date,
        text: m[0],
        index: m.index ?? 0,
        hasTime: groups.length > 3 && groups[3] !== undefined,
      });
    }
  }

  return matches;
}

/**
 * Leftmost match wins; at the same position a date+time beats a bare date.
 */
export function extractFilenameDate(filename: string, now: Date = new Date()): FilenameDateMatch | null {
  const matches = findFilenameDates(filename, now);
  let best: FilenameDateMatch | null = null;
  for (const match of matches) {
    if (
      best === null ||
      match.index < best.index ||
      (match.index === best.index && match.hasTime && !best.hasTime)
    ) {
      best = match;
    }
  }
  return best;
}
