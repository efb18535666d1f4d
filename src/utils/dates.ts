/**
 * Date helpers for metadata tags
 * EXIF date-times carry no zone and are handled as local wall-clock times.
 */

import { config } from '../config';
import { TagValue } from '../types';
import { ImplausibleDateError, ParseError } from './errors';

export interface CalendarParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const EXIF_DATETIME = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const NAIVE_DATETIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?$/;
const ZONED_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})$/;

function isValidDate(d: Date): boolean {
  return Number.isFinite(d.getTime());
}

function partsFromMatch(m: RegExpMatchArray): CalendarParts {
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  return { year, month, day, hour, minute, second };
}

/**
 * Build a local Date, rejecting calendar dates that do not exist (e.g. Feb 30).
 */
export function buildLocalDate(parts: CalendarParts): Date {
  const { year, month, day, hour, minute, second } = parts;
  if (hour > 23 || minute > 59 || second > 59) {
    throw new ParseError('Time of day out of range', { parts });
  }
  const date = new Date(year, month - 1, day, hour, minute, second, 0);
  if (
    !isValidDate(date) ||
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    throw new ParseError('Not a calendar date', { parts });
  }
  return date;
}

/**
 * Parse an EXIF date tag ('YYYY:MM:DD HH:MM:SS'). Codecs that already revived
 * the value may hand over a Date.
 */
export function parseExifDateTime(value: TagValue): Date {
  if (value instanceof Date) {
    if (!isValidDate(value)) throw new ParseError('Invalid Date value');
    return value;
  }
  if (typeof value !== 'string') {
    throw new ParseError('EXIF date must be a string', { value });
  }
  const m = value.trim().match(EXIF_DATETIME);
  if (!m) throw new ParseError(`Unrecognized EXIF date: ${value}`);
  return buildLocalDate(partsFromMatch(m));
}

/**
 * Parse a container creation tag. ISO strings with a zone are honoured;
 * naive forms are local wall-clock times.
 */
export function parseVideoDateTime(value: TagValue): Date {
  if (value instanceof Date) {
    if (!isValidDate(value)) throw new ParseError('Invalid Date value');
    return value;
  }
  if (typeof value !== 'string') {
    throw new ParseError('Video date must be a string', { value });
  }
  const text = value.trim();
  if (ZONED_DATETIME.test(text)) {
    const normalized = text.replace(/(\.\d{3})\d+/, '$1').replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
    const date = new Date(normalized);
    if (!isValidDate(date)) throw new ParseError(`Invalid ISO date: ${value}`);
    return date;
  }
  const m = text.match(NAIVE_DATETIME) ?? text.match(EXIF_DATETIME);
  if (!m) throw new ParseError(`Unrecognized video date: ${value}`);
  return buildLocalDate(partsFromMatch(m));
}

export function isPlausibleDate(date: Date, now: Date = new Date()): boolean {
  if (!isValidDate(date)) return false;
  const year = date.getFullYear();
  return year >= config.minPlausibleYear && year <= now.getFullYear() + config.maxFutureYears;
}

export function assertPlausibleDate(date: Date, now: Date = new Date()): Date {
  if (!isPlausibleDate(date, now)) throw new ImplausibleDateError(date);
  return date;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** Local time as 'YYYY:MM:DD HH:MM:SS' */
export function formatExifDateTime(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}:${pad(date.getMonth() + 1)}:${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
