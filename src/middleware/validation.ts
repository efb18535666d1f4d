/**
 * Validation Middleware
 * Request body checks and parsing helpers
 */

import { Request, Response, NextFunction } from 'express';
import path from 'path';
import { AnalysisRecord, DateSource, TargetField, WritableField } from '../types';
import { ValidationError } from '../utils/errors';
import { validateFields } from '../services/metadata/metadataMutator';

const DEFAULT_FIELDS: WritableField[] = [TargetField.DateTimeOriginal, TargetField.DateCreated];
const DATE_SOURCES: readonly string[] = Object.values(DateSource);

/**
 * Validate that a non-empty string body parameter is present
 */
export function validateBodyString(paramName: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const value: unknown = req.body?.[paramName];

    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new ValidationError(`${paramName} is required`);
    }

    next();
  };
}

export function parseBoolean(value: unknown, name: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${name} must be a boolean`);
  }
  return value;
}

/**
 * Date fields to write; both writable fields when omitted
 */
export function parseFields(value: unknown): WritableField[] {
  if (value === undefined) return DEFAULT_FIELDS;
  if (!Array.isArray(value) || !value.every((f): f is string => typeof f === 'string')) {
    throw new ValidationError('fields must be an array of field names');
  }
  return validateFields(value);
}

function isDateSource(value: string): value is DateSource {
  return DATE_SOURCES.includes(value);
}

/**
 * { "<path>": "<date source label>" } → Map keyed by absolute path.
 * Relative paths are taken from the request folder.
 */
export function parseOverrides(value: unknown, folder: string): Map<string, DateSource> {
  const overrides = new Map<string, DateSource>();
  if (value === undefined) return overrides;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError('overrides must be an object keyed by file path');
  }
  for (const [filePath, source] of Object.entries(value)) {
    if (typeof source !== 'string' || !isDateSource(source)) {
      throw new ValidationError(`Unknown date source for ${filePath}`, { allowed: DATE_SOURCES });
    }
    overrides.set(path.resolve(folder, filePath), source);
  }
  return overrides;
}

/**
 * Every override must name a file that was analyzed.
 */
export function assertOverridesMatch(
  overrides: ReadonlyMap<string, DateSource>,
  records: readonly AnalysisRecord[]
): void {
  const known = new Set(records.map((r) => r.path));
  const unmatched = [...overrides.keys()].filter((p) => !known.has(p));
  if (unmatched.length > 0) {
    throw new ValidationError('Overrides name files outside the analyzed folder', { unmatched });
  }
}
