/**
 * Custom Error Classes
 * Typed errors with HTTP status codes
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} '${id}' not found`
      : `${resource} not found`;
    super(message, 404, 'NOT_FOUND');
  }
}

/** A tag or filename fragment is present but does not parse. */
export class ParseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 422, 'PARSE_ERROR', details);
  }
}

export class ImplausibleDateError extends AppError {
  constructor(date: Date) {
    const text = Number.isFinite(date.getTime()) ? date.toISOString() : 'Invalid Date';
    super(`Implausible date: ${text}`, 422, 'IMPLAUSIBLE_DATE');
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(format: string) {
    super(`Metadata writing not supported for ${format || 'files without extension'}`, 422, 'UNSUPPORTED_FORMAT');
  }
}

export class BackupError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'IO_ERROR', details);
  }
}

export class MetadataWriteError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'WRITE_ERROR', details);
  }
}

/**
 * Short { code, message } pair for outcomes and logs.
 */
export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof AppError) {
    return { code: error.code || 'ERROR', message: error.message };
  }
  if (error instanceof Error) {
    const errno = 'code' in error && typeof error.code === 'string' ? error.code : 'ERROR';
    return { code: errno, message: error.message };
  }
  return { code: 'ERROR', message: String(error) };
}
