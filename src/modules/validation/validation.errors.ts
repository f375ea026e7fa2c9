import type { ValidationErrorCode, Verdict } from './types/validation.types.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    readonly code: ValidationErrorCode,
    readonly details?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a catalog cannot be reflected; the validator cannot be built.
 */
export class SchemaUnavailableError extends ValidationError {
  constructor(details: string) {
    super('Schema unavailable', 'SCHEMA_UNAVAILABLE', details);
    this.name = 'SchemaUnavailableError';
  }
}

export class DataSourceNotFoundError extends Error {
  constructor(readonly dataSourceId: string) {
    super(`Unknown data source '${dataSourceId}'`);
    this.name = 'DataSourceNotFoundError';
  }
}

/**
 * Raised by the query flow when SQL did not pass validation.
 */
export class QueryRejectedError extends Error {
  constructor(readonly verdict: Extract<Verdict, { passed: false }>) {
    super(verdict.message);
    this.name = 'QueryRejectedError';
  }
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error) return error;
  return fallback;
}
