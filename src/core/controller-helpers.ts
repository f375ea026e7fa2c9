import type { Response } from 'express';
import type { ZodError } from 'zod';
import type { AuthRequest } from '../middleware/auth.middleware.js';
import {
  DataSourceNotFoundError,
  QueryRejectedError,
  SchemaUnavailableError
} from '../modules/validation/validation.errors.js';

export function getUserId(req: AuthRequest): string | null {
  return req.user?.userId ?? null;
}

export function logControllerError(component: string, userId: string | null, operation: string, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`[${new Date().toISOString()}] [${component}] [USER-${userId ?? 'unknown'}] [${operation}] ${message}`);
}

export function sendUnauthorized(res: Response): Response {
  return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No valid user session' });
}

export function sendInvalidRequest(res: Response, error: ZodError): Response {
  return res.status(400).json({
    success: false,
    error: 'Invalid request',
    details: error.issues.map((issue) => issue.message).join(', ')
  });
}

/**
 * Map service errors to HTTP responses; anything unrecognised is a 500.
 */
export function sendServiceError(res: Response, error: unknown, failure: string): Response {
  if (error instanceof DataSourceNotFoundError) {
    return res.status(404).json({ success: false, error: 'Unknown data source', details: error.message });
  }

  if (error instanceof SchemaUnavailableError) {
    return res.status(503).json({ success: false, error: 'Schema unavailable', details: error.details ?? error.message });
  }

  if (error instanceof QueryRejectedError) {
    return res.status(422).json({ success: false, error: 'Query rejected', data: error.verdict });
  }

  return res.status(500).json({ success: false, error: failure, details: 'Internal server error' });
}
