/**
 * Shared request/response helpers for route handlers
 */

import type { Request, Response } from 'express';
import type { ErrorCode } from '../../errors.js';
import type { CommandResult } from '../../cli/command-adapter.js';
import type { ReviewFields } from '../../review-types.js';

const FIELD_NAMES: readonly (keyof ReviewFields)[] = ['title', 'genre', 'authorName', 'rating', 'body'];

/**
 * HTTP status for a domain error code
 */
export function statusForError(code: ErrorCode): number {
  switch (code) {
    case 'VALIDATION_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'NOT_AUTHORIZED':
      return 403;
    default:
      return 500;
  }
}

/**
 * Pick the review fields out of a JSON body; validation happens in the store
 */
export function reviewFieldsFromBody(body: unknown): Partial<Record<keyof ReviewFields, unknown>> {
  const fields: Partial<Record<keyof ReviewFields, unknown>> = {};
  if (body === null || typeof body !== 'object') {
    return fields;
  }
  for (const name of FIELD_NAMES) {
    fields[name] = Reflect.get(body, name);
  }
  return fields;
}

/**
 * Single string query parameter, or undefined
 */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Send a command result as `{ success, data | error }`
 */
export function sendResult(res: Response, result: CommandResult, successStatus = 200): void {
  if (!result.ok) {
    res.status(statusForError(result.error.code)).json({
      success: false,
      error: result.error.message,
      code: result.error.code,
      field: result.error.field
    });
    return;
  }

  switch (result.kind) {
    case 'review':
      res.status(successStatus).json({ success: true, data: result.review });
      return;
    case 'reviews':
      res.status(successStatus).json({ success: true, data: { count: result.reviews.length, reviews: result.reviews } });
      return;
    case 'peers':
      res.status(successStatus).json({ success: true, data: { count: result.peers.length, peers: result.peers } });
      return;
    case 'status':
      res.status(successStatus).json({ success: true, data: result.status });
      return;
  }
}

/**
 * Response for an unexpected failure inside a handler
 */
export function sendInternalError(res: Response, error: unknown): void {
  console.error('[WebServer] Request failed:', error);
  res.status(500).json({ success: false, error: 'Internal server error' });
}
