/**
 * Error taxonomy
 *
 * Validation, lookup and authorization failures surface to the command
 * caller. Transport failures stay inside the gossip engine.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'NOT_AUTHORIZED'
  | 'TRANSPORT_ERROR'
  | 'CONFIG_ERROR';

export abstract class ReviewNetworkError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed create input: empty required field, bad rating
 */
export class ValidationError extends ReviewNetworkError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

/**
 * Operation on an unknown (or already deleted) review id
 */
export class NotFoundError extends ReviewNetworkError {
  readonly code = 'NOT_FOUND';

  constructor(readonly reviewId: string) {
    super(`Review ${reviewId} not found`);
  }
}

/**
 * Mutation attempted on a review authored by another peer
 */
export class NotAuthorizedError extends ReviewNetworkError {
  readonly code = 'NOT_AUTHORIZED';

  constructor(readonly reviewId: string, readonly authorPeerId: string) {
    super(`Review ${reviewId} belongs to peer ${authorPeerId.slice(0, 8)}; only its author may change it`);
  }
}

/**
 * Send or receive failure on a single link
 */
export class TransportError extends ReviewNetworkError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(message: string, readonly peerId?: string) {
    super(message);
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends ReviewNetworkError {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string, readonly key?: string) {
    super(message);
  }
}

export function isReviewNetworkError(error: unknown): error is ReviewNetworkError {
  return error instanceof ReviewNetworkError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
