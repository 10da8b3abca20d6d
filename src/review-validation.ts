/**
 * Shape checks for review content
 *
 * Local input is validated strictly and reported with ValidationError.
 * Records arriving from the network or from disk are only checked for
 * structural shape; anything that does not fit is treated as absent.
 */

import { ValidationError } from './errors.js';
import { MAX_RATING, MIN_RATING, parseReviewId, type Review, type ReviewFields } from './review-types.js';

const TEXT_FIELDS = ['title', 'genre', 'authorName', 'body'] as const;

/**
 * Validate user input for a new review
 * @throws ValidationError naming the first offending field
 */
export function validateReviewFields(input: Partial<Record<keyof ReviewFields, unknown>>): ReviewFields {
  const text: Record<(typeof TEXT_FIELDS)[number], string> = {
    title: '',
    genre: '',
    authorName: '',
    body: ''
  };

  for (const field of TEXT_FIELDS) {
    const value = input[field];
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ValidationError(`${field} is required`, field);
    }
    text[field] = value.trim();
  }

  return { ...text, rating: validateRating(input.rating) };
}

/**
 * Ratings are finite numbers in [MIN_RATING, MAX_RATING]
 */
export function validateRating(value: unknown): number {
  const rating = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

  if (typeof rating !== 'number' || !Number.isFinite(rating)) {
    throw new ValidationError(`rating must be a number between ${MIN_RATING} and ${MAX_RATING}`, 'rating');
  }
  if (rating < MIN_RATING || rating > MAX_RATING) {
    throw new ValidationError(
      `rating ${rating} is out of bounds (${MIN_RATING}-${MAX_RATING})`,
      'rating'
    );
  }

  return rating;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Structural check of a review received from a peer or loaded from disk
 *
 * @returns a clean copy holding only the known fields, or null
 */
export function parseReview(value: unknown): Review | null {
  if (!isRecord(value)) {
    return null;
  }

  const { id, authorPeerId, title, genre, authorName, rating, body, published, deleted, version } = value;

  if (typeof id !== 'string' || typeof authorPeerId !== 'string' || authorPeerId === '') {
    return null;
  }

  // The id must be derived from the author, otherwise two peers could mint the same id
  const parsedId = parseReviewId(id);
  if (!parsedId || parsedId.authorPeerId !== authorPeerId) {
    return null;
  }

  if (
    typeof title !== 'string' ||
    typeof genre !== 'string' ||
    typeof authorName !== 'string' ||
    typeof body !== 'string'
  ) {
    return null;
  }

  if (typeof rating !== 'number' || !Number.isFinite(rating) || rating < MIN_RATING || rating > MAX_RATING) {
    return null;
  }

  if (typeof published !== 'boolean' || typeof deleted !== 'boolean') {
    return null;
  }

  if (typeof version !== 'number' || !Number.isInteger(version) || version < 0) {
    return null;
  }

  return { id, authorPeerId, title, genre, authorName, rating, body, published, deleted, version };
}
