/**
 * Merge resolver: last-writer-wins by version
 *
 * Only the author ever bumps a review's version, so for any id the versions
 * seen across the network form a chain. Picking the highest version is
 * then commutative and idempotent: every peer that has received the same
 * set of updates ends up holding the same record, whatever the arrival
 * order.
 */

import { Crypto } from './crypto.js';
import type { Review, MergeKind } from './review-types.js';

export interface Resolution {
  readonly kind: MergeKind;
  /** Record the store should hold afterwards */
  readonly winner: Review;
}

/**
 * Decide the merged record for one review id
 */
export function reconcile(local: Review | undefined, remote: Review): Resolution {
  if (!local) {
    return { kind: 'adopted', winner: remote };
  }

  if (remote.version > local.version) {
    return { kind: 'adopted', winner: remote };
  }

  if (remote.version < local.version) {
    return { kind: 'stale', winner: local };
  }

  // Equal versions from a well-behaved author are the same update
  if (sameReview(local, remote)) {
    return { kind: 'duplicate', winner: local };
  }

  return { kind: 'conflict', winner: local };
}

/**
 * Field-by-field equality over every wire field
 */
export function sameReview(a: Review, b: Review): boolean {
  return (
    a.id === b.id &&
    a.authorPeerId === b.authorPeerId &&
    a.title === b.title &&
    a.genre === b.genre &&
    a.authorName === b.authorName &&
    a.rating === b.rating &&
    a.body === b.body &&
    a.published === b.published &&
    a.deleted === b.deleted &&
    a.version === b.version
  );
}

/**
 * Content digest used in conflict diagnostics
 */
export function reviewDigest(review: Review): string {
  return Crypto.hashObject({
    id: review.id,
    authorPeerId: review.authorPeerId,
    title: review.title,
    genre: review.genre,
    authorName: review.authorName,
    rating: review.rating,
    body: review.body,
    published: review.published,
    deleted: review.deleted,
    version: review.version
  });
}
