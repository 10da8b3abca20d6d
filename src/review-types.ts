/**
 * Type definitions for bookgossip
 *
 * Every peer owns its own reviews. Copies of other peers' reviews are
 * read-only inputs to the merge and only ever change when a newer version
 * arrives from the author.
 */

/** Lowest rating a review may carry */
export const MIN_RATING = 0;

/** Highest rating a review may carry */
export const MAX_RATING = 5;

/**
 * User-supplied content of a review
 */
export interface ReviewFields {
  readonly title: string;
  readonly genre: string;
  /** Author of the book (not the peer that wrote the review) */
  readonly authorName: string;
  readonly rating: number;
  readonly body: string;
}

/**
 * A book review as stored locally and carried over the wire
 */
export interface Review extends ReviewFields {
  /** `<authorPeerId>-<counter>`, unique by construction */
  readonly id: string;
  /** Peer that created the review; immutable */
  readonly authorPeerId: string;
  /** True once the author has broadcast it */
  readonly published: boolean;
  /** Tombstone flag, set by the author on delete */
  readonly deleted: boolean;
  /** Bumped by the author on every publish/delete, never decremented */
  readonly version: number;
}

/**
 * Result of merging a remote review into the local store
 *
 * - adopted: no local copy, or remote version is newer
 * - stale: remote version is older than ours
 * - duplicate: same version, same content (re-delivery)
 * - conflict: same version, different content; local copy kept
 */
export type MergeKind = 'adopted' | 'stale' | 'duplicate' | 'conflict';

export interface MergeOutcome {
  readonly kind: MergeKind;
  /** Record held by the store after the merge */
  readonly review: Review;
}

/**
 * Diagnostic emitted when two copies of a review share a version but differ
 */
export interface ConflictDetected {
  readonly reviewId: string;
  readonly version: number;
  readonly localDigest: string;
  readonly remoteDigest: string;
  readonly detectedAt: number;
}

/**
 * Durable backing for the review store
 */
export interface ReviewPersistence {
  loadAll(): Promise<Map<string, Review>>;
  saveAll(reviews: ReadonlyMap<string, Review>): Promise<void>;
}

/**
 * Build a review id from the author's peer id and a local counter
 */
export function makeReviewId(authorPeerId: string, counter: number): string {
  return `${authorPeerId}-${counter}`;
}

/**
 * Split a review id into author peer id and counter
 *
 * Peer ids may themselves contain dashes, so the counter is whatever
 * follows the last one.
 */
export function parseReviewId(id: string): { authorPeerId: string; counter: number } | null {
  const dash = id.lastIndexOf('-');
  if (dash <= 0 || dash === id.length - 1) {
    return null;
  }

  const counterText = id.slice(dash + 1);
  if (!/^[0-9]+$/.test(counterText)) {
    return null;
  }

  const counter = parseInt(counterText, 10);
  if (counter < 1) {
    return null;
  }

  return { authorPeerId: id.slice(0, dash), counter };
}

/**
 * Total order used by every listing: author peer id, then numeric counter
 */
export function compareReviews(a: Review, b: Review): number {
  if (a.authorPeerId !== b.authorPeerId) {
    return a.authorPeerId < b.authorPeerId ? -1 : 1;
  }
  const ca = parseReviewId(a.id)?.counter ?? 0;
  const cb = parseReviewId(b.id)?.counter ?? 0;
  return ca - cb;
}
