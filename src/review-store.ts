/**
 * ReviewStore - local review records and their publish state
 *
 * Holds the local peer's own reviews (authoritative) next to copies of
 * other peers' reviews (read-only, replaced only through applyRemote).
 * Deleted reviews stay as tombstones so that a late, stale copy can never
 * bring them back.
 *
 * The store does no I/O and is owned by a single caller; see ReviewNode
 * for the serialized mutation path.
 */

import { NotAuthorizedError, NotFoundError } from './errors.js';
import { reconcile, reviewDigest } from './reconcile.js';
import { validateReviewFields } from './review-validation.js';
import {
  compareReviews,
  makeReviewId,
  parseReviewId,
  type ConflictDetected,
  type MergeOutcome,
  type Review,
  type ReviewFields
} from './review-types.js';

export interface ReviewStoreConfig {
  /** Identity of the local peer; reviews it authors are mutable here */
  readonly peerId: string;
  /** Records loaded from persistence */
  readonly initial?: Iterable<Review>;
  /** Called when a merge sees equal versions with different content */
  readonly onConflict?: (conflict: ConflictDetected) => void;
  readonly clock?: () => number;
}

export class ReviewStore {
  readonly peerId: string;
  private readonly reviews = new Map<string, Review>();
  private readonly onConflict?: (conflict: ConflictDetected) => void;
  private readonly clock: () => number;
  private lastCounter = 0;

  constructor(config: ReviewStoreConfig) {
    this.peerId = config.peerId;
    this.onConflict = config.onConflict;
    this.clock = config.clock ?? Date.now;

    this.restore(config.initial ?? []);
  }

  /**
   * Load persisted records; the local counter resumes after the highest one
   */
  restore(reviews: Iterable<Review>): void {
    for (const review of reviews) {
      this.reviews.set(review.id, review);
      this.trackCounter(review);
    }
  }

  /**
   * Create a draft review authored by the local peer
   * @throws ValidationError
   */
  create(input: Partial<Record<keyof ReviewFields, unknown>>): Review {
    const fields = validateReviewFields(input);
    const counter = this.lastCounter + 1;

    const review: Review = {
      ...fields,
      id: makeReviewId(this.peerId, counter),
      authorPeerId: this.peerId,
      published: false,
      deleted: false,
      version: 0
    };

    this.lastCounter = counter;
    this.reviews.set(review.id, review);
    console.log(`[ReviewStore] Created review ${review.id.slice(-12)} "${review.title}"`);
    return review;
  }

  /**
   * Mark a local review as published
   *
   * Publishing twice is a no-op; the current record is returned unchanged.
   * @throws NotFoundError, NotAuthorizedError
   */
  publish(id: string): Review {
    const review = this.requireOwn(id);

    if (review.deleted) {
      throw new NotFoundError(id);
    }
    if (review.published) {
      return review;
    }

    const updated: Review = { ...review, published: true, version: review.version + 1 };
    this.reviews.set(id, updated);
    console.log(`[ReviewStore] Published review ${id.slice(-12)} (v${updated.version})`);
    return updated;
  }

  /**
   * Tombstone a local review
   * @throws NotFoundError, NotAuthorizedError
   */
  delete(id: string): Review {
    const review = this.requireOwn(id);

    if (review.deleted) {
      throw new NotFoundError(id);
    }

    const updated: Review = { ...review, deleted: true, version: review.version + 1 };
    this.reviews.set(id, updated);
    console.log(`[ReviewStore] Deleted review ${id.slice(-12)} (v${updated.version})`);
    return updated;
  }

  /**
   * Merge a copy received from another peer
   *
   * Copies of our own reviews arrive only when a peer hands back what we
   * published before a restart. A newer one means our record was lost, and
   * the counter moves past it so its id is never minted again.
   */
  applyRemote(remote: Review): MergeOutcome {
    const local = this.reviews.get(remote.id);
    const resolution = reconcile(local, remote);

    switch (resolution.kind) {
      case 'adopted':
        this.reviews.set(remote.id, resolution.winner);
        if (remote.authorPeerId === this.peerId) {
          this.trackCounter(remote);
          console.log(`[ReviewStore] Recovered own review ${remote.id.slice(-12)} (v${remote.version})`);
        }
        break;
      case 'conflict':
        if (local) {
          this.reportConflict(local, remote);
        }
        break;
      case 'stale':
      case 'duplicate':
        break;
    }

    return { kind: resolution.kind, review: resolution.winner };
  }

  get(id: string): Review | undefined {
    return this.reviews.get(id);
  }

  /**
   * Reviews visible to the user: no tombstones, no unpublished remote copies
   */
  listAll(): Review[] {
    return Array.from(this.reviews.values())
      .filter(review => this.isVisible(review))
      .sort(compareReviews);
  }

  listByPeer(peerId: string): Review[] {
    return this.listAll().filter(review => review.authorPeerId === peerId);
  }

  /**
   * Local reviews, drafts included, tombstones excluded
   */
  listAuthored(): Review[] {
    return this.listByPeer(this.peerId);
  }

  /**
   * Local reviews that have ever been published, tombstones included
   *
   * This is what anti-entropy re-sends: a deletion only reaches peers that
   * missed it if its tombstone keeps being gossiped.
   */
  publishedAuthored(): Review[] {
    return this.publishedBy(this.peerId);
  }

  /**
   * Records of one author that have ever been published, tombstones included
   */
  publishedBy(peerId: string): Review[] {
    return Array.from(this.reviews.values())
      .filter(review => review.authorPeerId === peerId && review.published)
      .sort(compareReviews);
  }

  /**
   * Every record, tombstones included, for persistence
   */
  snapshot(): Map<string, Review> {
    return new Map(this.reviews);
  }

  get size(): number {
    return this.reviews.size;
  }

  private isVisible(review: Review): boolean {
    if (review.deleted) {
      return false;
    }
    return review.published || review.authorPeerId === this.peerId;
  }

  private requireOwn(id: string): Review {
    const review = this.reviews.get(id);
    if (!review) {
      throw new NotFoundError(id);
    }
    if (review.authorPeerId !== this.peerId) {
      throw new NotAuthorizedError(id, review.authorPeerId);
    }
    return review;
  }

  private trackCounter(review: Review): void {
    if (review.authorPeerId !== this.peerId) {
      return;
    }
    const counter = parseReviewId(review.id)?.counter ?? 0;
    if (counter > this.lastCounter) {
      this.lastCounter = counter;
    }
  }

  private reportConflict(local: Review, remote: Review): void {
    const conflict: ConflictDetected = {
      reviewId: local.id,
      version: local.version,
      localDigest: reviewDigest(local),
      remoteDigest: reviewDigest(remote),
      detectedAt: this.clock()
    };

    console.warn(
      `[ReviewStore] ⚠️ Conflict on ${local.id.slice(-12)} at v${local.version}: ` +
      `local ${conflict.localDigest.slice(0, 8)} vs remote ${conflict.remoteDigest.slice(0, 8)}, keeping local`
    );

    if (this.onConflict) {
      this.onConflict(conflict);
    }
  }
}
