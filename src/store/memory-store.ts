import type { Review, ReviewPersistence } from '../review-types.js';

/**
 * In-memory persistence, for tests and ephemeral nodes
 *
 * Keeps a copy of the last saved snapshot so a node can be "restarted" on
 * the same instance.
 */
export class MemoryReviewPersistence implements ReviewPersistence {
  private saved = new Map<string, Review>();
  saveCount = 0;

  constructor(initial?: Iterable<Review>) {
    for (const review of initial ?? []) {
      this.saved.set(review.id, review);
    }
  }

  async loadAll(): Promise<Map<string, Review>> {
    return new Map(this.saved);
  }

  async saveAll(reviews: ReadonlyMap<string, Review>): Promise<void> {
    this.saved = new Map(reviews);
    this.saveCount++;
  }
}
