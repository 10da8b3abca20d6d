/**
 * Command interface adapter
 *
 * Turns user intents (from the REPL or the HTTP API) into ReviewNode calls
 * and shapes the outcome as a result object. Domain failures become
 * `{ ok: false, error }`; anything else is a bug and propagates.
 */

import { isReviewNetworkError, NotFoundError, ValidationError, type ErrorCode } from '../errors.js';
import { MAX_RATING, type Review, type ReviewFields } from '../review-types.js';
import type { PeerRecord } from '../network-types.js';
import type { NodeStatus, ReviewNode } from '../review-node.js';

export type Intent =
  | { readonly kind: 'create-review'; readonly fields: Partial<Record<keyof ReviewFields, unknown>> }
  | { readonly kind: 'publish-review'; readonly id: string }
  | { readonly kind: 'delete-review'; readonly id: string }
  | { readonly kind: 'show-review'; readonly id: string }
  | { readonly kind: 'list-peers' }
  | { readonly kind: 'list-reviews' }
  | { readonly kind: 'list-reviews-by-peer'; readonly peerId: string }
  | { readonly kind: 'status' };

export type ReviewAction = 'created' | 'published' | 'deleted' | 'shown';

export interface CommandFailure {
  readonly code: ErrorCode;
  readonly message: string;
  readonly field?: string;
}

export type CommandResult =
  | { readonly ok: true; readonly kind: 'review'; readonly action: ReviewAction; readonly review: Review }
  | { readonly ok: true; readonly kind: 'reviews'; readonly reviews: Review[]; readonly peerId?: string }
  | { readonly ok: true; readonly kind: 'peers'; readonly peers: PeerRecord[] }
  | { readonly ok: true; readonly kind: 'status'; readonly status: NodeStatus }
  | { readonly ok: false; readonly error: CommandFailure };

export class CommandAdapter {
  constructor(private readonly node: ReviewNode) {}

  async execute(intent: Intent): Promise<CommandResult> {
    try {
      return await this.dispatch(intent);
    } catch (error) {
      if (!isReviewNetworkError(error)) {
        throw error;
      }
      const field = error instanceof ValidationError ? error.field : undefined;
      return { ok: false, error: { code: error.code, message: error.message, field } };
    }
  }

  private async dispatch(intent: Intent): Promise<CommandResult> {
    switch (intent.kind) {
      case 'create-review':
        return { ok: true, kind: 'review', action: 'created', review: await this.node.createReview(intent.fields) };

      case 'publish-review':
        return { ok: true, kind: 'review', action: 'published', review: await this.node.publishReview(intent.id) };

      case 'delete-review':
        return { ok: true, kind: 'review', action: 'deleted', review: await this.node.deleteReview(intent.id) };

      case 'show-review': {
        const review = await this.node.getReview(intent.id);
        if (!review || !this.isVisible(review)) {
          throw new NotFoundError(intent.id);
        }
        return { ok: true, kind: 'review', action: 'shown', review };
      }

      case 'list-peers':
        return { ok: true, kind: 'peers', peers: await this.node.listPeers() };

      case 'list-reviews':
        return { ok: true, kind: 'reviews', reviews: await this.node.listReviews() };

      case 'list-reviews-by-peer':
        return {
          ok: true,
          kind: 'reviews',
          reviews: await this.node.listReviewsByPeer(intent.peerId),
          peerId: intent.peerId
        };

      case 'status':
        return { ok: true, kind: 'status', status: await this.node.status() };
    }
  }

  /**
   * Same rule as the listings: no tombstones, no unpublished remote copies
   */
  private isVisible(review: Review): boolean {
    return !review.deleted && (review.published || review.authorPeerId === this.node.peerId);
  }
}

/**
 * Render a result as text lines for the terminal
 */
export function renderResult(result: CommandResult): string[] {
  if (!result.ok) {
    return [`Error [${result.error.code}]: ${result.error.message}`];
  }

  switch (result.kind) {
    case 'review':
      return renderReviewAction(result.action, result.review);

    case 'reviews': {
      if (result.reviews.length === 0) {
        return [result.peerId ? `No reviews from ${result.peerId}.` : 'No reviews.'];
      }
      return result.reviews.map(summarizeReview);
    }

    case 'peers': {
      if (result.peers.length === 0) {
        return ['No known peers.'];
      }
      return result.peers.map(peer =>
        `${peer.peerId}  ${peer.state}` +
        `${peer.address ? `  ${peer.address}` : ''}` +
        `  last seen ${new Date(peer.lastSeen).toISOString()}`
      );
    }

    case 'status': {
      const { status } = result;
      return [
        `Peer:     ${status.peerId}`,
        `Address:  ${status.address ?? '(not listening)'}`,
        `Peers:    ${status.reachablePeers} reachable / ${status.knownPeers} known`,
        `Reviews:  ${status.visibleReviews} visible / ${status.storedReviews} stored`,
        `Gossip:   ${status.gossip.framesReceived} in, ${status.gossip.framesSent} out, ` +
          `${status.gossip.malformedDropped + status.gossip.rejectedDropped} dropped`,
        `Conflicts: ${status.conflictsDetected}`
      ];
    }
  }
}

function renderReviewAction(action: ReviewAction, review: Review): string[] {
  switch (action) {
    case 'created':
      return [`Created review ${review.id} (draft)`];
    case 'published':
      return [`Published review ${review.id} (v${review.version})`];
    case 'deleted':
      return [`Deleted review ${review.id}`];
    case 'shown':
      return [
        `${review.title} (${review.genre})`,
        `by ${review.authorName}, rated ${review.rating}/${MAX_RATING}`,
        `id ${review.id}, v${review.version}${review.published ? '' : ', draft'}`,
        '',
        review.body
      ];
  }
}

function summarizeReview(review: Review): string {
  // Only local drafts are ever listed unpublished
  const draft = review.published ? '' : ' [draft]';
  return `${review.id}  [${review.rating}/${MAX_RATING}] ${review.title} by ${review.authorName} (${review.genre})${draft}`;
}
