/**
 * ReviewNode - one peer of the review network
 *
 * Owns the review store and the peer registry. Commands, inbound gossip and
 * timer work all reach that state through a single MutationQueue, so no
 * two mutations ever interleave. Network sends and disk writes happen
 * outside the queue.
 *
 * Local commands succeed or fail on their own; propagation to other peers
 * is asynchronous and best-effort and never changes a command's outcome.
 */

import { Crypto, type SigningKeyPair } from './crypto.js';
import { ConfigError, errorMessage } from './errors.js';
import { MutationQueue } from './mutation-queue.js';
import { PeerRegistry } from './network/peer-registry.js';
import { ReviewGossip, type GossipHost, type InboundResult } from './review-gossip.js';
import { ReviewStore } from './review-store.js';
import type { RateLimiterConfig } from './gossip/rate-limiter.js';
import type { GossipStats, GossipTransport, PeerHint, PeerRecord } from './network-types.js';
import type { ConflictDetected, Review, ReviewFields, ReviewPersistence } from './review-types.js';

/** Most peer-exchange hints put in one announce */
const MAX_ANNOUNCED_HINTS = 32;

export interface ReviewNodeConfig {
  /**
   * Peer identity. With `identity` set it is derived from the public key
   * and may be omitted.
   */
  readonly peerId?: string;

  /** Ed25519 keypair; when present every outgoing message is signed */
  readonly identity?: SigningKeyPair;

  readonly transport: GossipTransport;

  /** Durable backing; without it reviews live in memory only */
  readonly persistence?: ReviewPersistence;

  /** Reject unsigned inbound messages (default: false) */
  readonly requireSignatures?: boolean;

  /** Presence announcement period (default: 5000); 0 disables */
  readonly announceIntervalMs?: number;
  /** Anti-entropy period (default: 30000); 0 disables */
  readonly antiEntropyIntervalMs?: number;
  /** Silence check period (default: 5000); 0 disables */
  readonly silenceCheckIntervalMs?: number;
  /** Time without traffic before a peer is marked silent (default: 30000) */
  readonly silenceTimeoutMs?: number;
  /** Persistence flush period (default: 5000); 0 disables */
  readonly persistIntervalMs?: number;

  readonly rateLimit?: Omit<RateLimiterConfig, 'clock'>;

  /** Diagnostic hook for equal-version divergent copies */
  readonly onConflict?: (conflict: ConflictDetected) => void;

  readonly clock?: () => number;
}

export interface NodeStatus {
  readonly peerId: string;
  readonly address?: string;
  readonly running: boolean;
  readonly knownPeers: number;
  readonly reachablePeers: number;
  readonly storedReviews: number;
  readonly visibleReviews: number;
  readonly conflictsDetected: number;
  readonly gossip: GossipStats;
}

export class ReviewNode {
  readonly peerId: string;

  private readonly queue = new MutationQueue();
  private readonly store: ReviewStore;
  private readonly registry: PeerRegistry;
  private readonly gossip: ReviewGossip;
  private readonly transport: GossipTransport;
  private readonly persistence?: ReviewPersistence;
  private readonly persistIntervalMs: number;
  private readonly clock: () => number;
  private readonly onConflict?: (conflict: ConflictDetected) => void;

  private readonly inflight = new Set<Promise<void>>();
  private persistTimer?: NodeJS.Timeout;
  private running = false;
  private dirty = false;
  private conflictsDetected = 0;

  constructor(config: ReviewNodeConfig) {
    this.peerId = resolvePeerId(config);
    this.transport = config.transport;
    this.persistence = config.persistence;
    this.persistIntervalMs = config.persistIntervalMs ?? 5_000;
    this.clock = config.clock ?? Date.now;
    this.onConflict = config.onConflict;

    this.store = new ReviewStore({
      peerId: this.peerId,
      clock: this.clock,
      onConflict: conflict => {
        this.conflictsDetected++;
        if (this.onConflict) {
          this.onConflict(conflict);
        }
      }
    });

    this.registry = new PeerRegistry({
      localPeerId: this.peerId,
      silenceTimeoutMs: config.silenceTimeoutMs,
      clock: this.clock
    });

    this.gossip = new ReviewGossip({
      localPeerId: this.peerId,
      transport: config.transport,
      host: this.createHost(),
      signingKey: config.identity,
      requireSignatures: config.requireSignatures,
      announceIntervalMs: config.announceIntervalMs,
      antiEntropyIntervalMs: config.antiEntropyIntervalMs,
      silenceCheckIntervalMs: config.silenceCheckIntervalMs,
      rateLimit: config.rateLimit,
      clock: this.clock
    });
  }

  /**
   * Load persisted reviews, then join the network
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    if (this.persistence) {
      const loaded = await this.persistence.loadAll();
      await this.queue.run(() => this.store.restore(loaded.values()));
      console.log(`[ReviewNode] Loaded ${loaded.size} review record(s)`);
    }

    await this.gossip.start();
    this.running = true;

    if (this.persistence && this.persistIntervalMs > 0) {
      this.persistTimer = setInterval(() => {
        this.flush().catch(err => {
          console.error('[ReviewNode] Persist error:', err);
        });
      }, this.persistIntervalMs);
    }
  }

  /**
   * Leave the network and write the final snapshot
   *
   * Broadcasts still in flight are not awaited.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    if (this.persistTimer) {
      clearInterval(this.persistTimer);
      this.persistTimer = undefined;
    }

    await this.gossip.stop();
    await this.queue.idle();
    await this.flush();
  }

  // =================================================================
  //  COMMANDS
  // =================================================================

  /**
   * @throws ValidationError
   */
  async createReview(fields: Partial<Record<keyof ReviewFields, unknown>>): Promise<Review> {
    return this.queue.run(() => {
      const review = this.store.create(fields);
      this.dirty = true;
      return review;
    });
  }

  /**
   * @throws NotFoundError, NotAuthorizedError
   */
  async publishReview(id: string): Promise<Review> {
    const review = await this.queue.run(() => {
      const published = this.store.publish(id);
      this.dirty = true;
      return published;
    });

    this.propagate(review);
    return review;
  }

  /**
   * @throws NotFoundError, NotAuthorizedError
   */
  async deleteReview(id: string): Promise<Review> {
    const review = await this.queue.run(() => {
      const deleted = this.store.delete(id);
      this.dirty = true;
      return deleted;
    });

    // A draft never left this peer, so nobody holds a copy to tombstone
    if (review.published) {
      this.propagate(review);
    }
    return review;
  }

  async getReview(id: string): Promise<Review | undefined> {
    return this.queue.run(() => this.store.get(id));
  }

  async listReviews(): Promise<Review[]> {
    return this.queue.run(() => this.store.listAll());
  }

  async listReviewsByPeer(peerId: string): Promise<Review[]> {
    return this.queue.run(() => this.store.listByPeer(peerId));
  }

  async listPeers(): Promise<PeerRecord[]> {
    return this.queue.run(() => this.registry.listKnownPeers());
  }

  async status(): Promise<NodeStatus> {
    return this.queue.run(() => {
      const peers = this.registry.listKnownPeers();
      return {
        peerId: this.peerId,
        address: this.transport.localAddress,
        running: this.running,
        knownPeers: peers.length,
        reachablePeers: peers.filter(peer => peer.reachable).length,
        storedReviews: this.store.size,
        visibleReviews: this.store.listAll().length,
        conflictsDetected: this.conflictsDetected,
        gossip: this.gossip.getStats()
      };
    });
  }

  // =================================================================
  //  MAINTENANCE
  // =================================================================

  /**
   * Run the periodic tasks now (they also run on their timers)
   */
  async announce(): Promise<void> {
    await this.gossip.announce();
  }

  async antiEntropySweep(): Promise<void> {
    await this.gossip.antiEntropySweep();
  }

  async checkSilence(): Promise<PeerRecord[]> {
    return this.gossip.checkSilence();
  }

  /**
   * Write the store to persistence if anything changed
   */
  async flush(): Promise<void> {
    if (!this.persistence) {
      return;
    }

    const snapshot = await this.queue.run(() => {
      if (!this.dirty) {
        return null;
      }
      this.dirty = false;
      return this.store.snapshot();
    });

    if (!snapshot) {
      return;
    }

    try {
      await this.persistence.saveAll(snapshot);
    } catch (error) {
      this.dirty = true;
      throw error;
    }
  }

  /**
   * Resolve once queued mutations and tracked broadcasts have drained
   */
  async idle(): Promise<void> {
    do {
      await this.queue.idle();
      await Promise.all(Array.from(this.inflight));
    } while (this.queue.size > 0 || this.inflight.size > 0);
  }

  get address(): string | undefined {
    return this.transport.localAddress;
  }

  // =================================================================
  //  GOSSIP HOST
  // =================================================================

  private createHost(): GossipHost {
    return {
      handleAnnounce: (announce, fromPeerId) =>
        this.queue.run((): InboundResult => ({
          transition: this.registry.onDiscovery(fromPeerId, { address: announce.address }, this.clock())
        })),

      handleReviews: (reviews, fromPeerId) =>
        this.queue.run((): InboundResult => {
          const transition = this.registry.onMessage(fromPeerId, this.clock());
          const outcomes = reviews.map(review => {
            const outcome = this.store.applyRemote(review);
            if (outcome.kind === 'adopted') {
              this.dirty = true;
              console.log(
                `[ReviewNode] Merged ${review.id.slice(-12)} v${review.version} from ${fromPeerId.slice(0, 8)}` +
                `${review.deleted ? ' (tombstone)' : ''}`
              );
            }
            return outcome;
          });
          return { transition, outcomes };
        }),

      handleSilenceCheck: () => this.queue.run(() => this.registry.onSilenceTimeout(this.clock())),

      sendTargets: () => this.queue.run(() => this.registry.sendTargets()),

      publishedSnapshot: () => this.queue.run(() => this.store.publishedAuthored()),

      publishedBy: peerId => this.queue.run(() => this.store.publishedBy(peerId)),

      peerHints: () =>
        this.queue.run(() => {
          const hints: PeerHint[] = [];
          for (const peer of this.registry.listKnownPeers()) {
            if (peer.reachable && peer.address) {
              hints.push({ peerId: peer.peerId, address: peer.address });
            }
          }
          return hints.slice(0, MAX_ANNOUNCED_HINTS);
        })
    };
  }

  private propagate(review: Review): void {
    const task: Promise<void> = this.gossip
      .broadcastReview(review)
      .catch(error => {
        console.warn(`[ReviewNode] Broadcast of ${review.id.slice(-12)} failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }
}

function resolvePeerId(config: ReviewNodeConfig): string {
  if (config.identity) {
    const derived = Crypto.toHex(config.identity.publicKey);
    if (config.peerId && config.peerId !== derived) {
      throw new ConfigError('peerId must be the hex public key of the signing identity', 'peerId');
    }
    return derived;
  }

  if (!config.peerId) {
    throw new ConfigError('peerId or identity is required', 'peerId');
  }
  if (config.peerId.includes('|') || /\s/.test(config.peerId)) {
    throw new ConfigError('peerId must not contain whitespace or "|"', 'peerId');
  }
  return config.peerId;
}
