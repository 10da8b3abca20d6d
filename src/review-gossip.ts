/**
 * ReviewGossip: presence announcements and review replication
 *
 * Best-effort by design of the network underneath: frames can be lost,
 * duplicated or reordered and peers come and go. Two mechanisms keep every
 * peer converging anyway:
 *
 * - Delta broadcast: a local publish/delete sends the full updated record
 *   to every reachable peer, once, without acknowledgment.
 * - Anti-entropy: every sweep re-sends all locally authored published
 *   reviews (tombstones included) to every reachable peer, and a peer that
 *   is newly discovered or back from silence gets the same set right away.
 *   Full sets travel in review-batch frames so a large catalogue costs a
 *   handful of frames against the receiver's rate limit.
 *
 * After a start the engine asks each peer once (the `rejoin` flag on an
 * announce) to hand back the copies it holds of our own reviews, which is
 * how a peer that crashed before persisting recovers them.
 *
 * Receivers merge by version, so resending is always harmless.
 *
 * The engine holds no store or registry state. It reaches them only through
 * the GossipHost, whose calls are serialized by the owning node.
 */

import { GossipMessageSigner } from './gossip/message-signer.js';
import { PeerRateLimiter, type RateLimiterConfig } from './gossip/rate-limiter.js';
import {
  chunkReviews,
  createAnnounce,
  createReviewBatch,
  createReviewUpdate,
  decodeFrame,
  encodeFrame
} from './gossip/codec.js';
import { errorMessage } from './errors.js';
import type { SigningKeyPair } from './crypto.js';
import type { MergeOutcome, Review } from './review-types.js';
import {
  PeerState,
  type Announce,
  type GossipStats,
  type GossipTransport,
  type PeerHint,
  type PeerRecord,
  type PeerTransition,
  type ReviewGossipMessage
} from './network-types.js';

/**
 * Effect of one inbound message on the owner's state
 */
export interface InboundResult {
  readonly transition: PeerTransition | null;
  readonly outcomes?: readonly MergeOutcome[];
}

/**
 * Message-passing access to the owner of the store and registry
 */
export interface GossipHost {
  handleAnnounce(announce: Announce, fromPeerId: string): Promise<InboundResult>;
  /** Merge reviews received in one message */
  handleReviews(reviews: readonly Review[], fromPeerId: string): Promise<InboundResult>;
  handleSilenceCheck(): Promise<PeerRecord[]>;
  sendTargets(): Promise<string[]>;
  publishedSnapshot(): Promise<Review[]>;
  /** Copies we hold of another peer's published reviews */
  publishedBy(peerId: string): Promise<Review[]>;
  peerHints(): Promise<PeerHint[]>;
}

export interface ReviewGossipConfig {
  readonly localPeerId: string;
  readonly transport: GossipTransport;
  readonly host: GossipHost;

  /**
   * Signing key for gossip message authentication
   * If provided, all outgoing messages are signed.
   */
  readonly signingKey?: SigningKeyPair;

  /** Reject unsigned inbound messages (default: false) */
  readonly requireSignatures?: boolean;

  /** Presence announcement period (default: 5000); 0 disables the timer */
  readonly announceIntervalMs?: number;

  /** Full re-broadcast period (default: 30000); 0 disables the timer */
  readonly antiEntropyIntervalMs?: number;

  /** Silence check period (default: 5000); 0 disables the timer */
  readonly silenceCheckIntervalMs?: number;

  readonly rateLimit?: Omit<RateLimiterConfig, 'clock'>;

  readonly clock?: () => number;
}

export class ReviewGossip {
  private readonly localPeerId: string;
  private readonly transport: GossipTransport;
  private readonly host: GossipHost;
  private readonly clock: () => number;
  private readonly announceIntervalMs: number;
  private readonly antiEntropyIntervalMs: number;
  private readonly silenceCheckIntervalMs: number;

  private readonly messageSigner: GossipMessageSigner;
  private readonly rateLimiter: PeerRateLimiter;

  private readonly timers: NodeJS.Timeout[] = [];
  private running = false;

  /** Peers already asked for our own reviews since start */
  private readonly rejoinSent = new Set<string>();

  private stats = {
    framesReceived: 0,
    framesSent: 0,
    malformedDropped: 0,
    rejectedDropped: 0,
    sendFailures: 0,
    announcesSent: 0,
    antiEntropySweeps: 0
  };

  constructor(config: ReviewGossipConfig) {
    this.localPeerId = config.localPeerId;
    this.transport = config.transport;
    this.host = config.host;
    this.clock = config.clock ?? Date.now;
    this.announceIntervalMs = config.announceIntervalMs ?? 5_000;
    this.antiEntropyIntervalMs = config.antiEntropyIntervalMs ?? 30_000;
    this.silenceCheckIntervalMs = config.silenceCheckIntervalMs ?? 5_000;

    this.messageSigner = new GossipMessageSigner({
      signingKey: config.signingKey,
      requireSignatures: config.requireSignatures,
      clock: this.clock
    });

    this.rateLimiter = new PeerRateLimiter({ ...config.rateLimit, clock: this.clock });
  }

  /**
   * Start listening, announce ourselves and start the periodic tasks
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.rejoinSent.clear();

    await this.transport.start((frame, fromPeerId) => this.handleFrame(frame, fromPeerId));
    console.log(
      `[ReviewGossip] Started as ${this.localPeerId.slice(0, 8)}` +
      `${this.transport.localAddress ? ` on ${this.transport.localAddress}` : ''}` +
      `${this.messageSigner.isSigning ? ' (signed)' : ''}`
    );

    for (const peerId of this.transport.connectedPeers()) {
      this.rejoinSent.add(peerId);
    }
    await this.broadcastAnnounce(true);
    this.startTimers();
  }

  /**
   * Stop timers and the transport; in-flight sends are abandoned
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers.length = 0;

    await this.transport.stop();
    console.log('[ReviewGossip] Stopped');
  }

  /**
   * Broadcast our presence over every link
   */
  async announce(): Promise<void> {
    await this.broadcastAnnounce(false);
  }

  private async broadcastAnnounce(rejoin: boolean): Promise<void> {
    const frame = this.encode(createAnnounce(this.localPeerId, await this.announceBody(rejoin), this.clock()));

    try {
      const links = await this.transport.broadcast(frame);
      this.stats.announcesSent++;
      this.stats.framesSent += links;
    } catch (error) {
      this.stats.sendFailures++;
      console.warn(`[ReviewGossip] Announce failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Send the full updated record to every reachable peer
   */
  async broadcastReview(review: Review): Promise<void> {
    const targets = await this.host.sendTargets();
    if (targets.length === 0) {
      console.log(`[ReviewGossip] No reachable peers for ${review.id.slice(-12)}; anti-entropy will carry it`);
      return;
    }

    const frame = this.encode(createReviewUpdate(this.localPeerId, review, this.clock()));
    await Promise.all(targets.map(peerId => this.sendTo(peerId, frame)));
  }

  /**
   * Re-send every locally authored published review to every reachable peer
   */
  async antiEntropySweep(): Promise<void> {
    const [targets, reviews] = await Promise.all([this.host.sendTargets(), this.host.publishedSnapshot()]);
    this.stats.antiEntropySweeps++;

    if (targets.length === 0 || reviews.length === 0) {
      return;
    }

    const frames = this.batchFrames(reviews);

    // One sequential chain per peer; peers are independent of each other
    await Promise.all(targets.map(async peerId => {
      for (const frame of frames) {
        await this.sendTo(peerId, frame);
      }
    }));
  }

  /**
   * Mark quiet peers silent and expire bookkeeping
   */
  async checkSilence(): Promise<PeerRecord[]> {
    const silenced = await this.host.handleSilenceCheck();
    this.messageSigner.cleanupExpiredMessages();
    this.rateLimiter.cleanup();
    return silenced;
  }

  /**
   * Entry point for every frame a transport receives
   *
   * Never throws: bad frames are dropped and logged.
   */
  async handleFrame(frame: string, fromPeerId: string): Promise<void> {
    this.stats.framesReceived++;

    if (!this.rateLimiter.checkLimit(fromPeerId)) {
      this.stats.rejectedDropped++;
      return;
    }

    const decoded = decodeFrame(frame);
    if (!decoded.ok) {
      this.stats.malformedDropped++;
      console.warn(`[ReviewGossip] Dropping malformed frame from ${fromPeerId.slice(0, 8)}: ${decoded.reason}`);
      return;
    }

    const message = this.messageSigner.verify(decoded.message);
    if (!message) {
      this.stats.rejectedDropped++;
      return;
    }

    if (message.from !== fromPeerId) {
      this.stats.rejectedDropped++;
      console.warn(
        `[ReviewGossip] Dropping message claiming to be from ${message.from.slice(0, 8)} ` +
        `on link ${fromPeerId.slice(0, 8)}`
      );
      return;
    }

    try {
      await this.dispatch(message);
    } catch (error) {
      console.error(`[ReviewGossip] Failed to process ${message.type} from ${fromPeerId.slice(0, 8)}:`, error);
    }
  }

  getStats(): GossipStats {
    return { ...this.stats };
  }

  private async dispatch(message: ReviewGossipMessage): Promise<void> {
    if (message.type === 'announce') {
      const result = await this.host.handleAnnounce(message.announce, message.from);
      await this.afterInbound(message.from, result, message.announce.rejoin === true);
      await this.dialHints(message.announce.peers ?? []);
      return;
    }

    if (message.type === 'review-update') {
      // Only the author may speak for a review
      if (message.review.authorPeerId !== message.from) {
        this.dropRelayed(message.review, message.from);
        return;
      }
      const result = await this.host.handleReviews([message.review], message.from);
      await this.afterInbound(message.from, result, false);
      return;
    }

    // A batch carries the sender's own reviews, or ours handed back after a rejoin
    const accepted = message.reviews.filter(review => {
      if (review.authorPeerId === message.from || review.authorPeerId === this.localPeerId) {
        return true;
      }
      this.dropRelayed(review, message.from);
      return false;
    });
    if (accepted.length === 0) {
      return;
    }

    const result = await this.host.handleReviews(accepted, message.from);
    await this.afterInbound(message.from, result, false);
  }

  private dropRelayed(review: Review, fromPeerId: string): void {
    this.stats.rejectedDropped++;
    console.warn(
      `[ReviewGossip] Dropping review ${review.id.slice(-12)} relayed by non-author ${fromPeerId.slice(0, 8)}`
    );
  }

  /**
   * A peer we did not know, or that had gone silent, may have missed
   * everything: introduce ourselves and hand it our full published set.
   * A peer that just rejoined also gets back the copies we hold of its own
   * reviews.
   */
  private async afterInbound(peerId: string, result: InboundResult, rejoin: boolean): Promise<void> {
    const previous = result.transition?.previous;
    if (previous === 'unknown' || previous === PeerState.SILENT) {
      const askRejoin = !this.rejoinSent.has(peerId);
      this.rejoinSent.add(peerId);

      const announce = this.encode(createAnnounce(this.localPeerId, await this.announceBody(askRejoin), this.clock()));
      await this.sendTo(peerId, announce);

      const reviews = await this.host.publishedSnapshot();
      await this.sendReviews(peerId, reviews);
      if (reviews.length > 0) {
        console.log(`[ReviewGossip] Sent ${reviews.length} review(s) to ${peerId.slice(0, 8)}`);
      }
    }

    if (rejoin) {
      const theirs = await this.host.publishedBy(peerId);
      await this.sendReviews(peerId, theirs);
      if (theirs.length > 0) {
        console.log(`[ReviewGossip] Handed ${theirs.length} review(s) back to ${peerId.slice(0, 8)}`);
      }
    }
  }

  private async sendReviews(peerId: string, reviews: readonly Review[]): Promise<void> {
    for (const frame of this.batchFrames(reviews)) {
      await this.sendTo(peerId, frame);
    }
  }

  private batchFrames(reviews: readonly Review[]): string[] {
    return chunkReviews(reviews).map(chunk => this.encode(createReviewBatch(this.localPeerId, chunk, this.clock())));
  }

  private async dialHints(hints: readonly PeerHint[]): Promise<void> {
    const dial = this.transport.dial?.bind(this.transport);
    if (!dial) {
      return;
    }

    const linked = new Set(this.transport.connectedPeers());
    for (const hint of hints) {
      if (hint.peerId === this.localPeerId || linked.has(hint.peerId)) {
        continue;
      }
      try {
        await dial(hint.address);
      } catch (error) {
        console.warn(`[ReviewGossip] Could not dial ${hint.address} for ${hint.peerId.slice(0, 8)}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Send to one peer; failures are counted and logged, never thrown
   */
  private async sendTo(peerId: string, frame: string): Promise<void> {
    try {
      await this.transport.send(peerId, frame);
      this.stats.framesSent++;
    } catch (error) {
      this.stats.sendFailures++;
      console.warn(`[ReviewGossip] Failed to send to ${peerId.slice(0, 8)}: ${errorMessage(error)}`);
    }
  }

  private async announceBody(rejoin: boolean): Promise<Omit<Announce, 'peerId'>> {
    const peers = await this.host.peerHints();
    const body = {
      address: this.transport.localAddress,
      peers: peers.length > 0 ? peers : undefined
    };
    return rejoin ? { ...body, rejoin: true } : body;
  }

  private encode(message: ReviewGossipMessage): string {
    return encodeFrame(this.messageSigner.sign(message));
  }

  private startTimers(): void {
    if (this.announceIntervalMs > 0) {
      this.timers.push(setInterval(() => {
        this.announce().catch(err => {
          console.warn('[ReviewGossip] Announce error:', err);
        });
      }, this.announceIntervalMs));
    }

    if (this.antiEntropyIntervalMs > 0) {
      this.timers.push(setInterval(() => {
        this.antiEntropySweep().catch(err => {
          console.warn('[ReviewGossip] Anti-entropy error:', err);
        });
      }, this.antiEntropyIntervalMs));
    }

    if (this.silenceCheckIntervalMs > 0) {
      this.timers.push(setInterval(() => {
        this.checkSilence().catch(err => {
          console.warn('[ReviewGossip] Silence check error:', err);
        });
      }, this.silenceCheckIntervalMs));
    }
  }
}
