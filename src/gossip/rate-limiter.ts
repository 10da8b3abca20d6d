/**
 * PeerRateLimiter - Rate limiting for inbound gossip frames
 *
 * Fixed window per peer with a temporary ban once the window overflows.
 */

export interface RateLimiterConfig {
  /** Maximum frames per peer per window (default: 1000) */
  readonly maxMessagesPerWindow?: number;
  /** Time window in milliseconds (default: 60000 = 1 minute) */
  readonly windowMs?: number;
  /** Ban duration in milliseconds when limit exceeded (default: 60000 = 1 minute) */
  readonly banDurationMs?: number;
  readonly clock?: () => number;
}

interface PeerRateLimit {
  messageCount: number;
  windowStart: number;
  bannedUntil?: number;
}

export class PeerRateLimiter {
  private readonly maxMessages: number;
  private readonly windowMs: number;
  private readonly banDurationMs: number;
  private readonly clock: () => number;
  private readonly peerLimits = new Map<string, PeerRateLimit>();

  constructor(config: RateLimiterConfig = {}) {
    this.maxMessages = config.maxMessagesPerWindow ?? 1000;
    this.windowMs = config.windowMs ?? 60_000;
    this.banDurationMs = config.banDurationMs ?? 60_000;
    this.clock = config.clock ?? Date.now;
  }

  /**
   * @returns true if the frame should be processed, false if rate limited
   */
  checkLimit(peerId: string): boolean {
    const now = this.clock();
    let limit = this.peerLimits.get(peerId);

    if (!limit) {
      limit = { messageCount: 0, windowStart: now };
      this.peerLimits.set(peerId, limit);
    }

    if (limit.bannedUntil !== undefined) {
      if (now < limit.bannedUntil) {
        return false;
      }
      limit.bannedUntil = undefined;
      limit.messageCount = 0;
      limit.windowStart = now;
    }

    if (now - limit.windowStart >= this.windowMs) {
      limit.messageCount = 0;
      limit.windowStart = now;
    }

    limit.messageCount++;

    if (limit.messageCount > this.maxMessages) {
      limit.bannedUntil = now + this.banDurationMs;
      console.warn(
        `[RateLimiter] ⛔ Peer ${peerId.slice(0, 8)} exceeded rate limit ` +
        `(${limit.messageCount}/${this.maxMessages} in ${this.windowMs}ms). ` +
        `Banned for ${this.banDurationMs}ms`
      );
      return false;
    }

    return true;
  }

  isPeerBanned(peerId: string): boolean {
    const limit = this.peerLimits.get(peerId);
    return limit?.bannedUntil !== undefined && this.clock() < limit.bannedUntil;
  }

  /**
   * Drop entries for peers idle for two windows and not banned
   * @returns Number of entries removed
   */
  cleanup(): number {
    const now = this.clock();
    const cutoff = now - this.windowMs * 2;
    let removed = 0;

    for (const [peerId, limit] of this.peerLimits.entries()) {
      const notBanned = limit.bannedUntil === undefined || now >= limit.bannedUntil;
      if (limit.windowStart < cutoff && notBanned) {
        this.peerLimits.delete(peerId);
        removed++;
      }
    }

    return removed;
  }
}
