/**
 * PeerRegistry - bookkeeping of every peer we have heard from
 *
 * Unknown → Discovered → Active → Silent → Active …
 *
 * Records are never deleted: a silent peer stays listed for diagnostics but
 * is no longer a send target until it speaks again.
 */

import { PeerState, type PeerMetadata, type PeerRecord, type PeerTransition } from '../network-types.js';

export interface PeerRegistryConfig {
  /** Our own id; never registered */
  readonly localPeerId: string;
  /** Silence window before a peer is marked silent (default: 30000 = 30 seconds) */
  readonly silenceTimeoutMs?: number;
  readonly clock?: () => number;
}

interface MutablePeerRecord {
  peerId: string;
  state: PeerState;
  firstSeen: number;
  lastSeen: number;
  address?: string;
  messagesReceived: number;
}

export class PeerRegistry {
  private readonly localPeerId: string;
  private readonly silenceTimeoutMs: number;
  private readonly clock: () => number;
  private readonly peers = new Map<string, MutablePeerRecord>();

  constructor(config: PeerRegistryConfig) {
    this.localPeerId = config.localPeerId;
    this.silenceTimeoutMs = config.silenceTimeoutMs ?? 30_000;
    this.clock = config.clock ?? Date.now;
  }

  /**
   * Record a presence announcement (idempotent)
   *
   * @returns the transition, or null for our own id
   */
  onDiscovery(peerId: string, metadata: PeerMetadata = {}, now = this.clock()): PeerTransition | null {
    if (peerId === this.localPeerId) {
      return null;
    }

    const existing = this.peers.get(peerId);

    if (!existing) {
      const record: MutablePeerRecord = {
        peerId,
        state: PeerState.DISCOVERED,
        firstSeen: now,
        lastSeen: now,
        address: metadata.address,
        messagesReceived: 1
      };
      this.peers.set(peerId, record);
      console.log(`[PeerRegistry] Discovered peer ${peerId.slice(0, 8)}${record.address ? ` at ${record.address}` : ''}`);
      return { peer: freeze(record), previous: 'unknown' };
    }

    const previous = existing.state;
    existing.state = PeerState.ACTIVE;
    existing.lastSeen = Math.max(existing.lastSeen, now);
    existing.messagesReceived++;
    if (metadata.address) {
      existing.address = metadata.address;
    }

    if (previous === PeerState.SILENT) {
      console.log(`[PeerRegistry] Peer ${peerId.slice(0, 8)} is back`);
    }

    return { peer: freeze(existing), previous };
  }

  /**
   * Liveness refresh for any inbound message
   */
  onMessage(peerId: string, now = this.clock()): PeerTransition | null {
    return this.onDiscovery(peerId, {}, now);
  }

  /**
   * Mark peers silent when nothing was heard within the timeout window
   *
   * @returns the peers that went silent on this call
   */
  onSilenceTimeout(now = this.clock()): PeerRecord[] {
    const silenced: PeerRecord[] = [];

    for (const record of this.peers.values()) {
      if (record.state !== PeerState.SILENT && now - record.lastSeen > this.silenceTimeoutMs) {
        record.state = PeerState.SILENT;
        silenced.push(freeze(record));
        console.log(
          `[PeerRegistry] Peer ${record.peerId.slice(0, 8)} went silent ` +
          `(last seen ${Math.round((now - record.lastSeen) / 1000)}s ago)`
        );
      }
    }

    return silenced;
  }

  /**
   * Snapshot of every known peer, ordered by peer id
   */
  listKnownPeers(): PeerRecord[] {
    return Array.from(this.peers.values())
      .sort((a, b) => (a.peerId < b.peerId ? -1 : a.peerId > b.peerId ? 1 : 0))
      .map(freeze);
  }

  /**
   * Ids of peers that should receive broadcasts
   */
  sendTargets(): string[] {
    return this.listKnownPeers()
      .filter(peer => peer.reachable)
      .map(peer => peer.peerId);
  }

  get(peerId: string): PeerRecord | undefined {
    const record = this.peers.get(peerId);
    return record ? freeze(record) : undefined;
  }

  get size(): number {
    return this.peers.size;
  }
}

function freeze(record: MutablePeerRecord): PeerRecord {
  return {
    peerId: record.peerId,
    state: record.state,
    reachable: record.state !== PeerState.SILENT,
    firstSeen: record.firstSeen,
    lastSeen: record.lastSeen,
    address: record.address,
    messagesReceived: record.messagesReceived
  };
}
