/**
 * Network layer types for the bookgossip protocol
 *
 * Messages are self-contained: a receiver needs no session state to
 * interpret one. Transports only move opaque string frames between
 * identified peers.
 */

import type { Review } from './review-types.js';

/** Protocol tag carried by every gossip message */
export const PROTOCOL_ID = 'bookgossip/1';

/**
 * Liveness state of a known peer
 *
 * A peer that has never been heard from is simply absent from the registry
 * ("unknown"). Silent peers are kept for diagnostics but excluded from
 * send targets until they speak again.
 */
export enum PeerState {
  DISCOVERED = 'discovered',
  ACTIVE = 'active',
  SILENT = 'silent'
}

/**
 * Registry entry for a peer we have heard from
 */
export interface PeerRecord {
  readonly peerId: string;
  readonly state: PeerState;
  /** Whether the peer is currently a send target */
  readonly reachable: boolean;
  readonly firstSeen: number;
  readonly lastSeen: number;
  /** Dialable address advertised by the peer, if any */
  readonly address?: string;
  readonly messagesReceived: number;
}

/**
 * Metadata a peer advertises about itself
 */
export interface PeerMetadata {
  readonly address?: string;
}

/**
 * Registry state change caused by one inbound message
 */
export interface PeerTransition {
  readonly peer: PeerRecord;
  readonly previous: PeerState | 'unknown';
}

/**
 * Address hint shared through announces (peer exchange)
 */
export interface PeerHint {
  readonly peerId: string;
  readonly address: string;
}

/**
 * Presence announcement
 */
export interface Announce {
  readonly peerId: string;
  readonly address?: string;
  readonly peers?: readonly PeerHint[];
  /**
   * Set once per peer after the sender starts: the receiver answers with the
   * copies it holds of the sender's own reviews, which the sender may have
   * lost in a crash.
   */
  readonly rejoin?: boolean;
}

export type ReviewGossipMessage =
  | {
      readonly protocol: typeof PROTOCOL_ID;
      readonly type: 'announce';
      readonly from: string;
      readonly timestamp: number;
      readonly announce: Announce;
    }
  | {
      readonly protocol: typeof PROTOCOL_ID;
      readonly type: 'review-update';
      readonly from: string;
      readonly timestamp: number;
      readonly review: Review;
    }
  | {
      readonly protocol: typeof PROTOCOL_ID;
      readonly type: 'review-batch';
      readonly from: string;
      readonly timestamp: number;
      readonly reviews: readonly Review[];
    };

export type ReviewGossipMessageType = ReviewGossipMessage['type'];

/**
 * Signed wrapper around a gossip message
 *
 * The signature covers the canonical JSON of `{ message, nonce, expiresAt }`.
 */
export interface SignedReviewGossipMessage {
  readonly message: ReviewGossipMessage;
  readonly senderPublicKey: string;
  readonly signature: string;
  readonly nonce: string;
  readonly expiresAt: number;
}

/**
 * Called by a transport for every frame received on a link
 *
 * `fromPeerId` is the identity the link was established with.
 */
export type FrameHandler = (frame: string, fromPeerId: string) => Promise<void>;

/**
 * Transport contract used by the gossip engine
 *
 * Frames arrive whole or not at all. Ordering, delivery and deduplication
 * are not guaranteed.
 */
export interface GossipTransport {
  /** Address other peers can dial to reach us, if we listen */
  readonly localAddress?: string;

  start(handler: FrameHandler): Promise<void>;

  /** Send a frame to one peer; rejects with TransportError when unreachable */
  send(peerId: string, frame: string): Promise<void>;

  /** Send a frame over every open link; resolves with the number of links written */
  broadcast(frame: string): Promise<number>;

  /** Peer ids with an open link */
  connectedPeers(): string[];

  /** Open a link to an address learned through peer exchange */
  dial?(address: string): Promise<void>;

  stop(): Promise<void>;
}

/**
 * Gossip engine counters
 */
export interface GossipStats {
  readonly framesReceived: number;
  readonly framesSent: number;
  readonly malformedDropped: number;
  readonly rejectedDropped: number;
  readonly sendFailures: number;
  readonly announcesSent: number;
  readonly antiEntropySweeps: number;
}
