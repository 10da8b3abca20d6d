/**
 * Wire codec for gossip frames
 *
 * Frames are JSON. Decoding never throws: anything that does not parse or
 * does not have the expected shape comes back as a failure with a reason,
 * and the engine drops it.
 */

import { parseReview } from '../review-validation.js';
import type { Review } from '../review-types.js';
import {
  PROTOCOL_ID,
  type Announce,
  type PeerHint,
  type ReviewGossipMessage,
  type SignedReviewGossipMessage
} from '../network-types.js';

export type DecodeResult =
  | { readonly ok: true; readonly message: ReviewGossipMessage | SignedReviewGossipMessage }
  | { readonly ok: false; readonly reason: string };

/** Upper bound on peer-exchange hints accepted from one announce */
const MAX_PEER_HINTS = 64;

/** Most reviews carried by one review-batch frame */
export const REVIEW_BATCH_SIZE = 100;

export function createAnnounce(from: string, announce: Omit<Announce, 'peerId'>, timestamp: number): ReviewGossipMessage {
  return {
    protocol: PROTOCOL_ID,
    type: 'announce',
    from,
    timestamp,
    announce: { peerId: from, ...announce }
  };
}

export function createReviewUpdate(from: string, review: Review, timestamp: number): ReviewGossipMessage {
  return { protocol: PROTOCOL_ID, type: 'review-update', from, timestamp, review };
}

export function createReviewBatch(from: string, reviews: readonly Review[], timestamp: number): ReviewGossipMessage {
  return { protocol: PROTOCOL_ID, type: 'review-batch', from, timestamp, reviews };
}

/**
 * Split a review set into batch-sized chunks, preserving order
 */
export function chunkReviews(reviews: readonly Review[], size = REVIEW_BATCH_SIZE): Review[][] {
  const chunks: Review[][] = [];
  for (let i = 0; i < reviews.length; i += size) {
    chunks.push(reviews.slice(i, i + size));
  }
  return chunks;
}

export function encodeFrame(message: ReviewGossipMessage | SignedReviewGossipMessage): string {
  return JSON.stringify(message);
}

export function isSigned(
  message: ReviewGossipMessage | SignedReviewGossipMessage
): message is SignedReviewGossipMessage {
  return 'senderPublicKey' in message;
}

export function decodeFrame(frame: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch {
    return { ok: false, reason: 'not JSON' };
  }

  if (!isRecord(raw)) {
    return { ok: false, reason: 'not an object' };
  }

  if ('senderPublicKey' in raw) {
    return decodeSigned(raw);
  }

  const message = decodeMessage(raw);
  return typeof message === 'string' ? { ok: false, reason: message } : { ok: true, message };
}

function decodeSigned(raw: Record<string, unknown>): DecodeResult {
  const { message, senderPublicKey, signature, nonce, expiresAt } = raw;

  if (typeof senderPublicKey !== 'string' || typeof signature !== 'string' || typeof nonce !== 'string') {
    return { ok: false, reason: 'signed envelope missing key, signature or nonce' };
  }
  if (typeof expiresAt !== 'number' || !Number.isFinite(expiresAt)) {
    return { ok: false, reason: 'signed envelope missing expiry' };
  }
  if (!isRecord(message)) {
    return { ok: false, reason: 'signed envelope without message' };
  }

  const inner = decodeMessage(message);
  if (typeof inner === 'string') {
    return { ok: false, reason: inner };
  }

  return { ok: true, message: { message: inner, senderPublicKey, signature, nonce, expiresAt } };
}

/**
 * @returns the message, or the reason it was rejected
 */
function decodeMessage(raw: Record<string, unknown>): ReviewGossipMessage | string {
  const { protocol, type, from, timestamp } = raw;

  if (protocol !== PROTOCOL_ID) {
    return `unsupported protocol ${String(protocol)}`;
  }
  if (typeof from !== 'string' || from === '') {
    return 'missing sender';
  }
  if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
    return 'missing timestamp';
  }

  if (type === 'announce') {
    const announce = decodeAnnounce(raw.announce);
    if (!announce) {
      return 'malformed announce';
    }
    if (announce.peerId !== from) {
      return 'announce peer id does not match sender';
    }
    return { protocol: PROTOCOL_ID, type: 'announce', from, timestamp, announce };
  }

  if (type === 'review-update') {
    const review = parseReview(raw.review);
    if (!review) {
      return 'malformed review';
    }
    return { protocol: PROTOCOL_ID, type: 'review-update', from, timestamp, review };
  }

  if (type === 'review-batch') {
    const entries = raw.reviews;
    if (!Array.isArray(entries) || entries.length === 0) {
      return 'malformed review batch';
    }
    if (entries.length > REVIEW_BATCH_SIZE) {
      return `review batch of ${entries.length} exceeds ${REVIEW_BATCH_SIZE}`;
    }

    const reviews: Review[] = [];
    for (const entry of entries) {
      const review = parseReview(entry);
      if (!review) {
        return 'malformed review in batch';
      }
      reviews.push(review);
    }
    return { protocol: PROTOCOL_ID, type: 'review-batch', from, timestamp, reviews };
  }

  return `unknown message type ${String(type)}`;
}

function decodeAnnounce(value: unknown): Announce | null {
  if (!isRecord(value) || typeof value.peerId !== 'string' || value.peerId === '') {
    return null;
  }

  const address = typeof value.address === 'string' && value.address !== '' ? value.address : undefined;

  let peers: PeerHint[] | undefined;
  if (Array.isArray(value.peers)) {
    peers = [];
    for (const hint of value.peers.slice(0, MAX_PEER_HINTS)) {
      if (isRecord(hint) && typeof hint.peerId === 'string' && typeof hint.address === 'string') {
        peers.push({ peerId: hint.peerId, address: hint.address });
      }
    }
  }

  const announce: Announce = { peerId: value.peerId, address, peers };
  return value.rejoin === true ? { ...announce, rejoin: true } : announce;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
