/**
 * GossipMessageSigner - Handles signing and verification of gossip messages
 *
 * Provides:
 * - Ed25519 signing for outgoing messages
 * - Signature verification for incoming messages
 * - Replay protection via nonce and expiry
 *
 * When signing is on, a peer's id is the hex encoding of its public key, so
 * a verified signature also proves the `from` field.
 */

import { Crypto, type SigningKeyPair } from '../crypto.js';
import { isSigned } from './codec.js';
import type { ReviewGossipMessage, SignedReviewGossipMessage } from '../network-types.js';

export interface MessageSignerConfig {
  /**
   * Signing key for gossip message authentication
   */
  readonly signingKey?: SigningKeyPair;

  /**
   * Whether to require signatures on incoming messages (default: false)
   */
  readonly requireSignatures?: boolean;

  /**
   * How long signed messages are valid (default: 300000 = 5 minutes)
   */
  readonly messageExpiryMs?: number;

  readonly clock?: () => number;
}

/**
 * Seen nonce record for replay protection
 */
interface SeenMessageRecord {
  firstSeen: number;
  expiresAt: number;
}

export class GossipMessageSigner {
  private readonly signingKey?: SigningKeyPair;
  private readonly requireSignatures: boolean;
  private readonly messageExpiryMs: number;
  private readonly clock: () => number;
  private readonly seenMessages = new Map<string, SeenMessageRecord>();

  constructor(config: MessageSignerConfig = {}) {
    this.signingKey = config.signingKey;
    this.requireSignatures = config.requireSignatures ?? false;
    this.messageExpiryMs = config.messageExpiryMs ?? 300_000; // 5 minutes
    this.clock = config.clock ?? Date.now;
  }

  /**
   * Sign a gossip message
   *
   * @returns Signed wrapper, or the original message if no signing key
   */
  sign(message: ReviewGossipMessage): ReviewGossipMessage | SignedReviewGossipMessage {
    if (!this.signingKey) {
      return message;
    }

    const nonce = Crypto.toHex(Crypto.randomBytes(16));
    const expiresAt = this.clock() + this.messageExpiryMs;
    const signature = Crypto.sign(signingPayload(message, nonce, expiresAt), this.signingKey.privateKey);

    return {
      message,
      senderPublicKey: Crypto.toHex(this.signingKey.publicKey),
      signature: Crypto.toHex(signature),
      nonce,
      expiresAt
    };
  }

  /**
   * Verify and unwrap an incoming message
   *
   * Checks, in order: expiry, sender key matches `from`, signature, nonce
   * not seen before. The nonce is only remembered once the signature holds,
   * so a forged copy cannot burn a genuine message's nonce.
   *
   * @returns The inner message if valid, or null
   */
  verify(data: ReviewGossipMessage | SignedReviewGossipMessage): ReviewGossipMessage | null {
    if (!isSigned(data)) {
      if (this.requireSignatures) {
        console.warn('[MessageSigner] ⚠️ Rejecting unsigned message (requireSignatures=true)');
        return null;
      }
      return data;
    }

    const now = this.clock();
    const sender = data.senderPublicKey.slice(0, 8);

    if (data.expiresAt < now) {
      console.warn(
        `[MessageSigner] ⚠️ Rejecting expired message from ${sender} ` +
        `(expired ${Math.round((now - data.expiresAt) / 1000)}s ago)`
      );
      return null;
    }

    if (data.message.from !== data.senderPublicKey) {
      console.warn(`[MessageSigner] ⚠️ Sender key ${sender} does not match message origin ${data.message.from.slice(0, 8)}`);
      return null;
    }

    if (!Crypto.isValidPublicKeyHex(data.senderPublicKey) || !/^[0-9a-fA-F]{128}$/.test(data.signature)) {
      console.warn(`[MessageSigner] ⚠️ Malformed key or signature from ${sender}`);
      return null;
    }

    const valid = Crypto.verify(
      signingPayload(data.message, data.nonce, data.expiresAt),
      Crypto.fromHex(data.signature),
      Crypto.fromHex(data.senderPublicKey)
    );
    if (!valid) {
      console.warn(`[MessageSigner] ⚠️ Invalid signature from ${sender}`);
      return null;
    }

    const messageId = `${data.senderPublicKey}:${data.nonce}`;
    if (this.seenMessages.has(messageId)) {
      console.warn(`[MessageSigner] ⚠️ Rejecting replayed message from ${sender} (nonce: ${data.nonce.slice(0, 8)}...)`);
      return null;
    }
    this.seenMessages.set(messageId, { firstSeen: now, expiresAt: data.expiresAt });

    return data.message;
  }

  /**
   * Forget nonces whose messages have expired anyway
   * @returns Number of entries removed
   */
  cleanupExpiredMessages(): number {
    const now = this.clock();
    let expired = 0;

    for (const [messageId, record] of this.seenMessages.entries()) {
      if (record.expiresAt < now) {
        this.seenMessages.delete(messageId);
        expired++;
      }
    }

    return expired;
  }

  get isSigning(): boolean {
    return this.signingKey !== undefined;
  }

  get seenMessageCount(): number {
    return this.seenMessages.size;
  }
}

function signingPayload(message: ReviewGossipMessage, nonce: string, expiresAt: number): Uint8Array {
  return new TextEncoder().encode(Crypto.canonicalJson({ message, nonce, expiresAt }));
}
