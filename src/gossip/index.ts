/**
 * Gossip Module - wire codec and inbound message guards
 */

export {
  chunkReviews,
  createAnnounce,
  createReviewBatch,
  createReviewUpdate,
  decodeFrame,
  encodeFrame,
  isSigned,
  REVIEW_BATCH_SIZE,
  type DecodeResult
} from './codec.js';
export { GossipMessageSigner, type MessageSignerConfig } from './message-signer.js';
export { PeerRateLimiter, type RateLimiterConfig } from './rate-limiter.js';
