/**
 * bookgossip - peer-to-peer book reviews
 *
 * Every peer keeps its own reviews authoritative, publishes them by gossip
 * and merges what it hears from others by per-review version.
 */

// Node
export { ReviewNode } from './review-node.js';
export type { ReviewNodeConfig, NodeStatus } from './review-node.js';

// Store and merge
export { ReviewStore } from './review-store.js';
export type { ReviewStoreConfig } from './review-store.js';
export { reconcile, sameReview, reviewDigest } from './reconcile.js';
export type { Resolution } from './reconcile.js';
export { validateReviewFields, validateRating, parseReview } from './review-validation.js';
export { MutationQueue } from './mutation-queue.js';

// Gossip
export { ReviewGossip } from './review-gossip.js';
export type { GossipHost, InboundResult, ReviewGossipConfig } from './review-gossip.js';
export * from './gossip/index.js';

// Network
export { PeerRegistry } from './network/peer-registry.js';
export type { PeerRegistryConfig } from './network/peer-registry.js';
export { InMemoryNetwork, InMemoryTransport } from './network/in-memory-transport.js';
export type { FrameFate, FrameInterceptor, PendingFrame } from './network/in-memory-transport.js';
export { WebSocketTransport } from './network/ws-transport.js';
export type { WebSocketTransportConfig } from './network/ws-transport.js';

// Persistence
export { JsonFileReviewPersistence, getDataDir } from './store/file-store.js';
export { MemoryReviewPersistence } from './store/memory-store.js';

// Commands
export { CommandAdapter, renderResult } from './cli/command-adapter.js';
export type { CommandResult, CommandFailure, Intent, ReviewAction } from './cli/command-adapter.js';
export { parseCommand, USAGE } from './cli/command-parser.js';
export type { ParsedLine } from './cli/command-parser.js';
export { IdentityManager } from './cli/identity-manager.js';
export { ReviewWebServer } from './web/server.js';
export type { WebServerConfig } from './web/server.js';

// Configuration
export { loadConfig, DEFAULT_SETTINGS } from './config.js';
export type { NodeSettings, SettingsOverrides } from './config.js';

// Primitives
export { Crypto } from './crypto.js';
export type { SigningKeyPair } from './crypto.js';

// Errors
export {
  ReviewNetworkError,
  ValidationError,
  NotFoundError,
  NotAuthorizedError,
  TransportError,
  ConfigError,
  isReviewNetworkError,
  errorMessage
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Types
export * from './review-types.js';
export * from './network-types.js';
