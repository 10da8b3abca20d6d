/**
 * Route Modules Index
 *
 * Exports all route factory functions for use by the main server.
 */

export { createReviewRoutes } from './reviews.js';
export { createPeerRoutes } from './peers.js';
