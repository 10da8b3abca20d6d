/**
 * Shared test data and helpers
 */

import { InMemoryNetwork } from '../src/network/in-memory-transport.js';
import { ReviewNode, type ReviewNodeConfig } from '../src/review-node.js';
import { makeReviewId, type Review, type ReviewFields } from '../src/review-types.js';

export function fields(overrides: Partial<ReviewFields> = {}): ReviewFields {
  return {
    title: 'The Quiet Orchard',
    genre: 'fiction',
    authorName: 'Mara Lind',
    rating: 4,
    body: 'Slow start, lovely ending.',
    ...overrides
  };
}

export function review(authorPeerId: string, counter: number, overrides: Partial<Review> = {}): Review {
  return {
    ...fields(),
    id: makeReviewId(authorPeerId, counter),
    authorPeerId,
    published: true,
    deleted: false,
    version: 1,
    ...overrides
  };
}

/**
 * Manually advanced clock
 */
export class TestClock {
  constructor(public now = 1_000_000) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

/**
 * Poll until a condition holds; for tests over real sockets
 */
export async function waitFor(condition: () => boolean | Promise<boolean>, timeoutMs = 5_000, label = 'condition'): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await condition())) {
    if (Date.now() > deadline) {
      throw new Error(`Timed out after ${timeoutMs}ms waiting for ${label}`);
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
}

/**
 * Node on an in-memory network with every timer disabled
 */
export function createNode(
  network: InMemoryNetwork,
  peerId: string,
  clock: TestClock,
  extra: Partial<ReviewNodeConfig> = {}
): ReviewNode {
  return new ReviewNode({
    peerId,
    transport: network.createTransport(peerId),
    announceIntervalMs: 0,
    antiEntropyIntervalMs: 0,
    silenceCheckIntervalMs: 0,
    persistIntervalMs: 0,
    clock: clock.read,
    ...extra
  });
}

/**
 * Fully linked network of started nodes that have announced to each other
 */
export async function startNetwork(
  peerIds: string[],
  clock = new TestClock()
): Promise<{ network: InMemoryNetwork; nodes: ReviewNode[] }> {
  const network = new InMemoryNetwork();
  const nodes = peerIds.map(peerId => createNode(network, peerId, clock));
  network.linkAll();
  for (const node of nodes) {
    await node.start();
  }
  await settle(network, nodes);
  return { network, nodes };
}

/**
 * Flush until no node has pending work and no frame is queued
 */
export async function settle(network: InMemoryNetwork, nodes: ReviewNode[]): Promise<void> {
  for (let round = 0; round < 50; round++) {
    await Promise.all(nodes.map(node => node.idle()));
    const delivered = await network.flush();
    await Promise.all(nodes.map(node => node.idle()));
    if (delivered === 0 && network.pendingCount === 0) {
      return;
    }
  }
  throw new Error('Network did not settle');
}
