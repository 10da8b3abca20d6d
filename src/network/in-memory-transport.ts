/**
 * In-process network for tests and simulations
 *
 * Frames are queued, not delivered, until `flush()` is called, which makes
 * every delivery order explicit. An interceptor decides the fate of each
 * frame as it leaves the queue: deliver, drop, duplicate, or hold for a
 * later `release()` (which is how reordering is produced).
 */

import { TransportError } from '../errors.js';
import type { FrameHandler, GossipTransport } from '../network-types.js';

export interface PendingFrame {
  readonly from: string;
  readonly to: string;
  readonly frame: string;
}

export type FrameFate = 'deliver' | 'drop' | 'duplicate' | 'hold';

export type FrameInterceptor = (frame: PendingFrame) => FrameFate;

/** Guard against runaway delivery loops in a single flush */
const MAX_DELIVERIES_PER_FLUSH = 100_000;

function linkKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export class InMemoryNetwork {
  private readonly transports = new Map<string, InMemoryTransport>();
  private readonly links = new Set<string>();
  private readonly queue: PendingFrame[] = [];
  private readonly held: PendingFrame[] = [];
  private interceptor?: FrameInterceptor;

  delivered = 0;
  dropped = 0;

  createTransport(peerId: string): InMemoryTransport {
    if (this.transports.has(peerId)) {
      throw new TransportError(`Peer ${peerId} already has a transport on this network`, peerId);
    }
    const transport = new InMemoryTransport(this, peerId);
    this.transports.set(peerId, transport);
    return transport;
  }

  link(a: string, b: string): void {
    this.links.add(linkKey(a, b));
  }

  unlink(a: string, b: string): void {
    this.links.delete(linkKey(a, b));
  }

  /**
   * Fully connect every transport created so far
   */
  linkAll(): void {
    const ids = Array.from(this.transports.keys());
    for (let i = 0; i < ids.length; i++) {
      for (let j = i + 1; j < ids.length; j++) {
        this.link(ids[i], ids[j]);
      }
    }
  }

  isLinked(a: string, b: string): boolean {
    return this.links.has(linkKey(a, b));
  }

  neighbours(peerId: string): string[] {
    const result: string[] = [];
    for (const [id, transport] of this.transports) {
      if (id !== peerId && transport.isRunning && this.isLinked(peerId, id)) {
        result.push(id);
      }
    }
    return result.sort();
  }

  setInterceptor(interceptor?: FrameInterceptor): void {
    this.interceptor = interceptor;
  }

  /** @internal used by InMemoryTransport */
  enqueue(from: string, to: string, frame: string): void {
    const target = this.transports.get(to);
    if (!target || !target.isRunning) {
      throw new TransportError(`Peer ${to.slice(0, 8)} is not reachable`, to);
    }
    if (!this.isLinked(from, to)) {
      throw new TransportError(`No link between ${from.slice(0, 8)} and ${to.slice(0, 8)}`, to);
    }
    this.queue.push({ from, to, frame });
  }

  /**
   * Deliver queued frames, including frames sent while delivering, until
   * the queue is empty
   *
   * @returns number of frames handed to a receiver
   */
  async flush(): Promise<number> {
    let count = 0;

    while (this.queue.length > 0) {
      if (count >= MAX_DELIVERIES_PER_FLUSH) {
        throw new Error(`InMemoryNetwork: more than ${MAX_DELIVERIES_PER_FLUSH} deliveries in one flush`);
      }

      const next = this.queue.shift();
      if (!next) {
        break;
      }

      const fate = this.interceptor ? this.interceptor(next) : 'deliver';
      switch (fate) {
        case 'drop':
          this.dropped++;
          break;
        case 'hold':
          this.held.push(next);
          break;
        case 'duplicate':
          count += await this.deliver(next);
          count += await this.deliver(next);
          break;
        case 'deliver':
          count += await this.deliver(next);
          break;
      }
    }

    return count;
  }

  /**
   * Held frames, oldest first
   */
  heldFrames(): readonly PendingFrame[] {
    return [...this.held];
  }

  /**
   * Deliver matching held frames now, bypassing the interceptor
   *
   * Frames sent in response stay queued until the next flush.
   * @returns number of frames delivered
   */
  async release(predicate: (frame: PendingFrame) => boolean = () => true): Promise<number> {
    const released: PendingFrame[] = [];
    for (let i = 0; i < this.held.length;) {
      if (predicate(this.held[i])) {
        released.push(...this.held.splice(i, 1));
      } else {
        i++;
      }
    }

    let count = 0;
    for (const frame of released) {
      count += await this.deliver(frame);
    }
    return count;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  private async deliver(pending: PendingFrame): Promise<number> {
    const target = this.transports.get(pending.to);
    if (!target || !target.isRunning || !this.isLinked(pending.from, pending.to)) {
      this.dropped++;
      return 0;
    }
    this.delivered++;
    await target.receive(pending.frame, pending.from);
    return 1;
  }
}

export class InMemoryTransport implements GossipTransport {
  readonly localAddress: string;
  private handler?: FrameHandler;

  constructor(private readonly network: InMemoryNetwork, readonly peerId: string) {
    this.localAddress = `memory://${peerId}`;
  }

  get isRunning(): boolean {
    return this.handler !== undefined;
  }

  async start(handler: FrameHandler): Promise<void> {
    this.handler = handler;
  }

  async send(peerId: string, frame: string): Promise<void> {
    this.network.enqueue(this.peerId, peerId, frame);
  }

  async broadcast(frame: string): Promise<number> {
    const neighbours = this.network.neighbours(this.peerId);
    for (const peerId of neighbours) {
      this.network.enqueue(this.peerId, peerId, frame);
    }
    return neighbours.length;
  }

  connectedPeers(): string[] {
    return this.network.neighbours(this.peerId);
  }

  async stop(): Promise<void> {
    this.handler = undefined;
  }

  /** @internal called by InMemoryNetwork */
  async receive(frame: string, fromPeerId: string): Promise<void> {
    if (this.handler) {
      await this.handler(frame, fromPeerId);
    }
  }
}
