/**
 * WebSocket mesh transport
 *
 * Every peer may listen for links and dials the bootstrap addresses it was
 * given plus any address learned through peer exchange. Both ends of a new
 * link first send a `hello` naming their peer id; frames arriving before
 * that are dropped. Lost links are redialed periodically.
 *
 * Channel security (TLS, link authentication) is left to the deployment:
 * put the listener behind wss:// or turn on message signing.
 */

/// <reference types="node" />

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { TransportError, errorMessage } from '../errors.js';
import type { FrameHandler, GossipTransport } from '../network-types.js';

export interface WebSocketTransportConfig {
  readonly peerId: string;

  /** Port to listen on; 0 picks a free port; omit to only dial out */
  readonly port?: number;

  /** Interface to bind (default: 0.0.0.0) */
  readonly host?: string;

  /**
   * Address other peers should dial, e.g. ws://192.168.1.20:7400.
   * Defaults to ws://127.0.0.1:<port>, which only works on one machine.
   */
  readonly advertisedAddress?: string;

  /** Addresses dialed on start and redialed while unlinked */
  readonly bootstrap?: readonly string[];

  /** Redial period for known addresses (default: 10000); 0 disables */
  readonly redialIntervalMs?: number;

  /** Time allowed for open + hello (default: 5000) */
  readonly handshakeTimeoutMs?: number;
}

type LinkFrame =
  | { readonly t: 'hello'; readonly peerId: string; readonly address?: string }
  | { readonly t: 'data'; readonly data: string };

export class WebSocketTransport implements GossipTransport {
  private readonly config: WebSocketTransportConfig;
  private readonly redialIntervalMs: number;
  private readonly handshakeTimeoutMs: number;
  private wss?: WebSocketServer;
  private handler?: FrameHandler;
  private listenAddress?: string;
  private redialTimer?: NodeJS.Timeout;

  /** peerId -> socket of the most recent link */
  private readonly links = new Map<string, WebSocket>();
  /** socket -> peerId, set once hello arrives */
  private readonly socketPeers = new Map<WebSocket, string>();
  /** Every socket we opened or accepted that has not closed yet, linked or not */
  private readonly sockets = new Set<WebSocket>();
  /** socket -> timer closing it if no hello arrives */
  private readonly handshakes = new Map<WebSocket, NodeJS.Timeout>();
  /** peerId -> address the peer can be dialed at */
  private readonly peerAddresses = new Map<string, string>();
  private readonly knownAddresses = new Set<string>();
  private readonly dialing = new Set<string>();

  constructor(config: WebSocketTransportConfig) {
    this.config = config;
    this.redialIntervalMs = config.redialIntervalMs ?? 10_000;
    this.handshakeTimeoutMs = config.handshakeTimeoutMs ?? 5_000;
  }

  get localAddress(): string | undefined {
    return this.config.advertisedAddress ?? this.listenAddress;
  }

  async start(handler: FrameHandler): Promise<void> {
    this.handler = handler;

    if (this.config.port !== undefined) {
      await this.listen(this.config.port);
    }

    for (const address of this.config.bootstrap ?? []) {
      this.knownAddresses.add(address);
    }
    await this.redial();

    if (this.redialIntervalMs > 0) {
      this.redialTimer = setInterval(() => {
        this.redial().catch(err => {
          console.warn('[WebSocketTransport] Redial error:', err);
        });
      }, this.redialIntervalMs);
    }
  }

  async stop(): Promise<void> {
    this.handler = undefined;

    if (this.redialTimer) {
      clearInterval(this.redialTimer);
      this.redialTimer = undefined;
    }

    // Nothing is waiting for acknowledgments, so links are cut rather than drained.
    // Sockets still dialing or waiting for hello go too.
    for (const timer of this.handshakes.values()) {
      clearTimeout(timer);
    }
    this.handshakes.clear();
    for (const socket of this.sockets) {
      socket.terminate();
    }
    this.sockets.clear();
    this.links.clear();
    this.socketPeers.clear();

    const wss = this.wss;
    this.wss = undefined;
    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>(resolve => wss.close(() => resolve()));
    }
    console.log('[WebSocketTransport] Stopped');
  }

  /**
   * Open a link to an address; no-op if already linked or dialing
   */
  async dial(address: string): Promise<void> {
    if (!this.handler) {
      throw new TransportError('Transport is not started');
    }
    if (address === this.localAddress || this.dialing.has(address) || this.isAddressLinked(address)) {
      return;
    }

    this.knownAddresses.add(address);
    this.dialing.add(address);

    try {
      await new Promise<void>((resolve, reject) => {
        const socket = new WebSocket(address, { handshakeTimeout: this.handshakeTimeoutMs });
        this.track(socket);
        socket.once('open', () => {
          if (!this.handler) {
            socket.terminate();
            reject(new TransportError(`Transport stopped while dialing ${address}`));
            return;
          }
          this.attach(socket, address);
          resolve();
        });
        socket.once('error', error => {
          reject(new TransportError(`Failed to dial ${address}: ${error.message}`));
        });
      });
    } finally {
      this.dialing.delete(address);
    }
  }

  async send(peerId: string, frame: string): Promise<void> {
    const socket = this.links.get(peerId);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      throw new TransportError(`No open link to ${peerId.slice(0, 8)}`, peerId);
    }
    await this.write(socket, { t: 'data', data: frame }, peerId);
  }

  async broadcast(frame: string): Promise<number> {
    const open = Array.from(this.links.entries()).filter(([, socket]) => socket.readyState === WebSocket.OPEN);

    const results = await Promise.allSettled(
      open.map(([peerId, socket]) => this.write(socket, { t: 'data', data: frame }, peerId))
    );

    let written = 0;
    for (const result of results) {
      if (result.status === 'fulfilled') {
        written++;
      } else {
        console.warn(`[WebSocketTransport] Broadcast write failed: ${errorMessage(result.reason)}`);
      }
    }
    return written;
  }

  connectedPeers(): string[] {
    return Array.from(this.links.entries())
      .filter(([, socket]) => socket.readyState === WebSocket.OPEN)
      .map(([peerId]) => peerId)
      .sort();
  }

  private listen(port: number): Promise<void> {
    const host = this.config.host ?? '0.0.0.0';

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, host });

      const onStartupError = (error: Error) => reject(new TransportError(`Cannot listen on ${host}:${port}: ${error.message}`));
      wss.once('error', onStartupError);

      wss.once('listening', () => {
        wss.off('error', onStartupError);
        wss.on('error', error => {
          console.error('[WebSocketTransport] Server error:', error);
        });

        const bound = wss.address();
        const boundPort = typeof bound === 'object' && bound !== null ? bound.port : port;
        const displayHost = host === '0.0.0.0' || host === '::' ? '127.0.0.1' : host;
        this.listenAddress = `ws://${displayHost}:${boundPort}`;
        this.wss = wss;
        console.log(`[WebSocketTransport] Listening on ${host}:${boundPort}`);
        resolve();
      });

      wss.on('connection', (socket: WebSocket) => {
        this.track(socket);
        this.attach(socket);
      });
    });
  }

  private track(socket: WebSocket): void {
    this.sockets.add(socket);
    socket.once('close', () => {
      this.sockets.delete(socket);
    });
  }

  /**
   * Wire up a freshly opened socket and introduce ourselves
   */
  private attach(socket: WebSocket, dialedAddress?: string): void {
    this.handshakes.set(socket, setTimeout(() => {
      this.handshakes.delete(socket);
      console.warn('[WebSocketTransport] No hello received, closing link');
      socket.terminate();
    }, this.handshakeTimeoutMs));

    socket.on('message', (data: RawData) => {
      this.handleSocketMessage(socket, rawToString(data), dialedAddress);
    });

    socket.on('close', () => {
      this.clearHandshake(socket);
      this.detach(socket);
    });

    socket.on('error', error => {
      console.warn('[WebSocketTransport] Link error:', error.message);
    });

    this.write(socket, { t: 'hello', peerId: this.config.peerId, address: this.localAddress }).catch(err => {
      console.warn(`[WebSocketTransport] Failed to send hello: ${errorMessage(err)}`);
    });
  }

  private handleSocketMessage(socket: WebSocket, text: string, dialedAddress?: string): void {
    const frame = parseLinkFrame(text);
    if (!frame) {
      console.warn('[WebSocketTransport] Dropping unparseable link frame');
      return;
    }

    if (frame.t === 'hello') {
      this.clearHandshake(socket);
      if (!this.handler) {
        socket.terminate();
        return;
      }
      if (frame.peerId === this.config.peerId) {
        // Dialed ourselves through an alias of our own address
        socket.close();
        return;
      }

      const isNew = !this.links.has(frame.peerId);
      this.links.set(frame.peerId, socket);
      this.socketPeers.set(socket, frame.peerId);

      const address = frame.address ?? dialedAddress;
      if (address) {
        this.peerAddresses.set(frame.peerId, address);
      }
      if (isNew) {
        console.log(`[WebSocketTransport] Linked with ${frame.peerId.slice(0, 8)}${address ? ` (${address})` : ''}`);
      }
      return;
    }

    const peerId = this.socketPeers.get(socket);
    const handler = this.handler;
    if (!peerId || !handler) {
      return;
    }

    handler(frame.data, peerId).catch(err => {
      console.warn(`[WebSocketTransport] Frame handler failed for ${peerId.slice(0, 8)}: ${errorMessage(err)}`);
    });
  }

  private clearHandshake(socket: WebSocket): void {
    const timer = this.handshakes.get(socket);
    if (timer) {
      clearTimeout(timer);
      this.handshakes.delete(socket);
    }
  }

  private detach(socket: WebSocket): void {
    const peerId = this.socketPeers.get(socket);
    this.socketPeers.delete(socket);

    if (peerId && this.links.get(peerId) === socket) {
      this.links.delete(peerId);
      console.log(`[WebSocketTransport] Link to ${peerId.slice(0, 8)} closed`);
    }
  }

  private isAddressLinked(address: string): boolean {
    for (const [peerId, peerAddress] of this.peerAddresses) {
      if (peerAddress === address && this.links.get(peerId)?.readyState === WebSocket.OPEN) {
        return true;
      }
    }
    return false;
  }

  private async redial(): Promise<void> {
    const pending = Array.from(this.knownAddresses).filter(
      address => !this.dialing.has(address) && !this.isAddressLinked(address)
    );

    await Promise.all(pending.map(address =>
      this.dial(address).catch(err => {
        console.warn(`[WebSocketTransport] ${errorMessage(err)}`);
      })
    ));
  }

  private write(socket: WebSocket, frame: LinkFrame, peerId?: string): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.send(JSON.stringify(frame), error => {
        if (error) {
          reject(new TransportError(`Write failed: ${error.message}`, peerId));
        } else {
          resolve();
        }
      });
    });
  }
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

function parseLinkFrame(text: string): LinkFrame | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }

  if (raw === null || typeof raw !== 'object') {
    return null;
  }

  const t: unknown = Reflect.get(raw, 't');
  if (t === 'hello') {
    const peerId: unknown = Reflect.get(raw, 'peerId');
    const address: unknown = Reflect.get(raw, 'address');
    if (typeof peerId !== 'string' || peerId === '') {
      return null;
    }
    return { t: 'hello', peerId, address: typeof address === 'string' ? address : undefined };
  }

  if (t === 'data') {
    const data: unknown = Reflect.get(raw, 'data');
    return typeof data === 'string' ? { t: 'data', data } : null;
  }

  return null;
}
