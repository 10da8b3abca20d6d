/**
 * bookgossip HTTP API
 *
 * JSON front end over the same intents as the interactive shell. Every
 * response is `{ success: true, data }` or `{ success: false, error, code }`.
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type { CommandAdapter } from '../cli/command-adapter.js';
import { createPeerRoutes, createReviewRoutes } from './routes/index.js';

export interface WebServerConfig {
  readonly adapter: CommandAdapter;
  /** Port to listen on (default: 3000); 0 picks a free port */
  readonly port?: number;
  /** Interface to bind (default: 127.0.0.1) */
  readonly host?: string;
  /** Origins allowed by CORS; empty allows any */
  readonly allowedOrigins?: readonly string[];
  /** Create/publish/delete requests per minute per client (default: 30) */
  readonly writeLimitPerMinute?: number;
}

export class ReviewWebServer {
  readonly app: express.Application;
  private readonly port: number;
  private readonly host: string;
  private server?: Server;

  constructor(config: WebServerConfig) {
    this.port = config.port ?? 3000;
    this.host = config.host ?? '127.0.0.1';
    this.app = express();

    this.setupMiddleware(config);
    this.setupRoutes(config.adapter);
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(config: WebServerConfig): void {
    this.app.use((_req: Request, res: Response, next: NextFunction) => {
      res.setHeader('X-Content-Type-Options', 'nosniff');
      res.setHeader('X-Frame-Options', 'DENY');
      next();
    });

    const allowedOrigins = config.allowedOrigins ?? [];
    this.app.use(cors({
      origin: allowedOrigins.length === 0 ? true : [...allowedOrigins],
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS']
    }));

    const writeLimiter = rateLimit({
      windowMs: 60 * 1000, // 1 minute
      max: config.writeLimitPerMinute ?? 30,
      skip: (req: Request) => req.method === 'GET' || req.method === 'OPTIONS',
      message: { success: false, error: 'Too many changes, please slow down' },
      standardHeaders: true,
      legacyHeaders: false
    });
    const apiLimiter = rateLimit({
      windowMs: 60 * 1000, // 1 minute
      max: 300,
      message: { success: false, error: 'Too many requests, please slow down' },
      standardHeaders: true,
      legacyHeaders: false
    });

    this.app.use('/api/reviews', writeLimiter);
    this.app.use('/api/', apiLimiter);
    this.app.use(express.json({ limit: '64kb' }));
  }

  private setupRoutes(adapter: CommandAdapter): void {
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({ success: true, data: { status: 'ok' } });
    });

    this.app.use('/api', createReviewRoutes(adapter));
    this.app.use('/api', createPeerRoutes(adapter));

    this.app.use('/api', (_req: Request, res: Response) => {
      res.status(404).json({ success: false, error: 'Unknown endpoint' });
    });

    // Registered last so it also sees body-parser failures
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof SyntaxError) {
        res.status(400).json({ success: false, error: 'Request body is not valid JSON' });
        return;
      }
      console.error('[WebServer] Error:', err);
      res.status(500).json({ success: false, error: 'Internal server error' });
    });
  }

  /**
   * Start listening
   * @returns the bound port
   */
  async start(): Promise<number> {
    const server = await new Promise<Server>((resolve, reject) => {
      const listening = this.app.listen(this.port, this.host, () => resolve(listening));
      listening.once('error', reject);
    });
    this.server = server;

    const address = server.address();
    const port = isAddressInfo(address) ? address.port : this.port;
    console.log(`[WebServer] API running at http://${this.host}:${port}/api`);
    return port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    console.log('[WebServer] Stopped');
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
