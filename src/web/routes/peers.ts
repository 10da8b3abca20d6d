/**
 * Peer Routes - known peers and node status
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { CommandAdapter } from '../../cli/command-adapter.js';
import { sendInternalError, sendResult } from './validation.js';

export function createPeerRoutes(adapter: CommandAdapter): Router {
  const router = Router();

  router.get('/peers', async (_req: Request, res: Response) => {
    try {
      sendResult(res, await adapter.execute({ kind: 'list-peers' }));
    } catch (error) {
      sendInternalError(res, error);
    }
  });

  router.get('/status', async (_req: Request, res: Response) => {
    try {
      sendResult(res, await adapter.execute({ kind: 'status' }));
    } catch (error) {
      sendInternalError(res, error);
    }
  });

  return router;
}
