/**
 * Review Routes - create, publish, delete, read
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { CommandAdapter } from '../../cli/command-adapter.js';
import { queryString, reviewFieldsFromBody, sendInternalError, sendResult } from './validation.js';

export function createReviewRoutes(adapter: CommandAdapter): Router {
  const router = Router();

  // List visible reviews, optionally from one peer
  router.get('/reviews', async (req: Request, res: Response) => {
    try {
      const peerId = queryString(req, 'peer');
      const result = await adapter.execute(peerId ? { kind: 'list-reviews-by-peer', peerId } : { kind: 'list-reviews' });
      sendResult(res, result);
    } catch (error) {
      sendInternalError(res, error);
    }
  });

  router.get('/reviews/:id', async (req: Request, res: Response) => {
    try {
      sendResult(res, await adapter.execute({ kind: 'show-review', id: req.params.id }));
    } catch (error) {
      sendInternalError(res, error);
    }
  });

  // Create a draft; it stays local until published
  router.post('/reviews', async (req: Request, res: Response) => {
    try {
      const fields = reviewFieldsFromBody(req.body);
      sendResult(res, await adapter.execute({ kind: 'create-review', fields }), 201);
    } catch (error) {
      sendInternalError(res, error);
    }
  });

  router.post('/reviews/:id/publish', async (req: Request, res: Response) => {
    try {
      sendResult(res, await adapter.execute({ kind: 'publish-review', id: req.params.id }));
    } catch (error) {
      sendInternalError(res, error);
    }
  });

  router.delete('/reviews/:id', async (req: Request, res: Response) => {
    try {
      sendResult(res, await adapter.execute({ kind: 'delete-review', id: req.params.id }));
    } catch (error) {
      sendInternalError(res, error);
    }
  });

  return router;
}
