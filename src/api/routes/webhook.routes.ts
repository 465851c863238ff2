import express, { Router, type RequestHandler } from 'express';
import { extractMints, parseWebhookBody, verifySignature } from '../../webhooks/payload.js';
import { UnauthorizedError } from '../../errors.js';
import { logger } from '../../utils/logger.js';
import type { WebhookQueue } from '../../webhooks/webhook-queue.js';
import type { WebhookKind } from '../../types.js';

export const SIGNATURE_HEADER = 'x-helius-signature';

export interface WebhookRouteOptions {
  secret: string;
  bodyLimit: string;
}

export function webhookRoutes(queue: WebhookQueue, options: WebhookRouteOptions): Router {
  const router = Router();

  const receive = (kind: WebhookKind): RequestHandler => (req, res) => {
    const started = Date.now();
    const raw = typeof req.body === 'string' ? req.body : '';

    if (!verifySignature(raw, req.get(SIGNATURE_HEADER), options.secret)) {
      throw new UnauthorizedError();
    }

    const events = parseWebhookBody(raw);
    const mints = extractMints(events, kind);
    const queued: string[] = [];
    const duplicates: string[] = [];
    for (const mint of mints) {
      if (queue.enqueue(mint, kind)) queued.push(mint);
      else duplicates.push(mint);
    }

    logger.info(`[webhook] ${kind}: ${events.length} event(s), ${mints.length} mint(s), ${queued.length} queued`);
    res.status(202).json({
      status: 'accepted',
      kind,
      events: events.length,
      mints_found: mints.length,
      queued,
      duplicates,
      response_time_ms: Date.now() - started,
    });
  };

  // Raw text: the signature covers the exact bytes and Helius may double-encode JSON
  const rawBody = express.text({ type: '*/*', limit: options.bodyLimit });
  router.post('/helius/mint', rawBody, receive('mint'));
  router.post('/helius/pool', rawBody, receive('pool'));
  router.post('/helius/tx', rawBody, receive('tx'));

  router.get('/stats', (_req, res) => {
    res.json({ success: true, queue: queue.stats() });
  });

  return router;
}
