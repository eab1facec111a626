import express from 'express';
import type { PRContext } from './types.js';
import { createWebhookHandler } from './webhook/handler.js';
import { errorMessage } from './errors.js';
import { logger } from './observability/logger.js';
import { metrics } from './metrics/metrics.js';

export interface ServerOptions {
  webhookSecret: string | undefined;
  startReview: (context: PRContext) => Promise<unknown>;
}

export function createApp(options: ServerOptions): express.Express {
  const app = express();

  // Signatures are computed over the exact bytes GitHub sent.
  app.post(
    '/webhook',
    express.raw({ type: 'application/json', limit: '5mb' }),
    createWebhookHandler({ secret: options.webhookSecret, startReview: options.startReview })
  );

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/metrics', (_req, res) => {
    try {
      res.status(200).json(metrics.snapshot());
    } catch (error) {
      logger.error('metrics_error', 'Failed to generate metrics snapshot', {
        error: errorMessage(error),
      });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  });

  return app;
}
