import type { Request, Response } from 'express';
import crypto from 'crypto';
import { z } from 'zod';
import type { PRContext } from '../types.js';
import { errorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';

const REVIEWED_ACTIONS = new Set(['opened', 'synchronize', 'reopened']);

const PullRequestEventSchema = z.object({
  action: z.string(),
  pull_request: z.object({
    number: z.number().int().positive(),
    head: z.object({ sha: z.string() }).optional(),
  }),
  repository: z.object({
    name: z.string(),
    owner: z.object({ login: z.string() }),
  }),
  installation: z.object({ id: z.number().int() }).optional(),
});

export interface WebhookDelivery {
  event: string | undefined;
  signature: string | undefined;
  deliveryId: string | undefined;
  rawBody: Buffer;
}

export interface WebhookReply {
  status: number;
  body: Record<string, unknown>;
}

export interface WebhookDependencies {
  secret: string | undefined;
  startReview: (context: PRContext) => Promise<unknown>;
}

export function verifySignature(payload: Buffer, signature: string, secret: string): boolean {
  const digest = 'sha256=' + crypto.createHmac('sha256', secret).update(payload).digest('hex');
  const expected = Buffer.from(digest);
  const received = Buffer.from(signature);

  // timingSafeEqual throws on length mismatch.
  if (expected.length !== received.length) {
    return false;
  }
  return crypto.timingSafeEqual(received, expected);
}

export type ParsedEvent =
  | { kind: 'review'; context: PRContext; action: string }
  | { kind: 'ignored'; reason: string }
  | { kind: 'invalid'; reason: string };

export function parsePullRequestEvent(payload: unknown): ParsedEvent {
  const result = PullRequestEventSchema.safeParse(payload);
  if (!result.success) {
    return {
      kind: 'invalid',
      reason: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', '),
    };
  }

  const event = result.data;
  if (!REVIEWED_ACTIONS.has(event.action)) {
    return { kind: 'ignored', reason: `action ${event.action}` };
  }

  return {
    kind: 'review',
    action: event.action,
    context: {
      owner: event.repository.owner.login,
      repo: event.repository.name,
      pull_number: event.pull_request.number,
      installation_id: event.installation?.id,
    },
  };
}

function parseJson(raw: Buffer): unknown {
  try {
    return JSON.parse(raw.toString('utf-8'));
  } catch {
    return undefined;
  }
}

/**
 * Validate one delivery and, for reviewable PR events, start the review in
 * the background. The reply never waits for the review.
 */
export function handleWebhookDelivery(delivery: WebhookDelivery, deps: WebhookDependencies): WebhookReply {
  if (!delivery.signature) {
    logger.warn('webhook_validation', 'Missing signature header');
    return { status: 401, body: { error: 'Missing signature' } };
  }

  if (!deps.secret) {
    logger.error('webhook_validation', 'GITHUB_WEBHOOK_SECRET not configured');
    return { status: 500, body: { error: 'Server misconfiguration' } };
  }

  if (!verifySignature(delivery.rawBody, delivery.signature, deps.secret)) {
    logger.warn('webhook_validation', 'Invalid signature');
    return { status: 401, body: { error: 'Invalid signature' } };
  }

  if (delivery.event !== 'pull_request') {
    logger.info('webhook_filtering', 'Non-PR event ignored', { event: delivery.event });
    return { status: 200, body: { message: 'Event ignored' } };
  }

  const parsed = parsePullRequestEvent(parseJson(delivery.rawBody));

  if (parsed.kind === 'invalid') {
    logger.warn('webhook_validation', 'Malformed pull_request payload', { reason: parsed.reason });
    return { status: 400, body: { error: 'Invalid payload' } };
  }

  if (parsed.kind === 'ignored') {
    logger.info('webhook_filtering', 'PR action ignored', { reason: parsed.reason });
    return { status: 200, body: { message: 'Action ignored' } };
  }

  logger.info('webhook_received', 'Webhook accepted', {
    deliveryId: delivery.deliveryId,
    action: parsed.action,
    owner: parsed.context.owner,
    repo: parsed.context.repo,
    pullNumber: parsed.context.pull_number,
  });

  deps.startReview(parsed.context).catch(err => {
    logger.error('pipeline_fatal', 'Unhandled pipeline error', {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  });

  return { status: 200, body: { message: 'Processing' } };
}

export function createWebhookHandler(deps: WebhookDependencies) {
  return (req: Request, res: Response): void => {
    const reply = handleWebhookDelivery(
      {
        event: req.get('x-github-event'),
        signature: req.get('x-hub-signature-256'),
        deliveryId: req.get('x-github-delivery'),
        rawBody: Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0),
      },
      deps
    );

    res.status(reply.status).json(reply.body);
  };
}
