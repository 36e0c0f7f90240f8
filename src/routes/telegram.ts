// src/routes/telegram.ts — Bot API webhook: acknowledge at once, process per chat in order
import express, { type Request, type Response } from 'express';
import rateLimit from 'express-rate-limit';
import { updateSchema, toInbound, type Inbound } from '@/services/telegram/updates';
import type { MessageHandler } from '@/services/message-handler';
import type { ChatQueue } from '@/memory/chatQueue';
import { logger, errorMessage } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export interface WebhookOptions {
  secret: string;
  botUsername: string;
}

export type WebhookDecision =
  | { status: 401; reason: 'bad_secret' }
  | { status: 400; reason: 'invalid_update'; issues: Array<{ path: string; message: string }> }
  | { status: 200; inbound: Inbound | null };

/** Validates one webhook call; `inbound` is null for updates the bot ignores. */
export function acceptUpdate(body: unknown, secretHeader: string | undefined, options: WebhookOptions): WebhookDecision {
  if (options.secret && secretHeader !== options.secret) {
    return { status: 401, reason: 'bad_secret' };
  }
  const parsed = updateSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      reason: 'invalid_update',
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    };
  }
  return { status: 200, inbound: toInbound(parsed.data, options.botUsername) };
}

export function createTelegramRouter(options: WebhookOptions, queue: ChatQueue, handle: MessageHandler): express.Router {
  const router = express.Router();

  router.post(
    '/webhook',
    rateLimit({ windowMs: 60 * 1000, limit: 120, standardHeaders: true, legacyHeaders: false }),
    (req: Request, res: Response) => {
      const decision = acceptUpdate(req.body, req.get(SECRET_HEADER), options);
      if (decision.status === 401) {
        res.status(401).json(createErrorResponse('Invalid webhook secret', undefined, 'BAD_SECRET'));
        return;
      }
      if (decision.status === 400) {
        res.status(400).json(createErrorResponse('Invalid update', decision.issues, 'INVALID_UPDATE'));
        return;
      }

      res.status(200).json({ ok: true });
      const inbound = decision.inbound;
      if (!inbound) return;

      void queue.run(inbound.chatId, () => handle(inbound)).catch((err: unknown) => {
        logger.error('telegram:handle_failed', { chatId: inbound.chatId, error: errorMessage(err) });
      });
    },
  );

  return router;
}
