import { Router, Request, Response, NextFunction } from 'express';
import { timingSafeEqual } from 'crypto';
import { webhookRateLimit } from '../middleware/rateLimit.js';
import { HttpError } from '../middleware/errorHandler.js';
import { isTelegramUpdate } from '../types/telegram.js';
import type { TelegramUpdate } from '../types/telegram.js';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export interface TelegramRouterDeps {
  handleUpdate: (update: TelegramUpdate) => Promise<void>;
  /** Empty disables verification */
  webhookSecret: string;
}

function secretMatches(expected: string, received: string | undefined): boolean {
  if (received === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * POST /telegram/webhook
 *
 * Receives updates pushed by Telegram (webhook mode).
 * Answers 200 once the update has been handled so Telegram does not redeliver it;
 * failures are logged, never reported back.
 */
export function createTelegramRouter(deps: TelegramRouterDeps): Router {
  const router = Router();

  router.post(
    '/telegram/webhook',
    webhookRateLimit,
    async (req: Request, res: Response, next: NextFunction) => {
      if (deps.webhookSecret && !secretMatches(deps.webhookSecret, req.get(SECRET_HEADER))) {
        next(new HttpError(401, 'Invalid webhook secret'));
        return;
      }

      const update: unknown = req.body;
      if (!isTelegramUpdate(update)) {
        next(new HttpError(400, 'Body is not a Telegram update'));
        return;
      }

      try {
        await deps.handleUpdate(update);
      } catch (error) {
        console.error(`[Webhook] Update ${update.update_id} failed:`, error);
      }

      res.json({ ok: true });
    }
  );

  return router;
}
