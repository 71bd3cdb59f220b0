import express, { Request, Response, NextFunction, Express } from 'express';
import helmet from 'helmet';
import { createTelegramRouter } from './routes/telegram.js';
import { createTranslateRouter } from './routes/translate.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { LanguageCode, Translator } from './types/index.js';
import type { TelegramUpdate } from './types/telegram.js';

export interface AppDeps {
  translator: Translator;
  handleUpdate: (update: TelegramUpdate) => Promise<void>;
  defaultSource: LanguageCode;
  defaultTarget: LanguageCode;
  webhookSecret: string;
  maxTextLength: number;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Trust proxy (for Caddy/nginx/Cloudflare - ensures correct client IP for rate limiting)
  app.set('trust proxy', 1);

  // Security middleware - set various HTTP headers
  app.use(helmet());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] ${req.method} ${req.path} - ${req.ip}`);
    next();
  });

  app.use(express.json({ limit: '100kb' }));

  // Health check endpoint
  app.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      message: 'Translation relay is running',
    });
  });

  app.use(createTelegramRouter({
    handleUpdate: deps.handleUpdate,
    webhookSecret: deps.webhookSecret,
  }));
  app.use(createTranslateRouter({
    translator: deps.translator,
    defaultSource: deps.defaultSource,
    defaultTarget: deps.defaultTarget,
    maxTextLength: deps.maxTextLength,
  }));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
