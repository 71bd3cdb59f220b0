import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for POST /translate (each call hits the paid provider)
 * 60 requests per minute per IP
 */
export const translateRateLimit = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 60,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: 'Too Many Requests',
    message: 'Please wait before translating more text',
  },
});

/**
 * Rate limiter for the Telegram webhook.
 * Telegram delivers from a small set of addresses, so the ceiling is generous.
 */
export const webhookRateLimit = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 1200,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: 'Too Many Requests',
    message: 'Webhook rate limit exceeded',
  },
});
