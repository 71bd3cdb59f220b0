import { Request, Response, NextFunction } from 'express';
import { parseLanguageCode } from '../types/index.js';
import type { LanguageCode } from '../types/index.js';

/**
 * Express request with validated input attached
 */
export interface ValidatedRequest extends Request {
  validatedText?: string;
  validatedDefaults?: { source: LanguageCode; target: LanguageCode };
}

function badRequest(res: Response, message: string): void {
  res.status(400).json({
    error: 'Bad Request',
    message,
  });
}

/**
 * Middleware to validate input for POST /translate.
 *
 * Validates:
 * - Request body has a string `text` field
 * - Text is not empty and within the length limit
 * - `defaultSource` and `defaultTarget`, when given, are both en or zh
 *
 * On success, attaches `validatedText` and `validatedDefaults` to the request.
 */
export function validateTranslateInput(maxTextLength: number) {
  return (req: ValidatedRequest, res: Response, next: NextFunction): void => {
    const body: Record<string, unknown> =
      typeof req.body === 'object' && req.body !== null ? req.body : {};
    const { text, defaultSource, defaultTarget } = body;

    if (!text || typeof text !== 'string') {
      badRequest(res, 'Missing or invalid "text" in request body');
      return;
    }

    if (text.trim() === '') {
      badRequest(res, 'Text cannot be empty');
      return;
    }

    if (text.length > maxTextLength) {
      badRequest(res, `Text exceeds maximum length of ${maxTextLength} characters`);
      return;
    }

    if ((defaultSource === undefined) !== (defaultTarget === undefined)) {
      badRequest(res, 'Provide both "defaultSource" and "defaultTarget", or neither');
      return;
    }

    if (defaultSource !== undefined) {
      const source = typeof defaultSource === 'string' ? parseLanguageCode(defaultSource) : null;
      const target = typeof defaultTarget === 'string' ? parseLanguageCode(defaultTarget) : null;
      if (!source || !target) {
        badRequest(res, 'Language codes must be "en" or "zh"');
        return;
      }
      req.validatedDefaults = { source, target };
    }

    req.validatedText = text;
    next();
  };
}
