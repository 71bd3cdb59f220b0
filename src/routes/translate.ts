import { Router, Response } from 'express';
import { interpret } from '../services/queryInterpreter.js';
import { buildHelpText } from '../services/rendering.js';
import { validateTranslateInput, ValidatedRequest } from '../middleware/validation.js';
import { translateRateLimit } from '../middleware/rateLimit.js';
import { TranslationError } from '../errors/TranslationError.js';
import type { LanguageCode, TranslateResponse, Translator } from '../types/index.js';

export interface TranslateRouterDeps {
  translator: Translator;
  defaultSource: LanguageCode;
  defaultTarget: LanguageCode;
  maxTextLength: number;
}

/**
 * POST /translate
 *
 * Interpret free-form text the same way chat input is interpreted
 * and translate it.
 *
 * Request body: { text: string, defaultSource?: "en"|"zh", defaultTarget?: "en"|"zh" }
 * Response: { query: ParsedQuery, result: TranslationResult }
 */
export function createTranslateRouter(deps: TranslateRouterDeps): Router {
  const router = Router();

  router.post(
    '/translate',
    translateRateLimit,
    validateTranslateInput(deps.maxTextLength),
    async (req: ValidatedRequest, res: Response) => {
      const source = req.validatedDefaults?.source ?? deps.defaultSource;
      const target = req.validatedDefaults?.target ?? deps.defaultTarget;

      const query = interpret(req.validatedText ?? '', source, target);
      if (!query) {
        res.status(422).json({
          error: 'Unprocessable Entity',
          message: 'Nothing to translate',
          help: buildHelpText(source, target),
        });
        return;
      }

      try {
        const result = await deps.translator.translate({ ...query });
        const body: TranslateResponse = { query, result };
        res.json(body);
      } catch (error) {
        console.error('Error in /translate:', error);

        if (error instanceof TranslationError) {
          res.status(502).json({
            error: 'Bad Gateway',
            code: error.code,
            message: error.message,
          });
          return;
        }

        res.status(500).json({
          error: 'Internal Server Error',
          message: error instanceof Error ? error.message : 'An error occurred while translating',
        });
      }
    }
  );

  return router;
}
