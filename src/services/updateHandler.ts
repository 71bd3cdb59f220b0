import { interpret } from './queryInterpreter.js';
import {
  buildErrorCandidate,
  buildHelpCandidate,
  buildHelpText,
  formatErrorMessage,
  formatMessageReply,
  buildTranslationCandidates,
} from './rendering.js';
import type { BotApi } from './telegram.js';
import type { DisplayCandidate, LanguageCode, Translator } from '../types/index.js';
import type { TelegramInlineQuery, TelegramMessage, TelegramUpdate } from '../types/telegram.js';

export const NOT_UNDERSTOOD_MESSAGE = 'Could not understand the input. Please try again.';

export interface UpdateHandlerDeps {
  bot: BotApi;
  translator: Translator;
  defaultSource: LanguageCode;
  defaultTarget: LanguageCode;
  botUsername?: string;
}

export function buildWelcomeText(botUsername = ''): string {
  const handle = botUsername ? `@${botUsername.replace(/^@/, '')}` : 'the bot handle';
  return [
    '👋 Inline Translation Bot',
    `Type ${handle} followed by text anywhere to translate between English and Chinese.`,
    'You can also send me text directly here!',
  ].join('\n');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create the dispatcher for Telegram updates.
 * Each update is handled independently; nothing is shared between calls.
 */
export function createUpdateHandler(deps: UpdateHandlerDeps): (update: TelegramUpdate) => Promise<void> {
  const { bot, translator, defaultSource, defaultTarget, botUsername = '' } = deps;

  async function handleInlineQuery(query: TelegramInlineQuery): Promise<void> {
    const parsed = interpret(query.query, defaultSource, defaultTarget);

    if (!parsed) {
      await bot.answerInlineQuery(query.id, [
        buildHelpCandidate(defaultSource, defaultTarget, botUsername),
      ]);
      return;
    }

    let candidates: DisplayCandidate[];
    try {
      const result = await translator.translate({ ...parsed });
      candidates = buildTranslationCandidates(parsed, result);
    } catch (error) {
      console.error('[Inline] Translation failed:', errorMessage(error));
      candidates = [buildErrorCandidate(errorMessage(error))];
    }

    await bot.answerInlineQuery(query.id, candidates);
  }

  async function handleCommand(message: TelegramMessage, text: string): Promise<void> {
    // "/start@SomeBot args" -> "/start"
    const command = text.split(/\s+/)[0].split('@')[0].toLowerCase();

    switch (command) {
      case '/start':
        await bot.sendMessage(message.chat.id, buildWelcomeText(botUsername));
        break;
      case '/help':
        await bot.sendMessage(message.chat.id, buildHelpText(defaultSource, defaultTarget, botUsername));
        break;
      default:
        // Other commands are not translated
        break;
    }
  }

  async function handleMessage(message: TelegramMessage): Promise<void> {
    const text = message.text;
    if (text === undefined) {
      return;
    }

    if (text.startsWith('/')) {
      await handleCommand(message, text);
      return;
    }

    const parsed = interpret(text, defaultSource, defaultTarget);
    if (!parsed) {
      await bot.sendMessage(message.chat.id, NOT_UNDERSTOOD_MESSAGE);
      return;
    }

    try {
      await bot.sendChatAction(message.chat.id, 'typing');
    } catch (error) {
      console.warn('[Message] Failed to send typing action:', errorMessage(error));
    }

    let replies: string[];
    try {
      const result = await translator.translate({ ...parsed });
      replies = formatMessageReply(parsed, result);
    } catch (error) {
      console.error('[Message] Translation failed:', errorMessage(error));
      replies = [formatErrorMessage(errorMessage(error))];
    }

    for (const reply of replies) {
      await bot.sendMessage(message.chat.id, reply);
    }
  }

  return async function handleUpdate(update: TelegramUpdate): Promise<void> {
    if (update.inline_query) {
      await handleInlineQuery(update.inline_query);
    } else if (update.message) {
      await handleMessage(update.message);
    }
  };
}
