/**
 * Telegram Bot API client over fetch
 */

import { isTelegramUpdate } from '../types/telegram.js';
import type { InlineQueryResultArticle, TelegramUpdate } from '../types/telegram.js';
import type { DisplayCandidate } from '../types/index.js';

const FETCH_TIMEOUT = 10000; // 10 seconds

// Long polling holds the request open server-side for this long
export const POLL_TIMEOUT_SECONDS = 30;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class TelegramApiError extends Error {
  constructor(
    public readonly method: string,
    message: string,
    public readonly errorCode?: number
  ) {
    super(`Telegram API error in ${method}: ${message}`);
    this.name = 'TelegramApiError';
  }
}

/**
 * The Bot API calls the update handler needs
 */
export interface BotApi {
  answerInlineQuery(inlineQueryId: string, candidates: DisplayCandidate[]): Promise<void>;
  sendMessage(chatId: number, text: string): Promise<void>;
  sendChatAction(chatId: number, action: 'typing'): Promise<void>;
}

export interface TelegramApiOptions {
  token: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

export function toInlineArticle(candidate: DisplayCandidate): InlineQueryResultArticle {
  return {
    type: 'article',
    id: candidate.id,
    title: candidate.title,
    description: candidate.description,
    input_message_content: {
      message_text: candidate.messageText,
    },
  };
}

export class TelegramApi implements BotApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TelegramApiOptions) {
    this.baseUrl = `${options.baseUrl ?? 'https://api.telegram.org'}/bot${options.token}`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Call a Bot API method and return its `result` unchecked.
   * Throws TelegramApiError when Telegram answers `ok: false`.
   */
  async call(
    method: string,
    payload: Record<string, unknown>,
    { timeoutMs = FETCH_TIMEOUT, signal }: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(timeoutMs);
    const response = await this.fetchImpl(`${this.baseUrl}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    const parsed = parseBody(await response.text());
    if (!parsed.ok) {
      throw new TelegramApiError(method, `HTTP ${response.status}`);
    }
    const body = parsed.value;

    if (!isRecord(body) || body.ok !== true) {
      const description =
        isRecord(body) && typeof body.description === 'string' ? body.description : `HTTP ${response.status}`;
      const errorCode = isRecord(body) && typeof body.error_code === 'number' ? body.error_code : undefined;
      throw new TelegramApiError(method, description, errorCode);
    }

    return body.result;
  }

  async answerInlineQuery(inlineQueryId: string, candidates: DisplayCandidate[]): Promise<void> {
    await this.call('answerInlineQuery', {
      inline_query_id: inlineQueryId,
      results: candidates.map(toInlineArticle),
      cache_time: 0,
      is_personal: true,
    });
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.call('sendMessage', { chat_id: chatId, text });
  }

  async sendChatAction(chatId: number, action: 'typing'): Promise<void> {
    await this.call('sendChatAction', { chat_id: chatId, action });
  }

  async getUpdates(offset: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const result = await this.call(
      'getUpdates',
      {
        offset,
        timeout: POLL_TIMEOUT_SECONDS,
        allowed_updates: ['message', 'inline_query'],
      },
      { timeoutMs: (POLL_TIMEOUT_SECONDS + 10) * 1000, signal }
    );

    if (!Array.isArray(result)) {
      throw new TelegramApiError('getUpdates', 'result is not a list of updates');
    }
    return result.filter(isTelegramUpdate);
  }

  async setWebhook(url: string, secretToken: string): Promise<void> {
    await this.call('setWebhook', {
      url,
      allowed_updates: ['message', 'inline_query'],
      ...(secretToken ? { secret_token: secretToken } : {}),
    });
  }

  async deleteWebhook(): Promise<void> {
    await this.call('deleteWebhook', { drop_pending_updates: false });
  }
}

function parseBody(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}
