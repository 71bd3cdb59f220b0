import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, type Mock } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../src/app.js';
import { SECRET_HEADER } from '../src/routes/telegram.js';
import { TranslationProviderError } from '../src/errors/TranslationError.js';
import { LanguageCode } from '../src/types/index.js';
import type { TranslationRequest, TranslationResult } from '../src/types/index.js';
import type { TelegramUpdate } from '../src/types/telegram.js';

describe('HTTP app', () => {
  const translate = vi.fn<(request: TranslationRequest) => Promise<TranslationResult>>();
  const handleUpdate: Mock<(update: TelegramUpdate) => Promise<void>> = vi.fn();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const app = createApp({
      translator: { translate },
      handleUpdate,
      defaultSource: LanguageCode.En,
      defaultTarget: LanguageCode.Zh,
      webhookSecret: 'test-secret',
      maxTextLength: 100,
    });

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
  });

  beforeEach(() => {
    translate.mockReset();
    handleUpdate.mockReset();
  });

  function post(path: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  it('answers the health check', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', message: 'Translation relay is running' });
  });

  describe('POST /translate', () => {
    it('returns the interpreted query and the result', async () => {
      const result: TranslationResult = { primaryText: '你好', alternateTexts: [], providerLatencyMs: 8 };
      translate.mockResolvedValue(result);

      const response = await post('/translate', { text: 'hello' });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        query: { text: 'hello', sourceLang: 'en', targetLang: 'zh' },
        result,
      });
    });

    it('uses the fallback direction from the body', async () => {
      translate.mockResolvedValue({ primaryText: '12345', alternateTexts: [], providerLatencyMs: 1 });

      await post('/translate', { text: '12345', defaultSource: 'zh', defaultTarget: 'en' });

      expect(translate).toHaveBeenCalledWith({ text: '12345', sourceLang: 'zh', targetLang: 'en' });
    });

    it('rejects malformed JSON', async () => {
      const response = await fetch(`${baseUrl}/translate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"text": ',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: 'Error' });
    });

    it('rejects a missing text', async () => {
      const response = await post('/translate', {});

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Bad Request',
        message: 'Missing or invalid "text" in request body',
      });
    });

    it('rejects text over the length limit', async () => {
      const response = await post('/translate', { text: 'a'.repeat(101) });

      expect(response.status).toBe(400);
    });

    it('rejects unsupported language codes', async () => {
      const response = await post('/translate', { text: 'hi', defaultSource: 'fr', defaultTarget: 'en' });

      expect(response.status).toBe(400);
      expect(translate).not.toHaveBeenCalled();
    });

    it('answers 422 when nothing is left to translate', async () => {
      const response = await post('/translate', { text: ' | | ' });
      expect(response.status).toBe(422);
      expect(await response.json()).toMatchObject({ message: 'Nothing to translate' });
      expect(translate).not.toHaveBeenCalled();
    });

    it('answers 502 when the provider fails', async () => {
      translate.mockRejectedValue(new TranslationProviderError(503, 'down'));

      const response = await post('/translate', { text: 'hello' });

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({
        error: 'Bad Gateway',
        code: 'TRANSLATION_002',
        message: 'Translation provider failed (503): down',
      });
    });
  });

  describe('POST /telegram/webhook', () => {
    const update: TelegramUpdate = {
      update_id: 99,
      inline_query: { id: 'q', from: { id: 1, is_bot: false, first_name: 'Test' }, query: 'hi', offset: '' },
    };

    it('rejects requests without the secret', async () => {
      const response = await post('/telegram/webhook', update);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: 'Error', message: 'Invalid webhook secret' });
      expect(handleUpdate).not.toHaveBeenCalled();
    });

    it('rejects a wrong secret', async () => {
      const response = await post('/telegram/webhook', update, { [SECRET_HEADER]: 'wrong-secret' });

      expect(response.status).toBe(401);
    });

    it('dispatches a verified update', async () => {
      handleUpdate.mockResolvedValue(undefined);

      const response = await post('/telegram/webhook', update, { [SECRET_HEADER]: 'test-secret' });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ ok: true });
      expect(handleUpdate).toHaveBeenCalledWith(update);
    });

    it('acknowledges an update whose handling failed', async () => {
      handleUpdate.mockRejectedValue(new Error('Telegram down'));

      const response = await post('/telegram/webhook', update, { [SECRET_HEADER]: 'test-secret' });

      expect(response.status).toBe(200);
    });

    it('rejects a body that is not an update', async () => {
      const response = await post('/telegram/webhook', { hello: 'world' }, { [SECRET_HEADER]: 'test-secret' });

      expect(response.status).toBe(400);
      expect(handleUpdate).not.toHaveBeenCalled();
    });
  });
});
