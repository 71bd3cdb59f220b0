import type {
  ProviderPayload,
  TranslationRequest,
  TranslationResult,
  Translator,
} from '../types/index.js';
import {
  TranslationDecodeError,
  TranslationNetworkError,
  TranslationProviderError,
} from '../errors/TranslationError.js';

const SYSTEM_PROMPT =
  'Translate src->tgt. JSON: {"t":"translation","r":"romanized_if_zh"}. No alternatives. No commentary.';

const COMPLETIONS_PATH = 'chat/completions';

export interface TranslationClientOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Defaults to the global fetch (shared undici connection pool) */
  fetch?: typeof fetch;
}

/**
 * Which decode tier produced the payload
 */
export type DecodedContent =
  | { kind: 'structured'; payload: ProviderPayload }
  | { kind: 'raw'; payload: ProviderPayload };

/**
 * Resolve the chat completions endpoint from the configured base URL.
 * "https://host/v1" and "https://host/v1/" both become "https://host/v1/chat/completions";
 * a URL already ending in /chat/completions is used as is.
 */
export function resolveEndpoint(apiUrl: string): URL {
  const url = new URL(apiUrl);
  if (url.pathname.endsWith(`/${COMPLETIONS_PATH}`)) {
    return url;
  }
  if (!url.pathname.endsWith('/')) {
    url.pathname += '/';
  }
  return new URL(COMPLETIONS_PATH, url);
}

export function buildUserPrompt(request: TranslationRequest): string {
  return `src=${request.sourceLang};tgt=${request.targetLang};text=${request.text}`;
}

/**
 * Cut the JSON object out of content that may carry prose or markdown fences.
 * Spans from the first "{" to the last "}"; the whole string when there is no object.
 */
export function extractJsonCandidate(content: string): string {
  const start = content.indexOf('{');
  if (start === -1) {
    return content;
  }
  const end = content.lastIndexOf('}');
  if (end < start) {
    return content;
  }
  return content.slice(start, end + 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(record: Record<string, unknown>, long: string, short: string): unknown {
  return record[long] !== undefined ? record[long] : record[short];
}

/**
 * Read a provider payload, accepting long keys (translation/alternatives/romanized)
 * or their short aliases (t/a/r). Returns null when the shape does not match.
 */
export function toProviderPayload(value: unknown): ProviderPayload | null {
  if (!isRecord(value)) return null;

  const translation = pick(value, 'translation', 't');
  if (typeof translation !== 'string') return null;

  const payload: ProviderPayload = { translation };

  const alternatives = pick(value, 'alternatives', 'a');
  if (alternatives !== undefined && alternatives !== null) {
    if (!Array.isArray(alternatives)) return null;
    const texts: string[] = [];
    for (const item of alternatives) {
      if (typeof item !== 'string') return null;
      texts.push(item);
    }
    payload.alternatives = texts;
  }

  const romanized = pick(value, 'romanized', 'r');
  if (romanized !== undefined && romanized !== null) {
    if (typeof romanized !== 'string') return null;
    payload.romanized = romanized;
  }

  return payload;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Decode the model's message content in two tiers:
 * 1. structured payload parsed from the embedded JSON object
 * 2. the whole content, trimmed, as the translation
 */
export function decodeProviderContent(content: string): DecodedContent {
  const parsed = parseJson(extractJsonCandidate(content));
  const payload = parsed.ok ? toProviderPayload(parsed.value) : null;

  if (payload) {
    return { kind: 'structured', payload };
  }

  return { kind: 'raw', payload: { translation: content.trim() } };
}

/**
 * Pull choices[0].message.content out of a chat completions envelope
 */
export function extractMessageContent(envelope: unknown): string | null {
  if (!isRecord(envelope) || !Array.isArray(envelope.choices)) return null;
  const choice: unknown = envelope.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return null;
  const content = choice.message.content;
  return typeof content === 'string' ? content : null;
}

function describeFetchError(error: unknown, timeoutMs: number): TranslationNetworkError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new TranslationNetworkError(`timed out after ${timeoutMs}ms`, true);
  }
  if (error instanceof Error) {
    // undici wraps the socket error as `cause`
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return new TranslationNetworkError(`${error.message}${cause}`);
  }
  return new TranslationNetworkError(String(error));
}

/**
 * Client for an OpenAI-compatible chat completions endpoint.
 * Holds only read-only configuration, so one instance serves concurrent calls.
 */
export class TranslationClient implements Translator {
  readonly endpoint: URL;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TranslationClientOptions) {
    this.endpoint = resolveEndpoint(options.apiUrl);
    this.fetchImpl = options.fetch ?? fetch;
  }

  async translate(request: TranslationRequest): Promise<TranslationResult> {
    const startedAt = Date.now();
    const { timeoutMs } = this.options;

    // One signal bounds the whole exchange, body included
    const signal = AbortSignal.timeout(timeoutMs);

    let envelope: unknown;
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          temperature: 0,
          messages: [
            {
              role: 'system',
              content: SYSTEM_PROMPT,
            },
            {
              role: 'user',
              content: buildUserPrompt(request),
            },
          ],
        }),
        signal,
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => '');
        throw new TranslationProviderError(response.status, errorBody);
      }

      const body = await response.text();
      const parsed = parseJson(body);
      if (!parsed.ok) {
        throw new TranslationDecodeError('Provider response is not valid JSON');
      }
      envelope = parsed.value;
    } catch (error) {
      if (error instanceof TranslationProviderError || error instanceof TranslationDecodeError) {
        throw error;
      }
      throw describeFetchError(error, timeoutMs);
    }

    const content = extractMessageContent(envelope);
    if (content === null) {
      throw new TranslationDecodeError('Provider response missing content');
    }

    const decoded = decodeProviderContent(content);
    if (decoded.kind === 'raw') {
      console.warn('[Translator] Failed to parse JSON from provider, using raw content as translation');
    }

    const romanized = decoded.payload.romanized;

    return {
      primaryText: decoded.payload.translation,
      // Alternatives are never requested; drop any the model volunteers
      alternateTexts: [],
      ...(romanized !== undefined && romanized.trim() !== '' ? { romanizedText: romanized } : {}),
      providerLatencyMs: Math.max(0, Date.now() - startedAt),
    };
  }
}
