/**
 * Supported language codes. Exactly two: every consumer assumes en/zh.
 */
export const LanguageCode = {
  En: 'en',
  Zh: 'zh',
} as const;

export type LanguageCode = (typeof LanguageCode)[keyof typeof LanguageCode];

/**
 * Parse a two-letter code case-insensitively.
 * Returns null for anything other than en/zh.
 */
export function parseLanguageCode(value: string): LanguageCode | null {
  switch (value.trim().toLowerCase()) {
    case 'en':
      return LanguageCode.En;
    case 'zh':
      return LanguageCode.Zh;
    default:
      return null;
  }
}

/**
 * Normalized query produced by the interpreter
 */
export interface ParsedQuery {
  text: string;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
}

/**
 * Input to the translation client
 */
export interface TranslationRequest {
  text: string;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
}

/**
 * Structured translation returned by the client
 */
export interface TranslationResult {
  readonly primaryText: string;
  readonly alternateTexts: readonly string[];
  /** Only present when non-blank */
  readonly romanizedText?: string;
  readonly providerLatencyMs: number;
}

/**
 * Decoded shape of the provider's JSON answer (long or short keys)
 */
export interface ProviderPayload {
  translation: string;
  alternatives?: string[];
  romanized?: string;
}

/**
 * Anything that can translate a request (the real client or a test fake)
 */
export interface Translator {
  translate(request: TranslationRequest): Promise<TranslationResult>;
}

/**
 * A single inline result shown to the user
 */
export interface DisplayCandidate {
  id: string;
  title: string;
  messageText: string;
  description: string;
}

/**
 * Request body for POST /translate
 */
export interface TranslateRequestBody {
  text: string;
  /** Direction used when neither a prefix nor detection decides */
  defaultSource?: string;
  defaultTarget?: string;
}

/**
 * Response for POST /translate
 */
export interface TranslateResponse {
  query: ParsedQuery;
  result: TranslationResult;
}
