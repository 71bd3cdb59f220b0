/**
 * Error codes for translation errors.
 * Using unique string codes for programmatic identification.
 */
export const TranslationErrorCode = {
  NETWORK: 'TRANSLATION_001',
  PROVIDER_STATUS: 'TRANSLATION_002',
  DECODE: 'TRANSLATION_003',
} as const;

export type TranslationErrorCodeType =
  (typeof TranslationErrorCode)[keyof typeof TranslationErrorCode];

/**
 * Base error class for failures of the translation client.
 */
export class TranslationError extends Error {
  readonly code: TranslationErrorCodeType;

  constructor(
    code: TranslationErrorCodeType,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.code = code;
    this.name = 'TranslationError';
  }
}

/**
 * The exchange could not complete: connection failure or timeout.
 */
export class TranslationNetworkError extends TranslationError {
  constructor(reason: string, public readonly timedOut = false) {
    super(TranslationErrorCode.NETWORK, `Translation request failed: ${reason}`, { reason, timedOut });
    this.name = 'TranslationNetworkError';
  }
}

/**
 * The provider answered with a non-2xx status.
 */
export class TranslationProviderError extends TranslationError {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(
      TranslationErrorCode.PROVIDER_STATUS,
      `Translation provider failed (${status}): ${body}`,
      { status, body }
    );
    this.name = 'TranslationProviderError';
  }
}

/**
 * The provider envelope could not be read or had no message content.
 */
export class TranslationDecodeError extends TranslationError {
  constructor(reason: string) {
    super(TranslationErrorCode.DECODE, reason, { reason });
    this.name = 'TranslationDecodeError';
  }
}
