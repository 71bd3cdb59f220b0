import 'dotenv/config';
import { LanguageCode, parseLanguageCode } from '../types/index.js';

export interface AppConfig {
  port: number;

  // Telegram bot settings
  telegram: {
    botToken: string;
    // Public HTTPS URL for webhook mode; long polling when empty
    webhookUrl: string;
    webhookSecret: string;
    botUsername: string;
    apiBaseUrl: string;
  };

  // Translation provider (OpenAI-compatible chat completions)
  translation: {
    apiUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
  };

  languages: {
    defaultSource: LanguageCode;
    defaultTarget: LanguageCode;
  };

  // Input validation for POST /translate
  validation: {
    maxTextLength: number;
  };
}

type Env = Record<string, string | undefined>;

// Largest delay a Node timer accepts; longer ones fire after 1ms
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

function readLanguage(env: Env, key: string, fallback: string, errors: string[]): LanguageCode {
  const raw = env[key] || fallback;
  const code = parseLanguageCode(raw);
  if (code === null) {
    errors.push(`Invalid ${key}: "${raw}" (expected en or zh)`);
    return parseLanguageCode(fallback) ?? LanguageCode.En;
  }
  return code;
}

function readTimeout(env: Env, errors: string[]): number {
  const raw = env.HTTP_TIMEOUT_MS || '15000';
  if (!/^\d+$/.test(raw.trim())) {
    errors.push('HTTP_TIMEOUT_MS must be a number');
    return 15000;
  }
  const timeoutMs = parseInt(raw, 10);
  if (timeoutMs > MAX_TIMEOUT_MS) {
    errors.push(`HTTP_TIMEOUT_MS must be at most ${MAX_TIMEOUT_MS}`);
    return 15000;
  }
  return timeoutMs;
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the configuration from environment variables.
 * Collects every problem instead of stopping at the first one.
 */
export function readConfig(env: Env = process.env): { config: AppConfig; errors: string[] } {
  const errors: string[] = [];

  const required = (key: string): string => {
    const value = env[key]?.trim() || '';
    if (!value) {
      errors.push(`${key} must be set`);
    }
    return value;
  };

  const botToken = required('BOT_TOKEN');
  const apiUrl = required('TRANSLATION_API_URL');
  const apiKey = required('TRANSLATION_API_KEY');
  const model = required('TRANSLATION_MODEL');

  if (apiUrl && !isValidUrl(apiUrl)) {
    errors.push(`TRANSLATION_API_URL is not a valid URL: ${apiUrl}`);
  }

  const webhookUrl = env.TELEGRAM_WEBHOOK_URL?.trim() || '';
  if (webhookUrl && !isValidUrl(webhookUrl)) {
    errors.push(`TELEGRAM_WEBHOOK_URL is not a valid URL: ${webhookUrl}`);
  }

  const config: AppConfig = {
    port: parseInt(env.PORT || '5000', 10),
    telegram: {
      botToken,
      webhookUrl,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET?.trim() || '',
      botUsername: env.BOT_USERNAME?.trim() || '',
      apiBaseUrl: 'https://api.telegram.org',
    },
    translation: {
      apiUrl,
      apiKey,
      model,
      timeoutMs: readTimeout(env, errors),
    },
    languages: {
      defaultSource: readLanguage(env, 'DEFAULT_SOURCE_LANG', 'en', errors),
      defaultTarget: readLanguage(env, 'DEFAULT_TARGET_LANG', 'zh', errors),
    },
    validation: {
      maxTextLength: 4096,
    },
  };

  return { config, errors };
}

/**
 * Validate required configuration at startup.
 * Exits the process if critical configuration is missing.
 */
export function validateConfig(env: Env = process.env): AppConfig {
  const { config, errors } = readConfig(env);

  if (!config.telegram.webhookUrl) {
    console.warn('Note: TELEGRAM_WEBHOOK_URL not set. Updates will be fetched by long polling.');
  } else if (!config.telegram.webhookSecret) {
    console.warn('WARNING: TELEGRAM_WEBHOOK_SECRET not set. Webhook requests will not be verified.');
  }

  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach(err => console.error(`  - ${err}`));
    console.error('\nPlease set the required environment variables in .env');
    process.exit(1);
  }

  console.log('Configuration validated successfully');
  return config;
}
