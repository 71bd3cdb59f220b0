/**
 * Display formatting for translation results, help and errors.
 * Shared by the inline-query and direct-message paths.
 */

import { v4 as uuidv4 } from 'uuid';
import { SEGMENT_DELIMITER, splitSegments } from './queryInterpreter.js';
import type {
  DisplayCandidate,
  LanguageCode,
  ParsedQuery,
  TranslationResult,
} from '../types/index.js';

export const DESCRIPTION_MAX_LENGTH = 80;
export const MAX_ALTERNATIVES_SHOWN = 3;

/**
 * "🌐 EN → ZH"
 */
export function formatHeader(source: LanguageCode, target: LanguageCode): string {
  return `🌐 ${source.toUpperCase()} → ${target.toUpperCase()}`;
}

/**
 * One line per "|" segment
 */
export function formatSegmentsForDisplay(value: string): string {
  return splitSegments(value).join('\n');
}

/**
 * Collapse whitespace to single spaces and cap at `max` characters,
 * ending in an ellipsis when cut.
 */
export function truncateDescription(text: string, max = DESCRIPTION_MAX_LENGTH): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  const chars = Array.from(singleLine);
  if (chars.length <= max) {
    return singleLine;
  }
  return chars.slice(0, max - 1).join('') + '…';
}

function candidate(title: string, messageText: string, description: string): DisplayCandidate {
  return {
    id: uuidv4(),
    title,
    messageText,
    description: truncateDescription(description),
  };
}

/**
 * Build the inline results for a successful translation:
 * primary, then romanized and alternatives when available.
 */
export function buildTranslationCandidates(
  query: ParsedQuery,
  result: TranslationResult
): DisplayCandidate[] {
  const header = formatHeader(query.sourceLang, query.targetLang);
  const primaryDisplay = formatSegmentsForDisplay(result.primaryText);

  const candidates: DisplayCandidate[] = [
    candidate(`${header} · Primary`, `${header}\n${primaryDisplay}`, primaryDisplay),
  ];

  if (result.romanizedText !== undefined) {
    const romanizedDisplay = formatSegmentsForDisplay(result.romanizedText);
    candidates.push(
      candidate(`${header} · Romanized`, `${header}\n${romanizedDisplay}`, romanizedDisplay)
    );
  }

  if (result.alternateTexts.length > 0) {
    const samples = result.alternateTexts
      .slice(0, MAX_ALTERNATIVES_SHOWN)
      .map(formatSegmentsForDisplay);
    const bullets = samples.map(line => `• ${line}`).join('\n');
    candidates.push(
      candidate(`${header} · Alternatives`, `${header}\n${bullets}`, samples[0])
    );
  }

  return candidates;
}

export function buildHelpText(
  defaultSource: LanguageCode,
  defaultTarget: LanguageCode,
  botUsername = ''
): string {
  const handle = botUsername ? `@${botUsername.replace(/^@/, '')}` : '@yourbot';
  return [
    `Type something after the bot handle. Use "${SEGMENT_DELIMITER}" to separate segments when you want grouped translations (topic | detail).`,
    'Examples:',
    `• ${handle} en>zh: sustainability roadmap | 2025 goals`,
    `• ${handle} zh>en: 开会推迟到几点?`,
    `Defaults to ${defaultSource}→${defaultTarget} when not detectable.`,
  ].join('\n');
}

/**
 * Shown when the query could not be interpreted
 */
export function buildHelpCandidate(
  defaultSource: LanguageCode,
  defaultTarget: LanguageCode,
  botUsername = ''
): DisplayCandidate {
  return candidate(
    'How to translate',
    buildHelpText(defaultSource, defaultTarget, botUsername),
    'Prefix with en>zh or zh>en, and use | to split sentences.'
  );
}

export function formatErrorMessage(message: string): string {
  return `⚠️ Translation failed: ${message}`;
}

/**
 * Shown when the translation call failed
 */
export function buildErrorCandidate(message: string): DisplayCandidate {
  return candidate('Translation failed', formatErrorMessage(message), message);
}

/**
 * Reply texts for a direct message, in sending order
 */
export function formatMessageReply(query: ParsedQuery, result: TranslationResult): string[] {
  const header = formatHeader(query.sourceLang, query.targetLang);
  const replies = [`${header}\n\n${result.primaryText}`];
  if (result.romanizedText !== undefined) {
    replies.push(`Romanized:\n${result.romanizedText}`);
  }
  return replies;
}
