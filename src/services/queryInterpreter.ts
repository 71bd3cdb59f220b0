/**
 * Query interpretation: turns free-form chat input into a normalized
 * translation query.
 *
 * Direction comes from an explicit prefix ("en>zh:", "zh -> en") when present,
 * otherwise from script-based auto-detection:
 * 1. Any CJK character means Chinese -> English
 * 2. franc trigram detection (English or Mandarin)
 * 3. Any Latin letter means English -> Chinese
 * 4. The caller's defaults
 */

import { franc } from 'franc';
import { LanguageCode, parseLanguageCode } from '../types/index.js';
import type { ParsedQuery } from '../types/index.js';

export const SEGMENT_DELIMITER = '|';
export const MAX_TEXT_LENGTH = 2048;

// e.g. "en>zh:", "ZH -> en", "en->zh"
const DIRECTION_PREFIX_REGEX = /^(en|zh)\s*(?:>|->)\s*(en|zh)\s*:?/i;

// CJK symbols/punctuation, kana, extension A, unified ideographs, compatibility ideographs
const CJK_CHAR_REGEX = /[\u3000-\u303f\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/;

const LATIN_LETTER_REGEX = /[a-zA-Z]/;

type Direction = [source: LanguageCode, target: LanguageCode];

/**
 * Language of the text according to franc, limited to the two we support.
 * franc answers "und" for text too short to call.
 */
export function detectLanguage(text: string): LanguageCode | null {
  switch (franc(text)) {
    case 'eng':
      return LanguageCode.En;
    case 'cmn':
      return LanguageCode.Zh;
    default:
      return null;
  }
}

export function detectDirection(
  text: string,
  defaultSource: LanguageCode,
  defaultTarget: LanguageCode
): Direction {
  // Typing Chinese almost always means "translate this to English"
  if (CJK_CHAR_REGEX.test(text)) {
    return [LanguageCode.Zh, LanguageCode.En];
  }

  const detected = detectLanguage(text);
  if (detected === LanguageCode.En) {
    return [LanguageCode.En, LanguageCode.Zh];
  }
  if (detected === LanguageCode.Zh) {
    return [LanguageCode.Zh, LanguageCode.En];
  }

  // Short words and slang are rarely detected; Latin script still reads as English
  if (LATIN_LETTER_REGEX.test(text)) {
    return [LanguageCode.En, LanguageCode.Zh];
  }

  return [defaultSource, defaultTarget];
}

/**
 * Truncate to a number of Unicode code points (never splits a surrogate pair)
 */
export function truncateChars(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join('') : text;
}

/**
 * Split on "|", trim each segment, drop empty ones and rejoin.
 */
export function normalizeSegments(raw: string): string {
  return splitSegments(raw).join(SEGMENT_DELIMITER);
}

export function splitSegments(raw: string): string[] {
  return raw
    .split(SEGMENT_DELIMITER)
    .map(segment => segment.trim())
    .filter(segment => segment !== '');
}

/**
 * Interpret raw input as a translation query.
 *
 * @returns The normalized query, or null when nothing translatable remains
 */
export function interpret(
  raw: string,
  defaultSource: LanguageCode,
  defaultTarget: LanguageCode
): ParsedQuery | null {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }

  let direction: Direction;
  let candidate: string;

  const match = DIRECTION_PREFIX_REGEX.exec(trimmed);
  const source = match ? parseLanguageCode(match[1]) : null;
  const target = match ? parseLanguageCode(match[2]) : null;

  if (match && source && target) {
    direction = [source, target];
    candidate = trimmed.slice(match[0].length).trim();
  } else {
    direction = detectDirection(trimmed, defaultSource, defaultTarget);
    candidate = trimmed;
  }

  const text = normalizeSegments(truncateChars(candidate, MAX_TEXT_LENGTH));
  if (text === '') {
    return null;
  }

  return {
    text,
    sourceLang: direction[0],
    targetLang: direction[1],
  };
}
