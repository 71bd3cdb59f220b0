import { describe, it, expect } from 'vitest';
import {
  buildErrorCandidate,
  buildHelpCandidate,
  buildTranslationCandidates,
  formatHeader,
  formatMessageReply,
  formatSegmentsForDisplay,
  truncateDescription,
} from '../src/services/rendering.js';
import { LanguageCode } from '../src/types/index.js';
import type { ParsedQuery, TranslationResult } from '../src/types/index.js';

const query: ParsedQuery = {
  text: 'hello|world',
  sourceLang: LanguageCode.En,
  targetLang: LanguageCode.Zh,
};

function result(overrides: Partial<TranslationResult> = {}): TranslationResult {
  return {
    primaryText: '你好|世界',
    alternateTexts: [],
    providerLatencyMs: 12,
    ...overrides,
  };
}

describe('formatHeader', () => {
  it('upper-cases both codes', () => {
    expect(formatHeader(LanguageCode.Zh, LanguageCode.En)).toBe('🌐 ZH → EN');
  });
});

describe('formatSegmentsForDisplay', () => {
  it('puts each segment on its own line', () => {
    expect(formatSegmentsForDisplay(' a | b |  | c')).toBe('a\nb\nc');
  });
});

describe('truncateDescription', () => {
  it('collapses whitespace to one line', () => {
    expect(truncateDescription('  first\nsecond \t third ')).toBe('first second third');
  });

  it('keeps text of exactly 80 characters', () => {
    const text = 'x'.repeat(80);
    expect(truncateDescription(text)).toBe(text);
  });

  it('cuts longer text to 80 characters with an ellipsis', () => {
    const description = truncateDescription('x'.repeat(100));
    expect(description).toBe('x'.repeat(79) + '…');
    expect(Array.from(description)).toHaveLength(80);
  });

  it('counts multi-byte characters as one', () => {
    expect(truncateDescription('你'.repeat(81))).toBe('你'.repeat(79) + '…');
  });
});

describe('buildTranslationCandidates', () => {
  it('builds only the primary candidate for a plain result', () => {
    const candidates = buildTranslationCandidates(query, result());

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      title: '🌐 EN → ZH · Primary',
      messageText: '🌐 EN → ZH\n你好\n世界',
      description: '你好 世界',
    });
  });

  it('adds a romanized candidate when romanization is present', () => {
    const candidates = buildTranslationCandidates(query, result({ romanizedText: 'nǐ hǎo | shì jiè' }));

    expect(candidates.map(c => c.title)).toEqual(['🌐 EN → ZH · Primary', '🌐 EN → ZH · Romanized']);
    expect(candidates[1].messageText).toBe('🌐 EN → ZH\nnǐ hǎo\nshì jiè');
    expect(candidates[1].description).toBe('nǐ hǎo shì jiè');
  });

  it('lists at most three alternatives as bullets', () => {
    const candidates = buildTranslationCandidates(
      query,
      result({ alternateTexts: ['one', 'two|three', 'four', 'five'] })
    );

    expect(candidates).toHaveLength(2);
    expect(candidates[1]).toMatchObject({
      title: '🌐 EN → ZH · Alternatives',
      messageText: '🌐 EN → ZH\n• one\n• two\nthree\n• four',
      description: 'one',
    });
  });

  it('gives every candidate its own id', () => {
    const candidates = buildTranslationCandidates(
      query,
      result({ romanizedText: 'nǐ hǎo', alternateTexts: ['hi'] })
    );
    const ids = new Set(candidates.map(c => c.id));
    expect(ids.size).toBe(3);
  });
});

describe('buildHelpCandidate', () => {
  it('explains prefixes and segments', () => {
    const help = buildHelpCandidate(LanguageCode.En, LanguageCode.Zh, 'relaybot');
    const lines = help.messageText.split('\n');

    expect(help.title).toBe('How to translate');
    expect(help.description).toBe('Prefix with en>zh or zh>en, and use | to split sentences.');
    expect(lines[2]).toBe('• @relaybot en>zh: sustainability roadmap | 2025 goals');
    expect(lines[4]).toBe('Defaults to en→zh when not detectable.');
  });

  it('uses a placeholder handle when no username is configured', () => {
    const help = buildHelpCandidate(LanguageCode.Zh, LanguageCode.En);
    expect(help.messageText.split('\n')[3]).toBe('• @yourbot zh>en: 开会推迟到几点?');
  });
});

describe('buildErrorCandidate', () => {
  it('wraps the failure message', () => {
    expect(buildErrorCandidate('provider down')).toMatchObject({
      title: 'Translation failed',
      messageText: '⚠️ Translation failed: provider down',
      description: 'provider down',
    });
  });
});

describe('formatMessageReply', () => {
  it('returns the translation under a header', () => {
    expect(formatMessageReply(query, result({ primaryText: '你好' }))).toEqual(['🌐 EN → ZH\n\n你好']);
  });

  it('adds the romanization as a second reply', () => {
    expect(formatMessageReply(query, result({ primaryText: '你好', romanizedText: 'nǐ hǎo' }))).toEqual([
      '🌐 EN → ZH\n\n你好',
      'Romanized:\nnǐ hǎo',
    ]);
  });
});
