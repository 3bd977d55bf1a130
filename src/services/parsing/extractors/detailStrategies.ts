import {
  DESCRIPTION_MIN_LENGTH,
  MEETING_KEYWORDS,
  TITLE_FALLBACK_WORDS,
} from '../../../config/parsing-config.js';
import type { MentionedPriority } from '../../../types/index.js';
import { TextUtils } from '../../../utils/text.js';
import type { ExtractionStrategy } from '../types.js';

// ============================================================================
// PRIORITY
// ============================================================================

function keywordPriority(name: string, pattern: RegExp, priority: MentionedPriority): ExtractionStrategy<MentionedPriority> {
  return {
    name,
    extract: (text: string) => (pattern.test(text) ? priority : null),
  };
}

export const PRIORITY_STRATEGIES: readonly ExtractionStrategy<MentionedPriority>[] = [
  keywordPriority('urgent_keywords', /\b(?:urgent|asap|immediately|critical)\b/i, 'urgent'),
  keywordPriority('high_priority', /\b(?:high|important)\s*priority\b/i, 'high'),
  keywordPriority('low_priority', /\b(?:low|normal)\s*priority\b/i, 'low'),
];

// ============================================================================
// TITLE
// ============================================================================

export const quotedTitleStrategy: ExtractionStrategy<string> = {
  name: 'quoted_title',
  extract(text: string): string | null {
    const match = text.match(/"([^"]*)"/);
    if (!match) return null;
    const title = match[1].trim();
    return title.length > 0 ? title : null;
  },
};

/**
 * One word either side of the first meeting keyword: "a quick sync on" → "A Quick Sync"
 */
export const keywordWindowTitleStrategy: ExtractionStrategy<string> = {
  name: 'keyword_window_title',
  extract(text: string): string | null {
    for (const keyword of MEETING_KEYWORDS) {
      const match = text.match(new RegExp(String.raw`(?:\w+\s+)?\b${keyword}\b(?:\s+\w+)?`, 'i'));
      if (!match) continue;
      const title = match[0].trim();
      if (title.length > 5) {
        return TextUtils.titleCase(title);
      }
    }
    return null;
  },
};

export const leadingWordsTitleStrategy: ExtractionStrategy<string> = {
  name: 'leading_words_title',
  extract(text: string): string | null {
    const words = text.trim().split(/\s+/).slice(0, TITLE_FALLBACK_WORDS);
    return words.length >= 2 ? TextUtils.titleCase(words.join(' ')) : null;
  },
};

export const TITLE_STRATEGIES: readonly ExtractionStrategy<string>[] = [
  quotedTitleStrategy,
  keywordWindowTitleStrategy,
  leadingWordsTitleStrategy,
];

// ============================================================================
// DESCRIPTION & KEYWORDS
// ============================================================================

export function extractDescription(text: string): string | null {
  return text.length > DESCRIPTION_MIN_LENGTH ? text : null;
}

export function countMeetingKeywords(text: string): number {
  return MEETING_KEYWORDS.filter(keyword => new RegExp(String.raw`\b${keyword}\b`, 'i').test(text)).length;
}
