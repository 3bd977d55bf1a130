import { COMMON_FIRST_NAMES, MEETING_KEYWORDS, NON_NAME_WORDS } from '../../../config/parsing-config.js';

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

const NAME = String.raw`([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)`;

/**
 * Capitalized names next to a conjunction cue.
 * Cue words are matched in either case; names must be capitalized.
 */
const NAME_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\b[Ww]ith\s+${NAME}`, 'g'),
  new RegExp(String.raw`\b[Aa]nd\s+${NAME}`, 'g'),
  new RegExp(String.raw`${NAME}\s+and\b`, 'g'),
  new RegExp(String.raw`,\s*${NAME}`, 'g'),
];

const EXCLUDED_WORDS = new Set<string>([...NON_NAME_WORDS, ...MEETING_KEYWORDS]);

/**
 * Keep the leading run of words that can be part of a name.
 * "John Tomorrow" → "John", "Monday" → null
 */
function cleanName(candidate: string): string | null {
  const words = candidate.split(/\s+/);
  const kept: string[] = [];
  for (const word of words) {
    if (EXCLUDED_WORDS.has(word.toLowerCase())) break;
    kept.push(word);
  }
  return kept.length > 0 ? kept.join(' ') : null;
}

function pushUnique(target: string[], value: string): void {
  if (!target.includes(value)) {
    target.push(value);
  }
}

export function extractEmails(text: string): string[] {
  const emails: string[] = [];
  const seen = new Set<string>();
  for (const match of text.matchAll(EMAIL_PATTERN)) {
    const key = match[0].toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      emails.push(match[0]);
    }
  }
  return emails;
}

export function extractParticipantNames(text: string): string[] {
  // Email local parts must not be read as names
  const withoutEmails = text.replace(EMAIL_PATTERN, ' ');
  const names: string[] = [];

  for (const pattern of NAME_PATTERNS) {
    for (const match of withoutEmails.matchAll(pattern)) {
      const name = cleanName(match[1]);
      if (name) {
        pushUnique(names, name);
      }
    }
  }

  const dictionary = new Set<string>(COMMON_FIRST_NAMES);
  for (const rawWord of withoutEmails.split(/\s+/)) {
    const word = rawWord.replace(/^[^A-Za-z]+|[^A-Za-z]+$/g, '');
    if (!dictionary.has(word)) continue;
    const alreadyCovered = names.some(name => name.split(/\s+/).includes(word));
    if (!alreadyCovered) {
      names.push(word);
    }
  }

  return names;
}
