/**
 * Parsing Configuration
 * Keyword lists and confidence weights used by the request parser
 */

export const MEETING_KEYWORDS = [
  'meeting',
  'call',
  'sync',
  'standup',
  'review',
  'discussion',
  'session',
  'presentation',
  'demo',
  'interview',
  'chat',
] as const;

/**
 * First names recognized even without a "with"/"and" cue
 */
export const COMMON_FIRST_NAMES = [
  'John', 'Jane', 'Mike', 'Sarah', 'David', 'Emily', 'Chris', 'Lisa',
  'James', 'Maria', 'Robert', 'Jennifer', 'Michael', 'Amy', 'Daniel',
  'Jessica', 'Matthew', 'Ashley', 'Andrew', 'Amanda',
] as const;

/**
 * Capitalized words that are never participant names
 */
export const NON_NAME_WORDS = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
  'january', 'february', 'march', 'april', 'may', 'june', 'july', 'august',
  'september', 'october', 'november', 'december',
  'today', 'tomorrow', 'yesterday', 'next', 'this',
  'schedule', 'book', 'set', 'setup', 'arrange', 'plan', 'please', 'can', 'could',
  'i', 'we', 'me', 'us', 'a', 'an', 'the', 'at', 'on', 'for', 'to', 'and', 'with',
  'am', 'pm', 'urgent', 'asap', 'high', 'low', 'priority', 'team',
] as const;

export const CONFIDENCE_WEIGHTS = {
  BASE: 0.1,
  PARTICIPANTS: 0.3,
  DATE: 0.2,
  TIME: 0.2,
  DURATION: 0.1,
  TITLE: 0.1,
  PER_KEYWORD: 0.05,
  KEYWORD_CAP: 0.15,
  /** Floor applied when scoring itself fails */
  FAILURE_FLOOR: 0.1,
} as const;

/**
 * Requests scored below this are treated as not understood
 */
export const MIN_UNDERSTOOD_CONFIDENCE = 0.3;

export const DESCRIPTION_MIN_LENGTH = 20;

export const TITLE_FALLBACK_WORDS = 5;

/**
 * Canonical duration labels keyed by total minutes
 */
export const CANONICAL_DURATIONS: ReadonlyMap<number, string> = new Map([
  [15, '15 minutes'],
  [30, '30 minutes'],
  [45, '45 minutes'],
  [60, '1 hour'],
  [90, '1.5 hours'],
  [120, '2 hours'],
  [150, '2.5 hours'],
  [180, '3 hours'],
]);
