import { addDays, isBefore, startOfDay } from 'date-fns';
import type { DateKey } from '../../../types/index.js';
import { makeDate, toDateKey } from '../../../utils/time.js';
import type { ExtractionContext, ExtractionStrategy } from '../types.js';

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
] as const;

const RELATIVE_OFFSETS: Record<string, number> = {
  today: 0,
  tomorrow: 1,
  yesterday: -1,
};

/**
 * Days until the next `targetDay`; the same weekday as today means next week
 */
function nextOccurrence(reference: Date, targetDay: number): DateKey {
  const daysAhead = (targetDay - reference.getDay() + 7) % 7 || 7;
  return toDateKey(addDays(startOfDay(reference), daysAhead));
}

export const relativeDayStrategy: ExtractionStrategy<DateKey> = {
  name: 'relative_day',
  extract(text: string, { referenceDate }: ExtractionContext): DateKey | null {
    const match = text.match(/\b(today|tomorrow|yesterday)\b/i);
    if (!match) return null;
    const offset = RELATIVE_OFFSETS[match[1].toLowerCase()];
    return toDateKey(addDays(startOfDay(referenceDate), offset));
  },
};

export const bareWeekdayStrategy: ExtractionStrategy<DateKey> = {
  name: 'bare_weekday',
  extract(text: string, { referenceDate }: ExtractionContext): DateKey | null {
    const match = text.match(
      /(?<!\b(?:next|this)\s+)\b(sunday|monday|tuesday|wednesday|thursday|friday|saturday)\b/i
    );
    if (!match) return null;
    const day = WEEKDAYS.findIndex(name => name === match[1].toLowerCase());
    return nextOccurrence(referenceDate, day);
  },
};

export const qualifiedWeekdayStrategy: ExtractionStrategy<DateKey> = {
  name: 'qualified_weekday',
  extract(text: string, { referenceDate }: ExtractionContext): DateKey | null {
    const match = text.match(
      /\b(?:next|this)\s+(sunday|monday|tuesday|wednesday|thursday|friday|saturday)\b/i
    );
    if (!match) return null;
    const day = WEEKDAYS.findIndex(name => name === match[1].toLowerCase());
    return nextOccurrence(referenceDate, day);
  },
};

/**
 * "March 5" → this year, or next year when that day has already passed
 */
export const monthDayStrategy: ExtractionStrategy<DateKey> = {
  name: 'month_day',
  extract(text: string, { referenceDate }: ExtractionContext): DateKey | null {
    const pattern = new RegExp(`\\b(${MONTHS.join('|')})\\s+(\\d{1,2})\\b`, 'i');
    const match = text.match(pattern);
    if (!match) return null;

    const month = MONTHS.findIndex(name => name === match[1].toLowerCase()) + 1;
    const day = parseInt(match[2], 10);
    const today = startOfDay(referenceDate);

    const thisYear = makeDate(today.getFullYear(), month, day);
    if (!thisYear) return null;
    if (isBefore(thisYear, today)) {
      const nextYear = makeDate(today.getFullYear() + 1, month, day);
      return nextYear ? toDateKey(nextYear) : null;
    }
    return toDateKey(thisYear);
  },
};

/**
 * "3/14", "3-14-27", "3/14/2027". Never matches "1/2 hour".
 */
export const numericDateStrategy: ExtractionStrategy<DateKey> = {
  name: 'numeric_date',
  extract(text: string, { referenceDate }: ExtractionContext): DateKey | null {
    const match = text.match(/\b(\d{1,2})[/-](\d{1,2})(?:[/-](\d{4}|\d{2}))?\b(?!\s*(?:an\s+)?hours?\b)/i);
    if (!match) return null;

    const month = parseInt(match[1], 10);
    const day = parseInt(match[2], 10);
    let year = match[3] ? parseInt(match[3], 10) : referenceDate.getFullYear();
    if (year < 100) {
      year += 2000;
    }

    const date = makeDate(year, month, day);
    return date ? toDateKey(date) : null;
  },
};

export const DATE_STRATEGIES: readonly ExtractionStrategy<DateKey>[] = [
  relativeDayStrategy,
  bareWeekdayStrategy,
  qualifiedWeekdayStrategy,
  monthDayStrategy,
  numericDateStrategy,
];
