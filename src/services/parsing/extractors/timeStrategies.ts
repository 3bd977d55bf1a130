import type { ExtractionStrategy } from '../types.js';

function format12h(hour: number, minute: number, period: string): string {
  return `${hour}:${String(minute).padStart(2, '0')} ${period.toUpperCase()}`;
}

/** "2:30pm", "at 10:15 AM" */
export const clockWithPeriodStrategy: ExtractionStrategy<string> = {
  name: 'clock_with_period',
  extract(text: string): string | null {
    const match = text.match(/\b(\d{1,2}):(\d{2})\s*(am|pm)\b/i);
    if (!match) return null;
    const hour = parseInt(match[1], 10);
    const minute = parseInt(match[2], 10);
    if (hour < 1 || hour > 12 || minute > 59) return null;
    return format12h(hour, minute, match[3]);
  },
};

/** "2pm", "at 9 AM" */
export const hourWithPeriodStrategy: ExtractionStrategy<string> = {
  name: 'hour_with_period',
  extract(text: string): string | null {
    const match = text.match(/\b(\d{1,2})\s*(am|pm)\b/i);
    if (!match) return null;
    const hour = parseInt(match[1], 10);
    if (hour < 1 || hour > 12) return null;
    return format12h(hour, 0, match[2]);
  },
};

/** "14:30" → "2:30 PM", "00:15" → "12:15 AM" */
export const twentyFourHourStrategy: ExtractionStrategy<string> = {
  name: 'twenty_four_hour',
  extract(text: string): string | null {
    const match = text.match(/\b(\d{1,2}):(\d{2})\b/);
    if (!match) return null;
    const hour = parseInt(match[1], 10);
    const minute = parseInt(match[2], 10);
    if (hour > 23 || minute > 59) return null;

    if (hour === 0) return format12h(12, minute, 'AM');
    if (hour === 12) return format12h(12, minute, 'PM');
    if (hour > 12) return format12h(hour - 12, minute, 'PM');
    return format12h(hour, minute, 'AM');
  },
};

export const TIME_STRATEGIES: readonly ExtractionStrategy<string>[] = [
  clockWithPeriodStrategy,
  hourWithPeriodStrategy,
  twentyFourHourStrategy,
];
