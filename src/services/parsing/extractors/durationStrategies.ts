import { CANONICAL_DURATIONS } from '../../../config/parsing-config.js';
import type { ExtractionStrategy } from '../types.js';

/**
 * Total minutes → canonical label, or "<n> minutes" when non-canonical
 */
export function durationLabel(totalMinutes: number): string | null {
  if (!Number.isFinite(totalMinutes) || totalMinutes <= 0) return null;
  return CANONICAL_DURATIONS.get(totalMinutes) ?? `${totalMinutes} minutes`;
}

/**
 * Inverse of durationLabel. Unrecognized labels yield null.
 */
export function durationLabelToMinutes(label: string): number | null {
  for (const [minutes, canonical] of CANONICAL_DURATIONS) {
    if (canonical === label) return minutes;
  }
  const literal = label.match(/^(\d+) minutes$/);
  if (literal) {
    const minutes = parseInt(literal[1], 10);
    return minutes > 0 ? minutes : null;
  }
  return null;
}

// The lookbehind keeps "1/2 hour" away from the hour strategies
const HOURS = String.raw`(?<![\d/.])(\d+(?:\.\d+)?)\s*(?:hours?|hrs?)\b`;

/** "1 hour 30 minutes", "2 hours and 15 mins" */
export const hoursAndMinutesStrategy: ExtractionStrategy<string> = {
  name: 'hours_and_minutes',
  extract(text: string): string | null {
    const match = text.match(new RegExp(`${HOURS}\\s*(?:and\\s+)?(\\d+)\\s*(?:minutes?|mins?)\\b`, 'i'));
    if (!match) return null;
    const total = Math.round(parseFloat(match[1]) * 60) + parseInt(match[2], 10);
    return durationLabel(total);
  },
};

/** "1 hour", "1.5 hours" */
export const hoursStrategy: ExtractionStrategy<string> = {
  name: 'hours',
  extract(text: string): string | null {
    const match = text.match(new RegExp(HOURS, 'i'));
    if (!match) return null;
    return durationLabel(Math.round(parseFloat(match[1]) * 60));
  },
};

/** "45 minutes", "20 mins" */
export const minutesStrategy: ExtractionStrategy<string> = {
  name: 'minutes',
  extract(text: string): string | null {
    const match = text.match(/\b(\d+)\s*(?:minutes?|mins?)\b/i);
    if (!match) return null;
    return durationLabel(parseInt(match[1], 10));
  },
};

/** "half an hour", "1/2 hour" */
export const halfHourStrategy: ExtractionStrategy<string> = {
  name: 'half_hour',
  extract(text: string): string | null {
    return /\b(?:half|1\/2)\s*(?:an\s+)?hour\b/i.test(text) ? durationLabel(30) : null;
  },
};

export const DURATION_STRATEGIES: readonly ExtractionStrategy<string>[] = [
  hoursAndMinutesStrategy,
  hoursStrategy,
  minutesStrategy,
  halfHourStrategy,
];
