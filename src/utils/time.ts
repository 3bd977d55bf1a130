/**
 * Date and clock helpers shared by the parser and the availability engine.
 * Everything is local time; dates travel as `yyyy-MM-dd`, times as `HH:mm`.
 */

import { addDays, format, isValid, parse } from 'date-fns';
import type { ClockTime, DateKey } from '../types/index.js';

const DATE_KEY_FORMAT = 'yyyy-MM-dd';

export function toDateKey(date: Date): DateKey {
  return format(date, DATE_KEY_FORMAT);
}

export function fromDateKey(key: DateKey): Date {
  return parse(key, DATE_KEY_FORMAT, new Date());
}

export function addDaysToKey(key: DateKey, days: number): DateKey {
  return toDateKey(addDays(fromDateKey(key), days));
}

/**
 * Build a calendar date, rejecting values that would roll over (e.g. Feb 30)
 */
export function makeDate(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month - 1, day);
  if (!isValid(date)) return null;
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function clockToMinutes(time: ClockTime): number {
  const [hours, minutes] = time.split(':').map(part => parseInt(part, 10));
  return hours * 60 + minutes;
}

export function minutesToClock(totalMinutes: number): ClockTime {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Wall-clock fields, not elapsed minutes, so daylight-saving days keep the requested hour
 */
export function combineDateAndTime(date: DateKey, time: ClockTime): Date {
  return parse(`${date} ${time}`, `${DATE_KEY_FORMAT} HH:mm`, new Date());
}

/**
 * "2:00 PM" → "14:00"; also accepts "14:00" and "2 PM".
 * Returns null for anything out of range.
 */
export function parseTimeString(value: string): ClockTime | null {
  const trimmed = value.trim();

  const twelveHour = trimmed.match(/^(\d{1,2})(?::(\d{2}))?\s*(AM|PM)$/i);
  if (twelveHour) {
    const hour = parseInt(twelveHour[1], 10);
    const minute = twelveHour[2] ? parseInt(twelveHour[2], 10) : 0;
    if (hour < 1 || hour > 12 || minute > 59) return null;
    const isPm = twelveHour[3].toUpperCase() === 'PM';
    const hour24 = (hour % 12) + (isPm ? 12 : 0);
    return minutesToClock(hour24 * 60 + minute);
  }

  const twentyFourHour = trimmed.match(/^(\d{1,2}):(\d{2})$/);
  if (twentyFourHour) {
    const hour = parseInt(twentyFourHour[1], 10);
    const minute = parseInt(twentyFourHour[2], 10);
    if (hour > 23 || minute > 59) return null;
    return minutesToClock(hour * 60 + minute);
  }

  return null;
}

/**
 * "14:30" → "2:30 PM"
 */
export function formatClock12h(time: ClockTime): string {
  const total = clockToMinutes(time);
  const hour24 = Math.floor(total / 60);
  const minute = total % 60;
  const period = hour24 >= 12 ? 'PM' : 'AM';
  const hour12 = hour24 % 12 === 0 ? 12 : hour24 % 12;
  return `${hour12}:${String(minute).padStart(2, '0')} ${period}`;
}

export function formatDateLong(date: DateKey): string {
  return format(fromDateKey(date), 'EEEE, MMMM d');
}

export function toClockTime(date: Date): ClockTime {
  return format(date, 'HH:mm');
}
