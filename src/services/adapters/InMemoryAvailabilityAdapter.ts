/**
 * In-process availability provider backed by busy windows per participant.
 */

import type { AvailabilityStatus, ClockTime, DateKey } from '../../types/index.js';
import type { AvailabilityProvider } from '../../types/providers.js';
import { clockToMinutes } from '../../utils/time.js';

export interface BusyWindow {
  date: DateKey;
  start: ClockTime;
  end: ClockTime;
}

export class InMemoryAvailabilityAdapter implements AvailabilityProvider {
  private readonly busy = new Map<string, BusyWindow[]>();
  private readonly known = new Set<string>();

  /**
   * @param knownEmails - Participants whose calendars are visible; anyone else is `unknown`
   */
  constructor(knownEmails: readonly string[] = []) {
    for (const email of knownEmails) {
      this.known.add(email.toLowerCase());
    }
  }

  addBusy(email: string, window: BusyWindow): this {
    const key = email.toLowerCase();
    this.known.add(key);
    const windows = this.busy.get(key) ?? [];
    windows.push(window);
    this.busy.set(key, windows);
    return this;
  }

  async getAvailability(
    emails: string[],
    date: DateKey,
    startTime: ClockTime,
    endTime: ClockTime
  ): Promise<Record<string, AvailabilityStatus>> {
    const start = clockToMinutes(startTime);
    const end = clockToMinutes(endTime);
    const result: Record<string, AvailabilityStatus> = {};

    for (const email of emails) {
      const key = email.toLowerCase();
      if (!this.known.has(key)) {
        result[email] = 'unknown';
        continue;
      }
      const overlaps = (this.busy.get(key) ?? []).some(
        window => window.date === date && clockToMinutes(window.start) < end && start < clockToMinutes(window.end)
      );
      result[email] = overlaps ? 'busy' : 'available';
    }

    return result;
  }
}
