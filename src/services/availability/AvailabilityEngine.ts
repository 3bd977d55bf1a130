/**
 * AvailabilityEngine
 *
 * Checks a requested window against every participant's availability
 * and searches working-hours buckets for windows where all are free.
 */

import { isBefore } from 'date-fns';
import { DEFAULT_SCHEDULING_CONFIG, type SchedulingConfig } from '../../config/environment.js';
import { describeError, NoAvailabilityFoundError } from '../../errors/SchedulingErrors.js';
import type { AvailabilityStatus, ClockTime, DateKey, TimeSlotCandidate } from '../../types/index.js';
import type { AvailabilityProvider } from '../../types/providers.js';
import { logger } from '../../utils/logger.js';
import { addDaysToKey, clockToMinutes, combineDateAndTime, minutesToClock } from '../../utils/time.js';
import type { RequestedSlot, SlotCheckResult, SlotSearchRequest, WindowEvaluation } from './types.js';

type StatusVerdict = 'free' | 'unconfirmed' | 'conflict';

const MINUTES_PER_DAY = 24 * 60;

export class AvailabilityEngine {
  constructor(
    private readonly provider: AvailabilityProvider,
    private readonly config: SchedulingConfig = DEFAULT_SCHEDULING_CONFIG,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Accept the requested window as-is, or report who conflicts and
   * offer alternatives from the following days.
   */
  async checkRequestedSlot(request: RequestedSlot): Promise<SlotCheckResult> {
    const { participants, date, startTime, durationMinutes, horizonDays } = request;
    const startMinutes = clockToMinutes(startTime);
    const endMinutes = startMinutes + durationMinutes;

    const searchAlternatives = () =>
      this.findAvailableSlots({
        participants,
        startDate: addDaysToKey(date, 1),
        durationMinutes,
        horizonDays,
      });

    if (isBefore(combineDateAndTime(date, startTime), this.now())) {
      logger.info(`🕰️ [AvailabilityEngine] Requested ${date} ${startTime} is in the past`);
      return { status: 'conflict', reason: 'in_past', conflicts: [], alternatives: await searchAlternatives() };
    }

    if (!this.fitsWorkingHours(startMinutes, endMinutes)) {
      logger.info(`🕰️ [AvailabilityEngine] Requested ${date} ${startTime} is outside working hours`);
      return {
        status: 'conflict',
        reason: 'outside_working_hours',
        conflicts: [],
        alternatives: await searchAlternatives(),
      };
    }

    const endTime = minutesToClock(endMinutes);
    const emails = participants.map(p => p.email);
    const evaluation = await this.evaluateWindow(emails, date, startTime, endTime);

    if (evaluation.accepted) {
      logger.info(`✅ [AvailabilityEngine] ${date} ${startTime}-${endTime} works for all ${emails.length} participants`);
      return {
        status: 'accepted',
        slot: {
          date,
          startTime,
          endTime,
          availableParticipants: evaluation.available,
          unconfirmedParticipants: evaluation.unconfirmed,
        },
      };
    }

    const conflicting = new Set(evaluation.conflicting);
    const conflicts = participants.filter(p => conflicting.has(p.email));
    logger.info(
      `⚠️ [AvailabilityEngine] Conflict at ${date} ${startTime}: ${conflicts.map(p => p.email).join(', ')}`
    );

    return {
      status: 'conflict',
      reason: 'participants_busy',
      conflicts,
      alternatives: await searchAlternatives(),
    };
  }

  /**
   * Every bucket within the horizon where all participants are free,
   * ordered by date then start time. Never returns past windows.
   */
  async findAvailableSlots(search: SlotSearchRequest): Promise<TimeSlotCandidate[]> {
    const { participants, startDate, durationMinutes, horizonDays } = search;
    const emails = participants.map(p => p.email);
    const workStart = clockToMinutes(this.config.workingHours.start);
    const workEnd = clockToMinutes(this.config.workingHours.end);
    const now = this.now();
    const slots: TimeSlotCandidate[] = [];

    if (durationMinutes <= 0) return slots;

    for (let dayOffset = 0; dayOffset < horizonDays; dayOffset++) {
      const date = addDaysToKey(startDate, dayOffset);

      for (
        let bucketStart = workStart;
        bucketStart + durationMinutes <= workEnd;
        bucketStart += this.config.slotIncrementMinutes
      ) {
        const startTime = minutesToClock(bucketStart);
        if (isBefore(combineDateAndTime(date, startTime), now)) continue;

        const endTime = minutesToClock(bucketStart + durationMinutes);
        const evaluation = await this.evaluateWindow(emails, date, startTime, endTime);
        if (evaluation.accepted) {
          slots.push({
            date,
            startTime,
            endTime,
            availableParticipants: evaluation.available,
            unconfirmedParticipants: evaluation.unconfirmed,
          });
        }
      }
    }

    logger.info(
      `🔎 [AvailabilityEngine] ${slots.length} slot(s) of ${durationMinutes}min in ${horizonDays} day(s) from ${startDate}`
    );
    return slots;
  }

  /**
   * Same as findAvailableSlots, but an empty result is a NoAvailabilityFoundError
   */
  async requireAvailableSlots(search: SlotSearchRequest): Promise<TimeSlotCandidate[]> {
    const slots = await this.findAvailableSlots(search);
    if (slots.length === 0) {
      throw new NoAvailabilityFoundError(search.startDate, search.horizonDays);
    }
    return slots;
  }

  async evaluateWindow(
    emails: readonly string[],
    date: DateKey,
    startTime: ClockTime,
    endTime: ClockTime
  ): Promise<WindowEvaluation> {
    const statuses = await this.fetchAvailability(emails, date, startTime, endTime);
    const evaluation: WindowEvaluation = { accepted: true, available: [], unconfirmed: [], conflicting: [] };

    for (const email of emails) {
      switch (this.verdict(statuses[email] ?? 'unknown')) {
        case 'free':
          evaluation.available.push(email);
          break;
        case 'unconfirmed':
          evaluation.unconfirmed.push(email);
          break;
        case 'conflict':
          evaluation.conflicting.push(email);
          evaluation.accepted = false;
          break;
      }
    }

    return evaluation;
  }

  private verdict(status: AvailabilityStatus): StatusVerdict {
    switch (status) {
      case 'available':
        return 'free';
      case 'busy':
        return 'conflict';
      case 'unknown':
        return this.config.unknownAvailability === 'available' ? 'unconfirmed' : 'conflict';
      default: {
        const exhaustive: never = status;
        return exhaustive;
      }
    }
  }

  private fitsWorkingHours(startMinutes: number, endMinutes: number): boolean {
    const workStart = clockToMinutes(this.config.workingHours.start);
    const workEnd = clockToMinutes(this.config.workingHours.end);
    return startMinutes >= workStart && endMinutes <= workEnd && endMinutes <= MINUTES_PER_DAY;
  }

  /**
   * A failed lookup is "no data": everyone counts as unknown for the window
   */
  private async fetchAvailability(
    emails: readonly string[],
    date: DateKey,
    startTime: ClockTime,
    endTime: ClockTime
  ): Promise<Record<string, AvailabilityStatus>> {
    if (emails.length === 0) return {};
    try {
      return await this.provider.getAvailability([...emails], date, startTime, endTime);
    } catch (error) {
      logger.warn(
        `⚠️ [AvailabilityEngine] Availability lookup failed for ${date} ${startTime}-${endTime}: ${describeError(error)}`
      );
      return {};
    }
  }
}
