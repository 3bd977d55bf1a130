import type { ClockTime, DateKey, ParticipantIdentity, TimeSlotCandidate } from '../../types/index.js';

export interface SlotSearchRequest {
  participants: readonly ParticipantIdentity[];
  /** First day searched */
  startDate: DateKey;
  durationMinutes: number;
  /** Number of consecutive days searched, starting at startDate */
  horizonDays: number;
}

export interface RequestedSlot {
  participants: readonly ParticipantIdentity[];
  date: DateKey;
  startTime: ClockTime;
  durationMinutes: number;
  /** Days searched for alternatives, starting the day after `date` */
  horizonDays: number;
}

export type ConflictReason = 'participants_busy' | 'in_past' | 'outside_working_hours';

export type SlotCheckResult =
  | { status: 'accepted'; slot: TimeSlotCandidate }
  | {
      status: 'conflict';
      reason: ConflictReason;
      /** Participants who are not free for the requested window */
      conflicts: ParticipantIdentity[];
      alternatives: TimeSlotCandidate[];
    };

export interface WindowEvaluation {
  accepted: boolean;
  available: string[];
  unconfirmed: string[];
  conflicting: string[];
}
