/**
 * External collaborator contracts.
 * Implementations live outside the core; in-process adapters are in services/adapters.
 */

import type {
  AvailabilityStatus,
  ClockTime,
  DateKey,
  MeetingDraft,
  ParticipantIdentity,
} from './index.js';

export interface DirectoryProvider {
  listParticipants(): Promise<ParticipantIdentity[]>;
  getByEmail(email: string): Promise<ParticipantIdentity | null>;
  search(query: string, limit: number): Promise<ParticipantIdentity[]>;
}

/**
 * Status per email for the window [startTime, endTime) on `date`.
 * Emails missing from the result are treated as `unknown`.
 */
export interface AvailabilityProvider {
  getAvailability(
    emails: string[],
    date: DateKey,
    startTime: ClockTime,
    endTime: ClockTime
  ): Promise<Record<string, AvailabilityStatus>>;
}

export type SaveResult =
  | { success: true }
  | { success: false; error: string };

/**
 * Saving must be idempotent on `draft.id`.
 */
export interface MeetingStore {
  save(draft: MeetingDraft): Promise<SaveResult>;
}
