/**
 * Meeting Scheduler Core Types
 *
 * Shared domain types for parsing, participant resolution,
 * disambiguation and availability search.
 */

// ============================================================================
// PRIMITIVES
// ============================================================================

/** Calendar date in local time, formatted `yyyy-MM-dd` */
export type DateKey = string;

/** Wall-clock time in local time, 24-hour `HH:mm` */
export type ClockTime = string;

export type AvailabilityStatus = 'available' | 'busy' | 'unknown';

export type MentionedPriority = 'urgent' | 'high' | 'low';

export type MeetingPriority = 'low' | 'medium' | 'high' | 'urgent';

export type MeetingStatus = 'draft' | 'scheduled' | 'cancelled';

// ============================================================================
// PARSED REQUEST
// ============================================================================

export interface ParsedRequest {
  readonly originalText: string;
  readonly title: string | null;
  readonly participantNames: readonly string[];
  readonly participantEmails: readonly string[];
  readonly dateMentioned: DateKey | null;
  /** Display form, e.g. "2:00 PM" */
  readonly timeMentioned: string | null;
  /** Duration label, e.g. "1 hour" or "20 minutes" */
  readonly durationMentioned: string | null;
  readonly priorityMentioned: MentionedPriority | null;
  readonly description: string | null;
  readonly confidence: number;
}

// ============================================================================
// PARTICIPANTS
// ============================================================================

export interface ParticipantIdentity {
  email: string;
  displayName: string;
  department?: string;
  title?: string;
  availabilityStatus: AvailabilityStatus;
}

export interface ParticipantMatch {
  query: string;
  /** Best first, unique by email, at most 10 */
  candidates: ParticipantIdentity[];
  confidence: number;
  isExact: boolean;
  isEmailQuery: boolean;
}

// ============================================================================
// MEETINGS & SLOTS
// ============================================================================

export interface MeetingDraft {
  /** Stable identifier assigned when the draft is first scheduled */
  id?: string;
  title: string;
  description: string;
  participants: ParticipantIdentity[];
  startTime?: Date;
  endTime?: Date;
  durationMinutes: number;
  priority: MeetingPriority;
  status: MeetingStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface TimeSlotCandidate {
  date: DateKey;
  startTime: ClockTime;
  endTime: ClockTime;
  /** Emails whose status for the window was `available` */
  availableParticipants: string[];
  /** Emails with `unknown` status accepted under the configured policy */
  unconfirmedParticipants: string[];
}
