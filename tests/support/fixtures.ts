/**
 * Shared test data
 */

import type { ParsedRequest, ParticipantIdentity } from '../../src/types/index.js';

/** Monday 2026-10-19, 08:00 local time */
export const REFERENCE_DATE = new Date(2026, 9, 19, 8, 0, 0);

export function person(displayName: string, email: string, overrides: Partial<ParticipantIdentity> = {}): ParticipantIdentity {
  return { email, displayName, availabilityStatus: 'available', ...overrides };
}

export const JOHN = person('John', 'john@example.com');
export const SARAH = person('Sarah', 'sarah@example.com');
export const JOHN_SMITH = person('John Smith', 'john.smith@example.com');
export const JOHN_BROWN = person('John Brown', 'john.brown@example.com');

export function parsedRequest(overrides: Partial<ParsedRequest> = {}): ParsedRequest {
  return {
    originalText: '',
    title: null,
    participantNames: [],
    participantEmails: [],
    dateMentioned: null,
    timeMentioned: null,
    durationMentioned: null,
    priorityMentioned: null,
    description: null,
    confidence: 1,
    ...overrides,
  };
}
