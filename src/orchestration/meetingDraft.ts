import { randomUUID } from 'crypto';
import { addMinutes, format } from 'date-fns';
import { durationLabelToMinutes } from '../services/parsing/extractors/durationStrategies.js';
import type { ClockTime, DateKey, MeetingDraft, MeetingPriority, ParsedRequest, ParticipantIdentity } from '../types/index.js';
import { TextUtils } from '../utils/text.js';
import { combineDateAndTime } from '../utils/time.js';

const MAX_NAMED_IN_TITLE = 4;

export function generateMeetingTitle(participants: readonly ParticipantIdentity[]): string {
  if (participants.length === 0) return 'New Meeting';
  if (participants.length > MAX_NAMED_IN_TITLE) {
    return `Team Meeting (${participants.length} participants)`;
  }
  return `Meeting with ${TextUtils.joinNames(participants.map(p => p.displayName))}`;
}

/**
 * Minutes for a parsed duration label, or the fallback when absent or unreadable
 */
export function resolveDurationMinutes(label: string | null, fallback: number): number {
  if (!label) return fallback;
  return durationLabelToMinutes(label) ?? fallback;
}

export function resolvePriority(request: ParsedRequest): MeetingPriority {
  return request.priorityMentioned ?? 'medium';
}

/**
 * `MTG_yyyyMMdd_HHmmss_xxxxxxxx`; the random suffix keeps drafts created in the same second apart
 */
export function generateDraftId(now: Date): string {
  return `MTG_${format(now, 'yyyyMMdd_HHmmss')}_${randomUUID().slice(0, 8)}`;
}

export interface DraftInput {
  request: ParsedRequest;
  participants: readonly ParticipantIdentity[];
  date: DateKey;
  startTime: ClockTime;
  durationMinutes: number;
  now: Date;
}

export function createMeetingDraft({ request, participants, date, startTime, durationMinutes, now }: DraftInput): MeetingDraft {
  const start = combineDateAndTime(date, startTime);
  return {
    title: request.title ?? generateMeetingTitle(participants),
    description: request.description ?? `Meeting with ${participants.map(p => p.displayName).join(', ')}`,
    participants: participants.map(p => ({ ...p })),
    startTime: start,
    endTime: addMinutes(start, durationMinutes),
    durationMinutes,
    priority: resolvePriority(request),
    status: 'draft',
    createdAt: now,
    updatedAt: now,
  };
}
