/**
 * Presentation payloads attached to assistant messages.
 * The conversational shell renders each kind; the core never does.
 */

import type { ParticipantPrompt } from '../services/disambiguation/DisambiguationCoordinator.js';
import type { MeetingDraft, TimeSlotCandidate } from './index.js';

export interface ParticipantMatchesPayload {
  type: 'participant_matches';
  prompts: ParticipantPrompt[];
}

export interface MeetingSummaryPayload {
  type: 'meeting_summary';
  draft: MeetingDraft;
}

export interface TimeSlotSuggestionsPayload {
  type: 'time_slot_suggestions';
  slots: TimeSlotCandidate[];
  /** Set when the suggestions replace a requested window that did not work */
  conflictInfo?: { message: string };
}

export interface ConfirmationRequestPayload {
  type: 'confirmation_request';
  draft: MeetingDraft;
  actions: ReadonlyArray<'schedule' | 'change_time' | 'cancel'>;
}

export type AssistantPayload =
  | ParticipantMatchesPayload
  | MeetingSummaryPayload
  | TimeSlotSuggestionsPayload
  | ConfirmationRequestPayload;

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  payload?: AssistantPayload;
  at: Date;
}
