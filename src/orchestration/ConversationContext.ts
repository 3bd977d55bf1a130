/**
 * ConversationContext
 *
 * Everything one conversation carries between turns. The session layer
 * owns the object and passes it into every orchestrator operation.
 */

import type { DisambiguationState } from '../services/disambiguation/DisambiguationCoordinator.js';
import type { MeetingDraft, ParsedRequest, ParticipantIdentity, TimeSlotCandidate } from '../types/index.js';
import type { ChatMessage } from '../types/payloads.js';

/** Participants and request waiting for a slot to be chosen */
export interface PendingMeetingInfo {
  participants: ParticipantIdentity[];
  request: ParsedRequest;
  durationMinutes: number;
}

export interface ConversationContext {
  readonly userId: string;
  history: ChatMessage[];
  disambiguation: DisambiguationState;
  pendingMeeting: PendingMeetingInfo | null;
  suggestedSlots: TimeSlotCandidate[];
  currentDraft: MeetingDraft | null;
}

export function createConversationContext(userId: string): ConversationContext {
  return {
    userId,
    history: [],
    disambiguation: { request: null, matches: [], confirmations: new Map() },
    pendingMeeting: null,
    suggestedSlots: [],
    currentDraft: null,
  };
}

/**
 * Hands out one context per user; contexts are never shared
 */
export class ConversationRegistry {
  private readonly contexts = new Map<string, ConversationContext>();

  get(userId: string): ConversationContext {
    let context = this.contexts.get(userId);
    if (!context) {
      context = createConversationContext(userId);
      this.contexts.set(userId, context);
    }
    return context;
  }

  has(userId: string): boolean {
    return this.contexts.has(userId);
  }

  delete(userId: string): boolean {
    return this.contexts.delete(userId);
  }

  get size(): number {
    return this.contexts.size;
  }
}
