/**
 * MeetingOrchestrator Tests
 *
 * End-to-end conversations over in-process providers and a fixed clock.
 */

import { describe, expect, it } from 'vitest';
import {
  ConversationRegistry,
  createConversationContext,
  type ConversationContext,
} from '../../src/orchestration/ConversationContext.js';
import { MeetingOrchestrator } from '../../src/orchestration/MeetingOrchestrator.js';
import { InMemoryAvailabilityAdapter } from '../../src/services/adapters/InMemoryAvailabilityAdapter.js';
import { InMemoryDirectoryAdapter } from '../../src/services/adapters/InMemoryDirectoryAdapter.js';
import { InMemoryMeetingStore } from '../../src/services/adapters/InMemoryMeetingStore.js';
import type { MeetingDraft, ParticipantIdentity, TimeSlotCandidate } from '../../src/types/index.js';
import type { ChatMessage } from '../../src/types/payloads.js';
import type { MeetingStore, SaveResult } from '../../src/types/providers.js';
import { JOHN, JOHN_BROWN, JOHN_SMITH, REFERENCE_DATE, SARAH } from '../support/fixtures.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

const SCENARIO_TEXT = 'Schedule a meeting with John and Sarah tomorrow at 2pm for 1 hour';
const DRAFT_ID_PATTERN = /^MTG_20261019_080000_[0-9a-f]{8}$/;

interface Harness {
  orchestrator: MeetingOrchestrator;
  availability: InMemoryAvailabilityAdapter;
  context: ConversationContext;
}

function harness(participants: ParticipantIdentity[], store: MeetingStore = new InMemoryMeetingStore()): Harness {
  const availability = new InMemoryAvailabilityAdapter(participants.map(p => p.email));
  const orchestrator = new MeetingOrchestrator({
    directory: new InMemoryDirectoryAdapter(participants),
    availability,
    store,
    now: () => REFERENCE_DATE,
  });
  return { orchestrator, availability, context: createConversationContext('user-1') };
}

function contents(replies: ChatMessage[]): string[] {
  return replies.map(reply => reply.content);
}

function slotsOf(message: ChatMessage | undefined): TimeSlotCandidate[] {
  const payload = message?.payload;
  if (!payload || payload.type !== 'time_slot_suggestions') {
    throw new Error('expected time slot suggestions');
  }
  return payload.slots;
}

function draftOf(context: ConversationContext): MeetingDraft {
  if (!context.currentDraft) throw new Error('expected a current draft');
  return context.currentDraft;
}

class FlakyStore implements MeetingStore {
  readonly savedIds: Array<string | undefined> = [];
  private failuresLeft = 1;

  async save(draft: MeetingDraft): Promise<SaveResult> {
    this.savedIds.push(draft.id);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      return { success: false, error: 'disk full' };
    }
    return { success: true };
  }
}

// ============================================================================
// DIRECT PATH
// ============================================================================

describe('MeetingOrchestrator direct scheduling', () => {
  it('should draft the requested window when everyone is free', async () => {
    const { orchestrator, context } = harness([JOHN, SARAH]);

    const replies = await orchestrator.handleMessage(context, SCENARIO_TEXT);

    expect(contents(replies)).toEqual([
      'Great! Now checking availability for 2 participants...',
      '🎉 Great news! All participants are available at 2:00 PM.',
      'Here is your meeting draft:',
      'Would you like to schedule this meeting?',
    ]);
    expect(replies[2].payload?.type).toBe('meeting_summary');
    expect(replies[3].payload).toMatchObject({
      type: 'confirmation_request',
      actions: ['schedule', 'change_time', 'cancel'],
    });

    const draft = draftOf(context);
    expect(draft.title).toBe('A Meeting With');
    expect(draft.participants).toEqual([JOHN, SARAH]);
    expect(draft.startTime).toEqual(new Date(2026, 9, 20, 14, 0));
    expect(draft.durationMinutes).toBe(60);
    expect(draft.priority).toBe('medium');
    expect(draft.status).toBe('draft');
    expect(context.history).toHaveLength(5);
    expect(context.history[0]).toMatchObject({ role: 'user', content: SCENARIO_TEXT });
  });

  it('should schedule the draft with a stable id', async () => {
    const store = new InMemoryMeetingStore();
    const { orchestrator, context } = harness([JOHN, SARAH], store);
    await orchestrator.handleMessage(context, SCENARIO_TEXT);

    const replies = await orchestrator.scheduleMeeting(context);

    expect(contents(replies)).toEqual([
      "🎉 Perfect! Your meeting 'A Meeting With' is scheduled for Tuesday, October 20 at 2:00 PM.\n\n" +
        '📧 Calendar invitations will be sent to all 2 participants.',
    ]);
    const [meeting] = store.list();
    expect(meeting.id).toMatch(DRAFT_ID_PATTERN);
    expect(meeting.status).toBe('scheduled');
    expect(context.currentDraft).toBeNull();
  });

  it('should keep meetings scheduled in the same second apart', async () => {
    const store = new InMemoryMeetingStore();
    const { orchestrator, context } = harness([JOHN, SARAH], store);
    const other = createConversationContext('user-2');

    await orchestrator.handleMessage(context, SCENARIO_TEXT);
    await orchestrator.handleMessage(other, 'Review with Sarah tomorrow at 10am');
    await orchestrator.scheduleMeeting(context);
    await orchestrator.scheduleMeeting(other);

    const meetings = store.list();
    expect(meetings).toHaveLength(2);
    expect(new Set(meetings.map(m => m.id)).size).toBe(2);
    expect(meetings.map(m => m.startTime)).toEqual([new Date(2026, 9, 20, 14, 0), new Date(2026, 9, 20, 10, 0)]);
  });

  it('should keep the draft and its id when saving fails', async () => {
    const store = new FlakyStore();
    const { orchestrator, context } = harness([JOHN, SARAH], store);

    await orchestrator.handleMessage(context, SCENARIO_TEXT);
    const failed = await orchestrator.scheduleMeeting(context);

    expect(contents(failed)).toEqual([
      "❌ I couldn't save the meeting (disk full). Your draft is kept; you can try scheduling again.",
    ]);
    const id = draftOf(context).id;
    expect(id).toMatch(DRAFT_ID_PATTERN);
    expect(draftOf(context).status).toBe('draft');

    await orchestrator.scheduleMeeting(context);

    expect(store.savedIds).toEqual([id, id]);
    expect(context.currentDraft).toBeNull();
  });
});

// ============================================================================
// CONFLICTS & SLOT SEARCH
// ============================================================================

describe('MeetingOrchestrator slot suggestions', () => {
  it('should offer alternatives when a participant is busy', async () => {
    const { orchestrator, availability, context } = harness([JOHN, SARAH]);
    availability.addBusy(SARAH.email, { date: '2026-10-20', start: '14:00', end: '15:00' });

    const replies = await orchestrator.handleMessage(context, SCENARIO_TEXT);

    expect(contents(replies)).toEqual([
      'Great! Now checking availability for 2 participants...',
      '⚠️ Unfortunately, Sarah is busy at that time.',
      'Here are some alternative time slots when everyone is available:',
    ]);
    expect(replies[2].payload).toMatchObject({ conflictInfo: { message: 'Unfortunately, Sarah is busy at that time.' } });

    const slots = slotsOf(replies[2]);
    expect(slots).toHaveLength(5);
    expect(slots[0]).toMatchObject({ date: '2026-10-21', startTime: '09:00', endTime: '10:00' });
    expect(context.currentDraft).toBeNull();

    const selected = await orchestrator.selectSlot(context, 1);

    expect(contents(selected)[0]).toBe('✅ Selected: Wednesday, October 21 at 9:30 AM');
    expect(draftOf(context).startTime).toEqual(new Date(2026, 9, 21, 9, 30));
    expect(context.suggestedSlots).toEqual([]);
    expect(context.pendingMeeting).toBeNull();
  });

  it('should suggest slots on the target day when no time is given', async () => {
    const { orchestrator, context } = harness([JOHN]);

    const replies = await orchestrator.handleMessage(context, 'Set up a review with John tomorrow');

    expect(contents(replies)).toEqual([
      'Great! Now checking availability for 1 participant...',
      'Here are some available time slots:',
    ]);
    expect(slotsOf(replies[1]).map(slot => slot.startTime)).toEqual(['09:00', '09:30', '10:00', '10:30', '11:00']);
    expect(context.pendingMeeting?.durationMinutes).toBe(60);
  });

  it('should ask for another date when the day is fully booked', async () => {
    const { orchestrator, availability, context } = harness([JOHN]);
    availability.addBusy(JOHN.email, { date: '2026-10-20', start: '09:00', end: '17:00' });

    const replies = await orchestrator.handleMessage(context, 'Set up a review with John tomorrow');

    expect(contents(replies)[1]).toBe(
      "I couldn't find any available slots on Tuesday, October 20. Would you like to try a different date?"
    );
    expect(context.pendingMeeting).toBeNull();
    expect(context.currentDraft).toBeNull();
  });

  it('should propose new times for an existing draft', async () => {
    const { orchestrator, context } = harness([JOHN, SARAH]);
    await orchestrator.handleMessage(context, SCENARIO_TEXT);

    const replies = await orchestrator.requestTimeChange(context);

    expect(contents(replies)).toEqual([
      'I can help you find a different time. Let me suggest some alternatives...',
      'Here are some alternative time slots:',
    ]);
    expect(slotsOf(replies[1])[0]).toMatchObject({ date: '2026-10-21', startTime: '09:00' });

    await orchestrator.selectSlot(context, 0);

    const draft = draftOf(context);
    expect(draft.title).toBe('A Meeting With');
    expect(draft.startTime).toEqual(new Date(2026, 9, 21, 9, 0));
    expect(draft.participants).toEqual([JOHN, SARAH]);
  });

  it('should refuse a slot that was never offered', async () => {
    const { orchestrator, context } = harness([JOHN]);

    const replies = await orchestrator.selectSlot(context, 0);

    expect(contents(replies)).toEqual(['That time slot is not available. Please pick one of the suggested slots.']);
  });
});

// ============================================================================
// DISAMBIGUATION
// ============================================================================

describe('MeetingOrchestrator participant confirmation', () => {
  it('should ask which John is meant and continue once confirmed', async () => {
    const { orchestrator, context } = harness([JOHN_SMITH, JOHN_BROWN, SARAH]);

    const asked = await orchestrator.handleMessage(context, SCENARIO_TEXT);

    expect(contents(asked)).toEqual(['I found some people matching your request. Please confirm who should attend:']);
    expect(asked[0].payload).toEqual({
      type: 'participant_matches',
      prompts: [
        { kind: 'select', query: 'John', options: [JOHN_SMITH, JOHN_BROWN], totalCandidates: 2 },
        { kind: 'confirmed', query: 'Sarah', participant: SARAH },
      ],
    });

    const replies = await orchestrator.confirmParticipant(context, 'John', 'john.brown@example.com');

    expect(contents(replies).slice(0, 3)).toEqual([
      '✅ All participants confirmed: John Brown and Sarah',
      'Great! Now checking availability for 2 participants...',
      '🎉 Great news! All participants are available at 2:00 PM.',
    ]);
    expect(draftOf(context).participants).toEqual([JOHN_BROWN, SARAH]);
    expect(context.disambiguation.request).toBeNull();
  });

  it('should reject an email that was not offered', async () => {
    const { orchestrator, context } = harness([JOHN_SMITH, JOHN_BROWN, SARAH]);
    await orchestrator.handleMessage(context, SCENARIO_TEXT);

    const replies = await orchestrator.confirmParticipant(context, 'John', 'john@example.com');

    expect(contents(replies)).toEqual(['❌ "john@example.com" is not one of the options for "John".']);
    expect(context.disambiguation.confirmations.has('John')).toBe(false);
  });

  it('should add an unknown person as an external participant', async () => {
    const { orchestrator, context } = harness([SARAH]);
    await orchestrator.handleMessage(context, 'Schedule a meeting with Zed and Sarah tomorrow at 2pm');

    const invalid = await orchestrator.addExternalParticipant(context, 'Zed', 'zed@bad');
    expect(contents(invalid)).toEqual(['❌ Invalid email format: zed@bad']);

    const replies = await orchestrator.addExternalParticipant(context, 'Zed', 'zed@partner.org');

    expect(contents(replies).slice(0, 4)).toEqual([
      '✅ All participants confirmed: Zed and Sarah',
      'Great! Now checking availability for 2 participants...',
      '🎉 Great news! All participants are available at 2:00 PM.',
      "ℹ️ I couldn't confirm availability for Zed.",
    ]);
    expect(draftOf(context).participants.map(p => p.email)).toEqual(['zed@partner.org', SARAH.email]);
  });
});

// ============================================================================
// CONVERSATION STATE
// ============================================================================

describe('MeetingOrchestrator conversation state', () => {
  it('should explain when a request is not understood', async () => {
    const { orchestrator, context } = harness([JOHN]);

    const replies = await orchestrator.handleMessage(context, 'hello');

    expect(contents(replies)).toEqual([
      'I couldn\'t quite understand that request. Try something like "Schedule a meeting with John tomorrow at 2pm for 1 hour".',
    ]);
  });

  it('should ask who should attend when nobody is named', async () => {
    const { orchestrator, context } = harness([JOHN]);

    const replies = await orchestrator.handleMessage(context, 'Schedule a meeting tomorrow at 2pm');

    expect(contents(replies)).toEqual(['Who should attend? Mention participants by name or email address.']);
  });

  it('should cancel the draft and clear the conversation', async () => {
    const { orchestrator, context } = harness([JOHN, SARAH]);
    await orchestrator.handleMessage(context, SCENARIO_TEXT);
    const draft = draftOf(context);

    const replies = await orchestrator.cancel(context);

    expect(contents(replies)).toEqual(['Meeting draft cancelled. How else can I help you?']);
    expect(draft.status).toBe('cancelled');
    expect(context.currentDraft).toBeNull();

    orchestrator.clearConversation(context);
    expect(context.history).toEqual([]);
  });

  it('should keep conversations for different users apart', () => {
    const registry = new ConversationRegistry();

    const first = registry.get('user-1');
    first.history.push({ role: 'user', content: 'hi', at: REFERENCE_DATE });

    expect(registry.get('user-1')).toBe(first);
    expect(registry.get('user-2').history).toEqual([]);
    expect(registry.size).toBe(2);
    expect(registry.delete('user-1')).toBe(true);
    expect(registry.has('user-1')).toBe(false);
  });
});
