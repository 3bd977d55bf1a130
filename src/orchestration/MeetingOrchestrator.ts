/**
 * MeetingOrchestrator
 *
 * Sequences parsing, participant resolution, disambiguation, slot search
 * and storage for one conversation. Every operation takes the
 * conversation's context, appends to its history, and returns the
 * assistant replies it produced.
 *
 * Flow:
 *   text → parse → resolve → (confirm participants) → check/search slots
 *        → (select slot) → draft → schedule | change time | cancel
 */

import { DEFAULT_SCHEDULING_CONFIG, type SchedulingConfig } from '../config/environment.js';
import {
  describeError,
  NoAvailabilityFoundError,
  StoreFailureError,
  ValidationError,
} from '../errors/SchedulingErrors.js';
import { AvailabilityEngine } from '../services/availability/AvailabilityEngine.js';
import type { SlotCheckResult } from '../services/availability/types.js';
import {
  DisambiguationCoordinator,
  type ConfirmationResult,
} from '../services/disambiguation/DisambiguationCoordinator.js';
import { isUnderstood, RequestParser } from '../services/parsing/RequestParser.js';
import { needsDisambiguation, ParticipantEntityResolver } from '../services/resolution/ParticipantEntityResolver.js';
import type { IParticipantResolver } from '../services/resolution/types.js';
import type {
  ClockTime,
  DateKey,
  MeetingDraft,
  ParsedRequest,
  ParticipantIdentity,
  ParticipantMatch,
  TimeSlotCandidate,
} from '../types/index.js';
import type { AssistantPayload, ChatMessage, TimeSlotSuggestionsPayload } from '../types/payloads.js';
import type { AvailabilityProvider, DirectoryProvider, MeetingStore, SaveResult } from '../types/providers.js';
import { logger } from '../utils/logger.js';
import { TextUtils } from '../utils/text.js';
import {
  addDaysToKey,
  formatClock12h,
  formatDateLong,
  parseTimeString,
  toClockTime,
  toDateKey,
} from '../utils/time.js';
import type { ConversationContext } from './ConversationContext.js';
import { createMeetingDraft, generateDraftId, resolveDurationMinutes } from './meetingDraft.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const MAX_SLOT_PREVIEW = 5;

const DRAFT_ACTIONS = ['schedule', 'change_time', 'cancel'] as const;

const NOT_UNDERSTOOD_REPLY =
  'I couldn\'t quite understand that request. Try something like "Schedule a meeting with John tomorrow at 2pm for 1 hour".';

// ============================================================================
// TYPES
// ============================================================================

export interface MeetingOrchestratorOptions {
  directory: DirectoryProvider;
  availability: AvailabilityProvider;
  store: MeetingStore;
  config?: SchedulingConfig;
  now?: () => Date;
}

/** Replies produced by one operation, in order */
type Replies = ChatMessage[];

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class MeetingOrchestrator {
  private readonly parser = new RequestParser();
  private readonly resolver: IParticipantResolver;
  private readonly coordinator = new DisambiguationCoordinator();
  private readonly engine: AvailabilityEngine;
  private readonly store: MeetingStore;
  private readonly config: SchedulingConfig;
  private readonly now: () => Date;

  constructor(options: MeetingOrchestratorOptions) {
    this.config = options.config ?? DEFAULT_SCHEDULING_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.resolver = new ParticipantEntityResolver(options.directory);
    this.engine = new AvailabilityEngine(options.availability, this.config, this.now);
    this.store = options.store;
  }

  get participantResolver(): IParticipantResolver {
    return this.resolver;
  }

  /**
   * Start a new request from free text. Any pending request, slot list
   * or unsaved draft is discarded first.
   */
  async handleMessage(context: ConversationContext, text: string): Promise<Replies> {
    const replies: Replies = [];
    this.record(context, { role: 'user', content: text, at: this.now() });
    this.discardPending(context);

    const request = this.parser.parse(text, this.now());
    logger.info(`💬 [Orchestrator] ${context.userId}: parsed request (confidence ${request.confidence.toFixed(2)})`);

    if (!isUnderstood(request)) {
      this.say(context, replies, NOT_UNDERSTOOD_REPLY);
      return replies;
    }

    if (request.participantNames.length === 0 && request.participantEmails.length === 0) {
      this.say(context, replies, 'Who should attend? Mention participants by name or email address.');
      return replies;
    }

    const matches = await this.resolver.resolve(request.participantNames, request.participantEmails);

    if (needsDisambiguation(matches)) {
      context.disambiguation = this.coordinator.begin(request, matches);
      this.say(context, replies, 'I found some people matching your request. Please confirm who should attend:', {
        type: 'participant_matches',
        prompts: this.coordinator.prompts(context.disambiguation),
      });
      return replies;
    }

    await this.checkAvailabilityAndSuggest(context, replies, this.firstCandidates(matches), request);
    return replies;
  }

  /**
   * Pick `email` among the candidates offered for `query`
   */
  async confirmParticipant(context: ConversationContext, query: string, email: string): Promise<Replies> {
    const replies: Replies = [];
    const request = context.disambiguation.request;

    if (!request) {
      this.say(context, replies, 'There is no pending request to confirm participants for.');
      return replies;
    }

    const match = context.disambiguation.matches.find(m => m.query === query);
    const identity = match?.candidates.find(c => c.email.toLowerCase() === email.toLowerCase());
    if (!identity) {
      this.say(context, replies, `❌ "${email}" is not one of the options for "${query}".`);
      return replies;
    }

    return this.applyConfirmation(context, replies, request, () =>
      this.coordinator.confirm(context.disambiguation, query, identity)
    );
  }

  /**
   * Confirm `query` as someone outside the directory. Without `email`
   * the query itself must be the address.
   */
  async addExternalParticipant(context: ConversationContext, query: string, email?: string): Promise<Replies> {
    const replies: Replies = [];
    const request = context.disambiguation.request;
    if (!request) {
      this.say(context, replies, 'There is no pending request to add participants to.');
      return replies;
    }

    return this.applyConfirmation(context, replies, request, () =>
      this.coordinator.addExternal(context.disambiguation, query, email ?? query)
    );
  }

  async selectSlot(context: ConversationContext, index: number): Promise<Replies> {
    const replies: Replies = [];
    const pending = context.pendingMeeting;
    const slot = context.suggestedSlots[index];

    if (!pending || !slot) {
      this.say(context, replies, 'That time slot is not available. Please pick one of the suggested slots.');
      return replies;
    }

    this.say(context, replies, `✅ Selected: ${formatDateLong(slot.date)} at ${formatClock12h(slot.startTime)}`);
    this.presentDraft(context, replies, pending.request, pending.participants, slot.date, slot.startTime, pending.durationMinutes);
    return replies;
  }

  /**
   * Hand the current draft to the store. The draft id is assigned on the
   * first attempt and reused on retries.
   */
  async scheduleMeeting(context: ConversationContext): Promise<Replies> {
    const replies: Replies = [];
    const draft = context.currentDraft;
    if (!draft || !draft.startTime) {
      this.say(context, replies, 'There is no meeting draft to schedule.');
      return replies;
    }

    const now = this.now();
    draft.id = draft.id ?? generateDraftId(now);
    draft.updatedAt = now;
    const id = draft.id;

    const result = await this.saveSafely({ ...draft, status: 'scheduled' });

    if (!result.success) {
      const error = new StoreFailureError(id, result.error);
      logger.error(`❌ [Orchestrator] ${error.message}`);
      this.say(context, replies, `❌ I couldn't save the meeting (${result.error}). Your draft is kept; you can try scheduling again.`);
      return replies;
    }

    draft.status = 'scheduled';
    context.currentDraft = null;
    logger.info(`📅 [Orchestrator] Scheduled ${id} for ${context.userId}`);

    this.say(
      context,
      replies,
      `🎉 Perfect! Your meeting '${draft.title}' is scheduled for ` +
        `${formatDateLong(toDateKey(draft.startTime))} at ${formatClock12h(toClockTime(draft.startTime))}.\n\n` +
        `📧 Calendar invitations will be sent to all ${draft.participants.length} participants.`
    );
    return replies;
  }

  /**
   * Offer alternatives on the days after the current draft's date
   */
  async requestTimeChange(context: ConversationContext): Promise<Replies> {
    const replies: Replies = [];
    const draft = context.currentDraft;
    if (!draft || !draft.startTime) {
      this.say(context, replies, 'There is no meeting draft to reschedule.');
      return replies;
    }

    this.say(context, replies, 'I can help you find a different time. Let me suggest some alternatives...');

    const horizonDays = this.config.changeTimeHorizonDays;
    const alternatives = await this.engine.findAvailableSlots({
      participants: draft.participants,
      startDate: addDaysToKey(toDateKey(draft.startTime), 1),
      durationMinutes: draft.durationMinutes,
      horizonDays,
    });

    if (alternatives.length === 0) {
      this.say(
        context,
        replies,
        `I couldn't find any alternative slots in the next ${horizonDays} days. Would you like to try a different date?`
      );
      return replies;
    }

    context.pendingMeeting = {
      participants: draft.participants,
      request: this.requestFromDraft(draft),
      durationMinutes: draft.durationMinutes,
    };
    this.offerSlots(context, replies, alternatives, 'Here are some alternative time slots:');
    return replies;
  }

  async cancel(context: ConversationContext): Promise<Replies> {
    const replies: Replies = [];
    if (context.currentDraft) {
      context.currentDraft.status = 'cancelled';
    }
    this.discardPending(context);
    this.say(context, replies, 'Meeting draft cancelled. How else can I help you?');
    return replies;
  }

  clearConversation(context: ConversationContext): void {
    this.discardPending(context);
    context.history = [];
    logger.info(`🧹 [Orchestrator] Cleared conversation for ${context.userId}`);
  }

  // ==========================================================================
  // AVAILABILITY
  // ==========================================================================

  private async checkAvailabilityAndSuggest(
    context: ConversationContext,
    replies: Replies,
    participants: ParticipantIdentity[],
    request: ParsedRequest
  ): Promise<void> {
    const count = participants.length;
    this.say(context, replies, `Great! Now checking availability for ${count} participant${count === 1 ? '' : 's'}...`);

    const date = request.dateMentioned ?? addDaysToKey(toDateKey(this.now()), 1);
    const durationMinutes = resolveDurationMinutes(request.durationMentioned, this.config.defaultDurationMinutes);
    const startTime = request.timeMentioned ? parseTimeString(request.timeMentioned) : null;
    context.pendingMeeting = { participants, request, durationMinutes };

    if (startTime) {
      const result = await this.engine.checkRequestedSlot({
        participants,
        date,
        startTime,
        durationMinutes,
        horizonDays: this.config.conflictHorizonDays,
      });
      this.handleSlotCheck(context, replies, result, request, participants, durationMinutes);
      return;
    }

    try {
      const slots = await this.engine.requireAvailableSlots({
        participants,
        startDate: date,
        durationMinutes,
        horizonDays: 1,
      });
      this.offerSlots(context, replies, slots, 'Here are some available time slots:');
    } catch (error) {
      if (!(error instanceof NoAvailabilityFoundError)) throw error;
      context.pendingMeeting = null;
      this.say(
        context,
        replies,
        `I couldn't find any available slots on ${formatDateLong(date)}. Would you like to try a different date?`
      );
    }
  }

  private handleSlotCheck(
    context: ConversationContext,
    replies: Replies,
    result: SlotCheckResult,
    request: ParsedRequest,
    participants: ParticipantIdentity[],
    durationMinutes: number
  ): void {
    if (result.status === 'accepted') {
      const { slot } = result;
      this.say(context, replies, `🎉 Great news! All participants are available at ${formatClock12h(slot.startTime)}.`);
      if (slot.unconfirmedParticipants.length > 0) {
        this.say(
          context,
          replies,
          `ℹ️ I couldn't confirm availability for ${TextUtils.joinNames(this.namesFor(participants, slot.unconfirmedParticipants))}.`
        );
      }
      this.presentDraft(context, replies, request, participants, slot.date, slot.startTime, durationMinutes);
      return;
    }

    const conflictMessage = this.describeConflict(result);
    this.say(context, replies, `⚠️ ${conflictMessage}`);

    if (result.alternatives.length === 0) {
      context.pendingMeeting = null;
      this.say(context, replies, 'I couldn\'t find any suitable alternative slots. Would you like to try a different date?');
      return;
    }

    this.offerSlots(
      context,
      replies,
      result.alternatives,
      'Here are some alternative time slots when everyone is available:',
      conflictMessage
    );
  }

  private describeConflict(result: Extract<SlotCheckResult, { status: 'conflict' }>): string {
    switch (result.reason) {
      case 'participants_busy': {
        const names = result.conflicts.map(p => p.displayName);
        return `Unfortunately, ${TextUtils.joinNames(names)} ${names.length === 1 ? 'is' : 'are'} busy at that time.`;
      }
      case 'in_past':
        return 'That time has already passed.';
      case 'outside_working_hours': {
        const { start, end } = this.config.workingHours;
        return `That time is outside working hours (${formatClock12h(start)} to ${formatClock12h(end)}).`;
      }
      default: {
        const exhaustive: never = result.reason;
        return exhaustive;
      }
    }
  }

  private offerSlots(
    context: ConversationContext,
    replies: Replies,
    slots: TimeSlotCandidate[],
    intro: string,
    conflictMessage?: string
  ): void {
    context.suggestedSlots = slots.slice(0, MAX_SLOT_PREVIEW);
    const payload: TimeSlotSuggestionsPayload = { type: 'time_slot_suggestions', slots: context.suggestedSlots };
    if (conflictMessage) {
      payload.conflictInfo = { message: conflictMessage };
    }
    this.say(context, replies, intro, payload);
  }

  // ==========================================================================
  // DRAFTS
  // ==========================================================================

  private presentDraft(
    context: ConversationContext,
    replies: Replies,
    request: ParsedRequest,
    participants: ParticipantIdentity[],
    date: DateKey,
    startTime: ClockTime,
    durationMinutes: number
  ): void {
    const draft = createMeetingDraft({ request, participants, date, startTime, durationMinutes, now: this.now() });
    context.currentDraft = draft;
    context.pendingMeeting = null;
    context.suggestedSlots = [];

    this.say(context, replies, 'Here is your meeting draft:', { type: 'meeting_summary', draft });
    this.say(context, replies, 'Would you like to schedule this meeting?', {
      type: 'confirmation_request',
      draft,
      actions: DRAFT_ACTIONS,
    });
  }

  private requestFromDraft(draft: MeetingDraft): ParsedRequest {
    return {
      originalText: '',
      title: draft.title,
      participantNames: [],
      participantEmails: [],
      dateMentioned: null,
      timeMentioned: null,
      durationMentioned: null,
      priorityMentioned: draft.priority === 'medium' ? null : draft.priority,
      description: draft.description,
      confidence: 1,
    };
  }

  private async saveSafely(draft: MeetingDraft): Promise<SaveResult> {
    try {
      return await this.store.save(draft);
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  // ==========================================================================
  // PARTICIPANTS
  // ==========================================================================

  private async applyConfirmation(
    context: ConversationContext,
    replies: Replies,
    request: ParsedRequest,
    confirm: () => ConfirmationResult
  ): Promise<Replies> {
    let result: ConfirmationResult;
    try {
      result = confirm();
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn(`⚠️ [Orchestrator] ${error.message}`);
      this.say(context, replies, `❌ ${error.message}`);
      return replies;
    }

    if (result.status === 'pending') {
      this.say(context, replies, `✅ Confirmed. Still waiting on: ${result.remaining.join(', ')}`, {
        type: 'participant_matches',
        prompts: this.coordinator.prompts(context.disambiguation),
      });
      return replies;
    }

    this.say(context, replies, `✅ All participants confirmed: ${TextUtils.joinNames(result.participants.map(p => p.displayName))}`);
    await this.checkAvailabilityAndSuggest(context, replies, result.participants, request);
    return replies;
  }

  private firstCandidates(matches: readonly ParticipantMatch[]): ParticipantIdentity[] {
    const seen = new Set<string>();
    const participants: ParticipantIdentity[] = [];
    for (const match of matches) {
      const candidate = match.candidates[0];
      if (!candidate || seen.has(candidate.email.toLowerCase())) continue;
      seen.add(candidate.email.toLowerCase());
      participants.push(candidate);
    }
    return participants;
  }

  private namesFor(participants: readonly ParticipantIdentity[], emails: readonly string[]): string[] {
    return emails.map(email => participants.find(p => p.email === email)?.displayName ?? email);
  }

  // ==========================================================================
  // STATE
  // ==========================================================================

  private discardPending(context: ConversationContext): void {
    this.coordinator.reset(context.disambiguation);
    context.pendingMeeting = null;
    context.suggestedSlots = [];
    context.currentDraft = null;
  }

  private say(context: ConversationContext, replies: Replies, content: string, payload?: AssistantPayload): void {
    const message: ChatMessage = payload
      ? { role: 'assistant', content, payload, at: this.now() }
      : { role: 'assistant', content, at: this.now() };
    this.record(context, message);
    replies.push(message);
  }

  private record(context: ConversationContext, message: ChatMessage): void {
    context.history.push(message);
  }
}
