/**
 * DisambiguationCoordinator
 *
 * Tracks which participant queries the user has confirmed for one
 * pending request. The state object is owned by the conversation;
 * the coordinator itself holds nothing between calls.
 */

import { ValidationError } from '../../errors/SchedulingErrors.js';
import type { ParsedRequest, ParticipantIdentity, ParticipantMatch } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { isValidEmail, TextUtils } from '../../utils/text.js';
import { RESOLUTION_LIMITS } from '../resolution/resolution-config.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DisambiguationState {
  request: ParsedRequest | null;
  matches: ParticipantMatch[];
  /** query → confirmed identity */
  confirmations: Map<string, ParticipantIdentity>;
}

export type ConfirmationResult =
  | { status: 'pending'; remaining: string[] }
  | { status: 'complete'; participants: ParticipantIdentity[] };

export type ParticipantPrompt =
  | { kind: 'confirmed'; query: string; participant: ParticipantIdentity }
  | { kind: 'add_external'; query: string }
  | { kind: 'select'; query: string; options: ParticipantIdentity[]; totalCandidates: number };

export const EXTERNAL_DEPARTMENT = 'External';
export const EXTERNAL_TITLE = 'External Participant';

// ============================================================================
// COORDINATOR
// ============================================================================

export class DisambiguationCoordinator {
  /**
   * Open a confirmation round. Single exact matches need no answer
   * and are confirmed up front.
   */
  begin(request: ParsedRequest, matches: ParticipantMatch[]): DisambiguationState {
    const confirmations = new Map<string, ParticipantIdentity>();
    for (const match of matches) {
      if (match.isExact && match.candidates.length === 1) {
        confirmations.set(match.query, match.candidates[0]);
      }
    }
    return { request, matches, confirmations };
  }

  confirm(state: DisambiguationState, query: string, identity: ParticipantIdentity): ConfirmationResult {
    const request = state.request;
    if (!request) {
      throw new ValidationError('There is no pending request to confirm participants for');
    }

    const required = this.requiredQueries(request);
    if (!required.includes(query)) {
      throw new ValidationError(`"${query}" is not part of the pending request`, query);
    }

    state.confirmations.set(query, identity);
    logger.info(`✅ [Disambiguation] "${query}" → ${identity.displayName} <${identity.email}>`);

    const remaining = required.filter(q => !state.confirmations.has(q));
    if (remaining.length > 0) {
      return { status: 'pending', remaining };
    }

    const participants = this.collectParticipants(required, state.confirmations);
    this.reset(state);
    return { status: 'complete', participants };
  }

  /**
   * Confirm `query` as someone outside the directory, identified by `email`
   */
  addExternal(state: DisambiguationState, query: string, email: string = query): ConfirmationResult {
    const address = email.trim();
    if (!address.includes('@')) {
      throw new ValidationError(`An email address is needed to add "${query}" as an external participant`, email);
    }
    if (!isValidEmail(address)) {
      throw new ValidationError(`Invalid email format: ${address}`, email);
    }

    const identity: ParticipantIdentity = {
      email: address,
      displayName: TextUtils.displayNameFromEmail(address),
      department: EXTERNAL_DEPARTMENT,
      title: EXTERNAL_TITLE,
      availabilityStatus: 'unknown',
    };
    return this.confirm(state, query, identity);
  }

  /**
   * What the shell should offer for each query
   */
  prompts(state: DisambiguationState): ParticipantPrompt[] {
    return state.matches.map(match => {
      const confirmed = state.confirmations.get(match.query);
      if (confirmed) {
        return { kind: 'confirmed', query: match.query, participant: confirmed };
      }
      return this.presentationOptions(match);
    });
  }

  presentationOptions(match: ParticipantMatch): ParticipantPrompt {
    if (match.candidates.length === 0) {
      return { kind: 'add_external', query: match.query };
    }
    return {
      kind: 'select',
      query: match.query,
      options: match.candidates.slice(0, RESOLUTION_LIMITS.MAX_PRESENTED_OPTIONS),
      totalCandidates: match.candidates.length,
    };
  }

  reset(state: DisambiguationState): void {
    state.confirmations.clear();
    state.request = null;
    state.matches = [];
  }

  private requiredQueries(request: ParsedRequest): string[] {
    return [...request.participantNames, ...request.participantEmails];
  }

  private collectParticipants(
    queries: readonly string[],
    confirmations: ReadonlyMap<string, ParticipantIdentity>
  ): ParticipantIdentity[] {
    const seen = new Set<string>();
    const participants: ParticipantIdentity[] = [];
    for (const query of queries) {
      const identity = confirmations.get(query);
      if (!identity) continue;
      const key = identity.email.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      participants.push(identity);
    }
    return participants;
  }
}
