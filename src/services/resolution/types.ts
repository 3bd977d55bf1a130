/**
 * Participant Resolution Types
 */

import type { ParticipantIdentity, ParticipantMatch } from '../../types/index.js';

/**
 * Which rule matched a directory entry to a name query, strongest first
 */
export type NameMatchKind = 'exact' | 'first_name' | 'last_name' | 'substring' | 'token';

export interface RankedCandidate {
  identity: ParticipantIdentity;
  kind: NameMatchKind;
}

export interface ParticipantListIssues {
  invalidEmails: string[];
  duplicates: string[];
  missingInfo: string[];
}

export interface IParticipantResolver {
  resolve(names: readonly string[], emails: readonly string[]): Promise<ParticipantMatch[]>;
  suggest(partialName: string, limit?: number): Promise<ParticipantIdentity[]>;
  validateParticipants(participants: readonly ParticipantIdentity[]): ParticipantListIssues;
}
