/**
 * ParticipantEntityResolver
 *
 * Maps name and email queries to directory identities.
 * Handles:
 * - Exact email lookup, with a synthesized identity for unknown addresses
 * - Rule-ranked name matching (exact → first → last → substring → token)
 * - Confidence scoring and exactness flags that drive disambiguation
 */

import { describeError } from '../../errors/SchedulingErrors.js';
import type { ParticipantIdentity, ParticipantMatch } from '../../types/index.js';
import type { DirectoryProvider } from '../../types/providers.js';
import { logger } from '../../utils/logger.js';
import { isValidEmail, TextUtils } from '../../utils/text.js';
import {
  EMAIL_CONFIDENCE,
  MATCH_KIND_RANK,
  NAME_CONFIDENCE,
  RESOLUTION_LIMITS,
  TOKEN_OVERLAP_CONFIDENCE,
} from './resolution-config.js';
import type {
  IParticipantResolver,
  NameMatchKind,
  ParticipantListIssues,
  RankedCandidate,
} from './types.js';

/**
 * Any match that is not a single exact hit needs the user to confirm
 */
export function needsDisambiguation(matches: readonly ParticipantMatch[]): boolean {
  return matches.some(match => !match.isExact || match.candidates.length > 1);
}

export function classifyNameMatch(query: string, displayName: string): NameMatchKind | null {
  const normalizedQuery = TextUtils.normalize(query);
  const normalizedName = TextUtils.normalize(displayName);
  if (!normalizedQuery || !normalizedName) return null;

  if (normalizedQuery === normalizedName) return 'exact';

  const nameTokens = normalizedName.split(' ');
  if (normalizedQuery === nameTokens[0]) return 'first_name';
  if (nameTokens.length > 1 && normalizedQuery === nameTokens[nameTokens.length - 1]) return 'last_name';

  if (normalizedName.includes(normalizedQuery) || normalizedQuery.includes(normalizedName)) {
    return 'substring';
  }

  const queryTokens = normalizedQuery.split(' ');
  const overlaps = queryTokens.some(queryToken =>
    nameTokens.some(nameToken => nameToken.includes(queryToken) || queryToken.includes(nameToken))
  );
  return overlaps ? 'token' : null;
}

export class ParticipantEntityResolver implements IParticipantResolver {
  constructor(private readonly directory: DirectoryProvider) {}

  /**
   * One match per query: emails first, then names, input order within each group
   */
  async resolve(names: readonly string[], emails: readonly string[]): Promise<ParticipantMatch[]> {
    const matches: ParticipantMatch[] = [];

    for (const email of emails) {
      const match = await this.resolveEmail(email);
      if (match) {
        matches.push(match);
      }
    }

    const nameQueries = names.filter(name => name.trim().length >= RESOLUTION_LIMITS.MIN_NAME_QUERY_LENGTH);
    if (nameQueries.length > 0) {
      const directory = await this.loadDirectory();
      for (const name of nameQueries) {
        matches.push(this.resolveName(name, directory));
      }
    }

    logger.info(
      `👥 [ParticipantResolver] Resolved ${matches.length} queries: ` +
        matches.map(m => `"${m.query}"→${m.candidates.length} (${m.confidence.toFixed(2)})`).join(', ')
    );
    return matches;
  }

  /**
   * Autocomplete suggestions from the directory search
   */
  async suggest(partialName: string, limit: number = RESOLUTION_LIMITS.SUGGESTION_LIMIT): Promise<ParticipantIdentity[]> {
    if (!partialName.trim()) return [];
    try {
      return await this.directory.search(partialName.trim(), limit);
    } catch (error) {
      logger.warn(`⚠️ [ParticipantResolver] Directory search failed for "${partialName}": ${describeError(error)}`);
      return [];
    }
  }

  validateParticipants(participants: readonly ParticipantIdentity[]): ParticipantListIssues {
    const issues: ParticipantListIssues = { invalidEmails: [], duplicates: [], missingInfo: [] };
    const seen = new Set<string>();

    for (const participant of participants) {
      if (!isValidEmail(participant.email)) {
        issues.invalidEmails.push(participant.email);
      }

      const key = participant.email.toLowerCase();
      if (seen.has(key)) {
        issues.duplicates.push(participant.email);
      } else {
        seen.add(key);
      }

      if (!participant.displayName.trim()) {
        issues.missingInfo.push(`Missing name for ${participant.email}`);
      }
    }

    return issues;
  }

  // ==========================================================================
  // EMAIL QUERIES
  // ==========================================================================

  private async resolveEmail(email: string): Promise<ParticipantMatch | null> {
    const query = email.trim();
    if (!isValidEmail(query)) {
      logger.warn(`⚠️ [ParticipantResolver] Skipping malformed email query "${email}"`);
      return null;
    }

    const known = await this.lookupEmail(query);
    if (known) {
      return {
        query: email,
        candidates: [known],
        confidence: EMAIL_CONFIDENCE.DIRECTORY_HIT,
        isExact: true,
        isEmailQuery: true,
      };
    }

    return {
      query: email,
      candidates: [
        {
          email: query,
          displayName: TextUtils.displayNameFromEmail(query),
          availabilityStatus: 'unknown',
        },
      ],
      confidence: EMAIL_CONFIDENCE.UNKNOWN_ADDRESS,
      isExact: false,
      isEmailQuery: true,
    };
  }

  private async lookupEmail(email: string): Promise<ParticipantIdentity | null> {
    try {
      return await this.directory.getByEmail(email);
    } catch (error) {
      logger.warn(`⚠️ [ParticipantResolver] Directory lookup failed for ${email}: ${describeError(error)}`);
      return null;
    }
  }

  // ==========================================================================
  // NAME QUERIES
  // ==========================================================================

  private async loadDirectory(): Promise<ParticipantIdentity[]> {
    try {
      return await this.directory.listParticipants();
    } catch (error) {
      logger.warn(`⚠️ [ParticipantResolver] Directory listing failed: ${describeError(error)}`);
      return [];
    }
  }

  private resolveName(name: string, directory: readonly ParticipantIdentity[]): ParticipantMatch {
    const ranked = this.rankCandidates(name, directory);
    const candidates = ranked.map(candidate => candidate.identity);

    const isExact =
      candidates.length === 1 &&
      TextUtils.normalize(candidates[0].displayName) === TextUtils.normalize(name);

    return {
      query: name,
      candidates,
      confidence: this.calculateNameConfidence(name, ranked),
      isExact,
      isEmailQuery: false,
    };
  }

  private rankCandidates(name: string, directory: readonly ParticipantIdentity[]): RankedCandidate[] {
    const seen = new Set<string>();
    const ranked: RankedCandidate[] = [];

    for (const identity of directory) {
      const key = identity.email.toLowerCase();
      if (seen.has(key)) continue;

      const kind = classifyNameMatch(name, identity.displayName);
      if (!kind) continue;

      seen.add(key);
      ranked.push({ identity, kind });
    }

    // Array sort is stable: directory order survives within a rank
    return ranked
      .sort((a, b) => MATCH_KIND_RANK[a.kind] - MATCH_KIND_RANK[b.kind])
      .slice(0, RESOLUTION_LIMITS.MAX_CANDIDATES);
  }

  private calculateNameConfidence(name: string, ranked: readonly RankedCandidate[]): number {
    if (ranked.length === 0) return 0;

    const best = ranked[0];
    if (best.kind === 'token') {
      const queryTokens = new Set(TextUtils.tokens(name));
      const nameTokens = new Set(TextUtils.tokens(best.identity.displayName));
      const overlap = [...nameTokens].filter(token => queryTokens.has(token)).length;
      if (overlap === 0) return TOKEN_OVERLAP_CONFIDENCE.BASE;
      return Math.min(
        TOKEN_OVERLAP_CONFIDENCE.CAP,
        TOKEN_OVERLAP_CONFIDENCE.BASE + overlap * TOKEN_OVERLAP_CONFIDENCE.PER_TOKEN
      );
    }

    const [single, multiple] = NAME_CONFIDENCE[best.kind];
    return ranked.length === 1 ? single : multiple;
  }
}
