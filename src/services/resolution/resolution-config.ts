/**
 * Resolution Configuration
 *
 * Confidence table and limits for participant resolution.
 */

import type { NameMatchKind } from './types.js';

// ============================================================================
// LIMITS
// ============================================================================

export const RESOLUTION_LIMITS = {
  /** Candidates kept per query */
  MAX_CANDIDATES: 10,

  /** Selectable options shown for an ambiguous query */
  MAX_PRESENTED_OPTIONS: 5,

  /** Default size of autocomplete suggestions */
  SUGGESTION_LIMIT: 5,

  /** Name queries this short (after trimming) are skipped */
  MIN_NAME_QUERY_LENGTH: 2,
} as const;

// ============================================================================
// CONFIDENCE
// ============================================================================

export const EMAIL_CONFIDENCE = {
  DIRECTORY_HIT: 1.0,
  UNKNOWN_ADDRESS: 0.8,
} as const;

/**
 * [single candidate, multiple candidates] per kind of best match.
 * Token overlap is computed separately.
 */
export const NAME_CONFIDENCE: Record<Exclude<NameMatchKind, 'token'>, readonly [number, number]> = {
  exact: [1.0, 1.0],
  first_name: [0.9, 0.7],
  last_name: [0.8, 0.6],
  substring: [0.7, 0.5],
};

export const TOKEN_OVERLAP_CONFIDENCE = {
  BASE: 0.3,
  PER_TOKEN: 0.1,
  CAP: 0.6,
} as const;

/**
 * Rank used to order candidates; lower comes first
 */
export const MATCH_KIND_RANK: Record<NameMatchKind, number> = {
  exact: 0,
  first_name: 1,
  last_name: 2,
  substring: 3,
  token: 4,
};
