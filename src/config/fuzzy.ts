/**
 * Fuzzy Matching Configuration
 * Constants for directory search
 */

export const FuzzyConfig = {
  /**
   * Minimum similarity score (0-1, higher is more strict)
   */
  DEFAULT_SIMILARITY_THRESHOLD: 0.6,

  /**
   * Shorter matched runs are ignored to avoid false positives
   */
  MIN_MATCH_CHARACTER_LENGTH: 2,

  FUSE_CONFIG: {
    /**
     * true = match anywhere in the string, not just at the start
     */
    IGNORE_LOCATION: true,
    INCLUDE_SCORE: true,
  },
} as const;

/**
 * Fuse uses distance (lower is better), we use similarity (higher is better)
 */
export function toFuseThreshold(similarityThreshold: number): number {
  return 1 - similarityThreshold;
}
