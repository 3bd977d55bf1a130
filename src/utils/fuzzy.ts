import Fuse from 'fuse.js';
import { FuzzyConfig, toFuseThreshold } from '../config/fuzzy.js';
import { logger } from './logger.js';

/**
 * Fuzzy matching for directory search, on top of Fuse.js
 */

export interface FuzzyMatch<T> {
  item: T;
  score: number; // 0-1, higher is better
}

export class FuzzyMatcher {
  /**
   * Best matches for `query`, highest score first
   * @param keys - Object keys searched
   * @param threshold - Minimum similarity (0-1)
   */
  static search<T>(
    query: string,
    items: readonly T[],
    keys: string[],
    threshold: number = FuzzyConfig.DEFAULT_SIMILARITY_THRESHOLD
  ): FuzzyMatch<T>[] {
    const fuse = new Fuse([...items], {
      keys,
      threshold: toFuseThreshold(threshold),
      includeScore: FuzzyConfig.FUSE_CONFIG.INCLUDE_SCORE,
      ignoreLocation: FuzzyConfig.FUSE_CONFIG.IGNORE_LOCATION,
      minMatchCharLength: FuzzyConfig.MIN_MATCH_CHARACTER_LENGTH,
    });

    const matches = fuse
      .search(query)
      .map(result => ({
        item: result.item,
        score: 1 - (result.score ?? 0),
      }))
      .filter(match => match.score >= threshold)
      .sort((a, b) => b.score - a.score);

    logger.debug(`🔍 [FuzzyMatcher] "${query}" over ${items.length} items → ${matches.length} match(es)`);
    return matches;
  }
}
