/**
 * RequestParser
 *
 * Turns a free-form meeting request into a ParsedRequest.
 * Every field has its own extractor; a failing extractor is logged
 * and leaves its field empty, so parse() never throws.
 */

import { CONFIDENCE_WEIGHTS, MIN_UNDERSTOOD_CONFIDENCE } from '../../config/parsing-config.js';
import { ParseError } from '../../errors/SchedulingErrors.js';
import type { DateKey, MentionedPriority, ParsedRequest } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { DATE_STRATEGIES } from './extractors/dateStrategies.js';
import {
  countMeetingKeywords,
  extractDescription,
  PRIORITY_STRATEGIES,
  TITLE_STRATEGIES,
} from './extractors/detailStrategies.js';
import { DURATION_STRATEGIES } from './extractors/durationStrategies.js';
import { extractEmails, extractParticipantNames } from './extractors/participantExtractors.js';
import { TIME_STRATEGIES } from './extractors/timeStrategies.js';
import { firstMatch, type ExtractionContext } from './types.js';

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function isUnderstood(request: ParsedRequest): boolean {
  return request.confidence >= MIN_UNDERSTOOD_CONFIDENCE;
}

export type ParsedFields = Omit<ParsedRequest, 'originalText' | 'confidence'>;

export class RequestParser {
  parse(text: string, referenceDate: Date = new Date()): ParsedRequest {
    const trimmed = text.trim();
    if (!trimmed) {
      return {
        originalText: trimmed,
        title: null,
        participantNames: [],
        participantEmails: [],
        dateMentioned: null,
        timeMentioned: null,
        durationMentioned: null,
        priorityMentioned: null,
        description: null,
        confidence: 0,
      };
    }

    const context: ExtractionContext = { referenceDate };

    const fields: ParsedFields = {
      participantNames: this.guard<string[]>('participantNames', [], () => extractParticipantNames(trimmed)),
      participantEmails: this.guard<string[]>('participantEmails', [], () => extractEmails(trimmed)),
      dateMentioned: this.guard<DateKey | null>('date', null, () => firstMatch(DATE_STRATEGIES, trimmed, context)),
      timeMentioned: this.guard<string | null>('time', null, () => firstMatch(TIME_STRATEGIES, trimmed, context)),
      durationMentioned: this.guard<string | null>('duration', null, () =>
        firstMatch(DURATION_STRATEGIES, trimmed, context)
      ),
      priorityMentioned: this.guard<MentionedPriority | null>('priority', null, () =>
        firstMatch(PRIORITY_STRATEGIES, trimmed, context)
      ),
      title: this.guard<string | null>('title', null, () => firstMatch(TITLE_STRATEGIES, trimmed, context)),
      description: this.guard<string | null>('description', null, () => extractDescription(trimmed)),
    };

    const confidence = this.scoreSafely(trimmed, fields);

    logger.debug(
      `🧩 [RequestParser] names=${fields.participantNames.length} emails=${fields.participantEmails.length} ` +
        `date=${fields.dateMentioned ?? '-'} time=${fields.timeMentioned ?? '-'} confidence=${confidence.toFixed(2)}`
    );

    return { originalText: trimmed, ...fields, confidence };
  }

  /**
   * Weighted presence score, clamped to [0, 1]
   */
  calculateConfidence(text: string, fields: ParsedFields): number {
    let confidence: number = CONFIDENCE_WEIGHTS.BASE;

    if (fields.participantNames.length > 0 || fields.participantEmails.length > 0) {
      confidence += CONFIDENCE_WEIGHTS.PARTICIPANTS;
    }
    if (fields.dateMentioned) confidence += CONFIDENCE_WEIGHTS.DATE;
    if (fields.timeMentioned) confidence += CONFIDENCE_WEIGHTS.TIME;
    if (fields.durationMentioned) confidence += CONFIDENCE_WEIGHTS.DURATION;
    if (fields.title) confidence += CONFIDENCE_WEIGHTS.TITLE;

    confidence += Math.min(
      countMeetingKeywords(text) * CONFIDENCE_WEIGHTS.PER_KEYWORD,
      CONFIDENCE_WEIGHTS.KEYWORD_CAP
    );

    return clampConfidence(confidence);
  }

  private scoreSafely(text: string, fields: ParsedFields): number {
    try {
      return this.calculateConfidence(text, fields);
    } catch (error) {
      logger.warn(`⚠️ [RequestParser] ${new ParseError('confidence', error).message}`);
      return CONFIDENCE_WEIGHTS.FAILURE_FLOOR;
    }
  }

  private guard<T>(field: string, fallback: T, extract: () => T): T {
    try {
      return extract();
    } catch (error) {
      logger.warn(`⚠️ [RequestParser] ${new ParseError(field, error).message}`);
      return fallback;
    }
  }
}
