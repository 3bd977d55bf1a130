/**
 * Meeting Scheduler Core
 *
 * Free-text meeting requests → resolved participants → a window
 * when everyone is free → a meeting draft handed to a store.
 */

export * from './types/index.js';
export * from './types/payloads.js';
export * from './types/providers.js';
export * from './errors/SchedulingErrors.js';

export {
  DEFAULT_SCHEDULING_CONFIG,
  loadSchedulingConfig,
  type SchedulingConfig,
  type UnknownAvailabilityPolicy,
  type WorkingHours,
} from './config/environment.js';

export { RequestParser, isUnderstood } from './services/parsing/RequestParser.js';
export { durationLabel, durationLabelToMinutes } from './services/parsing/extractors/durationStrategies.js';
export * from './services/resolution/index.js';
export * from './services/disambiguation/DisambiguationCoordinator.js';
export { AvailabilityEngine } from './services/availability/AvailabilityEngine.js';
export * from './services/availability/types.js';
export * from './services/adapters/index.js';
export { ConversationLock, runExclusive, type RunExclusiveResult } from './services/concurrency/ConversationLock.js';

export {
  ConversationRegistry,
  createConversationContext,
  type ConversationContext,
  type PendingMeetingInfo,
} from './orchestration/ConversationContext.js';
export { MeetingOrchestrator, type MeetingOrchestratorOptions } from './orchestration/MeetingOrchestrator.js';
export { createMeetingDraft, generateDraftId, generateMeetingTitle } from './orchestration/meetingDraft.js';
export { parseTimeString } from './utils/time.js';
export { logger } from './utils/logger.js';
