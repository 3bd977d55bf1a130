/**
 * Participant Resolution Module
 */

export * from './types.js';
export * from './resolution-config.js';
export { ParticipantEntityResolver, classifyNameMatch, needsDisambiguation } from './ParticipantEntityResolver.js';
