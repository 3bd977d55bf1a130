/**
 * In-process meeting store. Saving is an upsert keyed on the draft id,
 * so retrying a save never duplicates a meeting.
 */

import type { MeetingDraft } from '../../types/index.js';
import type { MeetingStore, SaveResult } from '../../types/providers.js';
import { logger } from '../../utils/logger.js';

function copyMeeting(meeting: MeetingDraft): MeetingDraft {
  return {
    ...meeting,
    participants: meeting.participants.map(p => ({ ...p })),
    startTime: meeting.startTime && new Date(meeting.startTime),
    endTime: meeting.endTime && new Date(meeting.endTime),
  };
}

export class InMemoryMeetingStore implements MeetingStore {
  private readonly meetings = new Map<string, MeetingDraft>();

  async save(draft: MeetingDraft): Promise<SaveResult> {
    if (!draft.id) {
      return { success: false, error: 'Meeting has no identifier' };
    }
    this.meetings.set(draft.id, copyMeeting(draft));
    logger.info(`💾 [MeetingStore] Saved ${draft.id} (${draft.participants.length} participants)`);
    return { success: true };
  }

  get(id: string): MeetingDraft | null {
    const meeting = this.meetings.get(id);
    return meeting ? copyMeeting(meeting) : null;
  }

  list(): MeetingDraft[] {
    return [...this.meetings.values()].map(copyMeeting);
  }
}
