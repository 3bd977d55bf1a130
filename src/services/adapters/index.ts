export { InMemoryAvailabilityAdapter, type BusyWindow } from './InMemoryAvailabilityAdapter.js';
export { InMemoryDirectoryAdapter, loadDirectoryFromFile, ParticipantIdentitySchema } from './InMemoryDirectoryAdapter.js';
export { InMemoryMeetingStore } from './InMemoryMeetingStore.js';
