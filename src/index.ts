/**
 * OpenTimeline resolution engine.
 */

export * from './engine';

// Storage
export type * from './storage/types';
export { createEmptyDataset } from './storage/types';
export { InMemoryTimelineStore } from './storage/memoryStore';
export {
  BackupFormatError,
  ENTITIES_FILE,
  TIMELINES_FILE,
  loadBackupDirectory,
  parseBackup,
} from './storage/backupFileStore';

// State stores
export { createTimelineStore } from './store/timelineStore';
export type { TimelineStoreState } from './store/timelineStore';
export { createQuizStore } from './store/quizStore';
export type { QuizState } from './store/quizStore';
