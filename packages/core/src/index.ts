export type { User, UserId } from './models/user.js';
export type { Task, TaskId, NewTask } from './models/task.js';
export type { TaskResult } from './models/task-result.js';
export type {
  ProgressStatus,
  ProgressUpdate,
  ProgressRecord,
  ProgressTable,
} from './models/progress.js';
export { progressKey, isActive } from './models/progress.js';
export type {
  AssignmentConfidence,
  CandidateScore,
  Assignment,
  SkipReason,
  AssignAllReport,
  CompletionAnalytics,
  RecordedResult,
  TrainingSummary,
} from './models/assignment.js';
export type {
  SkillLevel,
  TaskOverview,
  ResultStats,
  UserPerformance,
  TypeSkill,
  UserSkills,
  ActiveTaskView,
  DashboardSnapshot,
} from './models/dashboard.js';
export type { ModelArtifact } from './models/model-artifact.js';

export type { IDataStore, ResultFilter } from './ports/data-store.js';
export type { IProgressStore } from './ports/progress-store.js';
export type { IModelStore } from './ports/model-store.js';
export type { IEventBus, EventHandler } from './ports/event-bus.js';

export * from './events/index.js';
export * from './constants.js';
export * from './errors.js';
export * from './schemas.js';
export * from './logger.js';
