import type { User } from '../models/user.js';
import type { Task } from '../models/task.js';
import type { TaskResult } from '../models/task-result.js';
import type { ProgressRecord } from '../models/progress.js';
import type { Assignment, TrainingSummary } from '../models/assignment.js';

export interface UserAddedEvent {
  user: User;
}

export interface UserRemovedEvent {
  user: User;
}

export interface TaskAddedEvent {
  task: Task;
}

export interface TaskRemovedEvent {
  task: Task;
}

export interface TaskAssignedEvent {
  assignment: Assignment;
  progress: ProgressRecord;
}

export interface ProgressUpdatedEvent {
  progress: ProgressRecord;
}

export interface ResultRecordedEvent {
  result: TaskResult;
  progress: ProgressRecord | null;
}

export interface ModelTrainedEvent {
  summary: TrainingSummary;
}

export const Events = {
  USER_ADDED: 'user:added',
  USER_REMOVED: 'user:removed',
  TASK_ADDED: 'task:added',
  TASK_REMOVED: 'task:removed',
  TASK_ASSIGNED: 'task:assigned',
  PROGRESS_UPDATED: 'progress:updated',
  RESULT_RECORDED: 'result:recorded',
  MODEL_TRAINED: 'model:trained',
  DATA_RESET: 'data:reset',
} as const;

export type EventName = (typeof Events)[keyof typeof Events];
