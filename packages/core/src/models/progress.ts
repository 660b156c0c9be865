import type { TaskId } from './task.js';
import type { UserId } from './user.js';

export type ProgressStatus = 'assigned' | 'in_progress' | 'completed';

export interface ProgressUpdate {
  timestamp: string;
  progressPercent: number;
  notes: string;
}

export interface ProgressRecord {
  taskId: TaskId;
  userId: UserId;
  userName: string;
  /** Task metadata captured at assignment time */
  taskType: string;
  complexity: number;
  deadline: number;
  status: ProgressStatus;
  startTime: string;
  updates: ProgressUpdate[];
  /** Set iff status is 'completed' */
  completionTime: string | null;
  /** Caller-reported hours from the matching result */
  actualTimeTaken?: number;
  /** Wall-clock hours between startTime and completionTime */
  actualDuration?: number;
}

/** Progress records keyed by `progressKey(taskId, userId)` */
export type ProgressTable = Record<string, ProgressRecord>;

export function progressKey(taskId: TaskId, userId: UserId): string {
  return `${taskId}_${userId}`;
}

export function isActive(record: ProgressRecord): boolean {
  return record.status === 'assigned' || record.status === 'in_progress';
}
