import type { TaskId } from './task.js';
import type { UserId } from './user.js';
import type { TaskResult } from './task-result.js';
import type { ProgressRecord } from './progress.js';

/** 'random' means the scorer was untrained and the pick carries no signal */
export type AssignmentConfidence = 'model' | 'random';

export interface CandidateScore {
  userId: UserId;
  userName: string;
  score: number;
}

export interface Assignment {
  taskId: TaskId;
  userId: UserId;
  userName: string;
  score: number;
  confidence: AssignmentConfidence;
  predictions: CandidateScore[];
}

export type SkipReason = 'completed' | 'active' | 'no_eligible_user';

export interface AssignAllReport {
  assignments: Assignment[];
  skipped: Array<{ taskId: TaskId; reason: SkipReason }>;
}

export interface CompletionAnalytics {
  actualDuration: number;
  /** Positive when finished ahead of the deadline */
  deadlineVariancePercent: number;
}

export interface RecordedResult {
  result: TaskResult;
  /** null when the pair was never assigned through the tracker */
  progress: ProgressRecord | null;
  analytics: CompletionAnalytics | null;
}

export interface TrainingSummary {
  sampleCount: number;
  trainedAt: string;
}
