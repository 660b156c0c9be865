import type { Task, TaskResult, User } from '@taskfit/core';
import { EFFICIENCY_WEIGHT, MAX_QUALITY, QUALITY_WEIGHT } from '@taskfit/core';
import type { FeatureRow } from './model/regressor.js';

export interface TrainingSet {
  features: FeatureRow[];
  labels: number[];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** `clamp(1 - timeTaken / deadline, 0, 1)`: overruns contribute nothing. */
export function efficiencyTerm(timeTaken: number, deadline: number): number {
  return clamp(1 - timeTaken / deadline, 0, 1);
}

/** Success label in [0, 1]: 70% normalised quality, 30% deadline efficiency. */
export function successLabel(quality: number, timeTaken: number, deadline: number): number {
  return QUALITY_WEIGHT * (quality / MAX_QUALITY) + EFFICIENCY_WEIGHT * efficiencyTerm(timeTaken, deadline);
}

/** Feature vector for scoring a (user, task) pair. */
export function featureRow(userId: number, task: Pick<Task, 'complexity' | 'deadline'>): FeatureRow {
  return [userId, task.complexity, task.deadline];
}

/**
 * Inner-join results with their task and user and build the supervised table.
 * Results whose task or user is gone are dropped. Returns null when nothing
 * is left to learn from.
 */
export function buildTrainingSet(
  users: User[],
  tasks: Task[],
  results: TaskResult[],
): TrainingSet | null {
  if (results.length === 0) return null;

  const tasksById = new Map(tasks.map((t) => [t.taskId, t]));
  const userIds = new Set(users.map((u) => u.userId));

  const features: FeatureRow[] = [];
  const labels: number[] = [];
  for (const result of results) {
    const task = tasksById.get(result.taskId);
    if (!task || !userIds.has(result.userId)) continue;

    features.push(featureRow(result.userId, task));
    labels.push(successLabel(result.quality, result.timeTaken, task.deadline));
  }

  return features.length > 0 ? { features, labels } : null;
}
