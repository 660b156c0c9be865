import type { CandidateScore, Task, TaskResult, User } from '@taskfit/core';
import type { Scorer } from './scorer.js';

export interface AssignmentPick {
  userId: number;
  userName: string;
  score: number;
  /** Every eligible user's score, in user order */
  predictions: CandidateScore[];
}

export interface ITaskAssigner {
  assign(task: Task, users: User[], results: TaskResult[], scorer: Scorer): AssignmentPick | null;
}

/**
 * Greedy best-scorer policy. A user is eligible unless a result already exists
 * for this exact (task, user) pair. Highest score wins; on a tie the user met
 * first keeps the task, so a fixed user order gives a fixed pick.
 */
export class GreedyTaskAssigner implements ITaskAssigner {
  assign(task: Task, users: User[], results: TaskResult[], scorer: Scorer): AssignmentPick | null {
    if (users.length === 0) return null;

    const finishedBy = new Set(
      results.filter((r) => r.taskId === task.taskId).map((r) => r.userId),
    );

    const predictions: CandidateScore[] = [];
    let best: CandidateScore | null = null;

    for (const user of users) {
      if (finishedBy.has(user.userId)) continue;

      const score = scorer.predict(user.userId, task);
      const candidate = { userId: user.userId, userName: user.name, score };
      predictions.push(candidate);

      if (!best || score > best.score) {
        best = candidate;
      }
    }

    if (!best) return null;
    return { ...best, predictions };
  }
}
