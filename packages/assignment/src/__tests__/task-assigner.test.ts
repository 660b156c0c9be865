import { describe, it, expect } from 'vitest';
import type { ModelArtifact, Task, TaskResult, User } from '@taskfit/core';
import type { RegressorFactory } from '../model/regressor.js';
import { Scorer } from '../scorer.js';
import { GreedyTaskAssigner } from '../task-assigner.js';

const task: Task = { taskId: 1, type: 'Design', complexity: 0.5, deadline: 10 };

const users: User[] = [
  { userId: 1, name: 'Ava' },
  { userId: 2, name: 'Ben' },
  { userId: 3, name: 'Cleo' },
];

/** Scorer whose trained model returns a fixed score per user id. */
function scorerWith(scores: Record<number, number>): Scorer {
  const artifact: ModelArtifact = {
    version: 1,
    algorithm: 'lookup',
    trainedAt: '2025-06-01T12:00:00.000Z',
    sampleCount: 1,
    payload: {},
  };
  const factory: RegressorFactory = {
    algorithm: 'lookup',
    create: () => ({
      fit: () => undefined,
      predict: (row) => scores[row[0]] ?? 0,
      toArtifact: () => artifact,
    }),
    fromArtifact: () => {
      throw new Error('unused');
    },
  };
  const scorer = new Scorer({ factory });
  scorer.train({ features: [[1, 0, 1]], labels: [0] });
  return scorer;
}

describe('GreedyTaskAssigner', () => {
  const assigner = new GreedyTaskAssigner();

  it('picks the highest scoring user', () => {
    const pick = assigner.assign(task, users, [], scorerWith({ 1: 0.2, 2: 0.8, 3: 0.5 }));
    expect(pick).toEqual({
      userId: 2,
      userName: 'Ben',
      score: 0.8,
      predictions: [
        { userId: 1, userName: 'Ava', score: 0.2 },
        { userId: 2, userName: 'Ben', score: 0.8 },
        { userId: 3, userName: 'Cleo', score: 0.5 },
      ],
    });
  });

  it('keeps the first user on a tie', () => {
    const pick = assigner.assign(task, users, [], scorerWith({ 1: 0.4, 2: 0.7, 3: 0.7 }));
    expect(pick?.userId).toBe(2);
  });

  it('picks the first user when every score is zero', () => {
    const pick = assigner.assign(task, users, [], scorerWith({}));
    expect(pick?.userId).toBe(1);
  });

  it('skips users with a result for this exact task only', () => {
    const results: TaskResult[] = [
      { taskId: 1, userId: 2, timeTaken: 3, quality: 5 },
      { taskId: 7, userId: 1, timeTaken: 3, quality: 5 },
    ];
    const pick = assigner.assign(task, users, results, scorerWith({ 1: 0.3, 2: 0.9, 3: 0.1 }));

    expect(pick?.userId).toBe(1);
    expect(pick?.predictions.map((p) => p.userId)).toEqual([1, 3]);
  });

  it('returns null when every user already has a result for the task', () => {
    const results: TaskResult[] = users.map((u) => ({
      taskId: 1,
      userId: u.userId,
      timeTaken: 2,
      quality: 3,
    }));
    expect(assigner.assign(task, users, results, scorerWith({ 1: 1 }))).toBeNull();
  });

  it('returns null without users', () => {
    expect(assigner.assign(task, [], [], scorerWith({}))).toBeNull();
  });
});
