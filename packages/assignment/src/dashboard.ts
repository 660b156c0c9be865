import type {
  ActiveTaskView,
  DashboardSnapshot,
  ProgressRecord,
  ResultStats,
  SkillLevel,
  Task,
  TaskOverview,
  TaskResult,
  User,
  UserPerformance,
  UserSkills,
} from '@taskfit/core';
import { SKILL_THRESHOLDS } from '@taskfit/core';
import { hoursBetween } from './utils/time.js';

export interface DashboardInput {
  users: User[];
  tasks: Task[];
  results: TaskResult[];
  progress: ProgressRecord[];
  trained: boolean;
}

export function skillLevel(averageQuality: number): SkillLevel {
  for (const { level, minQuality } of SKILL_THRESHOLDS) {
    if (averageQuality >= minQuality) return level;
  }
  return 'Learning';
}

function average(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function resultStats(results: TaskResult[]): ResultStats | null {
  if (results.length === 0) return null;
  return {
    totalCompleted: results.length,
    averageQuality: average(results.map((r) => r.quality)),
    averageTimeTaken: average(results.map((r) => r.timeTaken)),
  };
}

export function userPerformance(users: User[], results: TaskResult[]): UserPerformance[] {
  const rows: UserPerformance[] = [];
  for (const user of users) {
    const own = results.filter((r) => r.userId === user.userId);
    if (own.length === 0) continue;
    const averageQuality = average(own.map((r) => r.quality));
    rows.push({
      userId: user.userId,
      name: user.name,
      averageQuality,
      averageTimeTaken: average(own.map((r) => r.timeTaken)),
      tasksDone: own.length,
      skillLevel: skillLevel(averageQuality),
    });
  }
  return rows;
}

/** Per user, per task type skill buckets. Results for removed tasks are ignored. */
export function userSkills(users: User[], tasks: Task[], results: TaskResult[]): UserSkills[] {
  const typeOf = new Map(tasks.map((t) => [t.taskId, t.type]));
  const out: UserSkills[] = [];

  for (const user of users) {
    const byType = new Map<string, TaskResult[]>();
    for (const result of results) {
      if (result.userId !== user.userId) continue;
      const type = typeOf.get(result.taskId);
      if (type === undefined) continue;
      const bucket = byType.get(type) ?? [];
      bucket.push(result);
      byType.set(type, bucket);
    }
    if (byType.size === 0) continue;

    out.push({
      userId: user.userId,
      name: user.name,
      skills: Array.from(byType, ([type, bucket]) => {
        const averageQuality = average(bucket.map((r) => r.quality));
        return {
          type,
          averageQuality,
          averageTimeTaken: average(bucket.map((r) => r.timeTaken)),
          skillLevel: skillLevel(averageQuality),
        };
      }),
    });
  }
  return out;
}

export function activeTasks(progress: ProgressRecord[], now: Date): ActiveTaskView[] {
  const views: ActiveTaskView[] = [];
  for (const record of progress) {
    if (record.status === 'completed') continue;
    const latest = record.updates[record.updates.length - 1];
    views.push({
      taskId: record.taskId,
      userId: record.userId,
      userName: record.userName,
      taskType: record.taskType,
      complexity: record.complexity,
      deadline: record.deadline,
      status: record.status,
      elapsedHours: hoursBetween(record.startTime, now),
      latestPercent: latest ? latest.progressPercent : null,
      latestNotes: latest ? latest.notes : null,
    });
  }
  return views;
}

/** Read-only projection over the store; holds no state of its own. */
export function buildDashboardSnapshot(input: DashboardInput, now: Date): DashboardSnapshot {
  const completedTaskIds = new Set(input.results.map((r) => r.taskId));

  return {
    users: input.users,
    tasks: input.tasks.map((task): TaskOverview => ({
      ...task,
      status: completedTaskIds.has(task.taskId) ? 'completed' : 'pending',
    })),
    stats: resultStats(input.results),
    userPerformance: userPerformance(input.users, input.results),
    skills: userSkills(input.users, input.tasks, input.results),
    activeTasks: activeTasks(input.progress, now),
    model: { trained: input.trained, mode: input.trained ? 'model' : 'random' },
  };
}
