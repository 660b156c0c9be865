import type {
  IProgressStore,
  ProgressRecord,
  ProgressTable,
  Task,
  TaskId,
  User,
  UserId,
} from '@taskfit/core';
import { NotFoundError, isActive, progressKey } from '@taskfit/core';
import { hoursBetween } from './utils/time.js';

/**
 * Per-assignment state machine: assigned → in_progress → completed.
 * Completion is final; later updates are kept in the history but never move
 * the status or the completion time. Every change rewrites the whole table
 * through the store before the in-memory copy is replaced.
 */
export class ProgressTracker {
  private table: ProgressTable = {};

  constructor(
    private readonly store: IProgressStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async load(): Promise<void> {
    this.table = await this.store.load();
  }

  get(taskId: TaskId, userId: UserId): ProgressRecord | null {
    return this.table[progressKey(taskId, userId)] ?? null;
  }

  list(): ProgressRecord[] {
    return Object.values(this.table);
  }

  listActive(): ProgressRecord[] {
    return this.list().filter(isActive);
  }

  /** True when any user holds an assigned or in-progress record for the task. */
  hasActive(taskId: TaskId): boolean {
    return this.listActive().some((r) => r.taskId === taskId);
  }

  /** True when some user has taken the task to completion. */
  hasCompleted(taskId: TaskId): boolean {
    return this.list().some((r) => r.taskId === taskId && r.status === 'completed');
  }

  /**
   * Begin tracking; replaces an earlier open record for the same pair. A
   * completed record is kept as it is and returned unchanged.
   */
  async start(task: Task, user: User): Promise<ProgressRecord> {
    const existing = this.get(task.taskId, user.userId);
    if (existing?.status === 'completed') return existing;

    const record: ProgressRecord = {
      taskId: task.taskId,
      userId: user.userId,
      userName: user.name,
      taskType: task.type,
      complexity: task.complexity,
      deadline: task.deadline,
      status: 'assigned',
      startTime: this.now().toISOString(),
      updates: [],
      completionTime: null,
    };
    await this.commit({ ...this.table, [progressKey(task.taskId, user.userId)]: record });
    return record;
  }

  async update(
    taskId: TaskId,
    userId: UserId,
    progressPercent: number,
    notes = '',
  ): Promise<ProgressRecord> {
    const key = progressKey(taskId, userId);
    const existing = this.table[key];
    if (!existing) {
      throw new NotFoundError('progress', key);
    }

    const now = this.now();
    const record: ProgressRecord = {
      ...existing,
      updates: [...existing.updates, { timestamp: now.toISOString(), progressPercent, notes }],
    };

    if (existing.status !== 'completed') {
      if (progressPercent < 100) {
        record.status = 'in_progress';
      } else {
        record.status = 'completed';
        record.completionTime = now.toISOString();
        record.actualDuration = hoursBetween(existing.startTime, now);
      }
    }

    await this.commit({ ...this.table, [key]: record });
    return record;
  }

  /**
   * Close the record when a result is recorded for the pair. Returns null if
   * the pair was never tracked.
   */
  async complete(taskId: TaskId, userId: UserId, timeTaken: number): Promise<ProgressRecord | null> {
    const key = progressKey(taskId, userId);
    const existing = this.table[key];
    if (!existing) return null;

    const record: ProgressRecord = { ...existing, actualTimeTaken: timeTaken };
    if (existing.status !== 'completed') {
      const now = this.now();
      record.status = 'completed';
      record.completionTime = now.toISOString();
      record.actualDuration = hoursBetween(existing.startTime, now);
    }

    await this.commit({ ...this.table, [key]: record });
    return record;
  }

  /** Put back a record captured before a change whose follow-up write failed. */
  async revert(previous: ProgressRecord): Promise<void> {
    await this.commit({ ...this.table, [progressKey(previous.taskId, previous.userId)]: previous });
  }

  /** Drop every record matching the predicate. Returns how many went. */
  async removeWhere(predicate: (record: ProgressRecord) => boolean): Promise<number> {
    const next: ProgressTable = {};
    let removed = 0;
    for (const [key, record] of Object.entries(this.table)) {
      if (predicate(record)) {
        removed++;
      } else {
        next[key] = record;
      }
    }
    if (removed > 0) {
      await this.commit(next);
    }
    return removed;
  }

  async clear(): Promise<void> {
    await this.commit({});
  }

  private async commit(next: ProgressTable): Promise<void> {
    await this.store.save(next);
    this.table = next;
  }
}
