import type { TaskId } from './task.js';
import type { UserId } from './user.js';

/** One completion outcome. The result log is append-only. */
export interface TaskResult {
  taskId: TaskId;
  userId: UserId;
  /** Hours, as reported by the caller */
  timeTaken: number;
  /** 1-5 */
  quality: number;
}
