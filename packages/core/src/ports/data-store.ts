import type { User, UserId } from '../models/user.js';
import type { NewTask, Task, TaskId } from '../models/task.js';
import type { TaskResult } from '../models/task-result.js';

export interface ResultFilter {
  taskId?: TaskId;
  userId?: UserId;
}

/**
 * Users, tasks and the result log. Removing a user or task also drops every
 * result that references it.
 */
export interface IDataStore {
  listUsers(): Promise<User[]>;
  getUser(userId: UserId): Promise<User | null>;
  addUser(name: string): Promise<User>;
  removeUser(userId: UserId): Promise<User | null>;

  listTasks(): Promise<Task[]>;
  getTask(taskId: TaskId): Promise<Task | null>;
  addTask(input: NewTask): Promise<Task>;
  removeTask(taskId: TaskId): Promise<Task | null>;

  listResults(filter?: ResultFilter): Promise<TaskResult[]>;
  appendResult(result: TaskResult): Promise<TaskResult>;

  clear(): Promise<void>;
}
