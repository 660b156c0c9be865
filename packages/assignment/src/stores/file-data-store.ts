import { join } from 'node:path';
import { z } from 'zod';
import type {
  IDataStore,
  NewTask,
  ResultFilter,
  Task,
  TaskId,
  TaskResult,
  User,
  UserId,
} from '@taskfit/core';
import { TaskResultSchema, TaskSchema, UserSchema } from '@taskfit/core';
import { readJsonFile, writeJsonFile } from '../utils/json-file.js';

interface DataState {
  users: User[];
  tasks: Task[];
  results: TaskResult[];
}

/** Next id is max(existing) + 1, or 1 for an empty collection. */
export function nextId(ids: number[]): number {
  return ids.reduce((max, id) => Math.max(max, id), 0) + 1;
}

/**
 * Users, tasks and results, each kept in its own JSON file under `baseDir`.
 * A mutation writes the new collection first and only then replaces the
 * cached one, so a failed write leaves the cache untouched.
 */
export class FileDataStore implements IDataStore {
  private readonly usersPath: string;
  private readonly tasksPath: string;
  private readonly resultsPath: string;
  private cache: DataState | null = null;

  constructor(baseDir: string) {
    this.usersPath = join(baseDir, 'users.json');
    this.tasksPath = join(baseDir, 'tasks.json');
    this.resultsPath = join(baseDir, 'results.json');
  }

  async listUsers(): Promise<User[]> {
    const { users } = await this.loadCache();
    return [...users];
  }

  async getUser(userId: UserId): Promise<User | null> {
    const { users } = await this.loadCache();
    return users.find((u) => u.userId === userId) ?? null;
  }

  async addUser(name: string): Promise<User> {
    const state = await this.loadCache();
    const user: User = { userId: nextId(state.users.map((u) => u.userId)), name };
    const users = [...state.users, user];
    await writeJsonFile(this.usersPath, users);
    state.users = users;
    return user;
  }

  async removeUser(userId: UserId): Promise<User | null> {
    const state = await this.loadCache();
    const user = state.users.find((u) => u.userId === userId);
    if (!user) return null;

    const results = state.results.filter((r) => r.userId !== userId);
    const users = state.users.filter((u) => u.userId !== userId);
    if (results.length !== state.results.length) {
      await writeJsonFile(this.resultsPath, results);
    }
    await writeJsonFile(this.usersPath, users);
    state.results = results;
    state.users = users;
    return user;
  }

  async listTasks(): Promise<Task[]> {
    const { tasks } = await this.loadCache();
    return [...tasks];
  }

  async getTask(taskId: TaskId): Promise<Task | null> {
    const { tasks } = await this.loadCache();
    return tasks.find((t) => t.taskId === taskId) ?? null;
  }

  async addTask(input: NewTask): Promise<Task> {
    const state = await this.loadCache();
    const task: Task = { taskId: nextId(state.tasks.map((t) => t.taskId)), ...input };
    const tasks = [...state.tasks, task];
    await writeJsonFile(this.tasksPath, tasks);
    state.tasks = tasks;
    return task;
  }

  async removeTask(taskId: TaskId): Promise<Task | null> {
    const state = await this.loadCache();
    const task = state.tasks.find((t) => t.taskId === taskId);
    if (!task) return null;

    const results = state.results.filter((r) => r.taskId !== taskId);
    const tasks = state.tasks.filter((t) => t.taskId !== taskId);
    if (results.length !== state.results.length) {
      await writeJsonFile(this.resultsPath, results);
    }
    await writeJsonFile(this.tasksPath, tasks);
    state.results = results;
    state.tasks = tasks;
    return task;
  }

  async listResults(filter?: ResultFilter): Promise<TaskResult[]> {
    const { results } = await this.loadCache();
    let list = [...results];

    if (filter) {
      if (filter.taskId !== undefined) {
        list = list.filter((r) => r.taskId === filter.taskId);
      }
      if (filter.userId !== undefined) {
        list = list.filter((r) => r.userId === filter.userId);
      }
    }

    return list;
  }

  async appendResult(result: TaskResult): Promise<TaskResult> {
    const state = await this.loadCache();
    const results = [...state.results, { ...result }];
    await writeJsonFile(this.resultsPath, results);
    state.results = results;
    return result;
  }

  async clear(): Promise<void> {
    const state = await this.loadCache();
    await writeJsonFile(this.resultsPath, []);
    await writeJsonFile(this.tasksPath, []);
    await writeJsonFile(this.usersPath, []);
    state.users = [];
    state.tasks = [];
    state.results = [];
  }

  private async loadCache(): Promise<DataState> {
    if (this.cache) return this.cache;

    const [users, tasks, results] = await Promise.all([
      readJsonFile(this.usersPath, z.array(UserSchema)),
      readJsonFile(this.tasksPath, z.array(TaskSchema)),
      readJsonFile(this.resultsPath, z.array(TaskResultSchema)),
    ]);
    this.cache = {
      users: users ?? [],
      tasks: tasks ?? [],
      results: results ?? [],
    };
    return this.cache;
  }
}
