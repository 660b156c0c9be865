import type {
  IDataStore,
  IModelStore,
  IProgressStore,
  ModelArtifact,
  NewTask,
  ProgressTable,
  ResultFilter,
  Task,
  TaskResult,
  User,
} from '@taskfit/core';
import { PersistenceError } from '@taskfit/core';
import { nextId } from '../../stores/file-data-store.js';

/** Copy so callers can't reach into "disk" state. */
function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryDataStore implements IDataStore {
  users: User[] = [];
  tasks: Task[] = [];
  results: TaskResult[] = [];
  /** When set, the next write rejects with a PersistenceError */
  failNextWrite = false;

  async listUsers(): Promise<User[]> {
    return clone(this.users);
  }

  async getUser(userId: number): Promise<User | null> {
    return clone(this.users.find((u) => u.userId === userId) ?? null);
  }

  async addUser(name: string): Promise<User> {
    this.write();
    const user = { userId: nextId(this.users.map((u) => u.userId)), name };
    this.users = [...this.users, user];
    return clone(user);
  }

  async removeUser(userId: number): Promise<User | null> {
    const user = this.users.find((u) => u.userId === userId);
    if (!user) return null;
    this.write();
    this.users = this.users.filter((u) => u.userId !== userId);
    this.results = this.results.filter((r) => r.userId !== userId);
    return clone(user);
  }

  async listTasks(): Promise<Task[]> {
    return clone(this.tasks);
  }

  async getTask(taskId: number): Promise<Task | null> {
    return clone(this.tasks.find((t) => t.taskId === taskId) ?? null);
  }

  async addTask(input: NewTask): Promise<Task> {
    this.write();
    const task = { taskId: nextId(this.tasks.map((t) => t.taskId)), ...input };
    this.tasks = [...this.tasks, task];
    return clone(task);
  }

  async removeTask(taskId: number): Promise<Task | null> {
    const task = this.tasks.find((t) => t.taskId === taskId);
    if (!task) return null;
    this.write();
    this.tasks = this.tasks.filter((t) => t.taskId !== taskId);
    this.results = this.results.filter((r) => r.taskId !== taskId);
    return clone(task);
  }

  async listResults(filter?: ResultFilter): Promise<TaskResult[]> {
    return clone(
      this.results.filter(
        (r) =>
          (filter?.taskId === undefined || r.taskId === filter.taskId) &&
          (filter?.userId === undefined || r.userId === filter.userId),
      ),
    );
  }

  async appendResult(result: TaskResult): Promise<TaskResult> {
    this.write();
    this.results = [...this.results, clone(result)];
    return clone(result);
  }

  async clear(): Promise<void> {
    this.write();
    this.users = [];
    this.tasks = [];
    this.results = [];
  }

  private write(): void {
    if (this.failNextWrite) {
      this.failNextWrite = false;
      throw new PersistenceError('memory://data', 'write', new Error('disk full'));
    }
  }
}

export class InMemoryProgressStore implements IProgressStore {
  table: ProgressTable = {};
  saves = 0;
  failNextSave = false;

  async load(): Promise<ProgressTable> {
    return clone(this.table);
  }

  async save(table: ProgressTable): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new PersistenceError('memory://progress', 'write', new Error('disk full'));
    }
    this.saves++;
    this.table = clone(table);
  }
}

export class InMemoryModelStore implements IModelStore {
  artifact: ModelArtifact | null = null;
  failNextSave = false;

  async load(): Promise<ModelArtifact | null> {
    return clone(this.artifact);
  }

  async save(artifact: ModelArtifact): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new PersistenceError('memory://model', 'write', new Error('disk full'));
    }
    this.artifact = clone(artifact);
  }

  async clear(): Promise<void> {
    this.artifact = null;
  }
}
