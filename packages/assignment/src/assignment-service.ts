import type {
  AssignAllReport,
  Assignment,
  DashboardSnapshot,
  IDataStore,
  IEventBus,
  IModelStore,
  IProgressStore,
  Outcome,
  ProgressRecord,
  RecordedResult,
  Task,
  TaskResult,
  TrainingSummary,
  User,
} from '@taskfit/core';
import {
  Events,
  IdSchema,
  InsufficientDataError,
  NewTaskInputSchema,
  NotFoundError,
  ProgressInputSchema,
  ResultInputSchema,
  UserNameSchema,
  createLogger,
  failure,
  isTaskfitError,
  parseInput,
  setLogLevel,
  success,
} from '@taskfit/core';
import { EventBus } from '@taskfit/eventbus';
import type { TaskfitConfig } from './config.js';
import { buildDashboardSnapshot } from './dashboard.js';
import { buildTrainingSet } from './feature-builder.js';
import type { RegressorFactory } from './model/regressor.js';
import { DEFAULT_FOREST_PARAMS, randomForestFactory } from './model/random-forest.js';
import type { RandomSource } from './model/seeded-random.js';
import { ProgressTracker } from './progress-tracker.js';
import { Scorer } from './scorer.js';
import { FileDataStore } from './stores/file-data-store.js';
import { FileModelStore } from './stores/file-model-store.js';
import { FileProgressStore } from './stores/file-progress-store.js';
import type { ITaskAssigner } from './task-assigner.js';
import { GreedyTaskAssigner } from './task-assigner.js';

const log = createLogger('AssignmentService');

export interface AssignmentServiceDeps {
  dataStore: IDataStore;
  progressStore: IProgressStore;
  modelStore: IModelStore;
  eventBus?: IEventBus;
  regressorFactory?: RegressorFactory;
  assigner?: ITaskAssigner;
  /** Cold-start score source */
  random?: RandomSource;
  now?: () => Date;
}

/**
 * Caller-facing surface of the assignment loop. Operations run strictly one
 * after another; each validates its input before touching any store and
 * reports failures as a typed Outcome instead of throwing.
 */
export class AssignmentService {
  private readonly dataStore: IDataStore;
  private readonly modelStore: IModelStore;
  private readonly eventBus: IEventBus;
  private readonly assigner: ITaskAssigner;
  private readonly tracker: ProgressTracker;
  private readonly scorer: Scorer;
  private readonly now: () => Date;
  private tail: Promise<void> = Promise.resolve();

  private constructor(deps: AssignmentServiceDeps) {
    this.dataStore = deps.dataStore;
    this.modelStore = deps.modelStore;
    this.eventBus = deps.eventBus ?? new EventBus();
    this.assigner = deps.assigner ?? new GreedyTaskAssigner();
    this.now = deps.now ?? (() => new Date());
    this.tracker = new ProgressTracker(deps.progressStore, this.now);
    this.scorer = new Scorer({
      factory: deps.regressorFactory ?? randomForestFactory(DEFAULT_FOREST_PARAMS),
      random: deps.random,
      now: this.now,
    });
  }

  /** Load progress and any saved model, then return a ready service. */
  static async open(deps: AssignmentServiceDeps): Promise<AssignmentService> {
    const service = new AssignmentService(deps);
    await service.tracker.load();
    await service.restoreModel();
    return service;
  }

  /** File-backed service rooted at `config.dataDir`. */
  static async create(
    config: TaskfitConfig,
    overrides: Partial<AssignmentServiceDeps> = {},
  ): Promise<AssignmentService> {
    setLogLevel(config.logLevel);
    log.info(`Opening data directory ${config.dataDir}`);
    return AssignmentService.open({
      dataStore: new FileDataStore(config.dataDir),
      progressStore: new FileProgressStore(config.dataDir),
      modelStore: new FileModelStore(config.dataDir),
      regressorFactory: randomForestFactory(config.forest),
      ...overrides,
    });
  }

  get events(): IEventBus {
    return this.eventBus;
  }

  get isTrained(): boolean {
    return this.scorer.isTrained;
  }

  // --- Users & tasks ---

  addUser(name: string): Promise<Outcome<User>> {
    return this.run('addUser', async () => {
      const cleanName = parseInput(UserNameSchema, name);
      const user = await this.dataStore.addUser(cleanName);
      log.info(`Added user ${user.name}`, { userId: user.userId });
      this.eventBus.emit(Events.USER_ADDED, { user });
      return user;
    });
  }

  /** Removes the user with their results and progress records. */
  removeUser(userId: number): Promise<Outcome<User>> {
    return this.run('removeUser', async () => {
      const id = parseInput(IdSchema, userId);
      const user = await this.requireUser(id);
      // Progress goes first so a failed write leaves the user in place to retry
      const dropped = await this.tracker.removeWhere((r) => r.userId === id);
      if (!(await this.dataStore.removeUser(id))) throw new NotFoundError('user', id);
      log.info(`Removed user ${user.name}`, { userId: id, progressRecords: dropped });
      this.eventBus.emit(Events.USER_REMOVED, { user });
      return user;
    });
  }

  addTask(type: string, complexity: number, deadline: number): Promise<Outcome<Task>> {
    return this.run('addTask', async () => {
      const input = parseInput(NewTaskInputSchema, { type, complexity, deadline });
      const task = await this.dataStore.addTask(input);
      log.info(`Added task ${task.type}`, task);
      this.eventBus.emit(Events.TASK_ADDED, { task });
      return task;
    });
  }

  /** Removes the task with its results and progress records. */
  removeTask(taskId: number): Promise<Outcome<Task>> {
    return this.run('removeTask', async () => {
      const id = parseInput(IdSchema, taskId);
      const task = await this.requireTask(id);
      const dropped = await this.tracker.removeWhere((r) => r.taskId === id);
      if (!(await this.dataStore.removeTask(id))) throw new NotFoundError('task', id);
      log.info(`Removed task ${task.type}`, { taskId: id, progressRecords: dropped });
      this.eventBus.emit(Events.TASK_REMOVED, { task });
      return task;
    });
  }

  listUsers(): Promise<Outcome<User[]>> {
    return this.run('listUsers', () => this.dataStore.listUsers());
  }

  listTasks(): Promise<Outcome<Task[]>> {
    return this.run('listTasks', () => this.dataStore.listTasks());
  }

  listResults(): Promise<Outcome<TaskResult[]>> {
    return this.run('listResults', () => this.dataStore.listResults());
  }

  // --- Assignment ---

  assign(taskId: number): Promise<Outcome<Assignment>> {
    return this.run('assign', async () => {
      const id = parseInput(IdSchema, taskId);
      const users = await this.requireUsers();
      const task = await this.dataStore.getTask(id);
      if (!task) throw new NotFoundError('task', id);

      const assignment = await this.assignTask(task, users);
      if (!assignment) {
        throw new InsufficientDataError(`No eligible user for task ${id}`);
      }
      return assignment;
    });
  }

  /**
   * Assign every task that has no result and no active progress record.
   * Tasks nobody is eligible for are reported, not treated as failures.
   */
  assignAllPending(): Promise<Outcome<AssignAllReport>> {
    return this.run('assignAllPending', async () => {
      const users = await this.requireUsers();
      const tasks = await this.dataStore.listTasks();
      if (tasks.length === 0) {
        throw new InsufficientDataError('No tasks registered');
      }

      const completed = new Set((await this.dataStore.listResults()).map((r) => r.taskId));
      const report: AssignAllReport = { assignments: [], skipped: [] };

      for (const task of tasks) {
        if (completed.has(task.taskId) || this.tracker.hasCompleted(task.taskId)) {
          report.skipped.push({ taskId: task.taskId, reason: 'completed' });
          continue;
        }
        if (this.tracker.hasActive(task.taskId)) {
          report.skipped.push({ taskId: task.taskId, reason: 'active' });
          continue;
        }

        const assignment = await this.assignTask(task, users);
        if (assignment) {
          report.assignments.push(assignment);
        } else {
          report.skipped.push({ taskId: task.taskId, reason: 'no_eligible_user' });
        }
      }

      log.info(`Assigned ${report.assignments.length} pending task(s)`, {
        skipped: report.skipped.length,
      });
      return report;
    });
  }

  // --- Progress & results ---

  recordProgress(
    taskId: number,
    userId: number,
    percent: number,
    notes = '',
  ): Promise<Outcome<ProgressRecord>> {
    return this.run('recordProgress', async () => {
      const input = parseInput(ProgressInputSchema, { taskId, userId, percent, notes });
      await this.requireTask(input.taskId);
      await this.requireUser(input.userId);

      const progress = await this.tracker.update(input.taskId, input.userId, input.percent, input.notes);
      log.info(`Progress ${input.percent}% on task ${input.taskId}`, {
        userId: input.userId,
        status: progress.status,
      });
      this.eventBus.emit(Events.PROGRESS_UPDATED, { progress });
      return progress;
    });
  }

  /**
   * Append a completion outcome; this is what the model learns from. A tracked
   * assignment for the same pair is closed as completed. The progress write
   * happens first and is rolled back if the result cannot be appended.
   */
  recordResult(
    taskId: number,
    userId: number,
    timeTaken: number,
    quality: number,
  ): Promise<Outcome<RecordedResult>> {
    return this.run('recordResult', async () => {
      const input = parseInput(ResultInputSchema, { taskId, userId, timeTaken, quality });
      const task = await this.requireTask(input.taskId);
      const user = await this.requireUser(input.userId);

      const previous = this.tracker.get(input.taskId, input.userId);
      const progress = await this.tracker.complete(input.taskId, input.userId, input.timeTaken);
      let result: TaskResult;
      try {
        result = await this.dataStore.appendResult(input);
      } catch (err) {
        if (previous) await this.rollbackProgress(previous);
        throw err;
      }

      const analytics = progress
        ? {
            actualDuration: progress.actualDuration ?? 0,
            deadlineVariancePercent: ((progress.deadline - result.timeTaken) / progress.deadline) * 100,
          }
        : null;

      log.info(`Task completed: ${user.name} → ${task.type} in ${result.timeTaken}h, quality ${result.quality}/5`, analytics ?? undefined);
      this.eventBus.emit(Events.RESULT_RECORDED, { result, progress });
      return { result, progress, analytics };
    });
  }

  // --- Model ---

  /** Fit a new model on every joinable result; replaces the previous one. */
  retrain(): Promise<Outcome<TrainingSummary>> {
    return this.run('retrain', async () => {
      const [users, tasks, results] = await Promise.all([
        this.dataStore.listUsers(),
        this.dataStore.listTasks(),
        this.dataStore.listResults(),
      ]);
      if (results.length === 0) {
        throw new InsufficientDataError('No completed tasks yet: record results before training');
      }

      const { regressor, artifact } = this.scorer.fit(buildTrainingSet(users, tasks, results));
      await this.modelStore.save(artifact);
      this.scorer.install(regressor, artifact);

      const summary: TrainingSummary = {
        sampleCount: artifact.sampleCount,
        trainedAt: artifact.trainedAt,
      };
      log.info(`Model trained on ${summary.sampleCount} sample(s)`);
      this.eventBus.emit(Events.MODEL_TRAINED, { summary });
      return summary;
    });
  }

  // --- Read paths & maintenance ---

  getDashboardSnapshot(): Promise<Outcome<DashboardSnapshot>> {
    return this.run('getDashboardSnapshot', async () => {
      const [users, tasks, results] = await Promise.all([
        this.dataStore.listUsers(),
        this.dataStore.listTasks(),
        this.dataStore.listResults(),
      ]);
      return buildDashboardSnapshot(
        { users, tasks, results, progress: this.tracker.list(), trained: this.scorer.isTrained },
        this.now(),
      );
    });
  }

  /** Wipe all data and forget the model. */
  reset(): Promise<Outcome<void>> {
    return this.run('reset', async () => {
      await this.dataStore.clear();
      await this.tracker.clear();
      await this.modelStore.clear();
      this.scorer.reset();
      log.info('All data cleared, model untrained');
      this.eventBus.emit(Events.DATA_RESET, {});
    });
  }

  // --- Internals ---

  private async assignTask(task: Task, users: User[]): Promise<Assignment | null> {
    const results = await this.dataStore.listResults({ taskId: task.taskId });
    // Finishing at 100% without a result still counts as done for that user
    const open = users.filter(
      (u) => this.tracker.get(task.taskId, u.userId)?.status !== 'completed',
    );
    const pick = this.assigner.assign(task, open, results, this.scorer);
    if (!pick) {
      log.warn(`No available users for task ${task.taskId}`);
      return null;
    }

    const user = users.find((u) => u.userId === pick.userId);
    if (!user) throw new NotFoundError('user', pick.userId);

    const progress = await this.tracker.start(task, user);
    const assignment: Assignment = {
      taskId: task.taskId,
      userId: pick.userId,
      userName: pick.userName,
      score: pick.score,
      confidence: this.scorer.isTrained ? 'model' : 'random',
      predictions: pick.predictions,
    };
    log.info(`Assigned task ${task.taskId} (${task.type}) to ${user.name}`, {
      score: Number(pick.score.toFixed(3)),
      confidence: assignment.confidence,
    });
    this.eventBus.emit(Events.TASK_ASSIGNED, { assignment, progress });
    return assignment;
  }

  private async requireUsers(): Promise<User[]> {
    const users = await this.dataStore.listUsers();
    if (users.length === 0) {
      throw new InsufficientDataError('No users registered');
    }
    return users;
  }

  private async requireTask(taskId: number): Promise<Task> {
    const task = await this.dataStore.getTask(taskId);
    if (!task) throw new NotFoundError('task', taskId);
    return task;
  }

  private async requireUser(userId: number): Promise<User> {
    const user = await this.dataStore.getUser(userId);
    if (!user) throw new NotFoundError('user', userId);
    return user;
  }

  private async rollbackProgress(previous: ProgressRecord): Promise<void> {
    try {
      await this.tracker.revert(previous);
    } catch (err) {
      log.error(`Could not roll back progress for task ${previous.taskId}, user ${previous.userId}`, err);
    }
  }

  private async restoreModel(): Promise<void> {
    try {
      const artifact = await this.modelStore.load();
      if (artifact) {
        this.scorer.restore(artifact);
      } else {
        log.info('No saved model, starting in random assignment mode');
      }
    } catch (err) {
      if (!isTaskfitError(err)) throw err;
      log.warn('Saved model could not be loaded, starting untrained', err);
    }
  }

  /**
   * Queue an operation behind the previous one and turn domain failures into
   * an Outcome. Anything that is not a TaskfitError is a bug and rethrows.
   */
  private run<T>(name: string, op: () => Promise<T>): Promise<Outcome<T>> {
    const result = this.tail.then(async (): Promise<Outcome<T>> => {
      try {
        return success(await op());
      } catch (err) {
        if (!isTaskfitError(err)) {
          log.error(`${name} failed unexpectedly`, err);
          throw err;
        }
        log.warn(`${name} rejected: ${err.message}`);
        return failure(err);
      }
    });
    // The chain only orders operations; the caller observes `result` itself
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
