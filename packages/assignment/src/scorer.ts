import type { ModelArtifact, Task, UserId } from '@taskfit/core';
import { InsufficientDataError, createLogger } from '@taskfit/core';
import type { TrainingSet } from './feature-builder.js';
import { featureRow } from './feature-builder.js';
import type { Regressor, RegressorFactory } from './model/regressor.js';
import type { RandomSource } from './model/seeded-random.js';

const log = createLogger('Scorer');

export interface ScorerOptions {
  factory: RegressorFactory;
  /** Cold-start source, uniform in [0, 1) */
  random?: RandomSource;
  now?: () => Date;
}

/**
 * Predicts a success estimate in [0, 1] for a (user, task) pair. Until a model
 * has been trained or restored, every prediction is a uniform random draw.
 */
export class Scorer {
  private regressor: Regressor | null = null;
  private currentArtifact: ModelArtifact | null = null;
  private readonly factory: RegressorFactory;
  private readonly random: RandomSource;
  private readonly now: () => Date;

  constructor(options: ScorerOptions) {
    this.factory = options.factory;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  get isTrained(): boolean {
    return this.regressor !== null;
  }

  get artifact(): ModelArtifact | null {
    return this.currentArtifact;
  }

  /**
   * Fit a fresh regressor and return its artifact without installing it.
   * Callers persist the artifact, then `install` it.
   */
  fit(set: TrainingSet | null): { regressor: Regressor; artifact: ModelArtifact } {
    if (!set) {
      throw new InsufficientDataError('No training data: record at least one result first');
    }
    const regressor = this.factory.create();
    regressor.fit(set.features, set.labels);
    const artifact = regressor.toArtifact(this.now().toISOString());
    log.info(`Fitted ${this.factory.algorithm}`, { samples: set.features.length });
    return { regressor, artifact };
  }

  /** Fit and install in one step. */
  train(set: TrainingSet | null): ModelArtifact {
    const { regressor, artifact } = this.fit(set);
    this.install(regressor, artifact);
    return artifact;
  }

  install(regressor: Regressor, artifact: ModelArtifact): void {
    this.regressor = regressor;
    this.currentArtifact = artifact;
  }

  restore(artifact: ModelArtifact): void {
    this.install(this.factory.fromArtifact(artifact), artifact);
    log.info(`Restored ${artifact.algorithm} trained at ${artifact.trainedAt}`);
  }

  reset(): void {
    this.regressor = null;
    this.currentArtifact = null;
  }

  predict(userId: UserId, task: Pick<Task, 'complexity' | 'deadline'>): number {
    if (!this.regressor) {
      return this.random();
    }
    const raw = this.regressor.predict(featureRow(userId, task));
    // Regressors are not bound to the label range
    return Math.max(0, Math.min(1, raw));
  }
}
