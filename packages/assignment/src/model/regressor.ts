import type { ModelArtifact } from '@taskfit/core';

export type FeatureRow = number[];

/** A fitted-or-fittable scalar regressor. */
export interface Regressor {
  fit(features: FeatureRow[], labels: number[]): void;
  predict(row: FeatureRow): number;
  toArtifact(trainedAt: string): ModelArtifact;
}

/**
 * Builds fresh regressors and revives fitted ones, so the scoring layer never
 * names a concrete algorithm.
 */
export interface RegressorFactory {
  readonly algorithm: string;
  create(): Regressor;
  fromArtifact(artifact: ModelArtifact): Regressor;
}
