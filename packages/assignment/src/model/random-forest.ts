import { z } from 'zod';
import type { ModelArtifact } from '@taskfit/core';
import { PersistenceError } from '@taskfit/core';
import type { FeatureRow, Regressor, RegressorFactory } from './regressor.js';
import { createSeededRandom } from './seeded-random.js';
import type { TreeNode } from './regression-tree.js';
import { TreeNodeSchema, bootstrapSample, growTree, predictTree } from './regression-tree.js';

export const RANDOM_FOREST_ALGORITHM = 'random-forest';
export const RANDOM_FOREST_ARTIFACT_VERSION = 1;

export interface ForestParams {
  trees: number;
  seed: number;
  maxDepth: number;
  minSamplesSplit: number;
}

export const DEFAULT_FOREST_PARAMS: ForestParams = {
  trees: 100,
  seed: 42,
  maxDepth: 16,
  minSamplesSplit: 2,
};

export const ForestParamsSchema = z.object({
  trees: z.number().int().positive(),
  seed: z.number().int(),
  maxDepth: z.number().int().positive(),
  minSamplesSplit: z.number().int().min(2),
});

const ForestPayloadSchema = z.object({
  params: ForestParamsSchema,
  trees: z.array(TreeNodeSchema).min(1),
});

/**
 * Bagged ensemble of regression trees. Each tree is grown on a bootstrap
 * sample drawn from a generator seeded with `params.seed`, so fitting the same
 * table twice gives the same forest.
 */
export class RandomForestRegressor implements Regressor {
  private trees: TreeNode[] = [];
  private sampleCount = 0;

  constructor(private readonly params: ForestParams = DEFAULT_FOREST_PARAMS) {}

  get fitted(): boolean {
    return this.trees.length > 0;
  }

  get size(): number {
    return this.trees.length;
  }

  fit(features: FeatureRow[], labels: number[]): void {
    if (features.length === 0 || features.length !== labels.length) {
      throw new RangeError(
        `Cannot fit on ${features.length} rows with ${labels.length} labels`,
      );
    }

    const random = createSeededRandom(this.params.seed);
    const treeParams = {
      maxDepth: this.params.maxDepth,
      minSamplesSplit: this.params.minSamplesSplit,
    };
    const trees: TreeNode[] = [];
    for (let t = 0; t < this.params.trees; t++) {
      const sample = bootstrapSample(features.length, random);
      trees.push(growTree(features, labels, sample, treeParams));
    }
    this.trees = trees;
    this.sampleCount = features.length;
  }

  predict(row: FeatureRow): number {
    if (!this.fitted) {
      throw new Error('RandomForestRegressor.predict called before fit');
    }
    let sum = 0;
    for (const tree of this.trees) sum += predictTree(tree, row);
    return sum / this.trees.length;
  }

  toArtifact(trainedAt: string): ModelArtifact {
    return {
      version: RANDOM_FOREST_ARTIFACT_VERSION,
      algorithm: RANDOM_FOREST_ALGORITHM,
      trainedAt,
      sampleCount: this.sampleCount,
      payload: { params: { ...this.params }, trees: this.trees },
    };
  }

  static fromArtifact(artifact: ModelArtifact, source = 'model artifact'): RandomForestRegressor {
    if (
      artifact.algorithm !== RANDOM_FOREST_ALGORITHM ||
      artifact.version !== RANDOM_FOREST_ARTIFACT_VERSION
    ) {
      throw new PersistenceError(
        source,
        'parse',
        `unsupported model ${artifact.algorithm} v${artifact.version}`,
      );
    }
    const payload = ForestPayloadSchema.safeParse(artifact.payload);
    if (!payload.success) {
      throw new PersistenceError(source, 'parse', payload.error);
    }

    const forest = new RandomForestRegressor(payload.data.params);
    forest.trees = payload.data.trees;
    forest.sampleCount = artifact.sampleCount;
    return forest;
  }
}

export function randomForestFactory(
  params: ForestParams = DEFAULT_FOREST_PARAMS,
): RegressorFactory {
  return {
    algorithm: RANDOM_FOREST_ALGORITHM,
    create: () => new RandomForestRegressor(params),
    fromArtifact: (artifact) => RandomForestRegressor.fromArtifact(artifact),
  };
}
