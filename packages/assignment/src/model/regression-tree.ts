import { z } from 'zod';
import type { FeatureRow } from './regressor.js';
import type { RandomSource } from './seeded-random.js';

export type TreeNode =
  | { leaf: true; value: number }
  | { leaf: false; feature: number; threshold: number; left: TreeNode; right: TreeNode };

export const TreeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({ leaf: z.literal(true), value: z.number() }),
    z.object({
      leaf: z.literal(false),
      feature: z.number().int().nonnegative(),
      threshold: z.number(),
      left: TreeNodeSchema,
      right: TreeNodeSchema,
    }),
  ]),
);

export interface TreeParams {
  maxDepth: number;
  minSamplesSplit: number;
}

interface Split {
  feature: number;
  threshold: number;
  left: number[];
  right: number[];
}

function mean(labels: number[], indices: number[]): number {
  let sum = 0;
  for (const i of indices) sum += labels[i];
  return sum / indices.length;
}

/** Sum of squared deviations from the mean, computed from running sums. */
function sse(sum: number, sumSq: number, count: number): number {
  return count === 0 ? 0 : sumSq - (sum * sum) / count;
}

/**
 * Best mean-squared-error split over the candidate features. Thresholds sit
 * midway between consecutive distinct values. Returns null when no split
 * lowers the error.
 */
function findBestSplit(
  features: FeatureRow[],
  labels: number[],
  indices: number[],
  candidateFeatures: number[],
): Split | null {
  let totalSum = 0;
  let totalSq = 0;
  for (const i of indices) {
    totalSum += labels[i];
    totalSq += labels[i] * labels[i];
  }
  let bestError = sse(totalSum, totalSq, indices.length);
  let best: { feature: number; threshold: number } | null = null;

  for (const feature of candidateFeatures) {
    const sorted = [...indices].sort((a, b) => features[a][feature] - features[b][feature]);
    let leftSum = 0;
    let leftSq = 0;

    for (let k = 0; k < sorted.length - 1; k++) {
      const y = labels[sorted[k]];
      leftSum += y;
      leftSq += y * y;

      const current = features[sorted[k]][feature];
      const next = features[sorted[k + 1]][feature];
      if (current === next) continue;

      const leftCount = k + 1;
      const error =
        sse(leftSum, leftSq, leftCount) +
        sse(totalSum - leftSum, totalSq - leftSq, sorted.length - leftCount);
      // Tolerance keeps float noise from producing splits on constant labels
      if (error < bestError - 1e-12) {
        bestError = error;
        best = { feature, threshold: (current + next) / 2 };
      }
    }
  }

  if (!best) return null;
  const { feature, threshold } = best;
  return {
    feature,
    threshold,
    left: indices.filter((i) => features[i][feature] <= threshold),
    right: indices.filter((i) => features[i][feature] > threshold),
  };
}

/**
 * Grow a CART regression tree over the rows listed in `indices` (which may
 * repeat rows, as a bootstrap sample does).
 */
export function growTree(
  features: FeatureRow[],
  labels: number[],
  indices: number[],
  params: TreeParams,
  depth = 0,
): TreeNode {
  const value = mean(labels, indices);
  if (depth >= params.maxDepth || indices.length < params.minSamplesSplit) {
    return { leaf: true, value };
  }

  const featureCount = features[indices[0]].length;
  const candidates = Array.from({ length: featureCount }, (_, i) => i);
  const split = findBestSplit(features, labels, indices, candidates);
  if (!split) return { leaf: true, value };

  return {
    leaf: false,
    feature: split.feature,
    threshold: split.threshold,
    left: growTree(features, labels, split.left, params, depth + 1),
    right: growTree(features, labels, split.right, params, depth + 1),
  };
}

export function predictTree(node: TreeNode, row: FeatureRow): number {
  let current = node;
  while (!current.leaf) {
    current = row[current.feature] <= current.threshold ? current.left : current.right;
  }
  return current.value;
}

/** Draw `count` row indices with replacement. */
export function bootstrapSample(count: number, random: RandomSource): number[] {
  return Array.from({ length: count }, () => Math.floor(random() * count));
}
