import type { SkillLevel } from './models/dashboard.js';

/** Share of the success label coming from normalised quality */
export const QUALITY_WEIGHT = 0.7;
/** Share coming from finishing under the deadline */
export const EFFICIENCY_WEIGHT = 0.3;

export const MAX_QUALITY = 5;
export const MIN_QUALITY = 1;

export const SKILL_THRESHOLDS: ReadonlyArray<{ level: SkillLevel; minQuality: number }> = [
  { level: 'Expert', minQuality: 4 },
  { level: 'Good', minQuality: 3 },
];

export const MS_PER_HOUR = 3_600_000;
