export { AssignmentService } from './assignment-service.js';
export type { AssignmentServiceDeps } from './assignment-service.js';
export { loadConfig, CONFIG_FILE_NAME } from './config.js';
export type { TaskfitConfig, LoadConfigOptions } from './config.js';
export { buildDashboardSnapshot, skillLevel } from './dashboard.js';
export { buildTrainingSet, successLabel, efficiencyTerm, featureRow } from './feature-builder.js';
export type { TrainingSet } from './feature-builder.js';
export { Scorer } from './scorer.js';
export type { ScorerOptions } from './scorer.js';
export { GreedyTaskAssigner } from './task-assigner.js';
export type { ITaskAssigner, AssignmentPick } from './task-assigner.js';
export { ProgressTracker } from './progress-tracker.js';
export {
  RandomForestRegressor,
  randomForestFactory,
  DEFAULT_FOREST_PARAMS,
} from './model/random-forest.js';
export type { ForestParams } from './model/random-forest.js';
export type { Regressor, RegressorFactory, FeatureRow } from './model/regressor.js';
export { createSeededRandom } from './model/seeded-random.js';
export type { RandomSource } from './model/seeded-random.js';
export { FileDataStore } from './stores/file-data-store.js';
export { FileProgressStore } from './stores/file-progress-store.js';
export { FileModelStore } from './stores/file-model-store.js';
