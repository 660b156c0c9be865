import type { ModelArtifact } from '../models/model-artifact.js';

export interface IModelStore {
  /** null when nothing has been trained yet */
  load(): Promise<ModelArtifact | null>;
  save(artifact: ModelArtifact): Promise<void>;
  clear(): Promise<void>;
}
