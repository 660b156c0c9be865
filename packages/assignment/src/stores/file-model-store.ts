import { join } from 'node:path';
import type { IModelStore, ModelArtifact } from '@taskfit/core';
import { ModelArtifactSchema } from '@taskfit/core';
import { readJsonFile, removeFile, writeJsonFile } from '../utils/json-file.js';

/** Keeps the fitted model as `model.json` beside the data files. */
export class FileModelStore implements IModelStore {
  private readonly filePath: string;

  constructor(baseDir: string) {
    this.filePath = join(baseDir, 'model.json');
  }

  async load(): Promise<ModelArtifact | null> {
    return readJsonFile(this.filePath, ModelArtifactSchema);
  }

  async save(artifact: ModelArtifact): Promise<void> {
    await writeJsonFile(this.filePath, artifact);
  }

  async clear(): Promise<void> {
    await removeFile(this.filePath);
  }
}
