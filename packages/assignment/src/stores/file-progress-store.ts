import { join } from 'node:path';
import type { IProgressStore, ProgressTable } from '@taskfit/core';
import { ProgressTableSchema } from '@taskfit/core';
import { readJsonFile, writeJsonFile } from '../utils/json-file.js';

export class FileProgressStore implements IProgressStore {
  private readonly filePath: string;

  constructor(baseDir: string) {
    this.filePath = join(baseDir, 'progress.json');
  }

  async load(): Promise<ProgressTable> {
    return (await readJsonFile(this.filePath, ProgressTableSchema)) ?? {};
  }

  async save(table: ProgressTable): Promise<void> {
    await writeJsonFile(this.filePath, table);
  }
}
