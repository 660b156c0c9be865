import type { ProgressTable } from '../models/progress.js';

export interface IProgressStore {
  load(): Promise<ProgressTable>;
  /** Replaces the whole table on disk */
  save(table: ProgressTable): Promise<void>;
}
