import type { Dataset } from '../engine/types.js';
import type { SnookerStore } from './types.js';
import { readDatasetDirectory } from './dataset-files.js';

type DatasetSource = Dataset | (() => Promise<Dataset>);

const emptyDataset = (): Dataset => ({ players: [], tournaments: [], matches: [], scores: [] });

export class MemoryStore implements SnookerStore {
  readonly kind = 'memory' as const;

  private loads = 0;

  constructor(private readonly source: DatasetSource = emptyDataset()) {}

  static fromDirectory(dir: string) {
    return new MemoryStore(() => readDatasetDirectory(dir));
  }

  /** Number of times the dataset has been read from this store. */
  get loadCount() {
    return this.loads;
  }

  async loadDataset(): Promise<Dataset> {
    this.loads += 1;
    const dataset = typeof this.source === 'function' ? await this.source() : this.source;
    return {
      players: [...dataset.players],
      tournaments: [...dataset.tournaments],
      matches: [...dataset.matches],
      scores: [...dataset.scores],
    };
  }

  async close() {}
}
