import type { Dataset } from '../engine/types.js';

export type StoreKind = 'memory' | 'postgres';

/**
 * Source of the four input relations. Implementations return the full
 * dataset in one call; snapshot validation and enrichment happen above them.
 */
export interface SnookerStore {
  readonly kind: StoreKind;
  loadDataset(): Promise<Dataset>;
  close(): Promise<void>;
}

export * from './errors.js';
