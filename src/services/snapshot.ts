import { buildSnapshot } from '../engine/snapshot.js';
import type { Snapshot } from '../engine/types.js';
import type { SnookerStore } from '../store/index.js';

export interface SnapshotSummary {
  loadedAt: string;
  players: number;
  tournaments: number;
  matches: number;
  scoreEntries: number;
  breaks: number;
  draws: number;
  firstYear: number | null;
  lastYear: number | null;
}

export const summarizeSnapshot = (snapshot: Snapshot): SnapshotSummary => {
  const years = snapshot.tournaments.map((tournament) => tournament.year);
  return {
    loadedAt: snapshot.loadedAt.toISOString(),
    players: snapshot.players.length,
    tournaments: snapshot.tournaments.length,
    matches: snapshot.matches.length,
    scoreEntries: snapshot.scores.length,
    breaks: snapshot.breaks.length,
    draws: snapshot.matchView.filter((match) => match.outcome === 'draw').length,
    firstYear: years.length ? Math.min(...years) : null,
    lastYear: years.length ? Math.max(...years) : null,
  };
};

/**
 * Loads the store's dataset once and hands the same frozen snapshot to every
 * caller. Concurrent callers share the in-flight load; a failed load is not
 * cached, so the next call retries.
 */
export class SnapshotProvider {
  private pending: Promise<Snapshot> | null = null;

  constructor(
    private readonly store: SnookerStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  acquire(): Promise<Snapshot> {
    if (!this.pending) {
      const load = this.load();
      this.pending = load;
      load.catch(() => {
        if (this.pending === load) this.pending = null;
      });
    }
    return this.pending;
  }

  private async load() {
    const started = Date.now();
    const dataset = await this.store.loadDataset();
    const snapshot = buildSnapshot(dataset, this.now());
    console.log('snapshot_loaded', {
      store: this.store.kind,
      matches: snapshot.matches.length,
      breaks: snapshot.breaks.length,
      durationMs: Date.now() - started,
    });
    return snapshot;
  }
}
