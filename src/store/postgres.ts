import { asc } from 'drizzle-orm';

import type { Dataset } from '../engine/types.js';
import { closePool, getDb } from '../db/client.js';
import { matches, players, scores, tournaments } from '../db/schema.js';
import type { SnookerStore } from './types.js';
import { DatasetSourceError } from './errors.js';
import { mapMatchRow, mapPlayerRow, mapScoreRow, mapTournamentRow } from './postgres/rows.js';

export type DbClient = ReturnType<typeof getDb>;

export class PostgresStore implements SnookerStore {
  readonly kind = 'postgres' as const;

  constructor(private readonly db: DbClient = getDb()) {}

  async loadDataset(): Promise<Dataset> {
    try {
      // Read all four relations in one transaction so they come from the same database state.
      return await this.db.transaction(async (tx) => {
        const playerRows = await tx.select().from(players).orderBy(asc(players.fullName));
        const tournamentRows = await tx.select().from(tournaments).orderBy(asc(tournaments.id));
        const matchRows = await tx.select().from(matches).orderBy(asc(matches.matchId));
        const scoreRows = await tx
          .select()
          .from(scores)
          .orderBy(asc(scores.matchId), asc(scores.frame), asc(scores.player));

        return {
          players: playerRows.map(mapPlayerRow),
          tournaments: tournamentRows.map(mapTournamentRow),
          matches: matchRows.map(mapMatchRow),
          scores: scoreRows.map(mapScoreRow),
        };
      }, { isolationLevel: 'repeatable read', accessMode: 'read only' });
    } catch (err) {
      if (err instanceof DatasetSourceError) throw err;
      throw new DatasetSourceError('Failed to load dataset from Postgres', { source: 'postgres', cause: err });
    }
  }

  async close() {
    await closePool();
  }
}
