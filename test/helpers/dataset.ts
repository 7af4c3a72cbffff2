import { buildSnapshot } from '../../src/engine/snapshot.js';
import type {
  Dataset,
  MatchRecord,
  PlayerSlot,
  ScoreEntryRecord,
  Snapshot,
  TournamentRecord,
} from '../../src/engine/types.js';

export const LOADED_AT = new Date('2024-01-01T00:00:00Z');

type TournamentInput = Pick<TournamentRecord, 'id' | 'name' | 'year'> & Partial<TournamentRecord>;

export class DatasetBuilder {
  private readonly players = new Map<string, string>();
  private readonly tournaments: TournamentRecord[] = [];
  private readonly matches: MatchRecord[] = [];
  private readonly scores: ScoreEntryRecord[] = [];
  private nextMatchId = 1;

  player(fullName: string, country = 'England') {
    this.players.set(fullName, country);
    return this;
  }

  tournament(input: TournamentInput) {
    this.tournaments.push({
      status: 'Professional',
      category: 'Ranking',
      city: null,
      country: null,
      ...input,
    });
    return this;
  }

  match(
    tournamentId: number,
    player1Name: string,
    player2Name: string,
    score1: number,
    score2: number,
    options: { stage?: string; id?: number } = {}
  ) {
    for (const name of [player1Name, player2Name]) {
      if (!this.players.has(name)) this.player(name);
    }
    const matchId = options.id ?? this.nextMatchId;
    this.nextMatchId = Math.max(this.nextMatchId, matchId) + 1;
    this.matches.push({
      matchId,
      tournamentId,
      stage: options.stage ?? 'Last 16',
      player1Name,
      player2Name,
      score1,
      score2,
    });
    return this;
  }

  repeat(times: number, add: (builder: this, index: number) => void) {
    for (let index = 0; index < times; index += 1) add(this, index);
    return this;
  }

  frame(matchId: number, frame: number, score1: number, score2: number, breaks: Partial<Record<PlayerSlot, number>> = {}) {
    this.scores.push(
      { matchId, frame, player: 1, score: score1, fiftyPlusBreak: breaks[1] ?? null },
      { matchId, frame, player: 2, score: score2, fiftyPlusBreak: breaks[2] ?? null }
    );
    return this;
  }

  build(): Dataset {
    return {
      players: [...this.players.entries()].map(([fullName, country]) => ({ fullName, country })),
      tournaments: [...this.tournaments],
      matches: [...this.matches],
      scores: [...this.scores],
    };
  }

  snapshot(): Snapshot {
    return buildSnapshot(this.build(), LOADED_AT);
  }
}

export const dataset = () => new DatasetBuilder();
