import type {
  MatchRecord,
  PlayerRecord,
  ScoreEntryRecord,
  TournamentRecord,
} from '../../engine/types.js';
import { DatasetSourceError } from '../errors.js';

type PlayerRow = { fullName: string; country: string };

type TournamentRow = {
  id: number;
  name: string;
  year: number;
  status: string;
  category: string;
  city: string | null;
  country: string | null;
};

type MatchRow = {
  matchId: number;
  tournamentId: number;
  stage: string;
  player1Name: string;
  player2Name: string;
  score1: number;
  score2: number;
};

type ScoreRow = {
  matchId: number;
  frame: number;
  player: number;
  score: number;
  fiftyPlusBreak: number | null;
};

export const mapPlayerRow = (row: PlayerRow): PlayerRecord => ({
  fullName: row.fullName,
  country: row.country,
});

export const mapTournamentRow = (row: TournamentRow): TournamentRecord => ({
  id: row.id,
  name: row.name,
  year: row.year,
  status: row.status,
  category: row.category,
  city: row.city,
  country: row.country,
});

export const mapMatchRow = (row: MatchRow): MatchRecord => ({
  matchId: row.matchId,
  tournamentId: row.tournamentId,
  stage: row.stage,
  player1Name: row.player1Name,
  player2Name: row.player2Name,
  score1: row.score1,
  score2: row.score2,
});

export const mapScoreRow = (row: ScoreRow): ScoreEntryRecord => {
  if (row.player !== 1 && row.player !== 2) {
    throw new DatasetSourceError(`Score entry for match ${row.matchId} has player slot ${row.player}`, {
      source: 'postgres',
      relation: 'scores',
    });
  }
  return {
    matchId: row.matchId,
    frame: row.frame,
    player: row.player,
    score: row.score,
    fiftyPlusBreak: row.fiftyPlusBreak,
  };
};
