export type PlayerSlot = 1 | 2;
export type MatchOutcome = 'decided' | 'draw';
export type Role = 'winner' | 'loser' | 'draw';

export interface PlayerRecord {
  fullName: string;
  country: string;
}

export interface TournamentRecord {
  id: number;
  name: string;
  year: number;
  status: string;
  category: string;
  city: string | null;
  country: string | null;
}

export interface MatchRecord {
  matchId: number;
  tournamentId: number;
  stage: string;
  player1Name: string;
  player2Name: string;
  score1: number;
  score2: number;
}

export interface ScoreEntryRecord {
  matchId: number;
  frame: number;
  player: PlayerSlot;
  score: number;
  fiftyPlusBreak: number | null;
}

export interface Dataset {
  players: PlayerRecord[];
  tournaments: TournamentRecord[];
  matches: MatchRecord[];
  scores: ScoreEntryRecord[];
}

/**
 * One enriched row per match. For a draw the winner/loser slots keep the
 * listed order (player1, player2) and carry no result meaning.
 */
export interface MatchView {
  matchId: number;
  tournamentId: number;
  tournamentName: string;
  year: number;
  status: string;
  category: string;
  city: string | null;
  tournamentCountry: string | null;
  stage: string;
  outcome: MatchOutcome;
  winner: string;
  winnerCountry: string;
  winnerScore: number;
  winnerSlot: PlayerSlot;
  loser: string;
  loserCountry: string;
  loserScore: number;
  margin: number;
}

export interface BreakView {
  tournamentName: string;
  year: number;
  matchId: number;
  stage: string;
  frame: number;
  player: string;
  value: number;
}

export interface RoleRow {
  matchId: number;
  player: string;
  country: string;
  opponent: string;
  role: Role;
  playerScore: number;
  opponentScore: number;
  match: MatchView;
}

export interface Snapshot {
  readonly loadedAt: Date;
  readonly players: readonly PlayerRecord[];
  readonly tournaments: readonly TournamentRecord[];
  readonly matches: readonly MatchRecord[];
  readonly scores: readonly ScoreEntryRecord[];
  readonly matchView: readonly MatchView[];
  readonly breaks: readonly BreakView[];
}
