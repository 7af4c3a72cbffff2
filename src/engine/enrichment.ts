import { ReferentialIntegrityError } from './errors.js';
import type {
  BreakView,
  Dataset,
  MatchRecord,
  MatchView,
  PlayerRecord,
  PlayerSlot,
  TournamentRecord,
} from './types.js';

const indexPlayers = (players: readonly PlayerRecord[]) =>
  new Map(players.map((player) => [player.fullName, player]));

const indexTournaments = (tournaments: readonly TournamentRecord[]) =>
  new Map(tournaments.map((tournament) => [tournament.id, tournament]));

interface Side {
  name: string;
  score: number;
  slot: PlayerSlot;
}

const resolveSides = (match: MatchRecord) => {
  const first: Side = { name: match.player1Name, score: match.score1, slot: 1 };
  const second: Side = { name: match.player2Name, score: match.score2, slot: 2 };
  if (match.score2 > match.score1) {
    return { winner: second, loser: first, outcome: 'decided' as const };
  }
  return {
    winner: first,
    loser: second,
    outcome: match.score1 === match.score2 ? ('draw' as const) : ('decided' as const),
  };
};

export const enrichMatches = (dataset: Pick<Dataset, 'players' | 'tournaments' | 'matches'>): MatchView[] => {
  const players = indexPlayers(dataset.players);
  const tournaments = indexTournaments(dataset.tournaments);

  return dataset.matches.map((match) => {
    const tournament = tournaments.get(match.tournamentId);
    const player1 = players.get(match.player1Name);
    const player2 = players.get(match.player2Name);

    if (!tournament || !player1 || !player2) {
      const missingPlayers = [
        ...(player1 ? [] : [match.player1Name]),
        ...(player2 ? [] : [match.player2Name]),
      ];
      throw new ReferentialIntegrityError(`Match ${match.matchId} references unknown records`, {
        matchId: match.matchId,
        ...(tournament ? {} : { missingTournamentId: match.tournamentId }),
        ...(missingPlayers.length ? { missingPlayers } : {}),
      });
    }

    const { winner, loser, outcome } = resolveSides(match);
    const countryOf = (slot: PlayerSlot) => (slot === 1 ? player1.country : player2.country);

    return {
      matchId: match.matchId,
      tournamentId: tournament.id,
      tournamentName: tournament.name,
      year: tournament.year,
      status: tournament.status,
      category: tournament.category,
      city: tournament.city,
      tournamentCountry: tournament.country,
      stage: match.stage,
      outcome,
      winner: winner.name,
      winnerCountry: countryOf(winner.slot),
      winnerScore: winner.score,
      winnerSlot: winner.slot,
      loser: loser.name,
      loserCountry: countryOf(loser.slot),
      loserScore: loser.score,
      margin: winner.score - loser.score,
    };
  });
};

export const playerInSlot = (match: MatchView, slot: PlayerSlot) =>
  slot === match.winnerSlot ? match.winner : match.loser;

/** Score entries carrying a 50+ break, limited to tournaments with the given status. */
export const buildBreakView = (
  dataset: Pick<Dataset, 'scores'>,
  matchView: readonly MatchView[],
  status: string
): BreakView[] => {
  const matches = new Map(matchView.map((match) => [match.matchId, match]));
  const breaks: BreakView[] = [];

  for (const entry of dataset.scores) {
    const match = matches.get(entry.matchId);
    if (!match) {
      throw new ReferentialIntegrityError(`Score entry references unknown match ${entry.matchId}`, {
        matchId: entry.matchId,
        missingMatch: true,
      });
    }
    if (entry.fiftyPlusBreak === null || match.status !== status) continue;

    breaks.push({
      tournamentName: match.tournamentName,
      year: match.year,
      matchId: match.matchId,
      stage: match.stage,
      frame: entry.frame,
      player: playerInSlot(match, entry.player),
      value: entry.fiftyPlusBreak,
    });
  }

  return breaks;
};
