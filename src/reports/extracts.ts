import { distinctBy, flattenRoles, groupBy } from '../engine/aggregate.js';
import { compareBy, runningAggregate, sortRows } from '../engine/window.js';
import type { ScoreEntryRecord, Snapshot } from '../engine/types.js';
import { editionKey, isFinalStage, isProfessional, isTitle, normalizeCountry } from './shared.js';

export type FinalProgressionRow = {
  year: number;
  winner: string;
  loser: string;
  framesPlayed: number;
  framesWon: number;
};

/** Frame-by-frame progress of the eventual winner in every World Championship final. */
export const buildWorldFinalProgression = (snapshot: Snapshot): FinalProgressionRow[] => {
  const finals = sortRows(
    snapshot.matchView.filter(
      (match) => match.tournamentName === 'World Championship' && isFinalStage(match.stage) && match.outcome === 'decided'
    ),
    [compareBy((match) => match.year), compareBy((match) => match.matchId)]
  );
  const scoresByMatch = new Map(groupBy(snapshot.scores, (entry) => entry.matchId).map((group) => [group.key, group.rows]));

  const rows: FinalProgressionRow[] = [];
  for (const final of finals) {
    // Frames missing either player's entry are skipped.
    const frames = groupBy(scoresByMatch.get(final.matchId) ?? [], (entry) => entry.frame).flatMap((group) => {
      const slotScore = (slot: ScoreEntryRecord['player']) =>
        group.rows.find((entry) => entry.player === slot)?.score;
      const winnerScore = slotScore(final.winnerSlot);
      const loserScore = slotScore(final.winnerSlot === 1 ? 2 : 1);
      if (winnerScore === undefined || loserScore === undefined) return [];
      return [{ frame: group.key, won: winnerScore > loserScore ? 1 : 0 }];
    });

    const ordered = sortRows(frames, [compareBy((frame) => frame.frame)]);
    const won = runningAggregate(
      ordered.map((frame) => frame.won),
      { aggregate: 'sum', preceding: 'unbounded' }
    );

    ordered.forEach((frame, index) => {
      rows.push({
        year: final.year,
        winner: final.winner,
        loser: final.loser,
        framesPlayed: frame.frame,
        framesWon: won[index],
      });
    });
  }
  return rows;
};

export type TournamentEntryOutcomeRow = {
  player: string;
  tournamentName: string;
  year: number;
  category: string;
  outcome: 'Won' | 'Lost';
};

/** Every entry into a tournament edition that produced a professional champion. */
export const buildTournamentEntryOutcomes = (snapshot: Snapshot): TournamentEntryOutcomeRow[] => {
  const champions = new Map<string, Set<string>>();
  for (const match of snapshot.matchView.filter(isTitle)) {
    const key = editionKey(match.tournamentName, match.year);
    const winners = champions.get(key) ?? new Set<string>();
    winners.add(match.winner);
    champions.set(key, winners);
  }

  const entries = distinctBy(flattenRoles(snapshot.matchView), (row) =>
    [row.player, row.match.tournamentName, row.match.year, row.match.category].join('\u0000')
  );

  const rows: TournamentEntryOutcomeRow[] = [];
  for (const entry of entries) {
    const winners = champions.get(editionKey(entry.match.tournamentName, entry.match.year));
    if (!winners) continue;
    rows.push({
      player: entry.player,
      tournamentName: entry.match.tournamentName,
      year: entry.match.year,
      category: entry.match.category,
      outcome: winners.has(entry.player) ? 'Won' : 'Lost',
    });
  }

  return sortRows(rows, [
    compareBy((row) => row.player),
    compareBy((row) => row.year),
    compareBy((row) => row.tournamentName),
    compareBy((row) => row.category),
  ]);
};

export type CountryFootprintRow = {
  country: string;
  countryPlayerCount: number;
  tournamentName: string | null;
  year: number | null;
  city: string | null;
};

/**
 * Professional player counts per country alongside the professional
 * tournaments staged there. Home nations count as the United Kingdom.
 */
export const buildCountryFootprint = (snapshot: Snapshot): CountryFootprintRow[] => {
  const players = distinctBy(
    flattenRoles(snapshot.matchView.filter(isProfessional)).map((row) => ({
      player: row.player,
      country: normalizeCountry(row.country),
    })),
    (row) => `${row.player}\u0000${row.country}`
  );
  const counts = groupBy(players, (row) => row.country).map((group) => ({
    country: group.key,
    playerCount: group.rows.length,
  }));

  const tournamentsByCountry = new Map(
    groupBy(
      snapshot.tournaments.filter(
        (tournament) => isProfessional(tournament) && tournament.country !== null
      ),
      (tournament) => normalizeCountry(tournament.country ?? '')
    ).map((group) => [group.key, group.rows])
  );

  const rows: CountryFootprintRow[] = [];
  for (const { country, playerCount } of counts) {
    const hosted = tournamentsByCountry.get(country) ?? [];
    if (!hosted.length) {
      rows.push({ country, countryPlayerCount: playerCount, tournamentName: null, year: null, city: null });
      continue;
    }
    for (const tournament of hosted) {
      rows.push({
        country,
        countryPlayerCount: playerCount,
        tournamentName: tournament.name,
        year: tournament.year,
        city: tournament.city,
      });
    }
  }

  return sortRows(rows, [
    compareBy((row) => row.country),
    compareBy((row) => row.year ?? 0),
    compareBy((row) => row.tournamentName ?? ''),
    compareBy((row) => row.city ?? ''),
  ]);
};
