import { P, TRIPLE_CROWN_EVENTS } from '../engine/params.js';
import type { TripleCrownEvent } from '../engine/params.js';
import {
  countWhere,
  distinctBy,
  flattenRoles,
  groupBy,
  minSampleFilter,
  ratio,
  ratioOrNull,
} from '../engine/aggregate.js';
import { compareBy, pivot, rankWithinPartition, rollupTotal, sortRows } from '../engine/window.js';
import type { MatchView, Snapshot } from '../engine/types.js';
import type { ReportOptions } from './types.js';
import { isProfessional, isRanking, isTitle, isTripleCrown } from './shared.js';

export type WinPercentageRow = {
  player: string;
  wins: number;
  draws: number;
  losses: number;
  matchesPlayed: number;
  matchWinPercentage: number;
};

/**
 * Wins, losses and draws per player over professional matches. Counting over
 * role-flattened rows keeps players that only ever appear on one side.
 */
export const buildWinPercentage = (snapshot: Snapshot, options: ReportOptions = {}): WinPercentageRow[] => {
  const roles = flattenRoles(snapshot.matchView.filter(isProfessional));
  const groups = minSampleFilter(
    groupBy(roles, (row) => row.player),
    options.minSample ?? P.minSample.matches,
    (group) => group.rows.length
  );

  const rows = groups.map((group) => {
    const wins = countWhere(group.rows, (row) => row.role === 'winner');
    const losses = countWhere(group.rows, (row) => row.role === 'loser');
    const draws = countWhere(group.rows, (row) => row.role === 'draw');
    const matchesPlayed = group.rows.length;
    return {
      player: group.key,
      wins,
      draws,
      losses,
      matchesPlayed,
      matchWinPercentage: ratio(wins, matchesPlayed),
    };
  });

  return sortRows(rows, [compareBy((row) => row.matchWinPercentage, 'desc'), compareBy((row) => row.player)]);
};

export type MatchesPlayedRow = {
  player: string;
  matchesPlayed: number;
};

export const buildMatchesPlayed = (snapshot: Snapshot, options: ReportOptions = {}): MatchesPlayedRow[] => {
  const roles = flattenRoles(snapshot.matchView.filter(isProfessional));
  const groups = minSampleFilter(
    groupBy(roles, (row) => row.player),
    options.minSample ?? 0,
    (group) => group.rows.length
  );
  const rows = groups.map((group) => ({ player: group.key, matchesPlayed: group.rows.length }));
  return sortRows(rows, [compareBy((row) => row.matchesPlayed, 'desc'), compareBy((row) => row.player)]);
};

export type WhitewashRow = {
  player: string;
  whitewashes: number;
  matchesPlayed: number;
  whitewashPercentage: number;
};

/** Matches won without conceding a frame, among wins needing at least six frames. */
export const buildWhitewashPercentage = (snapshot: Snapshot, options: ReportOptions = {}): WhitewashRow[] => {
  const wins = snapshot.matchView.filter(
    (match) =>
      isProfessional(match) &&
      match.outcome === 'decided' &&
      match.winnerScore >= P.whitewashMinWinnerScore
  );
  const groups = minSampleFilter(
    groupBy(wins, (match) => match.winner),
    options.minSample ?? P.minSample.matches,
    (group) => group.rows.length
  );

  const rows = groups.map((group) => {
    const whitewashes = countWhere(group.rows, (match) => match.loserScore === 0);
    return {
      player: group.key,
      whitewashes,
      matchesPlayed: group.rows.length,
      whitewashPercentage: ratio(whitewashes, group.rows.length),
    };
  });

  return sortRows(rows, [compareBy((row) => row.whitewashPercentage, 'desc'), compareBy((row) => row.player)]);
};

export type TournamentTitlesRow = {
  player: string;
  tournamentWins: number;
  mostRecentYear: number;
  mostRecentTournament: string;
  mostRecentWin: string;
};

/**
 * Professional titles per player. The most recent win is the latest year;
 * two titles in one year resolve to the alphabetically first tournament.
 */
export const buildTournamentTitles = (snapshot: Snapshot): TournamentTitlesRow[] => {
  const titles = snapshot.matchView.filter(isTitle);

  const rows = groupBy(titles, (match) => match.winner).map((group) => {
    const [latest] = sortRows(group.rows, [
      compareBy((match) => match.year, 'desc'),
      compareBy((match) => match.tournamentName),
    ]);
    return {
      player: group.key,
      tournamentWins: group.rows.length,
      mostRecentYear: latest.year,
      mostRecentTournament: latest.tournamentName,
      mostRecentWin: `${latest.year} ${latest.tournamentName}`,
    };
  });

  return sortRows(rows, [compareBy((row) => row.tournamentWins, 'desc'), compareBy((row) => row.player)]);
};

/** Title count by player, used to order reports with the most successful players first. */
const titleCounts = (snapshot: Snapshot) =>
  new Map(buildTournamentTitles(snapshot).map((row) => [row.player, row.tournamentWins]));

export type TournamentWinPercentageRow = {
  player: string;
  rankingWins: number;
  rankingEntries: number;
  rankingWinPercentage: number | null;
  nonRankingWins: number;
  nonRankingEntries: number;
  nonRankingWinPercentage: number | null;
  totalWins: number;
  totalEntries: number;
  totalWinPercentage: number;
};

export const buildTournamentWinPercentage = (
  snapshot: Snapshot,
  options: ReportOptions = {}
): TournamentWinPercentageRow[] => {
  const entries = distinctBy(
    flattenRoles(snapshot.matchView.filter(isProfessional)),
    (row) => [row.player, row.match.tournamentName, row.match.year, row.match.category].join('\u0000')
  );
  const titlesByPlayer = new Map(
    groupBy(snapshot.matchView.filter(isTitle), (match) => match.winner).map((group) => [group.key, group.rows])
  );

  const groups = minSampleFilter(
    groupBy(entries, (row) => row.player),
    options.minSample ?? P.minSample.tournamentEntries,
    (group) => group.rows.length
  );

  const rows = groups.map((group) => {
    const titles = titlesByPlayer.get(group.key) ?? [];
    const rankingEntries = countWhere(group.rows, (row) => isRanking(row.match.category));
    const nonRankingEntries = group.rows.length - rankingEntries;
    const rankingWins = countWhere(titles, (match) => isRanking(match.category));
    const nonRankingWins = titles.length - rankingWins;
    return {
      player: group.key,
      rankingWins,
      rankingEntries,
      rankingWinPercentage: ratioOrNull(rankingWins, rankingEntries),
      nonRankingWins,
      nonRankingEntries,
      nonRankingWinPercentage: ratioOrNull(nonRankingWins, nonRankingEntries),
      totalWins: titles.length,
      totalEntries: group.rows.length,
      totalWinPercentage: ratio(titles.length, group.rows.length),
    };
  });

  return sortRows(rows, [compareBy((row) => row.totalWinPercentage, 'desc'), compareBy((row) => row.player)]);
};

export type NeverWonRankingRow = {
  player: string;
  tournamentWins: number;
};

/** Title winners none of whose titles came in a ranking event. */
export const buildNeverWonRankingEvent = (snapshot: Snapshot): NeverWonRankingRow[] => {
  const rankingWinners = new Set(
    snapshot.matchView.filter((match) => isTitle(match) && isRanking(match.category)).map((match) => match.winner)
  );
  return buildTournamentTitles(snapshot)
    .filter((row) => !rankingWinners.has(row.player))
    .map((row) => ({ player: row.player, tournamentWins: row.tournamentWins }));
};

export interface TripleCrownDefeatOptions extends ReportOptions {
  topPlayers?: number;
}

export type TripleCrownDefeatRow = {
  player: string;
  tournamentName: string;
  year: number;
  stage: string;
  lostTo: string;
  score: string;
  margin: number;
};

/**
 * Heaviest loss by frame margin for each leading player at each Triple Crown
 * event, pooled across every year the event was held.
 */
export const buildTripleCrownWorstDefeats = (
  snapshot: Snapshot,
  options: TripleCrownDefeatOptions = {}
): TripleCrownDefeatRow[] => {
  const top = buildTournamentTitles(snapshot).slice(0, options.topPlayers ?? P.topPlayersLimit);
  const titles = new Map(top.map((row) => [row.player, row.tournamentWins]));

  const losses = snapshot.matchView.filter(
    (match) => match.outcome === 'decided' && isTripleCrown(match.tournamentName) && titles.has(match.loser)
  );

  const ranked = rankWithinPartition(losses, {
    partitionBy: (match) => `${match.loser}\u0000${match.tournamentName}`,
    orderBy: [
      compareBy((match) => match.margin, 'desc'),
      compareBy((match) => match.year),
      compareBy((match) => match.matchId),
    ],
  });

  const rows = ranked
    .filter((entry) => entry.rank === 1)
    .map(({ row: match }) => ({
      player: match.loser,
      tournamentName: match.tournamentName,
      year: match.year,
      stage: match.stage,
      lostTo: match.winner,
      score: `${match.loserScore} - ${match.winnerScore}`,
      margin: match.margin,
    }));

  return sortRows(rows, [
    compareBy((row) => titles.get(row.player) ?? 0, 'desc'),
    compareBy((row) => row.player),
    compareBy((row) => row.tournamentName, 'desc'),
  ]);
};

export type DecidingFramesRow = {
  tournamentName: string;
  stage: string;
  numberOfDeciders: number;
  matchesPlayed: number;
  percentageDeciders: number;
};

/** Share of Triple Crown matches per stage that went to a deciding frame. */
export const buildDecidingFrames = (snapshot: Snapshot, options: ReportOptions = {}): DecidingFramesRow[] => {
  const matches = snapshot.matchView.filter((match) => isTripleCrown(match.tournamentName));
  const groups = minSampleFilter(
    groupBy(
      matches,
      (match) => ({ tournamentName: match.tournamentName, stage: match.stage }),
      (key) => `${key.tournamentName}\u0000${key.stage}`
    ),
    options.minSample ?? P.minSample.stageMatches,
    (group) => group.rows.length
  );

  const rows = groups.map((group) => {
    const deciders = countWhere(group.rows, (match) => match.margin === 1);
    return {
      tournamentName: group.key.tournamentName,
      stage: group.key.stage,
      numberOfDeciders: deciders,
      matchesPlayed: group.rows.length,
      percentageDeciders: ratio(deciders, group.rows.length),
    };
  });

  return sortRows(rows, [
    compareBy((row) => row.percentageDeciders, 'desc'),
    compareBy((row) => row.tournamentName),
    compareBy((row) => row.stage),
  ]);
};

const tripleCrownTitles = (snapshot: Snapshot) =>
  snapshot.matchView.filter((match) => isTitle(match) && isTripleCrown(match.tournamentName));

export type TripleCrownRollupRow = {
  player: string;
  tournamentName: string;
  numberOfTitles: number;
  rowType: 'detail' | 'subtotal' | 'grand_total';
};

/**
 * Triple Crown titles per player and event, with a per-player total and a
 * grand total. Total rows carry sentinel labels and a rowType tag. `limit`
 * counts players, so every kept player keeps its subtotal and the grand total
 * covers the kept players.
 */
export const buildTripleCrownTitles = (snapshot: Snapshot, options: ReportOptions = {}): TripleCrownRollupRow[] => {
  const titles = titleCounts(snapshot);
  const ordered = sortRows(tripleCrownTitles(snapshot), [
    compareBy((match) => titles.get(match.winner) ?? 0, 'desc'),
    compareBy((match) => match.winner),
    compareBy((match) => match.tournamentName),
  ]);
  const kept = new Set(
    distinctBy(ordered, (match) => match.winner)
      .slice(0, options.limit ?? ordered.length)
      .map((match) => match.winner)
  );

  return rollupTotal(ordered.filter((match) => kept.has(match.winner)), {
    keys: [(match: MatchView) => match.winner, (match: MatchView) => match.tournamentName],
    measure: (rows) => rows.length,
  }).map((entry): TripleCrownRollupRow => {
    const [player, tournamentName] = entry.keys;
    return {
      player: player ?? P.rollupLabels.allPlayers,
      tournamentName: tournamentName ?? P.rollupLabels.total,
      numberOfTitles: entry.value,
      rowType: entry.level === 2 ? 'detail' : entry.level === 1 ? 'subtotal' : 'grand_total',
    };
  });
};

export type TripleCrownPivotRow = {
  player: string;
  worldChampionship: number;
  masters: number;
  ukChampionship: number;
  total: number;
};

const cell = (values: Map<TripleCrownEvent, number>, event: TripleCrownEvent) => values.get(event) ?? 0;

export const buildTripleCrownTitlesPivot = (snapshot: Snapshot): TripleCrownPivotRow[] => {
  const rows = pivot(tripleCrownTitles(snapshot), {
    rowKey: (match) => match.winner,
    columnKey: (match) => match.tournamentName,
    columns: TRIPLE_CROWN_EVENTS,
  }).map((entry) => ({
    player: entry.key,
    worldChampionship: cell(entry.values, 'World Championship'),
    masters: cell(entry.values, 'Masters'),
    ukChampionship: cell(entry.values, 'UK Championship'),
    total: entry.total,
  }));

  return sortRows(rows, [compareBy((row) => row.total, 'desc'), compareBy((row) => row.player)]);
};

export interface HeadToHeadOptions extends ReportOptions {
  /** Restrict output to players with at least one professional title. */
  titleWinnersOnly?: boolean;
}

export type HeadToHeadRow = {
  player: string;
  opponentType: 'Best' | 'Worst';
  opponentName: string;
  wins: number;
  matchesPlayed: number;
  winPercentage: number;
  rank: number;
};

/**
 * Best and worst opponent per player by win ratio (ties: more meetings
 * first). A player with a single qualifying opponent gets that opponent as
 * both best and worst.
 */
export const buildHeadToHead = (snapshot: Snapshot, options: HeadToHeadOptions = {}): HeadToHeadRow[] => {
  const titles = titleCounts(snapshot);
  const titleWinnersOnly = options.titleWinnersOnly ?? true;

  const meetings = flattenRoles(
    snapshot.matchView.filter(
      (match) => isProfessional(match) && match.winnerScore >= P.headToHeadMinWinnerScore
    )
  ).filter((row) => !titleWinnersOnly || titles.has(row.player));

  const pairs = minSampleFilter(
    groupBy(
      meetings,
      (row) => ({ player: row.player, opponent: row.opponent }),
      (key) => `${key.player}\u0000${key.opponent}`
    ),
    options.minSample ?? P.minSample.headToHeadMeetings,
    (group) => group.rows.length
  ).map((group) => {
    const wins = countWhere(group.rows, (row) => row.role === 'winner');
    return {
      player: group.key.player,
      opponent: group.key.opponent,
      wins,
      matchesPlayed: group.rows.length,
      winFraction: wins / group.rows.length,
    };
  });

  const ranked = rankWithinPartition(pairs, {
    partitionBy: (pair) => pair.player,
    orderBy: [
      compareBy((pair) => pair.winFraction, 'desc'),
      compareBy((pair) => pair.matchesPlayed, 'desc'),
      compareBy((pair) => pair.opponent),
    ],
  });

  const rows: HeadToHeadRow[] = [];
  for (const { row: pair, rank, partitionSize } of ranked) {
    const base = {
      player: pair.player,
      opponentName: pair.opponent,
      wins: pair.wins,
      matchesPlayed: pair.matchesPlayed,
      winPercentage: ratio(pair.wins, pair.matchesPlayed),
      rank,
    };
    if (rank === 1) rows.push({ ...base, opponentType: 'Best' });
    if (rank === partitionSize) rows.push({ ...base, opponentType: 'Worst' });
  }

  return sortRows(rows, [
    compareBy((row) => titles.get(row.player) ?? 0, 'desc'),
    compareBy((row) => row.player),
    compareBy((row) => row.rank),
    compareBy((row) => (row.opponentType === 'Best' ? 0 : 1)),
  ]);
};
