import { P } from '../engine/params.js';
import { groupBy, minSampleFilter, ratio, roundHalfAwayFromZero } from '../engine/aggregate.js';
import { compareBy, rankWithinPartition, runningAggregate, sortRows } from '../engine/window.js';
import type { BreakView, Snapshot } from '../engine/types.js';
import type { ReportOptions } from './types.js';
import { editionKey, isCrucibleStage, isProfessional } from './shared.js';

const isCentury = (entry: BreakView) => entry.value >= P.century;
const isMaximum = (entry: BreakView) => entry.value === P.maximum;

const countByPlayer = (breaks: readonly BreakView[]) =>
  groupBy(breaks, (entry) => entry.player).map((group) => ({ player: group.key, count: group.rows.length }));

export type CenturyBreaksRow = {
  player: string;
  centuryBreaks: number;
};

export const buildCenturyBreaks = (snapshot: Snapshot): CenturyBreaksRow[] => {
  const rows = countByPlayer(snapshot.breaks.filter(isCentury)).map((entry) => ({
    player: entry.player,
    centuryBreaks: entry.count,
  }));
  return sortRows(rows, [compareBy((row) => row.centuryBreaks, 'desc'), compareBy((row) => row.player)]);
};

export type MaximumBreaksRow = {
  player: string;
  maximumBreaks: number;
};

export const buildMaximumBreaks = (snapshot: Snapshot): MaximumBreaksRow[] => {
  const rows = countByPlayer(snapshot.breaks.filter(isMaximum)).map((entry) => ({
    player: entry.player,
    maximumBreaks: entry.count,
  }));
  return sortRows(rows, [compareBy((row) => row.maximumBreaks, 'desc'), compareBy((row) => row.player)]);
};

export type TopBreakRow = {
  tournamentName: string;
  year: number;
  rank: number;
  player: string;
  breakValue: number;
};

/** The three highest breaks of every tournament edition. */
export const buildTopBreaksPerTournament = (snapshot: Snapshot): TopBreakRow[] => {
  const ranked = rankWithinPartition(snapshot.breaks, {
    partitionBy: (entry) => editionKey(entry.tournamentName, entry.year),
    orderBy: [
      compareBy((entry) => entry.value, 'desc'),
      compareBy((entry) => entry.matchId),
      compareBy((entry) => entry.frame),
      compareBy((entry) => entry.player),
    ],
  });

  const rows = ranked
    .filter((entry) => entry.rank <= P.topBreaksPerTournament)
    .map(({ row, rank }) => ({
      tournamentName: row.tournamentName,
      year: row.year,
      rank,
      player: row.player,
      breakValue: row.value,
    }));

  return sortRows(rows, [
    compareBy((row) => row.year, 'desc'),
    compareBy((row) => row.tournamentName),
    compareBy((row) => row.rank),
  ]);
};

export type CenturyRateRow = {
  tournamentName: string;
  year: number;
  centuryBreaks: number;
  framesPlayed: number;
  centuriesPerFrame: number;
};

/**
 * Centuries per frame for each professional tournament edition. At most one
 * century fits in a frame, so the century count bounds the frame count.
 */
export const buildCenturyRate = (snapshot: Snapshot, options: ReportOptions = {}): CenturyRateRow[] => {
  const frames = new Map(
    groupBy(
      snapshot.matchView.filter(isProfessional),
      (match) => editionKey(match.tournamentName, match.year)
    ).map((group) => [
      group.key,
      group.rows.reduce((sum, match) => sum + match.winnerScore + match.loserScore, 0),
    ])
  );

  const editions = groupBy(
    snapshot.breaks.filter(isCentury),
    (entry) => ({ tournamentName: entry.tournamentName, year: entry.year }),
    (key) => editionKey(key.tournamentName, key.year)
  ).map((group) => ({
    tournamentName: group.key.tournamentName,
    year: group.key.year,
    centuryBreaks: group.rows.length,
    framesPlayed: frames.get(editionKey(group.key.tournamentName, group.key.year)) ?? 0,
  }));

  const rows = minSampleFilter(editions, Math.max(1, options.minSample ?? 1), (edition) => edition.framesPlayed).map(
    (edition) => ({
      ...edition,
      centuriesPerFrame: ratio(edition.centuryBreaks, edition.framesPlayed, { scale: 1 }),
    })
  );

  return sortRows(rows, [
    compareBy((row) => row.centuriesPerFrame, 'desc'),
    compareBy((row) => row.year),
    compareBy((row) => row.tournamentName),
  ]);
};

export type CenturyTrendRow = {
  year: number;
  centuryBreaks: number;
  avgLast5: number;
  record: number;
};

const WORLD_CHAMPIONSHIP = 'World Championship';

/**
 * Centuries made at the World Championship from the Last 32 onward, per year,
 * with a trailing five-edition average and the running record.
 */
export const buildWorldChampionshipCenturies = (snapshot: Snapshot): CenturyTrendRow[] => {
  const centuries = snapshot.breaks.filter(
    (entry) => entry.tournamentName === WORLD_CHAMPIONSHIP && isCrucibleStage(entry.stage) && isCentury(entry)
  );
  const years = sortRows(
    groupBy(centuries, (entry) => entry.year).map((group) => ({ year: group.key, count: group.rows.length })),
    [compareBy((entry) => entry.year)]
  );

  const counts = years.map((entry) => entry.count);
  const averages = runningAggregate(counts, { aggregate: 'avg', preceding: P.centuryTrendPreceding });
  const records = runningAggregate(counts, { aggregate: 'max', preceding: 'unbounded' });

  return years.map((entry, index) => ({
    year: entry.year,
    centuryBreaks: entry.count,
    avgLast5: roundHalfAwayFromZero(averages[index]),
    record: records[index],
  }));
};
