import { P } from './params.js';
import { NoSampleDataError } from './errors.js';
import type { MatchView, RoleRow } from './types.js';

export interface Group<K, T> {
  key: K;
  rows: T[];
}

export const groupBy = <T, K>(rows: readonly T[], keyOf: (row: T) => K, hash: (key: K) => string = String) => {
  const groups = new Map<string, Group<K, T>>();
  for (const row of rows) {
    const key = keyOf(row);
    const id = hash(key);
    const existing = groups.get(id);
    if (existing) {
      existing.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }
  return [...groups.values()];
};

export const countWhere = <T>(rows: readonly T[], predicate: (row: T) => boolean) =>
  rows.reduce((count, row) => (predicate(row) ? count + 1 : count), 0);

export const roundHalfAwayFromZero = (value: number, digits: number = P.percentDigits) => {
  const factor = 10 ** digits;
  // toPrecision trims binary noise such as 1.0005 * 1000 = 1000.4999999999999.
  const scaled = Number((Math.abs(value) * factor).toPrecision(15));
  const rounded = Math.round(scaled) / factor;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
};

export const ratio = (
  numerator: number,
  total: number,
  options: { scale?: number; digits?: number } = {}
) => {
  if (!Number.isFinite(total) || total <= 0) {
    throw new NoSampleDataError(`No sample data: ratio of ${numerator} over ${total}`, { numerator, total });
  }
  const scale = options.scale ?? 100;
  return roundHalfAwayFromZero((scale * numerator) / total, options.digits ?? P.percentDigits);
};

/** Ratio that reports an empty denominator as null instead of throwing. */
export const ratioOrNull = (numerator: number, total: number, options?: { scale?: number; digits?: number }) => {
  try {
    return ratio(numerator, total, options);
  } catch (err) {
    if (err instanceof NoSampleDataError) return null;
    throw err;
  }
};

export const minSampleFilter = <G>(groups: readonly G[], threshold: number, sizeOf: (group: G) => number) =>
  groups.filter((group) => sizeOf(group) >= threshold);

export const distinctBy = <T>(rows: readonly T[], keyOf: (row: T) => string) => {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const row of rows) {
    const key = keyOf(row);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(row);
  }
  return result;
};

/**
 * Maps every match to one row per participant. A decided match yields a
 * winner row and a loser row; a drawn match yields two draw rows.
 */
export const flattenRoles = (matches: readonly MatchView[]): RoleRow[] => {
  const rows: RoleRow[] = [];
  for (const match of matches) {
    const drawn = match.outcome === 'draw';
    rows.push({
      matchId: match.matchId,
      player: match.winner,
      country: match.winnerCountry,
      opponent: match.loser,
      role: drawn ? 'draw' : 'winner',
      playerScore: match.winnerScore,
      opponentScore: match.loserScore,
      match,
    });
    rows.push({
      matchId: match.matchId,
      player: match.loser,
      country: match.loserCountry,
      opponent: match.winner,
      role: drawn ? 'draw' : 'loser',
      playerScore: match.loserScore,
      opponentScore: match.winnerScore,
      match,
    });
  }
  return rows;
};
