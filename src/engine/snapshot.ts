import { P } from './params.js';
import { InvalidDatasetError } from './errors.js';
import type { DatasetIssue } from './errors.js';
import { buildBreakView, enrichMatches } from './enrichment.js';
import type { Dataset, Snapshot } from './types.js';

const isCount = (value: number) => Number.isInteger(value) && value >= 0;

const findDuplicates = <T>(rows: readonly T[], keyOf: (row: T) => string | number) => {
  const seen = new Set<string | number>();
  const duplicates = new Set<string | number>();
  for (const row of rows) {
    const key = keyOf(row);
    if (seen.has(key)) duplicates.add(key);
    seen.add(key);
  }
  return [...duplicates];
};

export const collectDatasetIssues = (dataset: Dataset): DatasetIssue[] => {
  const issues: DatasetIssue[] = [];

  for (const name of findDuplicates(dataset.players, (player) => player.fullName)) {
    issues.push({ relation: 'players', path: `full_name=${name}`, message: 'duplicate player name' });
  }
  for (const id of findDuplicates(dataset.tournaments, (tournament) => tournament.id)) {
    issues.push({ relation: 'tournaments', path: `id=${id}`, message: 'duplicate tournament id' });
  }
  for (const id of findDuplicates(dataset.matches, (match) => match.matchId)) {
    issues.push({ relation: 'matches', path: `match_id=${id}`, message: 'duplicate match id' });
  }

  for (const match of dataset.matches) {
    const path = `match_id=${match.matchId}`;
    if (!isCount(match.score1) || !isCount(match.score2)) {
      issues.push({ relation: 'matches', path, message: 'scores must be non-negative integers' });
    }
    if (match.player1Name === match.player2Name) {
      issues.push({ relation: 'matches', path, message: 'a match needs two distinct players' });
    }
  }

  for (const entry of dataset.scores) {
    const path = `match_id=${entry.matchId}/frame=${entry.frame}/player=${entry.player}`;
    if (!Number.isInteger(entry.frame) || entry.frame < 1) {
      issues.push({ relation: 'scores', path, message: 'frame must be a positive integer' });
    }
    const value = entry.fiftyPlusBreak;
    if (value !== null && (!Number.isInteger(value) || value < P.breakRange.min || value > P.breakRange.max)) {
      issues.push({
        relation: 'scores',
        path,
        message: `break must lie in [${P.breakRange.min}, ${P.breakRange.max}]`,
      });
    }
  }

  // A frame can hold at most one century, so at most one maximum too.
  const centuries = new Map<string, number>();
  for (const entry of dataset.scores) {
    if (entry.fiftyPlusBreak === null || entry.fiftyPlusBreak < P.century) continue;
    const path = `match_id=${entry.matchId}/frame=${entry.frame}`;
    const seen = (centuries.get(path) ?? 0) + 1;
    centuries.set(path, seen);
    if (seen === 2) {
      issues.push({ relation: 'scores', path, message: 'a frame holds at most one century break' });
    }
  }

  return issues;
};

/** Freezes shallow copies so the caller's own rows stay writable. */
const freezeRows = <T extends object>(rows: readonly T[]): readonly T[] =>
  Object.freeze(
    rows.map((row) => {
      const copy = { ...row };
      Object.freeze(copy);
      return copy;
    })
  );

/**
 * Validates, enriches and freezes a loaded dataset. The returned snapshot is
 * immutable; every report reads from the same instance.
 */
export const buildSnapshot = (dataset: Dataset, loadedAt: Date = new Date()): Snapshot => {
  const issues = collectDatasetIssues(dataset);
  if (issues.length) {
    throw new InvalidDatasetError(`Dataset failed validation with ${issues.length} issue(s)`, issues);
  }

  const matchView = enrichMatches(dataset);
  const breaks = buildBreakView(dataset, matchView, P.professionalStatus);

  return Object.freeze({
    loadedAt,
    players: freezeRows(dataset.players),
    tournaments: freezeRows(dataset.tournaments),
    matches: freezeRows(dataset.matches),
    scores: freezeRows(dataset.scores),
    matchView: freezeRows(matchView),
    breaks: freezeRows(breaks),
  });
};
