import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { P } from '../engine/params.js';
import { InvalidDatasetError } from '../engine/errors.js';
import type { DatasetIssue } from '../engine/errors.js';
import type {
  Dataset,
  MatchRecord,
  PlayerRecord,
  ScoreEntryRecord,
  TournamentRecord,
} from '../engine/types.js';
import { DatasetSourceError } from './errors.js';

const count = z.number().int().min(0);

const PlayerRowSchema = z.object({
  full_name: z.string().min(1),
  country: z.string().min(1),
});

const TournamentRowSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  year: z.number().int(),
  status: z.string().min(1),
  category: z.string().min(1),
  city: z.string().nullable().optional(),
  country: z.string().nullable().optional(),
});

const MatchRowSchema = z.object({
  match_id: z.number().int(),
  tournament_id: z.number().int(),
  stage: z.string().min(1),
  player1_name: z.string().min(1),
  player2_name: z.string().min(1),
  score1: count,
  score2: count,
});

const ScoreRowSchema = z.object({
  match_id: z.number().int(),
  frame: z.number().int().min(1),
  player: z.union([z.literal(1), z.literal(2)]),
  score: count,
  fifty_plus_break: z.number().int().min(P.breakRange.min).max(P.breakRange.max).nullable().optional(),
});

export type PlayerRow = z.infer<typeof PlayerRowSchema>;
export type TournamentRow = z.infer<typeof TournamentRowSchema>;
export type MatchRow = z.infer<typeof MatchRowSchema>;
export type ScoreRow = z.infer<typeof ScoreRowSchema>;

export interface RawDataset {
  players: unknown;
  tournaments: unknown;
  matches: unknown;
  scores: unknown;
}

export const toPlayerRecord = (row: PlayerRow): PlayerRecord => ({
  fullName: row.full_name,
  country: row.country,
});

export const toTournamentRecord = (row: TournamentRow): TournamentRecord => ({
  id: row.id,
  name: row.name,
  year: row.year,
  status: row.status,
  category: row.category,
  city: row.city ?? null,
  country: row.country ?? null,
});

export const toMatchRecord = (row: MatchRow): MatchRecord => ({
  matchId: row.match_id,
  tournamentId: row.tournament_id,
  stage: row.stage,
  player1Name: row.player1_name,
  player2Name: row.player2_name,
  score1: row.score1,
  score2: row.score2,
});

export const toScoreEntryRecord = (row: ScoreRow): ScoreEntryRecord => ({
  matchId: row.match_id,
  frame: row.frame,
  player: row.player,
  score: row.score,
  fiftyPlusBreak: row.fifty_plus_break ?? null,
});

const parseRelation = <S extends z.ZodTypeAny>(
  relation: DatasetIssue['relation'],
  schema: S,
  input: unknown,
  issues: DatasetIssue[]
): Array<z.infer<S>> => {
  const parsed = z.array(schema).safeParse(input);
  if (parsed.success) return parsed.data;
  for (const issue of parsed.error.issues) {
    issues.push({ relation, path: issue.path.join('.'), message: issue.message });
  }
  return [];
};

/** Validates raw rows for the four relations and maps them to records. */
export const parseDataset = (raw: RawDataset): Dataset => {
  const issues: DatasetIssue[] = [];
  const players = parseRelation('players', PlayerRowSchema, raw.players, issues);
  const tournaments = parseRelation('tournaments', TournamentRowSchema, raw.tournaments, issues);
  const matches = parseRelation('matches', MatchRowSchema, raw.matches, issues);
  const scores = parseRelation('scores', ScoreRowSchema, raw.scores, issues);

  if (issues.length) {
    throw new InvalidDatasetError(`Dataset rows failed schema validation (${issues.length} issue(s))`, issues);
  }

  return {
    players: players.map(toPlayerRecord),
    tournaments: tournaments.map(toTournamentRecord),
    matches: matches.map(toMatchRecord),
    scores: scores.map(toScoreEntryRecord),
  };
};

export const DATASET_FILES = {
  players: 'players.json',
  tournaments: 'tournaments.json',
  matches: 'matches.json',
  scores: 'scores.json',
} as const;

const readJson = async (dir: string, relation: keyof typeof DATASET_FILES): Promise<unknown> => {
  const file = join(dir, DATASET_FILES[relation]);
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    throw new DatasetSourceError(`Unable to read ${file}`, { source: dir, relation, cause: err });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DatasetSourceError(`Invalid JSON in ${file}`, { source: dir, relation, cause: err });
  }
};

export const readDatasetDirectory = async (dir: string): Promise<Dataset> => {
  const [players, tournaments, matches, scores] = await Promise.all([
    readJson(dir, 'players'),
    readJson(dir, 'tournaments'),
    readJson(dir, 'matches'),
    readJson(dir, 'scores'),
  ]);
  return parseDataset({ players, tournaments, matches, scores });
};
