import {
  pgTable,
  text,
  integer,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

export const players = pgTable('players', {
  fullName: text('full_name').primaryKey(),
  country: text('country').notNull(),
});

export const tournaments = pgTable('tournaments', {
  id: integer('id').primaryKey(),
  name: text('name').notNull(),
  year: integer('year').notNull(),
  status: text('status').notNull(),
  category: text('category').notNull(),
  city: text('city'),
  country: text('country'),
}, (table) => ({
  nameYearIdx: index('tournaments_name_year_idx').on(table.name, table.year),
}));

export const matches = pgTable('matches', {
  matchId: integer('match_id').primaryKey(),
  tournamentId: integer('tournament_id').references(() => tournaments.id, {
    onDelete: 'restrict',
  }).notNull(),
  stage: text('stage').notNull(),
  player1Name: text('player1_name').references(() => players.fullName).notNull(),
  player2Name: text('player2_name').references(() => players.fullName).notNull(),
  score1: integer('score1').notNull(),
  score2: integer('score2').notNull(),
}, (table) => ({
  tournamentIdx: index('matches_tournament_idx').on(table.tournamentId),
}));

export const scores = pgTable('scores', {
  matchId: integer('match_id').references(() => matches.matchId, {
    onDelete: 'cascade',
  }).notNull(),
  frame: integer('frame').notNull(),
  player: integer('player').notNull(),
  score: integer('score').notNull(),
  fiftyPlusBreak: integer('fifty_plus_break'),
}, (table) => ({
  pk: primaryKey({ columns: [table.matchId, table.frame, table.player] }),
}));
