import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  buildCenturyBreaks,
  buildCenturyRate,
  buildMaximumBreaks,
  buildTopBreaksPerTournament,
  buildWorldChampionshipCenturies,
} from '../../src/reports/breaks.js';
import { dataset } from '../helpers/dataset.js';

const breaksFixture = () =>
  dataset()
    .tournament({ id: 1, name: 'World Championship', year: 2019 })
    .tournament({ id: 2, name: 'UK Championship', year: 2019 })
    .tournament({ id: 3, name: 'Club Classic', year: 2019, status: 'Amateur' })
    .match(1, 'Player A', 'Player B', 18, 10, { stage: 'Final', id: 1 })
    .match(1, 'Player A', 'Player C', 10, 5, { stage: 'Qualifying Round 1', id: 2 })
    .match(2, 'Player B', 'Player C', 6, 2, { id: 3 })
    .match(3, 'Player A', 'Player B', 4, 0, { id: 4 })
    .frame(1, 1, 147, 0, { 1: 147 })
    .frame(1, 2, 0, 120, { 2: 120 })
    .frame(1, 3, 101, 0, { 1: 101 })
    .frame(1, 4, 60, 12, { 1: 60 })
    .frame(2, 1, 0, 130, { 2: 130 })
    .frame(3, 1, 100, 0, { 1: 100 })
    .frame(3, 2, 0, 147, { 2: 147 })
    .frame(3, 3, 110, 5, { 1: 110 })
    .frame(4, 1, 140, 0, { 1: 140 })
    .snapshot();

test('century and maximum counts use professional breaks only', () => {
  const snapshot = breaksFixture();

  assert.deepEqual(buildCenturyBreaks(snapshot), [
    { player: 'Player B', centuryBreaks: 3 },
    { player: 'Player A', centuryBreaks: 2 },
    { player: 'Player C', centuryBreaks: 2 },
  ]);
  assert.deepEqual(buildMaximumBreaks(snapshot), [
    { player: 'Player A', maximumBreaks: 1 },
    { player: 'Player C', maximumBreaks: 1 },
  ]);
});

test('top breaks keep the three highest of each edition', () => {
  assert.deepEqual(buildTopBreaksPerTournament(breaksFixture()), [
    { tournamentName: 'UK Championship', year: 2019, rank: 1, player: 'Player C', breakValue: 147 },
    { tournamentName: 'UK Championship', year: 2019, rank: 2, player: 'Player B', breakValue: 110 },
    { tournamentName: 'UK Championship', year: 2019, rank: 3, player: 'Player B', breakValue: 100 },
    { tournamentName: 'World Championship', year: 2019, rank: 1, player: 'Player A', breakValue: 147 },
    { tournamentName: 'World Championship', year: 2019, rank: 2, player: 'Player C', breakValue: 130 },
    { tournamentName: 'World Championship', year: 2019, rank: 3, player: 'Player B', breakValue: 120 },
  ]);
});

test('century rate divides centuries by frames played in the edition', () => {
  const snapshot = breaksFixture();

  assert.deepEqual(buildCenturyRate(snapshot), [
    { tournamentName: 'UK Championship', year: 2019, centuryBreaks: 3, framesPlayed: 8, centuriesPerFrame: 0.375 },
    { tournamentName: 'World Championship', year: 2019, centuryBreaks: 4, framesPlayed: 43, centuriesPerFrame: 0.093 },
  ]);
  assert.deepEqual(buildCenturyRate(snapshot, { minSample: 10 }).map((row) => row.tournamentName), [
    'World Championship',
  ]);
});

test('world championship centuries carry a five-edition average and a running record', () => {
  const counts = [10, 12, 8, 15, 20, 18];
  const builder = dataset();
  counts.forEach((count, index) => {
    const id = index + 1;
    builder
      .tournament({ id, name: 'World Championship', year: 2015 + index })
      .match(id, 'Player A', 'Player B', 18, 16, { stage: 'Final', id });
    for (let frame = 1; frame <= count; frame += 1) {
      builder.frame(id, frame, 100, 0, { 1: 100 });
    }
  });
  builder
    .tournament({ id: 7, name: 'World Championship', year: 2020 })
    .match(7, 'Player A', 'Player B', 10, 2, { stage: 'Qualifying Round 4', id: 7 })
    .frame(7, 1, 125, 0, { 1: 125 });

  const rows = buildWorldChampionshipCenturies(builder.snapshot());

  assert.deepEqual(
    rows.map((row) => row.year),
    [2015, 2016, 2017, 2018, 2019, 2020]
  );
  assert.deepEqual(
    rows.map((row) => row.centuryBreaks),
    counts
  );
  assert.deepEqual(
    rows.map((row) => row.avgLast5),
    [10, 11, 10, 11.25, 13, 14.6]
  );
  assert.deepEqual(
    rows.map((row) => row.record),
    [10, 12, 12, 15, 20, 20]
  );
});
