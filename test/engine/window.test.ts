import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  compareBy,
  pivot,
  rankWithinPartition,
  rollupTotal,
  runningAggregate,
  sortRows,
} from '../../src/engine/window.js';

type Row = { player: string; opponent: string; ratio: number; meetings: number };

const rows: Row[] = [
  { player: 'A', opponent: 'X', ratio: 0.5, meetings: 10 },
  { player: 'B', opponent: 'X', ratio: 0.9, meetings: 12 },
  { player: 'A', opponent: 'Y', ratio: 0.5, meetings: 14 },
  { player: 'A', opponent: 'Z', ratio: 0.8, meetings: 10 },
  { player: 'B', opponent: 'Y', ratio: 0.2, meetings: 11 },
];

test('rankWithinPartition numbers each partition 1..N with tie-breaks', () => {
  const ranked = rankWithinPartition(rows, {
    partitionBy: (row) => row.player,
    orderBy: [compareBy((row) => row.ratio, 'desc'), compareBy((row) => row.meetings, 'desc')],
  });

  assert.deepEqual(
    ranked.map((entry) => [entry.row.player, entry.row.opponent, entry.rank, entry.partitionSize]),
    [
      ['A', 'Z', 1, 3],
      ['A', 'Y', 2, 3],
      ['A', 'X', 3, 3],
      ['B', 'X', 1, 2],
      ['B', 'Y', 2, 2],
    ]
  );
});

test('rankWithinPartition never repeats or skips a rank on full ties', () => {
  const tied = [1, 2, 3, 4].map((id) => ({ id, score: 7 }));
  const ranked = rankWithinPartition(tied, {
    partitionBy: () => 'all',
    orderBy: [compareBy((row) => row.score, 'desc')],
  });
  assert.deepEqual(ranked.map((entry) => entry.rank), [1, 2, 3, 4]);
  assert.deepEqual(ranked.map((entry) => entry.row.id), [1, 2, 3, 4]);
});

test('sortRows compares strings by code unit and leaves the input untouched', () => {
  const names = [{ name: 'b' }, { name: 'B' }, { name: 'a' }];
  const sorted = sortRows(names, [compareBy((row) => row.name)]);
  assert.deepEqual(sorted.map((row) => row.name), ['B', 'a', 'b']);
  assert.deepEqual(names.map((row) => row.name), ['b', 'B', 'a']);
});

test('runningAggregate averages a trailing five-row window including the current row', () => {
  const averages = runningAggregate([10, 12, 8, 15, 20, 18], { aggregate: 'avg', preceding: 4 });
  assert.equal(averages[0], 10);
  assert.equal(averages[1], 11);
  assert.equal(averages[4], 13);
  assert.equal(averages[5], 14.6);
});

test('runningAggregate supports unbounded frames', () => {
  assert.deepEqual(
    runningAggregate([10, 12, 8, 15, 20, 18], { aggregate: 'max', preceding: 'unbounded' }),
    [10, 12, 12, 15, 20, 20]
  );
  assert.deepEqual(runningAggregate([1, 0, 1, 1], { aggregate: 'sum', preceding: 'unbounded' }), [1, 1, 2, 3]);
  assert.deepEqual(runningAggregate([4, 9], { aggregate: 'count', preceding: 0 }), [1, 1]);
  assert.deepEqual(runningAggregate([], { aggregate: 'avg', preceding: 3 }), []);
});

test('runningAggregate rejects a negative window', () => {
  assert.throws(() => runningAggregate([1], { aggregate: 'sum', preceding: -1 }), RangeError);
});

type Title = { player: string; event: string };

const titles: Title[] = [
  { player: 'A', event: 'Masters' },
  { player: 'A', event: 'World Championship' },
  { player: 'A', event: 'Masters' },
  { player: 'B', event: 'UK Championship' },
];

test('rollupTotal emits detail rows, per-player subtotals and a grand total', () => {
  const rolled = rollupTotal(titles, {
    keys: [(row: Title) => row.player, (row: Title) => row.event],
    measure: (group) => group.length,
  });

  assert.deepEqual(
    rolled.map((row) => [row.level, row.keys, row.value]),
    [
      [2, ['A', 'Masters'], 2],
      [2, ['A', 'World Championship'], 1],
      [1, ['A', null], 3],
      [2, ['B', 'UK Championship'], 1],
      [1, ['B', null], 1],
      [0, [null, null], 4],
    ]
  );

  for (const subtotal of rolled.filter((row) => row.level === 1)) {
    const detail = rolled.filter((row) => row.level === 2 && row.keys[0] === subtotal.keys[0]);
    assert.equal(detail.reduce((sum, row) => sum + row.value, 0), subtotal.value);
  }
});

test('rollupTotal returns nothing for empty input', () => {
  assert.deepEqual(rollupTotal([], { keys: [(row: Title) => row.player], measure: (group) => group.length }), []);
});

test('pivot zero-fills known columns and drops unknown ones', () => {
  const pivoted = pivot(
    [
      { player: 'A', event: 'World Championship' },
      { player: 'A', event: 'World Championship' },
      { player: 'A', event: 'Shanghai Masters' },
      { player: 'C', event: 'Welsh Open' },
    ],
    {
      rowKey: (row) => row.player,
      columnKey: (row) => row.event,
      columns: ['World Championship', 'Masters', 'UK Championship'],
    }
  );

  assert.equal(pivoted.length, 1);
  assert.equal(pivoted[0].key, 'A');
  assert.deepEqual(
    [...pivoted[0].values.entries()],
    [
      ['World Championship', 2],
      ['Masters', 0],
      ['UK Championship', 0],
    ]
  );
  assert.equal(pivoted[0].total, 2);
  assert.deepEqual(pivot([], { rowKey: String, columnKey: String, columns: ['Masters'] }), []);
});
