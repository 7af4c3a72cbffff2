import { groupBy } from './aggregate.js';

export type Direction = 'asc' | 'desc';
export type Comparator<T> = (a: T, b: T) => number;

export const compareValues = (a: number | string, b: number | string) => {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

export const compareBy = <T>(value: (row: T) => number | string, direction: Direction = 'asc'): Comparator<T> =>
  (a, b) => {
    const result = compareValues(value(a), value(b));
    return direction === 'asc' ? result : -result;
  };

export const chainComparators = <T>(comparators: readonly Comparator<T>[]): Comparator<T> =>
  (a, b) => {
    for (const comparator of comparators) {
      const result = comparator(a, b);
      if (result !== 0) return result;
    }
    return 0;
  };

/** Stable sort into a new array. */
export const sortRows = <T>(rows: readonly T[], comparators: readonly Comparator<T>[]) =>
  [...rows].sort(chainComparators(comparators));

export interface Ranked<T> {
  row: T;
  rank: number;
  partitionSize: number;
}

export interface RankOptions<T> {
  partitionBy: (row: T) => string;
  orderBy: readonly Comparator<T>[];
}

/**
 * Row numbering within each partition: ranks run 1..N without gaps or
 * duplicates. Rows equal under every comparator keep their input order.
 */
export const rankWithinPartition = <T>(rows: readonly T[], options: RankOptions<T>): Ranked<T>[] => {
  const ranked: Ranked<T>[] = [];
  for (const partition of groupBy(rows, options.partitionBy)) {
    const ordered = sortRows(partition.rows, options.orderBy);
    ordered.forEach((row, index) => {
      ranked.push({ row, rank: index + 1, partitionSize: ordered.length });
    });
  }
  return ranked;
};

export type RunningAggregate = 'avg' | 'max' | 'min' | 'sum' | 'count';

export interface RunningWindow {
  aggregate: RunningAggregate;
  preceding: number | 'unbounded';
}

const reduceWindow = (values: readonly number[], aggregate: RunningAggregate) => {
  switch (aggregate) {
    case 'avg':
      return values.reduce((sum, value) => sum + value, 0) / values.length;
    case 'max':
      return Math.max(...values);
    case 'min':
      return Math.min(...values);
    case 'sum':
      return values.reduce((sum, value) => sum + value, 0);
    case 'count':
      return values.length;
  }
};

/**
 * Trailing aggregate over an ordered sequence. The frame spans `preceding`
 * rows before the current one plus the current row, both ends inclusive.
 */
export const runningAggregate = (values: readonly number[], window: RunningWindow): number[] => {
  if (window.preceding !== 'unbounded' && (!Number.isInteger(window.preceding) || window.preceding < 0)) {
    throw new RangeError(`preceding must be a non-negative integer, got ${window.preceding}`);
  }
  return values.map((_, index) => {
    const start = window.preceding === 'unbounded' ? 0 : Math.max(0, index - window.preceding);
    return reduceWindow(values.slice(start, index + 1), window.aggregate);
  });
};

export interface RollupRow<T> {
  /** Number of grouping keys present: keys.length for detail rows, 0 for the grand total. */
  level: number;
  keys: Array<string | null>;
  value: number;
  rows: T[];
}

export interface RollupOptions<T> {
  keys: ReadonlyArray<(row: T) => string>;
  measure: (rows: T[]) => number;
}

/**
 * Subtotals for every prefix of the key list plus a grand total. Groups keep
 * their first-seen order; each subtotal follows its children and the grand
 * total comes last. Absent keys are null, never a data value.
 */
export const rollupTotal = <T>(rows: readonly T[], options: RollupOptions<T>): RollupRow<T>[] => {
  const { keys, measure } = options;
  if (!rows.length || !keys.length) return [];

  const pad = (prefix: string[]) => [...prefix, ...keys.slice(prefix.length).map(() => null)];

  const walk = (subset: T[], depth: number, prefix: string[]): RollupRow<T>[] => {
    const out: RollupRow<T>[] = [];
    for (const group of groupBy(subset, keys[depth])) {
      const path = [...prefix, group.key];
      if (depth + 1 < keys.length) {
        out.push(...walk(group.rows, depth + 1, path));
      }
      out.push({ level: depth + 1, keys: pad(path), value: measure(group.rows), rows: group.rows });
    }
    return out;
  };

  const all = [...rows];
  return [...walk(all, 0, []), { level: 0, keys: pad([]), value: measure(all), rows: all }];
};

export interface PivotOptions<T, C extends string> {
  rowKey: (row: T) => string;
  columnKey: (row: T) => string;
  columns: readonly C[];
  value?: (rows: T[]) => number;
}

export interface PivotRow<C extends string> {
  key: string;
  values: Map<C, number>;
  total: number;
}

/**
 * One output row per distinct row key with a zero-filled cell for every known
 * column. Input rows whose column value is not listed are dropped.
 */
export const pivot = <T, C extends string>(rows: readonly T[], options: PivotOptions<T, C>): PivotRow<C>[] => {
  const value = options.value ?? ((cell: T[]) => cell.length);
  const known = rows.filter((row) => options.columns.some((column) => column === options.columnKey(row)));

  return groupBy(known, options.rowKey).map((group) => {
    const values = new Map<C, number>();
    let total = 0;
    for (const column of options.columns) {
      const cell = group.rows.filter((row) => options.columnKey(row) === column);
      const cellValue = cell.length ? value(cell) : 0;
      values.set(column, cellValue);
      total += cellValue;
    }
    return { key: group.key, values, total };
  });
};
