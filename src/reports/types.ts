import type { Snapshot } from '../engine/types.js';

export type ReportValue = string | number | null;
export type ReportRow = Record<string, ReportValue>;
export type ReportGroup = 'matches' | 'breaks' | 'extracts';

export interface ReportOptions {
  /** Overrides the report's minimum group size (HAVING threshold). */
  minSample?: number;
  /** Caps the number of rows returned. */
  limit?: number;
}

export type ReportBuilder<Row extends ReportRow = ReportRow> = (
  snapshot: Snapshot,
  options?: ReportOptions
) => Row[];

export interface ReportDefinition<Row extends ReportRow = ReportRow> {
  id: string;
  title: string;
  group: ReportGroup;
  /** Minimum sample applied when the caller does not override it; null when the report takes none. */
  defaultMinSample: number | null;
  /** The builder applies `limit` itself, before adding total rows. */
  limitsRows?: boolean;
  build: ReportBuilder<Row>;
}
