import type { ReportOutcome, ReportRow } from '../../reports/index.js';
import type { SnapshotSummary } from '../../services/snapshot.js';

export const toSnakeCase = (key: string) =>
  key
    .replace(/([a-z])([0-9])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();

export const toRowResponse = (row: ReportRow) =>
  Object.fromEntries(Object.entries(row).map(([key, value]) => [toSnakeCase(key), value]));

export const toSnapshotResponse = (summary: SnapshotSummary) => ({
  loaded_at: summary.loadedAt,
  players: summary.players,
  tournaments: summary.tournaments,
  matches: summary.matches,
  score_entries: summary.scoreEntries,
  breaks: summary.breaks,
  draws: summary.draws,
  first_year: summary.firstYear,
  last_year: summary.lastYear,
});

export const toOutcomeResponse = (outcome: ReportOutcome) => {
  if (outcome.status === 'ok') {
    return {
      report_id: outcome.reportId,
      status: outcome.status,
      row_count: outcome.rows.length,
      rows: outcome.rows.map(toRowResponse),
    };
  }
  return {
    report_id: outcome.reportId,
    status: outcome.status,
    error: outcome.error,
  };
};
