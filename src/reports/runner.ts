import type { Snapshot } from '../engine/types.js';
import type { ReportOptions, ReportRow } from './types.js';
import { getReport } from './catalog.js';
import { ReportOptionsError } from './errors.js';

export interface ReportResult {
  reportId: string;
  rows: ReportRow[];
}

export type ReportOutcome =
  | { reportId: string; status: 'ok'; rows: ReportRow[]; durationMs: number }
  | { reportId: string; status: 'failed'; error: { name: string; message: string } };

export const runReport = (snapshot: Snapshot, reportId: string, options: ReportOptions = {}): ReportResult => {
  const report = getReport(reportId);
  if (options.minSample !== undefined && report.defaultMinSample === null) {
    throw new ReportOptionsError(`Report ${reportId} does not take a minimum sample`, {
      reportId,
      option: 'minSample',
    });
  }
  const rows = report.build(snapshot, options);
  return {
    reportId,
    rows: options.limit === undefined || report.limitsRows ? rows : rows.slice(0, options.limit),
  };
};

/**
 * Runs several reports against one snapshot. Each report settles on its own:
 * a failure is logged and returned as a failed outcome without affecting the
 * others.
 */
export const runReports = async (
  snapshot: Snapshot,
  reportIds: readonly string[],
  options: ReportOptions = {}
): Promise<ReportOutcome[]> => {
  const settled = await Promise.allSettled(
    reportIds.map(async (reportId) => {
      const started = Date.now();
      const result = runReport(snapshot, reportId, options);
      return { ...result, durationMs: Date.now() - started };
    })
  );

  return settled.map((outcome, index): ReportOutcome => {
    const reportId = reportIds[index];
    if (outcome.status === 'fulfilled') {
      return { reportId, status: 'ok', rows: outcome.value.rows, durationMs: outcome.value.durationMs };
    }
    const error = outcome.reason instanceof Error
      ? { name: outcome.reason.name, message: outcome.reason.message }
      : { name: 'Error', message: String(outcome.reason) };
    console.error('report_failed', { reportId, ...error });
    return { reportId, status: 'failed', error };
  });
};
