export * from './types.js';
export * from './errors.js';
export { getReport, listReports } from './catalog.js';
export { runReport, runReports } from './runner.js';
export type { ReportOutcome, ReportResult } from './runner.js';
