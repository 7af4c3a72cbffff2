#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { getStore } from '../src/store/index.js';
import { SnapshotProvider } from '../src/services/snapshot.js';
import { listReports, runReport, runReports } from '../src/reports/index.js';
import type { ReportOptions, ReportRow } from '../src/reports/index.js';

const formatValue = (value: ReportRow[string]) =>
  value === null ? '' : typeof value === 'number' ? value.toLocaleString('en-US', { maximumFractionDigits: 3 }) : value;

const printRows = (reportId: string, rows: ReportRow[], json: boolean) => {
  if (json) {
    console.log(JSON.stringify({ report_id: reportId, rows }, null, 2));
    return;
  }
  console.log(`${reportId} (${rows.length} row(s))`);
  if (!rows.length) return;
  console.table(rows.map((row) => Object.fromEntries(Object.entries(row).map(([key, value]) => [key, formatValue(value)]))));
};

const toOptions = (argv: { minSample?: number; limit?: number }): ReportOptions => ({
  minSample: argv.minSample,
  limit: argv.limit,
});

const printCatalogue = () => {
  for (const report of listReports()) {
    const sample = report.defaultMinSample === null ? '' : ` (min sample ${report.defaultMinSample})`;
    console.log(`- ${report.id} [${report.group}] ${report.title}${sample}`);
  }
};

const runOne = async (argv: { reportId: string; minSample?: number; limit?: number; json: boolean }) => {
  const snapshot = await new SnapshotProvider(getStore()).acquire();
  const result = runReport(snapshot, argv.reportId, toOptions(argv));
  printRows(result.reportId, result.rows, argv.json);
};

const runAll = async (argv: { minSample?: number; limit?: number; json: boolean; group?: string }) => {
  const snapshot = await new SnapshotProvider(getStore()).acquire();
  const ids = listReports()
    .filter((report) => !argv.group || report.group === argv.group)
    // --min-sample selects the reports that take one.
    .filter((report) => argv.minSample === undefined || report.defaultMinSample !== null)
    .map((report) => report.id);
  const outcomes = await runReports(snapshot, ids, toOptions(argv));

  const failures: string[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'ok') {
      printRows(outcome.reportId, outcome.rows, argv.json);
    } else {
      failures.push(`${outcome.reportId} (${outcome.error.message})`);
    }
  }

  if (failures.length) {
    console.warn('Report failures:', failures.join(', '));
    process.exitCode = 1;
  }
};

const sharedOptions = {
  'min-sample': {
    type: 'number',
    describe: 'Override the minimum group size (only reports with a default sample accept it)',
  },
  limit: {
    type: 'number',
    describe: 'Maximum rows to print per report',
  },
  json: {
    type: 'boolean',
    default: false,
    describe: 'Print rows as JSON instead of a table',
  },
} as const;

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('report')
    .command('list', 'List the available reports', {}, () => printCatalogue())
    .command(
      'run <reportId>',
      'Run one report against the loaded snapshot',
      (cmd) =>
        cmd
          .positional('reportId', {
            type: 'string',
            describe: 'Report identifier, see `report list`',
            demandOption: true,
          })
          .options(sharedOptions),
      (argv) => runOne(argv)
    )
    .command(
      'all',
      'Run every report, optionally limited to one group',
      (cmd) =>
        cmd
          .option('group', {
            type: 'string',
            choices: ['matches', 'breaks', 'extracts'],
            describe: 'Only run reports from this group',
          })
          .options(sharedOptions),
      (argv) => runAll(argv)
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(async () => {
    try {
      await getStore().close();
    } catch (err) {
      if (process.env.DATABASE_URL) {
        console.error('Failed to close database connection', err);
      }
    }
  });
