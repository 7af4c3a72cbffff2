import type { Express } from 'express';
import { z } from 'zod';

import type { SnapshotProvider } from '../services/snapshot.js';
import { listReports, runReport, runReports } from '../reports/index.js';
import { toOutcomeResponse, toRowResponse } from './helpers/responders.js';

const minSample = z.coerce.number().int().min(0);
const limit = z.coerce.number().int().min(1).max(10_000);

const ReportQuerySchema = z.object({
  min_sample: minSample.optional(),
  limit: limit.optional(),
});

const ReportBatchSchema = z.object({
  reports: z.array(z.string().min(1)).min(1).max(50),
  min_sample: minSample.optional(),
  limit: limit.optional(),
});

export const registerReportRoutes = (app: Express, snapshots: SnapshotProvider) => {
  app.get('/v1/reports', (_req, res) => {
    res.send({
      reports: listReports().map((report) => ({
        report_id: report.id,
        title: report.title,
        group: report.group,
        default_min_sample: report.defaultMinSample,
      })),
    });
  });

  app.get('/v1/reports/:report_id', async (req, res, next) => {
    const parsed = ReportQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const snapshot = await snapshots.acquire();
      const result = runReport(snapshot, req.params.report_id, {
        minSample: parsed.data.min_sample,
        limit: parsed.data.limit,
      });
      return res.send({
        report_id: result.reportId,
        row_count: result.rows.length,
        rows: result.rows.map(toRowResponse),
      });
    } catch (err) {
      return next(err);
    }
  });

  app.post('/v1/reports/batch', async (req, res, next) => {
    const parsed = ReportBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const snapshot = await snapshots.acquire();
      const outcomes = await runReports(snapshot, parsed.data.reports, {
        minSample: parsed.data.min_sample,
        limit: parsed.data.limit,
      });
      return res.send({ results: outcomes.map(toOutcomeResponse) });
    } catch (err) {
      return next(err);
    }
  });
};
