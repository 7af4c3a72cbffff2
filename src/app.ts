import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import type { SnookerStore } from './store/index.js';
import {
  DatasetSourceError,
  InvalidDatasetError,
  NoSampleDataError,
  ReferentialIntegrityError,
} from './store/index.js';
import { ReportLookupError, ReportOptionsError } from './reports/index.js';
import { SnapshotProvider } from './services/snapshot.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerReportRoutes } from './routes/reports.js';
import { registerSnapshotRoutes } from './routes/snapshot.js';

const isBodyParseError = (err: unknown): err is SyntaxError & { status: number } =>
  err instanceof SyntaxError && 'status' in err && err.status === 400;

const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof ReportLookupError) {
    return { status: 404, body: { error: 'report_not_found', message: err.message } };
  }

  if (err instanceof ReportOptionsError) {
    return {
      status: 400,
      body: { error: 'validation_error', message: err.message, context: err.context },
    };
  }

  if (err instanceof NoSampleDataError) {
    return {
      status: 422,
      body: { error: 'no_sample_data', message: err.message, context: err.context },
    };
  }

  if (isBodyParseError(err)) {
    return { status: 400, body: { error: 'invalid_json', message: err.message } };
  }

  if (err instanceof ReferentialIntegrityError) {
    return {
      status: 500,
      body: { error: 'referential_integrity_error', message: err.message, context: err.context },
      log: { error: err, context: 'snapshot_integrity_error' },
    };
  }

  if (err instanceof InvalidDatasetError) {
    return {
      status: 500,
      body: { error: 'invalid_dataset', message: err.message, issues: err.issues.slice(0, 50) },
      log: { error: err, context: 'snapshot_invalid_dataset' },
    };
  }

  if (err instanceof DatasetSourceError) {
    return {
      status: 503,
      body: { error: 'dataset_unavailable', message: err.message },
      log: { error: err, context: 'snapshot_source_error' },
    };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    // eslint-disable-next-line no-console
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

export const createApp = (store: SnookerStore, snapshots: SnapshotProvider = new SnapshotProvider(store)): Express => {
  const app = express();
  app.use(express.json());

  registerHealthRoutes(app);
  registerSnapshotRoutes(app, snapshots);
  registerReportRoutes(app, snapshots);

  app.use(errorHandler);

  return app;
};
