import type { Express } from 'express';

import type { SnapshotProvider } from '../services/snapshot.js';
import { summarizeSnapshot } from '../services/snapshot.js';
import { toSnapshotResponse } from './helpers/responders.js';

export const registerSnapshotRoutes = (app: Express, snapshots: SnapshotProvider) => {
  app.get('/v1/snapshot', async (_req, res, next) => {
    try {
      const snapshot = await snapshots.acquire();
      return res.send(toSnapshotResponse(summarizeSnapshot(snapshot)));
    } catch (err) {
      return next(err);
    }
  });
};
