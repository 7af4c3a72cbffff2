import { test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

process.env.NODE_ENV = 'test';
delete process.env.DATABASE_URL;

const { createTestApp } = await import('../helpers/app.js');
const { dataset } = await import('../helpers/dataset.js');
const { DatasetSourceError } = await import('../../src/store/errors.js');

const fixture = () =>
  dataset()
    .tournament({ id: 1, name: 'World Championship', year: 2019, city: 'Sheffield', country: 'England' })
    .match(1, 'Player A', 'Player B', 10, 3, { stage: 'Semi-Final', id: 1 })
    .match(1, 'Player C', 'Player D', 10, 8, { stage: 'Semi-Final', id: 2 })
    .match(1, 'Player A', 'Player C', 18, 16, { stage: 'Final', id: 3 })
    .frame(3, 1, 124, 0, { 1: 124 })
    .build();

test('health responds ok', async () => {
  const { app } = createTestApp();
  const res = await request(app).get('/health');
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { ok: true });
});

test('snapshot summary counts the loaded relations', async () => {
  const { app } = createTestApp(fixture());
  const res = await request(app).get('/v1/snapshot');
  assert.equal(res.status, 200, res.text);
  assert.equal(res.body.players, 4);
  assert.equal(res.body.matches, 3);
  assert.equal(res.body.score_entries, 2);
  assert.equal(res.body.breaks, 1);
  assert.equal(res.body.draws, 0);
  assert.equal(res.body.first_year, 2019);
  assert.equal(res.body.last_year, 2019);
});

test('catalogue lists report ids with their default sample', async () => {
  const { app } = createTestApp();
  const res = await request(app).get('/v1/reports');
  assert.equal(res.status, 200);
  assert.equal(res.body.reports.length, 19);
  assert.deepEqual(res.body.reports[0], {
    report_id: 'win-percentage',
    title: 'Highest match win percentage',
    group: 'matches',
    default_min_sample: 100,
  });
});

test('report rows come back in snake_case', async () => {
  const { app } = createTestApp(fixture());

  const titles = await request(app).get('/v1/reports/tournament-titles');
  assert.equal(titles.status, 200, titles.text);
  assert.deepEqual(titles.body, {
    report_id: 'tournament-titles',
    row_count: 1,
    rows: [
      {
        player: 'Player A',
        tournament_wins: 1,
        most_recent_year: 2019,
        most_recent_tournament: 'World Championship',
        most_recent_win: '2019 World Championship',
      },
    ],
  });

  const centuries = await request(app).get('/v1/reports/world-championship-centuries');
  assert.deepEqual(centuries.body.rows, [{ year: 2019, century_breaks: 1, avg_last_5: 1, record: 1 }]);
});

test('query overrides apply min_sample and limit', async () => {
  const { app } = createTestApp(fixture());
  const res = await request(app).get('/v1/reports/win-percentage').query({ min_sample: 2, limit: 1 });
  assert.equal(res.status, 200, res.text);
  assert.deepEqual(res.body.rows, [
    { player: 'Player A', wins: 2, draws: 0, losses: 0, matches_played: 2, match_win_percentage: 100 },
  ]);
});

test('unknown reports return 404 and bad queries return 400', async () => {
  const { app } = createTestApp(fixture());

  const missing = await request(app).get('/v1/reports/most-fouls');
  assert.equal(missing.status, 404);
  assert.deepEqual(missing.body, { error: 'report_not_found', message: 'Report not found: most-fouls' });

  const invalid = await request(app).get('/v1/reports/win-percentage').query({ min_sample: -1 });
  assert.equal(invalid.status, 400);
  assert.equal(invalid.body.error, 'validation_error');
});

test('min_sample is refused for reports without a minimum sample', async () => {
  const { app } = createTestApp(fixture());
  const res = await request(app).get('/v1/reports/tournament-titles').query({ min_sample: 500 });

  assert.equal(res.status, 400);
  assert.deepEqual(res.body, {
    error: 'validation_error',
    message: 'Report tournament-titles does not take a minimum sample',
    context: { reportId: 'tournament-titles', option: 'minSample' },
  });
});

test('batch runs every report and isolates failures', async () => {
  const { app, store } = createTestApp(fixture());
  const res = await request(app)
    .post('/v1/reports/batch')
    .send({ reports: ['matches-played', 'most-fouls'], limit: 1 });

  assert.equal(res.status, 200, res.text);
  assert.deepEqual(res.body.results, [
    {
      report_id: 'matches-played',
      status: 'ok',
      row_count: 1,
      rows: [{ player: 'Player A', matches_played: 2 }],
    },
    {
      report_id: 'most-fouls',
      status: 'failed',
      error: { name: 'ReportLookupError', message: 'Report not found: most-fouls' },
    },
  ]);
  assert.equal(store.loadCount, 1);

  const empty = await request(app).post('/v1/reports/batch').send({ reports: [] });
  assert.equal(empty.status, 400);
  assert.equal(empty.body.error, 'validation_error');

  const malformed = await request(app)
    .post('/v1/reports/batch')
    .set('Content-Type', 'application/json')
    .send('{"reports":');
  assert.equal(malformed.status, 400);
  assert.equal(malformed.body.error, 'invalid_json');
});

test('dataset failures map to 500 and 503', async () => {
  const broken = fixture();
  broken.matches.push({ ...broken.matches[0], matchId: 4, tournamentId: 9 });
  const integrity = await request(createTestApp(broken).app).get('/v1/reports/matches-played');
  assert.equal(integrity.status, 500);
  assert.equal(integrity.body.error, 'referential_integrity_error');
  assert.equal(integrity.body.context.missingTournamentId, 9);

  const duplicate = fixture();
  duplicate.tournaments.push({ ...duplicate.tournaments[0] });
  const invalid = await request(createTestApp(duplicate).app).get('/v1/snapshot');
  assert.equal(invalid.status, 500);
  assert.deepEqual(invalid.body.issues, [{ relation: 'tournaments', path: 'id=1', message: 'duplicate tournament id' }]);

  const offline = createTestApp(async () => {
    throw new DatasetSourceError('source offline', { source: 'test' });
  });
  const unavailable = await request(offline.app).get('/v1/snapshot');
  assert.equal(unavailable.status, 503);
  assert.deepEqual(unavailable.body, { error: 'dataset_unavailable', message: 'source offline' });
});
