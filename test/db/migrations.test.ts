import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { applyMigrations, connectWithRetry, readMigrateConfig } from '../../src/db/migrations.js';
import type { Queryable } from '../../src/db/migrations.js';

test('readMigrateConfig falls back to defaults for missing or unusable values', () => {
  assert.deepEqual(readMigrateConfig({}, '/srv/stats'), {
    dir: join('/srv/stats', 'drizzle'),
    table: 'snooker_stats_migrations',
    retries: 10,
    retryDelayMs: 5000,
  });

  const custom = readMigrateConfig(
    { DB_MIGRATIONS_TABLE: 'stats_schema_log', DB_MIGRATE_RETRIES: '3', DB_MIGRATE_RETRY_DELAY_MS: 'soon' },
    '/srv/stats'
  );
  assert.equal(custom.table, 'stats_schema_log');
  assert.equal(custom.retries, 3);
  assert.equal(custom.retryDelayMs, 5000);
});

test('readMigrateConfig refuses a table name that is not a plain identifier', () => {
  assert.throws(
    () => readMigrateConfig({ DB_MIGRATIONS_TABLE: 'log; DROP TABLE players' }),
    /DB_MIGRATIONS_TABLE must be a plain SQL identifier/
  );
});

test('connectWithRetry backs off between failed attempts', async () => {
  let attempts = 0;
  const waits: number[] = [];
  const pool = {
    async connect() {
      attempts += 1;
      if (attempts < 3) throw new Error('connection refused');
      return 'client';
    },
  };

  const client = await connectWithRetry(pool, { retries: 5, retryDelayMs: 5 }, async (ms) => {
    waits.push(ms);
  });

  assert.equal(client, 'client');
  assert.equal(attempts, 3);
  assert.deepEqual(waits, [5, 10]);
});

test('connectWithRetry rethrows the last failure once attempts run out', async () => {
  let attempts = 0;
  const pool = {
    async connect(): Promise<string> {
      attempts += 1;
      throw new Error(`refused ${attempts}`);
    },
  };

  await assert.rejects(connectWithRetry(pool, { retries: 2, retryDelayMs: 1 }, async () => {}), /refused 2/);
  assert.equal(attempts, 2);
});

const recordingClient = (applied: string[], failingSql?: string) => {
  const calls: Array<{ text: string; values?: unknown[] }> = [];
  const client: Queryable = {
    async query(text, values) {
      calls.push({ text: text.trim(), values });
      if (failingSql !== undefined && text === failingSql) throw new Error('syntax error');
      return { rows: text.startsWith('SELECT name') ? applied.map((name) => ({ name })) : [] };
    },
  };
  return { client, calls };
};

test('applyMigrations runs pending files in order inside transactions', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'snooker-migrations-'));
  try {
    await writeFile(join(dir, '0001_breaks.sql'), 'CREATE INDEX scores_break_idx ON scores (fifty_plus_break);');
    await writeFile(join(dir, '0000_source.sql'), 'CREATE TABLE players (full_name text);');
    await writeFile(join(dir, 'README.txt'), 'not a migration');

    const { client, calls } = recordingClient(['0000_source.sql']);
    const applied = await applyMigrations(client, { dir, table: 'stats_schema_log' });

    assert.deepEqual(applied, ['0001_breaks.sql']);
    assert.ok(calls[0].text.startsWith('CREATE TABLE IF NOT EXISTS stats_schema_log'));
    assert.deepEqual(
      calls.slice(1).map((call) => call.text),
      [
        'SELECT name FROM stats_schema_log ORDER BY name',
        'BEGIN',
        'CREATE INDEX scores_break_idx ON scores (fifty_plus_break);',
        'INSERT INTO stats_schema_log (name) VALUES ($1)',
        'COMMIT',
      ]
    );
    assert.deepEqual(calls[4].values, ['0001_breaks.sql']);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('applyMigrations rolls back a failing file and stops', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'snooker-migrations-'));
  try {
    const broken = 'CREATE TABLE broken (';
    await writeFile(join(dir, '0000_broken.sql'), broken);
    await writeFile(join(dir, '0001_after.sql'), 'SELECT 1;');

    const { client, calls } = recordingClient([], broken);
    await assert.rejects(applyMigrations(client, { dir, table: 'stats_schema_log' }), /syntax error/);

    assert.deepEqual(
      calls.slice(2).map((call) => call.text),
      ['BEGIN', 'CREATE TABLE broken (', 'ROLLBACK']
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
