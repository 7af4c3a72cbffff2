import 'dotenv/config';
import type { PoolClient } from 'pg';

import { closePool, getPool } from './client.js';
import { applyMigrations, connectWithRetry, readMigrateConfig } from './migrations.js';

async function main() {
  const config = readMigrateConfig();
  const client = await connectWithRetry<PoolClient>(getPool(), config);
  try {
    const applied = await applyMigrations(client, config);
    console.log('migrations_up_to_date', { table: config.table, applied });
  } finally {
    client.release();
    await closePool();
  }
}

main().catch((err) => {
  console.error('migrate_failed', err);
  process.exit(1);
});
