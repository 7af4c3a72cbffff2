import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

export interface MigrateConfig {
  dir: string;
  table: string;
  retries: number;
  retryDelayMs: number;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const positiveInteger = (fallback: number) =>
  z.coerce.number().int().positive().catch(fallback);

const MigrateEnvSchema = z.object({
  DB_MIGRATIONS_DIR: z.string().min(1).default('drizzle'),
  DB_MIGRATIONS_TABLE: z
    .string()
    .regex(IDENTIFIER, 'must be a plain SQL identifier')
    .default('snooker_stats_migrations'),
  DB_MIGRATE_RETRIES: positiveInteger(10),
  DB_MIGRATE_RETRY_DELAY_MS: positiveInteger(5_000),
});

export const readMigrateConfig = (env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): MigrateConfig => {
  const parsed = MigrateEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid migration config: ${parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join(', ')}`);
  }
  return {
    dir: join(cwd, parsed.data.DB_MIGRATIONS_DIR),
    table: parsed.data.DB_MIGRATIONS_TABLE,
    retries: parsed.data.DB_MIGRATE_RETRIES,
    retryDelayMs: parsed.data.DB_MIGRATE_RETRY_DELAY_MS,
  };
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Connects, backing off linearly between attempts; rethrows the last failure. */
export const connectWithRetry = async <C>(
  pool: { connect(): Promise<C> },
  config: Pick<MigrateConfig, 'retries' | 'retryDelayMs'>,
  sleep: (ms: number) => Promise<void> = defaultSleep
): Promise<C> => {
  let lastError: unknown;
  for (let attempt = 1; attempt <= config.retries; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      lastError = err;
      if (attempt === config.retries) break;
      const delayMs = config.retryDelayMs * attempt;
      console.warn('db_connect_retry', {
        attempt,
        attempts: config.retries,
        delayMs,
        message: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs);
    }
  }
  throw lastError instanceof Error ? lastError : new Error('Failed to acquire database connection');
};

const AppliedRowSchema = z.object({ name: z.string() });

/**
 * Applies every `.sql` file in the directory not yet recorded in the
 * migrations table, in file-name order, each inside its own transaction.
 * Returns the names applied.
 */
export const applyMigrations = async (
  client: Queryable,
  config: Pick<MigrateConfig, 'dir' | 'table'>
): Promise<string[]> => {
  await client.query(`
CREATE TABLE IF NOT EXISTS ${config.table} (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`);

  const result = await client.query(`SELECT name FROM ${config.table} ORDER BY name`);
  const applied = new Set(z.array(AppliedRowSchema).parse(result.rows).map((row) => row.name));

  const pending = (await readdir(config.dir))
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  for (const file of pending) {
    const sql = await readFile(join(config.dir, file), 'utf8');
    console.log('migration_applying', { file });
    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query(`INSERT INTO ${config.table} (name) VALUES ($1)`, [file]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }

  return pending;
};
