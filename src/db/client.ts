import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import * as schema from './schema.js';

let pool: Pool | undefined;

export const getPool = () => {
  if (!pool) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) throw new Error('DATABASE_URL is not set');
    pool = new Pool({ connectionString });
  }
  return pool;
};

export const getDb = () => drizzle(getPool(), { schema });

export const closePool = async () => {
  if (!pool) return;
  const current = pool;
  pool = undefined;
  await current.end();
};
