// src/db/pool.ts
// What: Postgres connection pool factory.
// How: Creates a pg Pool for the given DATABASE_URL with a small pool size; callers own its lifetime.

import pg from 'pg';

export function createPool(connectionString: string): pg.Pool {
  return new pg.Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
}
