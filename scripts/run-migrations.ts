// scripts/run-migrations.ts
// What: Applies the SQL files in src/db/migrations to DATABASE_URL.
// How: Loads .env, discovers *.sql files, sorts by filename and executes each over a single connection. Each file
//      carries its own BEGIN/COMMIT and IF NOT EXISTS guards, so re-running is safe. Logs the target database
//      without its password.

import 'dotenv/config';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createPool } from '../src/db/pool.js';
import logger from '../src/logging.js';

const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../src/db/migrations');

async function main(): Promise<void> {
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    logger.info({ migrationsDir }, 'No migrations found');
    return;
  }

  const connStr = process.env.DATABASE_URL;
  if (!connStr) {
    throw new Error('DATABASE_URL is not set');
  }

  try {
    const u = new URL(connStr);
    logger.info(
      { user: u.username, host: u.hostname, port: u.port || '5432', database: u.pathname.replace(/^\//, '') },
      'Migration target',
    );
  } catch (err) {
    logger.warn({ err }, 'Could not parse DATABASE_URL');
  }

  const pool = createPool(connStr);
  try {
    const client = await pool.connect();
    try {
      for (const file of files) {
        const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
        logger.info({ file }, 'Applying migration');
        await client.query(sql);
      }
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }

  logger.info({ applied: files.length }, 'Migrations complete');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Migration failed');
  process.exit(1);
});
