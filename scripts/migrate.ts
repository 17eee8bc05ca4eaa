import fs from 'fs';
import path from 'path';
import { loadConfig } from '../src/config';
import { createPool } from '../src/config/database';
import { logger } from '../src/utils/logger';

const migrationsDir = path.join(__dirname, '../src/migrations');

async function runMigrations(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.database);

  try {
    logger.info('Running database migrations...');

    await pool.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        run_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const files = fs.readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort();

    const result = await pool.query<{ name: string }>('SELECT name FROM _migrations');
    const completed = new Set(result.rows.map((r) => r.name));

    let ranCount = 0;
    for (const file of files) {
      if (completed.has(file)) {
        logger.info(`Skipping ${file} (already run)`);
        continue;
      }

      logger.info(`Running ${file}...`);
      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
      ranCount++;
    }

    if (ranCount === 0) {
      logger.info('Database is up to date, no new migrations');
    } else {
      logger.info(`Ran ${ranCount} migration(s) successfully`);
    }
  } finally {
    await pool.end();
  }
}

runMigrations().catch((error: unknown) => {
  logger.error('Migration failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
