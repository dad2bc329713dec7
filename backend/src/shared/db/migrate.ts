/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply the documents-table migrations before running with STORE_DRIVER=postgres.
 * - TS migrations live in: src/shared/db/migrations (loaded through tsx).
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { FileMigrationProvider, Migrator } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const db = createDb(config.databaseUrl);
  const migrationFolder = fileURLToPath(new URL('./migrations', import.meta.url));

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder }),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migration.failed', { err: error });
    process.exit(1);
  }

  logger.info('migration.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migration.fatal', { err });
  process.exit(1);
});
