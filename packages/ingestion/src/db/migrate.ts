import path from 'path';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { createLogger } from '../logger';
import type { Database } from './client';

const logger = createLogger('migrate');

export const MIGRATIONS_FOLDER = path.join(__dirname, '../../drizzle');

export async function runMigrations(db: Database): Promise<void> {
  logger.info({ folder: MIGRATIONS_FOLDER }, 'Running Drizzle migrations');
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  logger.info('Migrations complete');
}
