import * as fs from 'fs';
import * as path from 'path';
import { Database } from '../src/config/database';
import { loadConfig } from '../src/config/config';
import { Queryable } from '../src/services/user.service';
import { logger } from '../src/utils/logger';

// Scripts run from the project root, built or not
export const SCHEMA_PATH = path.resolve(process.cwd(), 'database', 'schema.sql');

/**
 * Run database migrations
 * Executes the schema.sql file and returns the tables now present
 */
export async function runMigrations(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<string[]> {
  logger.info('Starting database migrations...');

  const schemaSql = fs.readFileSync(schemaPath, 'utf-8');

  logger.info('Executing schema.sql...');
  await db.query(schemaSql);

  // Verify tables were created
  const verifyQuery = `
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'public'
      AND table_type = 'BASE TABLE'
    ORDER BY table_name;
  `;

  const result = await db.query(verifyQuery);
  const tables = result.rows
    .map((r) => r.table_name)
    .filter((name): name is string => typeof name === 'string');
  logger.info('Database migrations completed successfully', { tables });

  return tables;
}

async function main(): Promise<void> {
  const db = new Database(loadConfig().database);
  try {
    await runMigrations(db);
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Migration failed:', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
