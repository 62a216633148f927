import dotenv from 'dotenv';
import { promises as fs } from 'fs';
import { join } from 'path';
import { loadConfig } from '../config/config';
import { logger } from '../utils/logger';
import { Database, createDatabase } from './client';

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Applies every .sql file in the migrations directory in file name order.
 * Migrations are written to be re-runnable.
 */
async function runMigrations(database: Database, migrationsDir: string = MIGRATIONS_DIR) {
     const files = await fs.readdir(migrationsDir);
     const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

     logger.info({ count: sqlFiles.length }, 'Running database migrations');

     for (const file of sqlFiles) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

          logger.info({ file }, 'Executing migration');
          await database.withTransaction(async (client) => {
               await client.query(sql);
          });
          logger.info({ file }, 'Migration completed');
     }

     logger.info('All migrations completed successfully');
     return sqlFiles;
}

async function main() {
     dotenv.config();
     const config = loadConfig();
     const database = createDatabase(config.database);
     try {
          await runMigrations(database);
     } finally {
          await database.close();
     }
}

// Run if executed directly
if (require.main === module) {
     main().catch((err) => {
          logger.error({ err }, 'Migration failed');
          process.exit(1);
     });
}

export { runMigrations };
