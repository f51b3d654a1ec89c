import 'dotenv/config';
import { promises as fs } from 'fs';
import { join } from 'path';
import { closePool, pool } from './client';
import { logger } from '../utils/logger';

async function runMigrations(): Promise<void> {
     const migrationsDir = join(__dirname, 'migrations');

     try {
          const files = await fs.readdir(migrationsDir);
          const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

          logger.info({ count: sqlFiles.length }, 'Running database migrations');

          for (const file of sqlFiles) {
               const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await pool.query(sql);
               logger.info({ file }, 'Migration completed');
          }

          logger.info('All migrations completed successfully');
     } catch (err) {
          logger.error({ err }, 'Migration failed');
          throw err;
     } finally {
          await closePool();
     }
}

if (require.main === module) {
     runMigrations().catch((err: unknown) => {
          logger.error({ err }, 'Migration error');
          process.exit(1);
     });
}

export { runMigrations };
