import '../env.js';
import { bootstrapDatabase } from './bootstrap.js';
import db from './client.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Migrate');

async function migrate(): Promise<void> {
  try {
    log.info('Running database migrations...');
    await bootstrapDatabase();
    log.info('Database migrations completed successfully');
    await db.end();
    process.exit(0);
  } catch (error) {
    log.error('Migration failed', error);
    process.exit(1);
  }
}

await migrate();
