import 'dotenv/config';
import { closePool, getPool } from '../db/client';
import { SCHEMA_SQL } from '../db/schema';
import { logger } from '../utils/logger';

/**
 * Database migration script
 * Applies the embedded schema; safe to run repeatedly
 */
async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration...');

    const pool = getPool();
    await pool.query(SCHEMA_SQL);

    logger.info('Database migration completed successfully');
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void migrate();
