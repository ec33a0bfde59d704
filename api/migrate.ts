import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getPool } from '../src/db/client';
import { SCHEMA_SQL } from '../src/db/schema';
import { logger } from '../src/utils/logger';

/**
 * Database migration API endpoint
 * Secured with MIGRATION_SECRET, falling back to CRON_SECRET
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const authHeader = req.headers.authorization;
  const expectedSecret = process.env.MIGRATION_SECRET || process.env.CRON_SECRET;

  if (expectedSecret && authHeader !== `Bearer ${expectedSecret}`) {
    logger.warn('Unauthorized migration request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  try {
    logger.info('Starting database migration...');
    await getPool().query(SCHEMA_SQL);
    logger.info('Database migration completed successfully');

    res.status(200).json({
      success: true,
      message: 'Database migration completed successfully',
    });
  } catch (error) {
    logger.error('Database migration failed', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
