import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Config, loadConfig } from '../../src/config';
import { createPipeline } from '../../src/services/pipeline';
import { PipelineState } from '../../src/services/run-stats';
import { logger } from '../../src/utils/logger';

/**
 * Scheduled ingestion endpoint
 * Runs via Vercel Cron, secured with CRON_SECRET
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const authHeader = req.headers.authorization;
  const cronSecret = process.env.CRON_SECRET;

  if (cronSecret && authHeader !== `Bearer ${cronSecret}`) {
    logger.warn('Unauthorized cron request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  logger.info('Scheduled ingestion run started');

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error('Invalid configuration', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return;
  }

  logger.info('Configuration loaded', {
    positionType: config.positionType,
    enabledSources: {
      simplify: config.simplify.enabled,
      jsearch: config.jsearch.enabled,
    },
    fuzzyMatching: config.sponsorship.useFuzzy,
  });

  // Stop fetching when the platform closes the request
  const controller = new AbortController();
  req.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });

  const stats = await createPipeline(config).run(controller.signal);
  const success = stats.state === PipelineState.Done;

  res.status(success ? 200 : 500).json({ success, stats });
}
