import 'dotenv/config';
import { loadConfig } from '../config';
import { closePool } from '../db/client';
import { createPipeline } from '../services/pipeline';
import { PipelineState } from '../services/run-stats';
import { logger } from '../utils/logger';

/**
 * Runs one ingestion pass from the command line
 * SIGINT or SIGTERM cancels the run; exits with 1 when the run fails
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const controller = new AbortController();

  const cancel = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}, cancelling run`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const stats = await createPipeline(config).run(controller.signal);
    console.log(JSON.stringify(stats, null, 2));
    process.exitCode = stats.state === PipelineState.Done ? 0 : 1;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
    await closePool();
  }
}

main().catch((error: unknown) => {
  logger.error('Pipeline run crashed', error);
  process.exitCode = 1;
});
