import { JobSource } from '../sources/base';
import { normalizeJob } from './normalizer';
import { SourceStatistics } from './run-stats';
import { JobRecord } from '../types/job';
import { ValidationRejectedError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface FetchOutcome {
  /** Normalized records, grouped by source in source-list order */
  jobs: JobRecord[];
  sources: SourceStatistics[];
}

interface SourceOutcome {
  jobs: JobRecord[];
  stats: SourceStatistics;
}

/**
 * Orchestrates job fetching from all sources
 * A failing source is recorded and never affects the others
 */
export class JobFetcherService {
  constructor(
    private readonly sources: JobSource[],
    private readonly options: { concurrent: boolean } = { concurrent: true }
  ) {}

  async fetchAllJobs(signal?: AbortSignal): Promise<FetchOutcome> {
    const outcomes: SourceOutcome[] = [];

    if (this.options.concurrent) {
      const settled = await Promise.allSettled(
        this.sources.map(source => this.fetchFromSource(source, signal))
      );
      settled.forEach((result, i) => {
        outcomes.push(
          result.status === 'fulfilled'
            ? result.value
            : this.failedOutcome(this.sources[i], result.reason, 0)
        );
      });
    } else {
      for (const source of this.sources) {
        outcomes.push(await this.fetchFromSource(source, signal));
      }
    }

    return {
      jobs: outcomes.flatMap(outcome => outcome.jobs),
      sources: outcomes.map(outcome => outcome.stats),
    };
  }

  private async fetchFromSource(source: JobSource, signal?: AbortSignal): Promise<SourceOutcome> {
    const started = Date.now();
    logger.info(`Fetching from source: ${source.name}`);

    try {
      const batch = await source.fetchJobs({ signal });
      const jobs: JobRecord[] = [];
      let rejected = batch.rejected;

      for (const raw of batch.jobs) {
        try {
          jobs.push(normalizeJob(raw));
        } catch (error) {
          if (!(error instanceof ValidationRejectedError)) throw error;
          rejected++;
          logger.debug(`Source ${source.name}: ${error.message}`);
        }
      }

      const stats: SourceStatistics = {
        source: source.name,
        fetched: jobs.length,
        rejected,
        retries: batch.retries,
        failed: false,
        error: null,
        durationMs: Date.now() - started,
      };
      logger.info(`Source ${source.name} completed`, { ...stats });
      return { jobs, stats };
    } catch (error) {
      return this.failedOutcome(source, error, Date.now() - started);
    }
  }

  private failedOutcome(source: JobSource, error: unknown, durationMs: number): SourceOutcome {
    logger.error(`Source ${source.name} failed`, error);
    return {
      jobs: [],
      stats: {
        source: source.name,
        fetched: 0,
        rejected: 0,
        retries: 0,
        failed: true,
        error: errorMessage(error),
        durationMs,
      },
    };
  }
}
