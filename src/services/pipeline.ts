import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { JobFetcherService } from './job-fetcher';
import { deduplicateJobs } from './deduplication';
import { SponsorshipTagger } from './sponsorship-tagger';
import { RunNotifier, createRunNotifier } from './notification-dispatcher';
import { EmployerReferenceSet } from './employer-reference-set';
import { FinalState, PipelineState, RunRecorder, RunStatistics } from './run-stats';
import { Config } from '../config';
import { JobStore, JobsRepository } from '../db/jobs';
import { JobSource } from '../sources/base';
import { createJobSources } from '../sources';
import { JobRecord } from '../types/job';
import { logger } from '../utils/logger';

export interface PipelineDependencies {
  sources: JobSource[];
  tagger: SponsorshipTagger;
  store: JobStore;
  notifier?: RunNotifier | null;
}

export interface PipelineOptions {
  concurrentSources?: boolean;
  /** An empty fetch where every source failed ends the run as Failed */
  requireData?: boolean;
  /** Where to write the tagged unique records of each run */
  snapshotPath?: string | null;
  now?: () => Date;
}

class RunCancelledError extends Error {
  readonly name = 'RunCancelledError';

  constructor(readonly stage: PipelineState) {
    super(`Run cancelled before ${stage}`);
  }
}

/**
 * Runs fetch, deduplication, tagging and persistence as one state machine
 * `run` always resolves with the run's statistics
 */
export class JobPipeline {
  private state = PipelineState.Idle;
  private readonly fetcher: JobFetcherService;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions = {}
  ) {
    this.fetcher = new JobFetcherService(deps.sources, {
      concurrent: options.concurrentSources ?? true,
    });
  }

  get currentState(): PipelineState {
    return this.state;
  }

  private enter(state: PipelineState, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new RunCancelledError(state);
    }
    logger.info(`Pipeline: ${this.state} -> ${state}`);
    this.state = state;
  }

  async run(signal?: AbortSignal): Promise<RunStatistics> {
    const recorder = new RunRecorder(this.options.now);
    this.state = PipelineState.Idle;
    // Each run sees the reference files as they are now
    this.deps.tagger.reset();

    let tagged: JobRecord[] | null = null;
    let finalState: FinalState;
    try {
      const result = await this.execute(recorder, signal);
      finalState = result.state;
      tagged = result.tagged;
    } catch (error) {
      if (error instanceof RunCancelledError) {
        logger.warn(error.message);
        recorder.markCancelled();
        recorder.recordError(error.stage, error);
      } else {
        logger.error(`Pipeline failed in ${this.state}`, error);
        recorder.recordError(this.state, error);
      }
      finalState = PipelineState.Failed;
    }

    this.state = finalState;
    const stats = recorder.finish(finalState);
    logger.info(`Pipeline finished: ${finalState}`, {
      cancelled: stats.cancelled,
      fetched: stats.fetched,
      unique: stats.unique,
      inserted: stats.inserted,
      updated: stats.updated,
      errors: stats.errors.length,
    });

    if (tagged) {
      await this.writeSnapshot(tagged);
    }
    await this.notify(stats);
    return stats;
  }

  private async execute(
    recorder: RunRecorder,
    signal: AbortSignal | undefined
  ): Promise<{ state: FinalState; tagged: JobRecord[] | null }> {
    this.enter(PipelineState.Fetching, signal);
    const fetched = await this.fetcher.fetchAllJobs(signal);
    fetched.sources.forEach(source => recorder.recordSource(source));

    if (fetched.jobs.length === 0) {
      if (signal?.aborted) {
        throw new RunCancelledError(PipelineState.Deduplicating);
      }
      const allFailed = fetched.sources.every(source => source.failed);
      if (this.options.requireData && allFailed) {
        recorder.recordError(PipelineState.Fetching, new Error('No records fetched: every source failed'));
        return { state: PipelineState.Failed, tagged: null };
      }
      logger.info('No records fetched, nothing to do');
      return { state: PipelineState.Done, tagged: null };
    }

    this.enter(PipelineState.Deduplicating, signal);
    let unique: JobRecord[];
    try {
      const result = deduplicateJobs(fetched.jobs);
      recorder.recordDeduplication(result.duplicates, result.incomplete, result.jobs.length);
      unique = result.jobs;
      logger.info(`Deduplicated ${fetched.jobs.length} records to ${unique.length}`, {
        duplicates: result.duplicates,
        incomplete: result.incomplete,
      });
    } catch (error) {
      logger.error('Deduplication failed', error);
      recorder.recordError(PipelineState.Deduplicating, error);
      return { state: PipelineState.Failed, tagged: null };
    }

    this.enter(PipelineState.Tagging, signal);
    let tagged: JobRecord[];
    try {
      const result = await this.deps.tagger.tag(unique);
      tagged = result.jobs;
      recorder.recordTagging({
        likely: result.likely,
        noRecord: result.noRecord,
        unclassified: result.unclassified,
        lookupFailures: result.lookupFailures,
        available: result.referenceError === null,
      });
      if (result.referenceError !== null) {
        recorder.recordError(PipelineState.Tagging, new Error(result.referenceError));
      }
    } catch (error) {
      // Tagging never ends the run; records keep their Unclassified state
      logger.error('Tagging failed, continuing without sponsorship data', error);
      recorder.recordError(PipelineState.Tagging, error);
      recorder.recordTagging({
        likely: 0,
        noRecord: 0,
        unclassified: unique.length,
        lookupFailures: 0,
        available: false,
      });
      tagged = unique;
    }

    this.enter(PipelineState.Persisting, signal);
    try {
      const result = await this.deps.store.upsertJobs(tagged);
      recorder.recordPersistence(result.inserted, result.updated, result.skipped);
    } catch (error) {
      logger.error('Persistence failed', error);
      recorder.recordError(PipelineState.Persisting, error);
      return { state: PipelineState.Failed, tagged };
    }

    return { state: PipelineState.Done, tagged };
  }

  private async writeSnapshot(jobs: JobRecord[]): Promise<void> {
    const path = this.options.snapshotPath;
    if (!path) return;

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, `${JSON.stringify(jobs, null, 2)}\n`, 'utf-8');
      logger.info(`Saved ${jobs.length} jobs to ${path}`);
    } catch (error) {
      logger.error(`Could not write job snapshot ${path}`, error);
    }
  }

  private async notify(stats: RunStatistics): Promise<void> {
    if (!this.deps.notifier) return;

    try {
      await this.deps.notifier.notifyRunSummary(stats);
    } catch (error) {
      logger.error('Run summary notification failed', error);
    }
  }
}

/**
 * Wires the configured sources, reference set, store and notifier
 */
export function createPipeline(config: Config, store: JobStore = new JobsRepository()): JobPipeline {
  const tagger = new SponsorshipTagger(
    () =>
      EmployerReferenceSet.build({
        referenceFiles: config.sponsorship.referenceFiles,
        cacheFile: config.sponsorship.cacheFile,
        minCases: config.sponsorship.minCases,
      }),
    {
      useFuzzy: config.sponsorship.useFuzzy,
      threshold: config.sponsorship.fuzzyThreshold,
    }
  );

  return new JobPipeline(
    {
      sources: createJobSources(config),
      tagger,
      store,
      notifier: createRunNotifier(config.telegram),
    },
    {
      concurrentSources: config.pipeline.concurrentSources,
      requireData: config.pipeline.requireData,
      snapshotPath: config.pipeline.snapshotPath,
    }
  );
}
