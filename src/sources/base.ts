import { JobSourceName, RawJob } from '../types/job';

export interface FetchOptions {
  /**
   * Run-level cancellation, propagated to in-flight requests and waits
   */
  signal?: AbortSignal;
}

/**
 * Output of one source fetch
 */
export interface SourceBatch<R extends RawJob = RawJob> {
  jobs: R[];
  /** Records dropped by the source's own validation */
  rejected: number;
  /** Retried requests, transient failures only */
  retries: number;
}

/**
 * Base interface for all job sources
 * Each source adapter must implement this interface
 */
export interface JobSource<R extends RawJob = RawJob> {
  /**
   * Unique identifier for the source, also the tag on every record it returns
   */
  readonly name: JobSourceName;

  /**
   * Fetches the source's current listings
   * Resolves with an empty batch when there is nothing to report
   */
  fetchJobs(options?: FetchOptions): Promise<SourceBatch<R>>;
}
