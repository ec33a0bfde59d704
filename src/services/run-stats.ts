import { JobSourceName } from '../types/job';
import { errorMessage } from '../utils/errors';

export enum PipelineState {
  Idle = 'Idle',
  Fetching = 'Fetching',
  Deduplicating = 'Deduplicating',
  Tagging = 'Tagging',
  Persisting = 'Persisting',
  Done = 'Done',
  Failed = 'Failed',
}

export type FinalState = PipelineState.Done | PipelineState.Failed;

export interface SourceStatistics {
  readonly source: JobSourceName;
  /** Normalized records the source contributed */
  readonly fetched: number;
  /** Dropped by the source or by the normalizer */
  readonly rejected: number;
  readonly retries: number;
  readonly failed: boolean;
  readonly error: string | null;
  readonly durationMs: number;
}

export interface StageError {
  readonly stage: PipelineState;
  readonly message: string;
}

export interface RunStatistics {
  readonly state: FinalState;
  readonly cancelled: boolean;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly sources: readonly SourceStatistics[];
  readonly fetched: number;
  readonly rejected: number;
  readonly retries: number;
  readonly duplicates: number;
  readonly incomplete: number;
  readonly unique: number;
  readonly likelySponsorship: number;
  readonly noRecordFound: number;
  readonly unclassified: number;
  readonly lookupFailures: number;
  readonly sponsorshipDataAvailable: boolean;
  readonly inserted: number;
  readonly updated: number;
  readonly skipped: number;
  readonly errors: readonly StageError[];
}

/**
 * Mutable counters of one run
 * Only the pipeline and the stage it is running write here
 */
export class RunRecorder {
  private readonly startedAt: Date;
  private readonly sources: SourceStatistics[] = [];
  private readonly errors: StageError[] = [];
  private cancelled = false;
  private dedup = { duplicates: 0, incomplete: 0, unique: 0 };
  private tagging = {
    likelySponsorship: 0,
    noRecordFound: 0,
    unclassified: 0,
    lookupFailures: 0,
    sponsorshipDataAvailable: false,
  };
  private persistence = { inserted: 0, updated: 0, skipped: 0 };

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = now();
  }

  recordSource(stats: SourceStatistics): void {
    this.sources.push(stats);
  }

  recordDeduplication(duplicates: number, incomplete: number, unique: number): void {
    this.dedup = { duplicates, incomplete, unique };
  }

  recordTagging(counts: {
    likely: number;
    noRecord: number;
    unclassified: number;
    lookupFailures: number;
    available: boolean;
  }): void {
    this.tagging = {
      likelySponsorship: counts.likely,
      noRecordFound: counts.noRecord,
      unclassified: counts.unclassified,
      lookupFailures: counts.lookupFailures,
      sponsorshipDataAvailable: counts.available,
    };
  }

  recordPersistence(inserted: number, updated: number, skipped: number): void {
    this.persistence = { inserted, updated, skipped };
  }

  recordError(stage: PipelineState, error: unknown): void {
    this.errors.push({ stage, message: errorMessage(error) });
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  /**
   * Frozen summary; later recorder calls do not affect it
   */
  finish(state: FinalState): RunStatistics {
    const finishedAt = this.now();
    const sources = Object.freeze(this.sources.map(source => Object.freeze({ ...source })));
    const sum = (pick: (source: SourceStatistics) => number): number =>
      sources.reduce((total, source) => total + pick(source), 0);

    return Object.freeze({
      state,
      cancelled: this.cancelled,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
      sources,
      fetched: sum(source => source.fetched),
      rejected: sum(source => source.rejected),
      retries: sum(source => source.retries),
      ...this.dedup,
      ...this.tagging,
      ...this.persistence,
      errors: Object.freeze(this.errors.map(error => Object.freeze({ ...error }))),
    });
  }
}
