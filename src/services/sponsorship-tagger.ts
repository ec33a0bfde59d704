import { EmployerReferenceSet, DEFAULT_FUZZY_THRESHOLD } from './employer-reference-set';
import { JobRecord, Sponsorship } from '../types/job';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type ReferenceSetLoader = () => Promise<EmployerReferenceSet>;

export interface TaggerOptions {
  useFuzzy: boolean;
  threshold?: number;
}

export interface TaggingResult {
  jobs: JobRecord[];
  likely: number;
  noRecord: number;
  unclassified: number;
  lookupFailures: number;
  /** Set when no sponsorship data was available for this call */
  referenceError: string | null;
}

/**
 * Classifies jobs against the employer reference set
 * The set is loaded on first use and kept until `reset`, which the pipeline calls once per run
 */
export class SponsorshipTagger {
  private referenceSet: Promise<EmployerReferenceSet | null> | null = null;
  private loadError: string | null = null;

  constructor(
    private readonly loadReferenceSet: ReferenceSetLoader,
    private readonly options: TaggerOptions
  ) {}

  /**
   * Drops the loaded set and any load failure; the next `tag` loads again
   */
  reset(): void {
    this.referenceSet = null;
    this.loadError = null;
  }

  private ensureReferenceSet(): Promise<EmployerReferenceSet | null> {
    if (!this.referenceSet) {
      this.referenceSet = this.loadReferenceSet().then(
        set => {
          logger.info(`Employer reference set ready with ${set.size} employers`, { origin: set.origin });
          return set;
        },
        (error: unknown) => {
          this.loadError = errorMessage(error);
          logger.error('Employer reference set unavailable, sponsorship left unclassified', error);
          return null;
        }
      );
    }
    return this.referenceSet;
  }

  private classify(set: EmployerReferenceSet, company: string): Sponsorship {
    const known = this.options.useFuzzy
      ? set.matchesApprox(company, this.options.threshold ?? DEFAULT_FUZZY_THRESHOLD)
      : set.hasExact(company);
    return known ? Sponsorship.LikelySponsorship : Sponsorship.NoRecordFound;
  }

  /**
   * Returns tagged copies; the input records are left as they are
   */
  async tag(jobs: JobRecord[]): Promise<TaggingResult> {
    const set = await this.ensureReferenceSet();
    if (!set) {
      return {
        jobs: jobs.map(job => ({ ...job, sponsorship: Sponsorship.Unclassified })),
        likely: 0,
        noRecord: 0,
        unclassified: jobs.length,
        lookupFailures: 0,
        referenceError: this.loadError,
      };
    }

    const result: TaggingResult = {
      jobs: [],
      likely: 0,
      noRecord: 0,
      unclassified: 0,
      lookupFailures: 0,
      referenceError: null,
    };

    for (const job of jobs) {
      let sponsorship: Sponsorship;
      try {
        sponsorship = this.classify(set, job.company);
      } catch (error) {
        logger.warn(`Sponsorship lookup failed for "${job.company}"`, { error: errorMessage(error) });
        result.lookupFailures++;
        sponsorship = Sponsorship.NoRecordFound;
      }

      if (sponsorship === Sponsorship.LikelySponsorship) {
        result.likely++;
      } else {
        result.noRecord++;
      }
      result.jobs.push({ ...job, sponsorship });
    }

    return result;
  }
}
