import { z } from 'zod';
import { FetchOptions, JobSource, SourceBatch } from './base';
import { PositionType } from '../config';
import { JSearchRawJob } from '../types/job';
import { FetchError, errorMessage } from '../utils/errors';
import { HttpFetch, fetchWithRetry } from '../utils/http';
import { sleep } from '../utils/sleep';
import { logger } from '../utils/logger';

const SOURCE_NAME = 'jsearch';

export interface JSearchSourceOptions {
  apiKey: string;
  apiUrl: string;
  queries: string[];
  positionType: PositionType;
  /** `all`, `today`, `3days`, `week` or `month` */
  datePosted: string;
  /** Pause between two keyword requests */
  requestDelayMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  timeoutMs: number;
  fetchFn?: HttpFetch;
}

const payloadSchema = z.object({
  data: z.array(z.unknown()),
});

const jobSchema = z.object({
  job_id: z.string().nullish(),
  employer_name: z.string().nullish(),
  job_title: z.string().nullish(),
  job_city: z.string().nullish(),
  job_state: z.string().nullish(),
  job_country: z.string().nullish(),
  job_apply_link: z.string().nullish(),
  job_posted_at_datetime_utc: z.string().nullish(),
  job_description: z.string().nullish(),
  job_is_remote: z.boolean().nullish(),
  job_employment_types: z.array(z.string()).nullish(),
  job_employment_type: z.string().nullish(),
});

type JSearchJob = z.infer<typeof jobSchema>;

export function buildSearchQuery(query: string, positionType: PositionType): string {
  const base = query.trim();
  switch (positionType) {
    case 'intern':
      return base ? `${base} intern` : 'intern';
    case 'fulltime':
      return base ? `${base} entry level` : 'entry level';
    case 'both':
      return base || 'developer';
  }
}

function employmentTypesParam(positionType: PositionType): string | null {
  switch (positionType) {
    case 'intern':
      return 'INTERN';
    case 'fulltime':
      return 'FULLTIME';
    case 'both':
      return null;
  }
}

export function matchesPositionType(employmentTypes: string[], positionType: PositionType): boolean {
  const types = employmentTypes.map(type => type.toUpperCase());
  switch (positionType) {
    case 'intern':
      return types.includes('INTERN');
    case 'fulltime':
      return types.includes('FULLTIME');
    case 'both':
      return types.includes('INTERN') || types.includes('FULLTIME');
  }
}

function employmentTypesOf(job: JSearchJob): string[] {
  if (job.job_employment_types && job.job_employment_types.length > 0) {
    return job.job_employment_types;
  }
  return job.job_employment_type ? [job.job_employment_type] : [];
}

function toRawJob(job: JSearchJob): JSearchRawJob | null {
  const jobId = job.job_id?.trim();
  const applyLink = job.job_apply_link?.trim();
  if (!jobId || !applyLink) return null;

  return {
    source: 'jsearch',
    jobId,
    employerName: job.employer_name ?? '',
    jobTitle: job.job_title ?? '',
    city: job.job_city ?? null,
    state: job.job_state ?? null,
    country: job.job_country ?? null,
    applyLink,
    postedAtUtc: job.job_posted_at_datetime_utc ?? null,
    description: job.job_description ?? null,
    isRemote: job.job_is_remote ?? null,
    employmentTypes: employmentTypesOf(job),
  };
}

interface KeywordResult {
  jobs: JSearchRawJob[];
  rejected: number;
  filtered: number;
}

/**
 * Maps one response payload; returns null when the payload is malformed
 */
export function parseJSearchPayload(payload: unknown, positionType: PositionType): KeywordResult | null {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success) return null;

  const result: KeywordResult = { jobs: [], rejected: 0, filtered: 0 };
  for (const item of parsed.data.data) {
    const job = jobSchema.safeParse(item);
    const raw = job.success ? toRawJob(job.data) : null;
    if (!raw) {
      result.rejected++;
      continue;
    }
    if (!matchesPositionType(raw.employmentTypes, positionType)) {
      result.filtered++;
      continue;
    }
    result.jobs.push(raw);
  }
  return result;
}

function isAuthFailure(error: FetchError): boolean {
  return error.status === 401 || error.status === 403;
}

/**
 * Keyword-search adapter for the JSearch API
 * Requests run one at a time with a fixed pause between keywords
 */
export class JSearchSource implements JobSource<JSearchRawJob> {
  readonly name = SOURCE_NAME;

  constructor(private readonly options: JSearchSourceOptions) {}

  async fetchJobs({ signal }: FetchOptions = {}): Promise<SourceBatch<JSearchRawJob>> {
    const { queries, positionType, requestDelayMs } = this.options;
    const seen = new Set<string>();
    const jobs: JSearchRawJob[] = [];
    let rejected = 0;
    let retries = 0;

    for (let i = 0; i < queries.length; i++) {
      if (i > 0) {
        logger.debug(`JSearch: waiting ${requestDelayMs}ms before next query`);
        await sleep(requestDelayMs, signal);
      }

      const searchQuery = buildSearchQuery(queries[i], positionType);
      logger.info(`JSearch: query ${i + 1}/${queries.length} "${searchQuery}"`);

      let payload: unknown;
      try {
        payload = await this.request(searchQuery, signal, () => {
          retries++;
        });
      } catch (error) {
        if (!(error instanceof FetchError)) throw error;

        if (error.transient) {
          logger.error(`JSearch: giving up after retries, keeping ${jobs.length} jobs`, error);
          if (jobs.length === 0) throw error;
          break;
        }
        if (isAuthFailure(error)) {
          logger.error('JSearch: request not authorized, check JSEARCH_API_KEY', error);
          if (jobs.length === 0) throw error;
          break;
        }
        logger.warn(`JSearch: skipping query "${searchQuery}"`, { error: error.message });
        continue;
      }

      const result = parseJSearchPayload(payload, positionType);
      if (!result) {
        logger.warn(`JSearch: malformed payload for "${searchQuery}", skipping`);
        continue;
      }

      rejected += result.rejected;
      let added = 0;
      for (const job of result.jobs) {
        if (seen.has(job.jobId)) continue;
        seen.add(job.jobId);
        jobs.push(job);
        added++;
      }

      logger.info(`JSearch: ${added} new positions for "${searchQuery}"`, {
        rejected: result.rejected,
        filtered: result.filtered,
      });
    }

    logger.info(`Fetched ${jobs.length} jobs from ${this.name}`, { rejected, retries });
    return { jobs, rejected, retries };
  }

  private async request(
    searchQuery: string,
    signal: AbortSignal | undefined,
    onRetry: () => void
  ): Promise<unknown> {
    const params = new URLSearchParams({
      query: searchQuery,
      page: '1',
      num_pages: '1',
      date_posted: this.options.datePosted,
    });
    const employmentTypes = employmentTypesParam(this.options.positionType);
    if (employmentTypes) {
      params.set('employment_types', employmentTypes);
    }

    const body = await fetchWithRetry(
      `${this.options.apiUrl}?${params.toString()}`,
      {
        headers: {
          'X-API-Key': this.options.apiKey,
          Accept: 'application/json',
        },
      },
      {
        maxAttempts: this.options.maxAttempts,
        timeoutMs: this.options.timeoutMs,
        backoffMs: attempt => attempt * this.options.backoffBaseMs,
      },
      { source: this.name, fetchFn: this.options.fetchFn, signal, onRetry },
      response => response.text()
    );

    try {
      const payload: unknown = JSON.parse(body);
      return payload;
    } catch (error) {
      logger.warn(`JSearch: response for "${searchQuery}" is not JSON`, { error: errorMessage(error) });
      return null;
    }
  }
}
