import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'stream';
import { Response } from 'node-fetch';
import {
  JSearchSource,
  JSearchSourceOptions,
  buildSearchQuery,
  matchesPositionType,
  parseJSearchPayload,
} from './jsearch';
import { FetchError } from '../utils/errors';
import { HttpFetch } from '../utils/http';

function item(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    job_id: id,
    employer_name: `Employer ${id}`,
    job_title: 'Software Intern',
    job_city: 'Austin',
    job_state: 'TX',
    job_country: 'US',
    job_apply_link: `https://apply.example.com/${id}`,
    job_posted_at_datetime_utc: '2026-03-01T12:00:00.000Z',
    job_description: 'Build things',
    job_is_remote: false,
    job_employment_types: ['INTERN'],
    ...overrides,
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function source(fetchFn: HttpFetch, overrides: Partial<JSearchSourceOptions> = {}): JSearchSource {
  return new JSearchSource({
    apiKey: 'test-secret',
    apiUrl: 'https://api.example.com/jsearch/search',
    queries: ['software'],
    positionType: 'intern',
    datePosted: 'week',
    requestDelayMs: 0,
    maxAttempts: 3,
    backoffBaseMs: 0,
    timeoutMs: 1_000,
    fetchFn,
    ...overrides,
  });
}

describe('buildSearchQuery', () => {
  it('suffixes the query by position type', () => {
    expect(buildSearchQuery('software', 'intern')).toBe('software intern');
    expect(buildSearchQuery('software', 'fulltime')).toBe('software entry level');
    expect(buildSearchQuery('software', 'both')).toBe('software');
    expect(buildSearchQuery('', 'both')).toBe('developer');
  });
});

describe('matchesPositionType', () => {
  it('keeps intern or full-time listings for both', () => {
    expect(matchesPositionType(['INTERN'], 'both')).toBe(true);
    expect(matchesPositionType(['FULLTIME'], 'both')).toBe(true);
    expect(matchesPositionType(['CONTRACTOR'], 'both')).toBe(false);
    expect(matchesPositionType(['FULLTIME'], 'intern')).toBe(false);
  });
});

describe('parseJSearchPayload', () => {
  it('rejects items without an id or apply link', () => {
    const result = parseJSearchPayload(
      { data: [item('a'), item('b', { job_id: null }), item('c', { job_apply_link: '' }), 'junk'] },
      'intern'
    );
    expect(result?.jobs.map(job => job.jobId)).toEqual(['a']);
    expect(result?.rejected).toBe(3);
  });

  it('falls back to the single employment type field', () => {
    const result = parseJSearchPayload(
      { data: [item('a', { job_employment_types: undefined, job_employment_type: 'INTERN' })] },
      'intern'
    );
    expect(result?.jobs[0].employmentTypes).toEqual(['INTERN']);
  });

  it('returns null for a malformed payload', () => {
    expect(parseJSearchPayload({ status: 'OK' }, 'intern')).toBeNull();
    expect(parseJSearchPayload(null, 'intern')).toBeNull();
  });
});

describe('JSearchSource', () => {
  it('recovers from a rate limit and records one retry', async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(new Response('Too Many Requests', { status: 429 }))
      .mockResolvedValueOnce(json({ data: [item('a'), item('b')] }));

    const batch = await source(fetchFn).fetchJobs();

    expect(batch.jobs.map(job => job.jobId)).toEqual(['a', 'b']);
    expect(batch.retries).toBe(1);
    expect(batch.rejected).toBe(0);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('sends the key header and search parameters', async () => {
    const fetchFn = vi.fn<HttpFetch>().mockResolvedValue(json({ data: [] }));

    await source(fetchFn).fetchJobs();

    const [url, init] = fetchFn.mock.calls[0];
    const params = new URL(url).searchParams;
    expect(params.get('query')).toBe('software intern');
    expect(params.get('employment_types')).toBe('INTERN');
    expect(params.get('date_posted')).toBe('week');
    expect(params.get('num_pages')).toBe('1');
    expect(init?.headers).toMatchObject({ 'X-API-Key': 'test-secret' });
  });

  it('omits the employment type filter for both', async () => {
    const fetchFn = vi.fn<HttpFetch>().mockResolvedValue(json({ data: [] }));

    await source(fetchFn, { positionType: 'both' }).fetchJobs();

    const params = new URL(fetchFn.mock.calls[0][0]).searchParams;
    expect(params.get('query')).toBe('software');
    expect(params.has('employment_types')).toBe(false);
  });

  it('keeps earlier results when retries run out', async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(json({ data: [item('a')] }))
      .mockImplementation(async () => new Response('', { status: 503 }));

    const batch = await source(fetchFn, { queries: ['software', 'data', 'design'] }).fetchJobs();

    expect(batch.jobs.map(job => job.jobId)).toEqual(['a']);
    expect(batch.retries).toBe(2);
    // One successful call plus three attempts for the second query; the third is never sent
    expect(fetchFn).toHaveBeenCalledTimes(4);
  });

  it('fails when retries run out before anything was collected', async () => {
    const fetchFn = vi.fn<HttpFetch>().mockImplementation(async () => new Response('', { status: 503 }));

    await expect(source(fetchFn).fetchJobs()).rejects.toMatchObject({ name: 'FetchError', transient: true });
  });

  it('fails on a rejected key without retrying', async () => {
    const fetchFn = vi.fn<HttpFetch>().mockResolvedValue(new Response('Forbidden', { status: 403 }));

    const error = await source(fetchFn).fetchJobs().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ transient: false, status: 403 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('returns partial results when the key is rejected later', async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(json({ data: [item('a')] }))
      .mockResolvedValueOnce(new Response('Unauthorized', { status: 401 }));

    const batch = await source(fetchFn, { queries: ['software', 'data', 'design'] }).fetchJobs();

    expect(batch.jobs.map(job => job.jobId)).toEqual(['a']);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('skips a query with a malformed payload', async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(json({ unexpected: true }))
      .mockResolvedValueOnce(json({ data: [item('b')] }));

    const batch = await source(fetchFn, { queries: ['software', 'data'] }).fetchJobs();

    expect(batch.jobs.map(job => job.jobId)).toEqual(['b']);
    expect(batch.retries).toBe(0);
  });

  it('retries a response whose body is cut off by the connection', async () => {
    const dropped = new Readable({
      read() {
        this.destroy(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));
      },
    });
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(new Response(dropped, { status: 200 }))
      .mockResolvedValueOnce(json({ data: [item('a')] }));

    const batch = await source(fetchFn).fetchJobs();

    expect(batch.jobs.map(job => job.jobId)).toEqual(['a']);
    expect(batch.retries).toBe(1);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('skips a complete body that is not JSON without retrying', async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }))
      .mockResolvedValueOnce(json({ data: [item('b')] }));

    const batch = await source(fetchFn, { queries: ['software', 'data'] }).fetchJobs();

    expect(batch.jobs.map(job => job.jobId)).toEqual(['b']);
    expect(batch.retries).toBe(0);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('deduplicates across queries by job id', async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(json({ data: [item('a'), item('b')] }))
      .mockResolvedValueOnce(json({ data: [item('b'), item('c')] }));

    const batch = await source(fetchFn, { queries: ['software', 'data'] }).fetchJobs();

    expect(batch.jobs.map(job => job.jobId)).toEqual(['a', 'b', 'c']);
  });

  it('waits between queries', async () => {
    vi.useFakeTimers();
    try {
      const fetchFn = vi.fn<HttpFetch>().mockImplementation(async () => json({ data: [] }));
      const pending = source(fetchFn, { queries: ['software', 'data'], requestDelayMs: 2_000 }).fetchJobs();

      await vi.advanceTimersByTimeAsync(1_999);
      expect(fetchFn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(fetchFn).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
