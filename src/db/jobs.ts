import { z } from 'zod';
import { ConnectionPool, Queryable, getPool, withTransaction } from './client';
import { JobRecord, JobSourceName, Sponsorship, StoredJob } from '../types/job';
import { PersistenceError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const UPSERT_CHUNK_SIZE = 1000;
export const DEFAULT_QUERY_LIMIT = 100;
export const MAX_QUERY_LIMIT = 500;

const JOB_COLUMNS = [
  'company',
  'title',
  'location',
  'link',
  'sponsorship',
  'source',
  'remote',
  'date_posted',
  'description',
  'tags',
] as const;

export interface UpsertResult {
  inserted: number;
  updated: number;
  /** Records without a link, or repeating a link earlier in the same batch */
  skipped: number;
}

/**
 * Write side used by the pipeline
 */
export interface JobStore {
  upsertJobs(jobs: JobRecord[]): Promise<UpsertResult>;
}

export interface JobQuery {
  /** Case-insensitive substring of the company name */
  company?: string;
  sponsorship?: Sponsorship;
  /** Case-insensitive substring of company, title, location or description */
  keyword?: string;
  source?: JobSourceName;
  remote?: boolean;
  limit?: number;
}

export interface JobStatistics {
  total: number;
  uniqueCompanies: number;
  remote: number;
  bySponsorship: Record<string, number>;
  bySource: Record<string, number>;
}

const upsertRowSchema = z.object({ inserted: z.boolean() });

const jobRowSchema = z.object({
  id: z.string(),
  company: z.string(),
  title: z.string(),
  location: z.string(),
  link: z.string(),
  sponsorship: z.nativeEnum(Sponsorship),
  source: z.enum(['simplify', 'jsearch']),
  remote: z.boolean(),
  date_posted: z.date().nullable(),
  description: z.string().nullable(),
  tags: z.array(z.string()).nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

const totalsRowSchema = z.object({
  total: z.coerce.number(),
  unique_companies: z.coerce.number(),
  remote: z.coerce.number(),
});

const groupRowSchema = z.object({
  key: z.string(),
  count: z.coerce.number(),
});

function toStoredJob(row: unknown): StoredJob {
  const parsed = jobRowSchema.parse(row);
  return {
    id: parsed.id,
    company: parsed.company,
    title: parsed.title,
    location: parsed.location,
    link: parsed.link,
    sponsorship: parsed.sponsorship,
    source: parsed.source,
    remote: parsed.remote,
    datePosted: parsed.date_posted,
    description: parsed.description,
    tags: parsed.tags ?? [],
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at,
  };
}

/**
 * ILIKE pattern matching `text` anywhere, with its own wildcards taken literally
 */
export function containsPattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, match => `\\${match}`)}%`;
}

/**
 * Multi-row upsert keyed on the link; every mutable column is overwritten
 */
export function buildUpsertStatement(jobs: JobRecord[]): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const tuples = jobs.map(job => {
    const row = [
      job.company,
      job.title,
      job.location,
      job.link,
      job.sponsorship,
      job.source,
      job.remote,
      job.datePosted,
      job.description,
      job.tags,
    ];
    const placeholders = row.map(value => {
      values.push(value);
      return `$${values.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  const updates = JOB_COLUMNS.filter(column => column !== 'link')
    .map(column => `${column} = EXCLUDED.${column}`)
    .concat('updated_at = NOW()');

  const text = `INSERT INTO jobs (${JOB_COLUMNS.join(', ')})
VALUES ${tuples.join(',\n       ')}
ON CONFLICT (link) DO UPDATE SET
  ${updates.join(',\n  ')}
RETURNING (xmax = 0) AS inserted`;

  return { text, values };
}

/**
 * Database operations for jobs
 * The link is the natural key, so repeated runs converge on one row per posting
 */
export class JobsRepository implements JobStore {
  constructor(private readonly pool: ConnectionPool = getPool()) {}

  /**
   * Inserts or updates every job in one transaction
   * Throws PersistenceError after rolling back when any statement fails
   */
  async upsertJobs(jobs: JobRecord[]): Promise<UpsertResult> {
    const seen = new Set<string>();
    const rows: JobRecord[] = [];
    let skipped = 0;

    for (const job of jobs) {
      const link = job.link.trim();
      if (!link || seen.has(link)) {
        skipped++;
        continue;
      }
      seen.add(link);
      rows.push({ ...job, link });
    }

    if (rows.length === 0) {
      return { inserted: 0, updated: 0, skipped };
    }

    try {
      const { inserted, updated } = await withTransaction(
        client => this.upsertChunks(client, rows),
        this.pool
      );
      logger.info('Upsert complete', { inserted, updated, skipped });
      return { inserted, updated, skipped };
    } catch (error) {
      throw new PersistenceError(`Bulk upsert of ${rows.length} jobs failed: ${errorMessage(error)}`, error);
    }
  }

  private async upsertChunks(
    client: Queryable,
    rows: JobRecord[]
  ): Promise<{ inserted: number; updated: number }> {
    let inserted = 0;
    let updated = 0;

    for (let start = 0; start < rows.length; start += UPSERT_CHUNK_SIZE) {
      const { text, values } = buildUpsertStatement(rows.slice(start, start + UPSERT_CHUNK_SIZE));
      const result = await client.query(text, values);
      for (const row of result.rows) {
        if (upsertRowSchema.parse(row).inserted) {
          inserted++;
        } else {
          updated++;
        }
      }
    }

    return { inserted, updated };
  }

  /**
   * Filtered listing, newest first
   */
  async findJobs(query: JobQuery = {}): Promise<StoredJob[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    const param = (value: unknown): string => {
      values.push(value);
      return `$${values.length}`;
    };

    if (query.company) {
      conditions.push(`company ILIKE ${param(containsPattern(query.company))} ESCAPE '\\'`);
    }
    if (query.sponsorship) {
      conditions.push(`sponsorship = ${param(query.sponsorship)}`);
    }
    if (query.source) {
      conditions.push(`source = ${param(query.source)}`);
    }
    if (query.remote !== undefined) {
      conditions.push(`remote = ${param(query.remote)}`);
    }
    if (query.keyword) {
      const pattern = `${param(containsPattern(query.keyword))} ESCAPE '\\'`;
      conditions.push(
        `(company ILIKE ${pattern} OR title ILIKE ${pattern} OR location ILIKE ${pattern} OR description ILIKE ${pattern})`
      );
    }

    const limit = Math.min(Math.max(query.limit ?? DEFAULT_QUERY_LIMIT, 1), MAX_QUERY_LIMIT);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const result = await this.pool.query(
      `SELECT id, company, title, location, link, sponsorship, source, remote,
        date_posted, description, tags, created_at, updated_at
      FROM jobs
      ${where}
      ORDER BY created_at DESC
      LIMIT ${param(limit)}`,
      values
    );

    return result.rows.map(toStoredJob);
  }

  async getStatistics(): Promise<JobStatistics> {
    const totals = await this.pool.query(
      `SELECT COUNT(*) AS total,
        COUNT(DISTINCT company) AS unique_companies,
        COUNT(*) FILTER (WHERE remote) AS remote
      FROM jobs`
    );
    const bySponsorship = await this.pool.query(
      'SELECT sponsorship AS key, COUNT(*) AS count FROM jobs GROUP BY sponsorship'
    );
    const bySource = await this.pool.query(
      'SELECT source AS key, COUNT(*) AS count FROM jobs GROUP BY source'
    );

    const summary = totalsRowSchema.parse(totals.rows[0] ?? { total: 0, unique_companies: 0, remote: 0 });
    const toRecord = (rows: unknown[]): Record<string, number> =>
      Object.fromEntries(rows.map(row => groupRowSchema.parse(row)).map(({ key, count }) => [key, count]));

    return {
      total: summary.total,
      uniqueCompanies: summary.unique_companies,
      remote: summary.remote,
      bySponsorship: toRecord(bySponsorship.rows),
      bySource: toRecord(bySource.rows),
    };
  }
}
