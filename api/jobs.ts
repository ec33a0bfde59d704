import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { JobsRepository } from '../src/db/jobs';
import { Sponsorship } from '../src/types/job';
import { logger } from '../src/utils/logger';

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

const emptyToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

export const jobsQuerySchema = z.object({
  company: z.preprocess(emptyToUndefined, z.string().trim().min(1).optional()),
  sponsorship: z.preprocess(emptyToUndefined, z.nativeEnum(Sponsorship).optional()),
  q: z.preprocess(emptyToUndefined, z.string().trim().min(1).optional()),
  source: z.preprocess(emptyToUndefined, z.enum(['simplify', 'jsearch']).optional()),
  remote: z.preprocess(emptyToUndefined, z.enum(['true', 'false']).optional()),
  limit: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  stats: z.string().optional(),
});

/**
 * Read-only listing of persisted jobs
 * `?stats=1` returns store statistics instead
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  if (req.method !== 'GET') {
    res.status(405).json({ error: 'Method not allowed' });
    return;
  }

  const parsed = jobsQuerySchema.safeParse({
    company: firstValue(req.query.company),
    sponsorship: firstValue(req.query.sponsorship),
    q: firstValue(req.query.q),
    source: firstValue(req.query.source),
    remote: firstValue(req.query.remote),
    limit: firstValue(req.query.limit),
    stats: firstValue(req.query.stats),
  });

  if (!parsed.success) {
    res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues });
    return;
  }

  const query = parsed.data;

  try {
    const jobsRepo = new JobsRepository();

    if (query.stats) {
      res.status(200).json(await jobsRepo.getStatistics());
      return;
    }

    const jobs = await jobsRepo.findJobs({
      company: query.company,
      sponsorship: query.sponsorship,
      keyword: query.q,
      source: query.source,
      remote: query.remote === undefined ? undefined : query.remote === 'true',
      limit: query.limit,
    });

    res.status(200).json({ count: jobs.length, jobs });
  } catch (error) {
    logger.error('Job query failed', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
