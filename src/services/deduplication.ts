import { JobRecord } from '../types/job';
import { normalizeForKey } from '../utils/text';

export interface DeduplicationResult {
  jobs: JobRecord[];
  /** Records whose identity key was already seen */
  duplicates: number;
  /** Records with an empty key component */
  incomplete: number;
}

/**
 * Identity of a job across sources: company, title and location in comparison form
 * Null when any component is empty
 */
export function jobIdentityKey(job: JobRecord): string | null {
  const parts = [job.company, job.title, job.location].map(normalizeForKey);
  if (parts.some(part => part.length === 0)) return null;
  return parts.join('\u0000');
}

/**
 * Removes repeated jobs, keeping the first occurrence in input order
 */
export function deduplicateJobs(jobs: JobRecord[]): DeduplicationResult {
  const seen = new Set<string>();
  const unique: JobRecord[] = [];
  let duplicates = 0;
  let incomplete = 0;

  for (const job of jobs) {
    const key = jobIdentityKey(job);
    if (key === null) {
      incomplete++;
      continue;
    }
    if (seen.has(key)) {
      duplicates++;
      continue;
    }
    seen.add(key);
    unique.push(job);
  }

  return { jobs: unique, duplicates, incomplete };
}
