import {
  DEFAULT_LOCATION,
  JSearchRawJob,
  JobRecord,
  RawJob,
  SimplifyRawJob,
  Sponsorship,
} from '../types/job';
import { ValidationRejectedError } from '../utils/errors';
import { cleanDisplayText, collapseWhitespace } from '../utils/text';

const REMOTE_PATTERN = /\bremote\b/i;

export function inferRemote(location: string): boolean {
  return REMOTE_PATTERN.test(location);
}

export function parsePostedDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

function joinLocation(parts: Array<string | null>): string {
  return parts
    .map(part => collapseWhitespace(part ?? ''))
    .filter(part => part.length > 0)
    .join(', ');
}

function fromSimplify(raw: SimplifyRawJob): JobRecord {
  const location = collapseWhitespace(raw.location) || DEFAULT_LOCATION;
  return {
    company: cleanDisplayText(raw.company),
    title: collapseWhitespace(raw.title),
    location,
    link: raw.link?.trim() ?? '',
    source: 'simplify',
    remote: inferRemote(location),
    datePosted: null,
    description: null,
    tags: [],
    sponsorship: Sponsorship.Unclassified,
  };
}

function fromJSearch(raw: JSearchRawJob): JobRecord {
  const location = joinLocation([raw.city, raw.state, raw.country]) || DEFAULT_LOCATION;
  const description = raw.description?.trim();
  return {
    company: cleanDisplayText(raw.employerName),
    title: collapseWhitespace(raw.jobTitle),
    location,
    link: raw.applyLink.trim(),
    source: 'jsearch',
    remote: raw.isRemote ?? inferRemote(location),
    datePosted: parsePostedDate(raw.postedAtUtc),
    description: description ? description : null,
    tags: [...raw.employmentTypes],
    sponsorship: Sponsorship.Unclassified,
  };
}

/**
 * Converts a source record into the canonical job record
 * Throws ValidationRejectedError when a required field is empty after cleaning
 */
export function normalizeJob(raw: RawJob): JobRecord {
  const job = raw.source === 'simplify' ? fromSimplify(raw) : fromJSearch(raw);

  if (!job.company) throw new ValidationRejectedError('empty company');
  if (!job.title) throw new ValidationRejectedError('empty title');
  if (!job.link) throw new ValidationRejectedError('empty link');

  return job;
}
