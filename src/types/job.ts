/**
 * Sponsorship classification
 * Only the sponsorship tagger sets anything other than Unclassified
 */
export enum Sponsorship {
  Unclassified = 'Unclassified',
  LikelySponsorship = 'Likely sponsorship',
  NoRecordFound = 'No record found',
}

export type JobSourceName = 'simplify' | 'jsearch';

export const DEFAULT_LOCATION = 'Not specified';

/**
 * Canonical job record
 * All sources are normalized to this structure
 */
export interface JobRecord {
  company: string;
  title: string;
  location: string;
  link: string;
  source: JobSourceName;
  remote: boolean;
  datePosted: Date | null;
  description: string | null;
  tags: string[];
  sponsorship: Sponsorship;
}

/**
 * Row from the table document, one per listing row
 */
export interface SimplifyRawJob {
  source: 'simplify';
  company: string;
  title: string;
  location: string;
  link: string | null;
}

/**
 * Item from the keyword search API
 */
export interface JSearchRawJob {
  source: 'jsearch';
  jobId: string;
  employerName: string;
  jobTitle: string;
  city: string | null;
  state: string | null;
  country: string | null;
  applyLink: string;
  postedAtUtc: string | null;
  description: string | null;
  isRemote: boolean | null;
  employmentTypes: string[];
}

export type RawJob = SimplifyRawJob | JSearchRawJob;

/**
 * Persisted job row as returned by read queries
 */
export interface StoredJob extends JobRecord {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}
