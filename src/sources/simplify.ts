import * as cheerio from 'cheerio';
import { FetchOptions, JobSource, SourceBatch } from './base';
import { SimplifyRawJob } from '../types/job';
import { HttpFetch, fetchWithRetry } from '../utils/http';
import { collapseWhitespace } from '../utils/text';
import { logger } from '../utils/logger';

/**
 * Marks a row that belongs to the company of the row above
 */
export const CONTINUATION_MARKER = '↳';

export interface SimplifySourceOptions {
  url: string;
  /** Host of the listing document itself; links back to it are not application links */
  selfHost: string;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs?: number;
  fetchFn?: HttpFetch;
}

function isSelfReference(href: string, selfHost: string): boolean {
  let host: string;
  try {
    host = new URL(href).hostname.toLowerCase();
  } catch {
    // Relative links resolve against the listing document
    return true;
  }
  const self = selfHost.toLowerCase();
  return host === self || host.endsWith(`.${self}`);
}

export function isApplicationLink(href: string | undefined, selfHost: string): href is string {
  if (!href) return false;
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return false;
  return !isSelfReference(trimmed, selfHost);
}

/**
 * Extracts listing rows from every table of the document
 * Invalid rows are counted in `rejected` and left out of `jobs`
 */
export function parseSimplifyTables(
  html: string,
  selfHost: string
): { jobs: SimplifyRawJob[]; rejected: number } {
  const $ = cheerio.load(html);
  const jobs: SimplifyRawJob[] = [];
  let rejected = 0;

  $('table').each((tableIdx, table) => {
    let currentCompany: string | null = null;
    let rowCount = 0;

    $(table).find('tr').each((_, tr) => {
      const cells = $(tr).children('td').toArray();
      if (cells.length < 3) return;
      rowCount++;

      const firstCol = collapseWhitespace($(cells[0]).text());
      if (firstCol && firstCol !== CONTINUATION_MARKER) {
        currentCompany = firstCol;
      }
      if (!currentCompany) {
        rejected++;
        return;
      }

      let link: string | null = null;
      for (const cell of cells.slice(2)) {
        const href = $(cell)
          .find('a[href]')
          .toArray()
          .map(a => $(a).attr('href'))
          .find(candidate => isApplicationLink(candidate, selfHost));
        if (href) {
          link = href.trim();
          break;
        }
      }

      const job: SimplifyRawJob = {
        source: 'simplify',
        company: currentCompany,
        title: collapseWhitespace($(cells[1]).text()),
        location: collapseWhitespace($(cells[2]).text()),
        link,
      };

      if (job.company && job.title && job.location && job.link) {
        jobs.push(job);
      } else {
        rejected++;
      }
    });

    logger.debug(`Simplify: table ${tableIdx + 1} processed ${rowCount} rows`);
  });

  return { jobs, rejected };
}

/**
 * Listing-table adapter
 * Reads the HTML tables embedded in the Simplify internships README
 */
export class SimplifySource implements JobSource<SimplifyRawJob> {
  readonly name = 'simplify';

  constructor(private readonly options: SimplifySourceOptions) {}

  async fetchJobs({ signal }: FetchOptions = {}): Promise<SourceBatch<SimplifyRawJob>> {
    logger.info(`Fetching listing tables from ${this.options.url}`);

    let retries = 0;
    const backoffBaseMs = this.options.backoffBaseMs ?? 2_000;
    const document = await fetchWithRetry(
      this.options.url,
      { headers: { Accept: 'text/html, text/markdown, text/plain' } },
      {
        maxAttempts: this.options.maxAttempts,
        timeoutMs: this.options.timeoutMs,
        backoffMs: attempt => backoffBaseMs * attempt,
      },
      {
        source: this.name,
        fetchFn: this.options.fetchFn,
        signal,
        onRetry: () => {
          retries++;
        },
      },
      response => response.text()
    );

    const { jobs, rejected } = parseSimplifyTables(document, this.options.selfHost);

    logger.info(`Fetched ${jobs.length} jobs from ${this.name}`, {
      documentLength: document.length,
      rejected,
      retries,
    });

    return { jobs, rejected, retries };
  }
}
