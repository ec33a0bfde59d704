import { JobSource } from './base';
import { SimplifySource } from './simplify';
import { JSearchSource } from './jsearch';
import { Config } from '../config';
import { HttpFetch } from '../utils/http';
import { logger } from '../utils/logger';

export interface SourceDependencies {
  fetchFn?: HttpFetch;
}

/**
 * Factory function to create enabled job sources based on configuration
 * Order here is the merge order of the fetched records
 */
export function createJobSources(config: Config, deps: SourceDependencies = {}): JobSource[] {
  const sources: JobSource[] = [];

  // The listing document only carries internships
  if (config.simplify.enabled && config.positionType !== 'fulltime') {
    sources.push(
      new SimplifySource({
        url: config.simplify.url,
        selfHost: config.simplify.selfHost,
        timeoutMs: config.http.timeoutMs,
        maxAttempts: config.http.maxRetries,
        fetchFn: deps.fetchFn,
      })
    );
  }

  if (config.jsearch.enabled && config.jsearch.apiKey) {
    sources.push(
      new JSearchSource({
        apiKey: config.jsearch.apiKey,
        apiUrl: config.jsearch.apiUrl,
        queries: config.jsearch.queries,
        positionType: config.positionType,
        datePosted: config.jsearch.datePosted,
        requestDelayMs: config.jsearch.requestDelayMs,
        maxAttempts: config.jsearch.maxRetries,
        backoffBaseMs: config.jsearch.backoffBaseMs,
        timeoutMs: config.http.timeoutMs,
        fetchFn: deps.fetchFn,
      })
    );
  } else if (config.jsearch.enabled) {
    logger.warn('JSearch enabled but JSEARCH_API_KEY is not set, skipping');
  }

  return sources;
}
